export type StepId = 'stopping' | 'analyzing' | 'normalizing' | 'merging' | 'vertical';
export type StepStatus = 'pending' | 'running' | 'complete' | 'failed' | 'skipped';
export type SessionStage = 'idle' | 'countdown' | 'recording' | 'processing';
export type PipelineResult = 'running' | 'completed' | 'failed';
export type ProducedFileKind = 'video' | 'audio' | 'webcam' | 'merged' | 'vertical';

export interface CaptureCapabilities {
  hasAudio: boolean;
  hasScreen: boolean;
  hasWebcam: boolean;
  createVertical: boolean;
}

export interface LogoSelection {
  left?: string;
  right?: string;
  bottom?: string;
  titleColor?: string;
}

export interface RecordingRequest {
  title: string;
  description: string;
  topic: string;
  presenter: string;
  monitor?: string;
  recordAudio: boolean;
  recordScreen: boolean;
  recordWebcam: boolean;
  verticalVideo: boolean;
  logos: LogoSelection;
}

export interface ProducedFile {
  kind: ProducedFileKind;
  path: string;
}

export interface ExternalRecordingChange {
  active: boolean;
  pids: string[];
}

export interface AppConfig {
  captureBin: string;
  externalCaptureProcess: string;
  videosDir: string;
  logDir: string;
  logToConsole: boolean;
  defaultMonitor: string;
  countdownSeconds: number;
  completeHoldMs: number;
  sentinelPollMs: number;
  relayQueueCapacity: number;
  captureStartDelayMs: number;
  captureStopTimeoutMs: number;
  audioCues: boolean;
  recordAudio: boolean;
  recordScreen: boolean;
  recordWebcam: boolean;
  verticalVideo: boolean;
  logos: LogoSelection;
  presenter: string;
}
