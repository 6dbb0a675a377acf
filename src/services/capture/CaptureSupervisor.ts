import { ProgressSink } from '../../core/pipeline/ProgressEvent';
import { LogoSelection, ProducedFile, ProducedFileKind } from '../../types';

export interface CaptureMetadataUpdater {
  recordFile(kind: ProducedFileKind, filePath: string): Promise<void>;
}

export interface CaptureOptions {
  outputDir: string;
  monitor: string;
  audioEnabled: boolean;
  screenEnabled: boolean;
  webcamEnabled: boolean;
  verticalEnabled: boolean;
  logos: LogoSelection;
  metadata: CaptureMetadataUpdater;
}

export interface CaptureStatus {
  isRecording: boolean;
  outputDir?: string;
  producedFiles: ProducedFile[];
}

// Owns the recorders and the post-processing run; encoding never happens in this process.
export interface CaptureSupervisor {
  start(options: CaptureOptions): Promise<void>;
  stop(): Promise<void>;
  // Points post-processing at an earlier recording without starting capture.
  useSession(options: CaptureOptions): void;
  getStatus(): CaptureStatus;
  runPipelineWithProgress(sink: ProgressSink): Promise<void>;
  abortProcessing(): void;
}
