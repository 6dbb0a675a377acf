import { EventEmitter } from 'node:events';
import { StructuredLogger } from '../logging/StructuredLogger';
import { CaptureOptions, CaptureStatus, CaptureSupervisor } from '../services/capture/CaptureSupervisor';
import { CountdownCue } from '../services/cue/ToneCountdownCue';
import { RecordingInfoStore } from '../services/metadata/FileRecordingInfoStore';
import { RecordingInfo } from '../services/metadata/RecordingInfo';
import { ExternalRecordingChange, PipelineResult, RecordingRequest, SessionStage } from '../types';
import { ExternalRecordingSentinel } from './ExternalRecordingSentinel';
import { PipelineBackend, PipelineDriver } from './pipeline/PipelineDriver';
import { ProcessingSnapshot, SkipOptions, deriveCapabilities } from './pipeline/ProcessingState';
import { PipelineOutcome } from './pipeline/ProgressRelay';

const COUNTDOWN_TICK_MS = 1000;

export interface SessionControllerDependencies {
  supervisor: CaptureSupervisor;
  metadata: RecordingInfoStore;
  cue?: CountdownCue;
  sentinel?: ExternalRecordingSentinel;
  clock?: () => number;
}

export interface SessionControllerOptions {
  countdownSeconds: number;
  completeHoldMs: number;
  defaultMonitor: string;
  relayQueueCapacity: number;
}

export interface SessionSnapshot {
  stage: SessionStage;
  countdownRemaining?: number;
  processing: ProcessingSnapshot;
  pipelineResult?: PipelineResult;
  error?: string;
  title?: string;
  outputDir?: string;
  externalRecording: ExternalRecordingChange;
}

interface ActiveSession {
  generation: number;
  request: RecordingRequest;
  info?: RecordingInfo;
}

const requestFromInfo = (info: RecordingInfo): RecordingRequest => ({
  title: info.metadata.title,
  description: info.metadata.description,
  topic: info.metadata.topic,
  presenter: info.metadata.presenter,
  monitor: info.environment.monitor || undefined,
  recordAudio: info.settings.audioEnabled,
  recordScreen: info.settings.screenEnabled,
  recordWebcam: info.settings.webcamEnabled,
  verticalVideo: info.settings.verticalEnabled,
  logos: {
    left: info.settings.logoLeft,
    right: info.settings.logoRight,
    bottom: info.settings.logoBottom,
    titleColor: info.settings.titleColor
  }
});

export declare interface SessionController {
  on(event: 'stateChanged', listener: (snapshot: SessionSnapshot) => void): this;
  on(event: 'countdownTick', listener: (remaining: number) => void): this;
  on(event: 'pipelineDone', listener: (outcome: PipelineOutcome) => void): this;
  on(event: 'externalRecordingChanged', listener: (change: ExternalRecordingChange) => void): this;
}

// Idle -> Countdown -> Recording -> Processing. Requests outside those transitions are ignored.
export class SessionController extends EventEmitter {
  private stage: SessionStage = 'idle';
  private generation = 0;
  private session: ActiveSession | undefined;
  private countdownRemaining: number | undefined;
  private captureStarting = false;
  private pipelineResult: PipelineResult | undefined;
  private error: string | undefined;
  private externalRecording: ExternalRecordingChange = { active: false, pids: [] };
  private countdownTimer: NodeJS.Timeout | undefined;
  private holdTimer: NodeJS.Timeout | undefined;
  private pipelineRun: Promise<PipelineOutcome> | undefined;
  private readonly driver: PipelineDriver;

  public constructor(
    private readonly deps: SessionControllerDependencies,
    private readonly options: SessionControllerOptions,
    private readonly logger?: StructuredLogger
  ) {
    super();
    this.driver = new PipelineDriver(
      { queueCapacity: options.relayQueueCapacity, clock: deps.clock },
      logger
    );
  }

  public start(): void {
    const { sentinel } = this.deps;
    if (!sentinel) {
      return;
    }

    sentinel.on('changed', (change) => {
      this.externalRecording = change;
      this.emit('externalRecordingChanged', change);
      this.emitState();
    });

    void sentinel.poll().catch((error) => {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Initial external recording check failed', { detail });
    });
    sentinel.start(() => this.stage !== 'countdown');
  }

  public getStage(): SessionStage {
    return this.stage;
  }

  public getCaptureStatus(): CaptureStatus {
    return this.deps.supervisor.getStatus();
  }

  public getSnapshot(): SessionSnapshot {
    return {
      stage: this.stage,
      countdownRemaining: this.countdownRemaining,
      processing: this.driver.snapshot(),
      pipelineResult: this.pipelineResult,
      error: this.error,
      title: this.session?.request.title,
      outputDir: this.session?.info?.files.folderPath,
      externalRecording: this.externalRecording
    };
  }

  public requestNewRecording(request: RecordingRequest): boolean {
    if (this.stage !== 'idle') {
      return false;
    }

    this.generation += 1;
    this.session = { generation: this.generation, request };
    this.error = undefined;
    this.pipelineResult = undefined;
    this.captureStarting = false;
    this.countdownRemaining = this.options.countdownSeconds;

    this.logger?.info('Countdown started', {
      title: request.title,
      seconds: this.options.countdownSeconds
    });

    this.setStage('countdown');
    this.emit('countdownTick', this.countdownRemaining);
    this.playCue(this.countdownRemaining);
    this.scheduleCountdownTick(this.generation);
    return true;
  }

  public cancelCountdown(): boolean {
    if (this.stage !== 'countdown' || this.captureStarting) {
      return false;
    }

    this.clearCountdownTimer();
    this.generation += 1;
    this.session = undefined;
    this.countdownRemaining = undefined;
    this.logger?.info('Countdown cancelled');
    this.setStage('idle');
    return true;
  }

  public async requestStop(): Promise<PipelineOutcome | undefined> {
    const session = this.session;
    if (this.stage !== 'recording' || !session) {
      return undefined;
    }

    return this.startPipeline(session, {});
  }

  // Runs post-processing again for a recording folder left by an earlier session.
  public async requestReprocess(folderPath: string): Promise<PipelineOutcome | undefined> {
    if (this.stage !== 'idle') {
      return undefined;
    }

    const generation = this.generation;
    let info: RecordingInfo;

    try {
      info = await this.deps.metadata.load(folderPath);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.error('Failed to load recording for reprocessing', { folderPath, detail });
      if (this.stage === 'idle' && generation === this.generation) {
        this.setError(`Failed to load recording metadata: ${detail}`);
      }
      return undefined;
    }

    if (this.stage !== 'idle' || generation !== this.generation) {
      this.logger?.warn('Reprocess request dropped; session is busy', { folderPath });
      return undefined;
    }

    const request = requestFromInfo(info);
    const monitor = request.monitor ?? this.options.defaultMonitor;

    try {
      this.deps.supervisor.useSession(this.captureOptionsFor(info, request, monitor));
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.setError(`Failed to reprocess recording: ${detail}`);
      return undefined;
    }

    this.generation += 1;
    const session: ActiveSession = { generation: this.generation, request, info };
    this.session = session;
    this.error = undefined;
    this.countdownRemaining = undefined;
    this.logger?.info('Reprocessing recording', { folder: info.metadata.folderName });

    return this.startPipeline(session, { captureAlreadyStopped: true });
  }

  public setError(detail: string): void {
    this.error = detail;
    this.emitState();
  }

  public clearError(): void {
    if (this.error === undefined) {
      return;
    }

    this.error = undefined;
    this.emitState();
  }

  public async shutdown(): Promise<void> {
    this.generation += 1;
    this.clearCountdownTimer();
    if (this.holdTimer) {
      clearTimeout(this.holdTimer);
      this.holdTimer = undefined;
    }

    this.deps.sentinel?.stop();

    if (this.deps.supervisor.getStatus().isRecording) {
      try {
        await this.deps.supervisor.stop();
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.error('Failed to stop capture during shutdown', { detail });
      }
    }

    const run = this.pipelineRun;
    if (run) {
      this.deps.supervisor.abortProcessing();
      try {
        await run;
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.error('Pipeline did not settle during shutdown', { detail });
      }
    }

    this.logger?.info('Session controller shut down', { stage: this.stage });
  }

  private scheduleCountdownTick(generation: number): void {
    this.countdownTimer = setTimeout(() => {
      this.countdownTimer = undefined;
      this.onCountdownTick(generation);
    }, COUNTDOWN_TICK_MS);
  }

  private onCountdownTick(generation: number): void {
    const session = this.session;
    if (this.stage !== 'countdown' || !session || session.generation !== generation) {
      return;
    }

    const remaining = this.countdownRemaining ?? 0;
    if (remaining <= 0) {
      this.captureStarting = true;
      void this.beginCapture(session);
      return;
    }

    const next = remaining - 1;
    this.countdownRemaining = next;
    this.emit('countdownTick', next);
    this.emitState();
    this.playCue(next);
    this.scheduleCountdownTick(generation);
  }

  private async beginCapture(session: ActiveSession): Promise<void> {
    const { metadata, supervisor } = this.deps;
    const { request } = session;
    const monitor = request.monitor ?? this.options.defaultMonitor;
    let phase = 'allocate a recording number';

    try {
      const recordingNumber = await metadata.nextRecordingNumber();

      phase = 'create recording metadata';
      const info = metadata.create(request, recordingNumber, monitor);

      phase = 'create the output directory';
      await metadata.prepareFolder(info);

      phase = 'save recording metadata';
      await metadata.save(info);

      phase = 'start capture';
      await supervisor.start(this.captureOptionsFor(info, request, monitor));

      if (session.generation !== this.generation) {
        this.logger?.warn('Capture started after shutdown; stopping it');
        await supervisor.stop();
        return;
      }

      session.info = info;
      this.captureStarting = false;
      this.countdownRemaining = undefined;
      this.logger?.info('Recording started', { folder: info.metadata.folderName, monitor });
      this.setStage('recording');
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.error('Failed to begin recording', { phase, detail });

      if (session.generation !== this.generation) {
        return;
      }

      this.captureStarting = false;
      this.session = undefined;
      this.countdownRemaining = undefined;
      this.error = `Failed to ${phase}: ${detail}`;
      this.setStage('idle');
    }
  }

  private startPipeline(session: ActiveSession, skip: SkipOptions): Promise<PipelineOutcome> {
    const run: Promise<PipelineOutcome> = this.runPipeline(session, skip).finally(() => {
      if (this.pipelineRun === run) {
        this.pipelineRun = undefined;
      }
    });

    this.pipelineRun = run;
    return run;
  }

  private async runPipeline(session: ActiveSession, skip: SkipOptions): Promise<PipelineOutcome> {
    this.pipelineResult = 'running';
    this.driver.begin(deriveCapabilities(session.request), skip);
    this.setStage('processing');

    const { info } = session;
    if (info) {
      void this.deps.metadata.markProcessing(info).catch((error) => {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.warn('Failed to mark recording as processing', { detail });
      });
    }

    const { supervisor } = this.deps;
    const backend: PipelineBackend = {
      stopCapture: () => supervisor.stop(),
      runPipelineWithProgress: async (sink) => {
        if (session.generation !== this.generation) {
          throw new Error('Processing cancelled by shutdown');
        }

        await supervisor.runPipelineWithProgress(sink);
      }
    };

    const outcome = await this.driver.run(backend, {
      onStateChanged: () => this.emitState()
    });

    this.handlePipelineDone(session, outcome);

    if (info) {
      try {
        await this.deps.metadata.markProcessed(info, outcome.status === 'failed' ? outcome.error : undefined);
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.warn('Failed to record processing result', { detail });
      }
    }

    return outcome;
  }

  private handlePipelineDone(session: ActiveSession, outcome: PipelineOutcome): void {
    this.pipelineResult = outcome.status;
    if (outcome.status === 'failed') {
      this.error = outcome.error.message;
    }

    this.emit('pipelineDone', outcome);
    this.emitState();

    // A failed run stays on screen until the user quits; after shutdown nothing is left to show.
    if (outcome.status !== 'completed' || session.generation !== this.generation) {
      return;
    }

    this.holdTimer = setTimeout(() => {
      this.holdTimer = undefined;
      this.finishSession(session.generation);
    }, this.options.completeHoldMs);
  }

  private captureOptionsFor(info: RecordingInfo, request: RecordingRequest, monitor: string): CaptureOptions {
    const { metadata } = this.deps;

    return {
      outputDir: info.files.folderPath,
      monitor,
      audioEnabled: request.recordAudio,
      screenEnabled: request.recordScreen,
      webcamEnabled: request.recordWebcam,
      verticalEnabled: request.verticalVideo,
      logos: request.logos,
      metadata: {
        recordFile: (kind, filePath) => metadata.recordFile(info, kind, filePath)
      }
    };
  }

  private finishSession(generation: number): void {
    if (this.stage !== 'processing' || this.session?.generation !== generation) {
      return;
    }

    this.driver.reset();
    this.session = undefined;
    this.pipelineResult = undefined;
    this.setStage('idle');
  }

  private playCue(count: number): void {
    const { cue } = this.deps;
    if (!cue || count <= 0) {
      return;
    }

    void cue.play(count).catch((error) => {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.debug('Countdown cue failed', { count, detail });
    });
  }

  private clearCountdownTimer(): void {
    if (this.countdownTimer) {
      clearTimeout(this.countdownTimer);
      this.countdownTimer = undefined;
    }
  }

  private setStage(stage: SessionStage): void {
    this.stage = stage;
    this.emitState();
  }

  private emitState(): void {
    this.emit('stateChanged', this.getSnapshot());
  }
}
