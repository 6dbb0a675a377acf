import { CaptureCapabilities, RecordingRequest, StepId, StepStatus } from '../../types';

export interface StepDefinition {
  id: StepId;
  name: string;
}

// Order is fixed for the lifetime of the process; indices are part of the event protocol.
export const PIPELINE_STEPS: readonly StepDefinition[] = [
  { id: 'stopping', name: 'Stopping recorders' },
  { id: 'analyzing', name: 'Analyzing audio levels' },
  { id: 'normalizing', name: 'Normalizing audio' },
  { id: 'merging', name: 'Merging video & audio' },
  { id: 'vertical', name: 'Creating vertical video' }
];

export const STEP_INDEX: Readonly<Record<StepId, number>> = {
  stopping: 0,
  analyzing: 1,
  normalizing: 2,
  merging: 3,
  vertical: 4
};

export const INDETERMINATE_PROGRESS = -1;

export interface SkipOptions {
  // Set when the capture was stopped in an earlier session, e.g. when reprocessing.
  captureAlreadyStopped?: boolean;
}

export const deriveCapabilities = (
  request: Pick<RecordingRequest, 'recordAudio' | 'recordScreen' | 'recordWebcam' | 'verticalVideo'>
): CaptureCapabilities => ({
  hasAudio: request.recordAudio,
  hasScreen: request.recordScreen,
  hasWebcam: request.recordWebcam,
  createVertical: request.verticalVideo && request.recordWebcam && request.recordScreen
});

export interface ProcessingStep {
  readonly id: StepId;
  readonly name: string;
  status: StepStatus;
  startTime?: number;
  endTime?: number;
  progress: number;
}

export interface ProcessingSnapshot {
  readonly steps: ReadonlyArray<Readonly<ProcessingStep>>;
  readonly currentStepIndex: number;
  readonly isProcessing: boolean;
  readonly startTime?: number;
  readonly endTime?: number;
  readonly error?: Error;
}

const ALLOWED_TRANSITIONS: Readonly<Record<StepStatus, readonly StepStatus[]>> = {
  pending: ['running', 'skipped'],
  running: ['complete', 'failed'],
  complete: [],
  failed: [],
  skipped: []
};

const createSteps = (): ProcessingStep[] =>
  PIPELINE_STEPS.map((definition) => ({
    id: definition.id,
    name: definition.name,
    status: 'pending',
    progress: INDETERMINATE_PROGRESS
  }));

// Allowed transitions: pending -> running | skipped, running -> complete | failed.
export class ProcessingState {
  private steps: ProcessingStep[] = createSteps();
  private currentStepIndex = -1;
  private isProcessing = false;
  private skipsConfigured = false;
  private started = false;
  private startTime: number | undefined;
  private endTime: number | undefined;
  private error: Error | undefined;

  public constructor(private readonly now: () => number = Date.now) {}

  public configureSkips(capabilities: CaptureCapabilities, options: SkipOptions = {}): void {
    if (this.skipsConfigured) {
      throw new Error('Pipeline skips are already configured for this run');
    }

    if (this.started) {
      throw new Error('Pipeline skips must be configured before processing starts');
    }

    if (options.captureAlreadyStopped) {
      this.transition(STEP_INDEX.stopping, 'skipped');
    }

    if (!capabilities.hasAudio) {
      this.transition(STEP_INDEX.analyzing, 'skipped');
      this.transition(STEP_INDEX.normalizing, 'skipped');
    }

    if (!capabilities.hasScreen && !capabilities.hasWebcam) {
      this.transition(STEP_INDEX.merging, 'skipped');
    }

    if (!capabilities.createVertical) {
      this.transition(STEP_INDEX.vertical, 'skipped');
    }

    this.skipsConfigured = true;
  }

  public start(): void {
    if (this.started) {
      throw new Error('Processing has already started; reset before starting again');
    }

    this.started = true;
    this.isProcessing = true;
    this.startTime = this.now();
    this.currentStepIndex = this.nextEligibleIndex(0);
    this.transition(this.currentStepIndex, 'running');
  }

  public advance(): void {
    if (!this.isProcessing || this.error || this.currentStepIndex >= this.steps.length) {
      return;
    }

    this.transition(this.currentStepIndex, 'complete');
    this.currentStepIndex = this.nextEligibleIndex(this.currentStepIndex + 1);
    this.transition(this.currentStepIndex, 'running');
  }

  public fail(error: Error): void {
    this.transition(this.currentStepIndex, 'failed');
    this.error = error;
    this.endTime = this.now();
    this.isProcessing = false;
  }

  public complete(): void {
    this.transition(this.currentStepIndex, 'complete');
    this.endTime = this.now();
    this.isProcessing = false;
  }

  public reset(): void {
    this.steps = createSteps();
    this.currentStepIndex = -1;
    this.isProcessing = false;
    this.skipsConfigured = false;
    this.started = false;
    this.startTime = undefined;
    this.endTime = undefined;
    this.error = undefined;
  }

  public setProgress(index: number, percent: number): void {
    const step = this.steps[index];
    if (!step || Number.isNaN(percent)) {
      return;
    }

    step.progress = percent < 0 ? INDETERMINATE_PROGRESS : Math.min(percent, 100);
  }

  public getCurrentStepIndex(): number {
    return this.currentStepIndex;
  }

  public getStepStatus(index: number): StepStatus | undefined {
    return this.steps[index]?.status;
  }

  public hasFailed(): boolean {
    return this.error !== undefined;
  }

  public snapshot(): ProcessingSnapshot {
    return {
      steps: this.steps.map((step) => ({ ...step })),
      currentStepIndex: this.currentStepIndex,
      isProcessing: this.isProcessing,
      startTime: this.startTime,
      endTime: this.endTime,
      error: this.error
    };
  }

  private nextEligibleIndex(from: number): number {
    let index = from;
    while (index < this.steps.length && this.steps[index].status === 'skipped') {
      index += 1;
    }

    return index;
  }

  private transition(index: number, next: StepStatus): boolean {
    const step = this.steps[index];
    if (!step || !ALLOWED_TRANSITIONS[step.status].includes(next)) {
      return false;
    }

    step.status = next;

    if (next === 'running') {
      step.startTime = this.now();
      step.progress = INDETERMINATE_PROGRESS;
    } else if (next === 'complete') {
      step.endTime = this.now();
      step.progress = 100;
    } else if (next === 'failed') {
      step.endTime = this.now();
    }

    return true;
  }
}
