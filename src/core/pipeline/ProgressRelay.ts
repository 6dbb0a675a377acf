import { StructuredLogger } from '../../logging/StructuredLogger';
import { ProcessingSnapshot, ProcessingState } from './ProcessingState';
import { ProgressEvent } from './ProgressEvent';

export type PipelineOutcome =
  | { status: 'completed'; snapshot: ProcessingSnapshot }
  | { status: 'failed'; snapshot: ProcessingSnapshot; error: Error };

export interface PipelineListener {
  onStateChanged?: (snapshot: ProcessingSnapshot) => void;
  onPipelineDone?: (outcome: PipelineOutcome) => void;
}

export interface ProgressRelayHooks {
  onStepCompleted?: (stepIndex: number) => void;
}

export type RelayAction = 'acknowledge' | 'setProgress' | 'advance' | 'fail' | 'ignored';

export class ProgressRelay {
  public constructor(
    private readonly state: ProcessingState,
    private readonly listener: PipelineListener = {},
    private readonly hooks: ProgressRelayHooks = {},
    private readonly logger?: StructuredLogger
  ) {}

  public async run(events: AsyncIterable<ProgressEvent>): Promise<PipelineOutcome> {
    for await (const event of events) {
      const failedBefore = this.state.hasFailed();
      const action = this.apply(event);

      if (action !== 'ignored') {
        this.notify('onStateChanged', () => this.listener.onStateChanged?.(this.state.snapshot()));
      }

      if (event.kind === 'completed' && !failedBefore && !this.state.hasFailed()) {
        this.notify('onStepCompleted', () => this.hooks.onStepCompleted?.(event.stepIndex));
      }
    }

    const outcome = this.finish();
    this.notify('onPipelineDone', () => this.listener.onPipelineDone?.(outcome));
    return outcome;
  }

  public apply(event: ProgressEvent): RelayAction {
    if (this.state.hasFailed()) {
      this.logger?.debug('Dropping pipeline event after failure', {
        kind: event.kind,
        stepIndex: event.stepIndex
      });
      return 'ignored';
    }

    if (event.kind === 'failed') {
      this.state.fail(event.error);
      this.logger?.error('Pipeline step failed', {
        stepIndex: event.stepIndex,
        currentStepIndex: this.state.getCurrentStepIndex(),
        detail: event.error.message
      });
      return 'fail';
    }

    if (event.kind === 'skipped' && this.state.getStepStatus(event.stepIndex) === 'skipped') {
      return 'ignored';
    }

    if (!this.isCurrentRunningStep(event.stepIndex)) {
      this.logger?.warn('Ignoring out-of-order pipeline event', {
        kind: event.kind,
        stepIndex: event.stepIndex,
        currentStepIndex: this.state.getCurrentStepIndex()
      });
      return 'ignored';
    }

    switch (event.kind) {
      case 'started':
        this.state.setProgress(event.stepIndex, -1);
        return 'acknowledge';
      case 'percent':
        this.state.setProgress(event.stepIndex, event.percent);
        return 'setProgress';
      case 'completed':
      case 'skipped':
        // A running step cannot become skipped; the worker skipping it means it is done.
        this.state.advance();
        return 'advance';
    }
  }

  private finish(): PipelineOutcome {
    if (!this.state.hasFailed()) {
      this.state.complete();
    }

    const snapshot = this.state.snapshot();
    if (snapshot.error) {
      return { status: 'failed', snapshot, error: snapshot.error };
    }

    return { status: 'completed', snapshot };
  }

  private isCurrentRunningStep(stepIndex: number): boolean {
    return (
      stepIndex === this.state.getCurrentStepIndex() &&
      this.state.getStepStatus(stepIndex) === 'running'
    );
  }

  private notify(name: string, callback: () => void): void {
    try {
      callback();
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Pipeline listener threw', { callback: name, detail });
    }
  }
}
