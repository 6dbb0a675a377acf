import { StructuredLogger } from '../../logging/StructuredLogger';
import { CaptureCapabilities } from '../../types';
import { EventQueue } from './EventQueue';
import { ProcessingSnapshot, ProcessingState, STEP_INDEX, SkipOptions } from './ProcessingState';
import {
  ProgressEvent,
  ProgressSink,
  stepCompleted,
  stepFailed,
  stepStarted,
  toError
} from './ProgressEvent';
import { PipelineListener, PipelineOutcome, ProgressRelay } from './ProgressRelay';

export interface PipelineBackend {
  stopCapture(): Promise<void>;
  runPipelineWithProgress(sink: ProgressSink): Promise<void>;
}

export interface PipelineDriverOptions {
  queueCapacity: number;
  clock?: () => number;
}

// Callers only see snapshots; the relay of the active run is the sole writer.
export class PipelineDriver {
  private readonly state: ProcessingState;
  private running = false;

  public constructor(
    private readonly options: PipelineDriverOptions,
    private readonly logger?: StructuredLogger
  ) {
    this.state = new ProcessingState(options.clock);
  }

  public snapshot(): ProcessingSnapshot {
    return this.state.snapshot();
  }

  public isRunning(): boolean {
    return this.running;
  }

  public reset(): void {
    if (this.running) {
      throw new Error('Cannot reset the pipeline while a run is active');
    }

    this.state.reset();
  }

  public begin(capabilities: CaptureCapabilities, options: SkipOptions = {}): ProcessingSnapshot {
    this.reset();
    this.state.configureSkips(capabilities, options);
    this.state.start();
    this.logger?.info('Pipeline started', { ...capabilities, ...options });
    return this.state.snapshot();
  }

  public async run(backend: PipelineBackend, listener: PipelineListener = {}): Promise<PipelineOutcome> {
    if (this.running) {
      throw new Error('A pipeline run is already active');
    }

    this.running = true;
    const queue = new EventQueue<ProgressEvent>(this.options.queueCapacity);
    let remainder: Promise<void> | undefined;

    const relay = new ProgressRelay(
      this.state,
      listener,
      {
        onStepCompleted: (stepIndex) => {
          if (stepIndex === STEP_INDEX.stopping && !remainder) {
            remainder = this.runRemainder(queue, backend);
          }
        }
      },
      this.logger
    );

    try {
      // With the stop step skipped there is nothing to bootstrap; the worker starts right away.
      const bootstrap =
        this.state.getStepStatus(STEP_INDEX.stopping) === 'skipped'
          ? undefined
          : this.runBootstrap(queue, backend);
      if (!bootstrap) {
        remainder = this.runRemainder(queue, backend);
      }

      const outcome = await relay.run(queue);
      await bootstrap;
      await remainder;

      this.logger?.info('Pipeline finished', {
        status: outcome.status,
        detail: outcome.status === 'failed' ? outcome.error.message : undefined
      });
      return outcome;
    } finally {
      this.running = false;
    }
  }

  private async runBootstrap(queue: EventQueue<ProgressEvent>, backend: PipelineBackend): Promise<void> {
    const stepIndex = STEP_INDEX.stopping;

    try {
      await queue.push(stepStarted(stepIndex));
      await backend.stopCapture();
      await queue.push(stepCompleted(stepIndex));
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.error('Failed to stop capture', { detail });
      await this.pushFinal(queue, stepFailed(stepIndex, toError(error)));
      queue.close();
    }
  }

  private async runRemainder(queue: EventQueue<ProgressEvent>, backend: PipelineBackend): Promise<void> {
    let lastStep: number = STEP_INDEX.stopping;
    const sink: ProgressSink = async (event) => {
      lastStep = event.stepIndex;
      await queue.push(event);
    };

    try {
      await backend.runPipelineWithProgress(sink);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.error('Pipeline worker failed', { stepIndex: lastStep, detail });
      await this.pushFinal(queue, stepFailed(lastStep, toError(error)));
    } finally {
      queue.close();
    }
  }

  private async pushFinal(queue: EventQueue<ProgressEvent>, event: ProgressEvent): Promise<void> {
    try {
      await queue.push(event);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Could not deliver final pipeline event', { kind: event.kind, detail });
    }
  }
}
