import { EventEmitter } from 'node:events';
import { StructuredLogger } from '../logging/StructuredLogger';
import { ExternalRecordingChange } from '../types';

export interface CaptureProcessLister {
  listActiveCaptureProcesses(): Promise<ReadonlySet<string>>;
}

export interface ExternalRecordingSentinelOptions {
  intervalMs: number;
}

export declare interface ExternalRecordingSentinel {
  on(event: 'changed', listener: (change: ExternalRecordingChange) => void): this;
}

// Emits `changed` only when the active flag flips.
export class ExternalRecordingSentinel extends EventEmitter {
  private active = false;
  private pids: ReadonlySet<string> = new Set();
  private timer: NodeJS.Timeout | undefined;
  private running = false;
  private shouldPoll: () => boolean = () => true;

  public constructor(
    private readonly lister: CaptureProcessLister,
    private readonly options: ExternalRecordingSentinelOptions,
    private readonly logger?: StructuredLogger
  ) {
    super();
  }

  public isActive(): boolean {
    return this.active;
  }

  public getPids(): string[] {
    return [...this.pids];
  }

  public start(shouldPoll: () => boolean = () => true): void {
    if (this.running) {
      return;
    }

    this.running = true;
    this.shouldPoll = shouldPoll;
    this.schedule();
  }

  public stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  public async poll(): Promise<boolean> {
    let pids: ReadonlySet<string>;

    try {
      pids = await this.lister.listActiveCaptureProcesses();
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.debug('Capture process poll failed; treating as inactive', { detail });
      pids = new Set();
    }

    const active = pids.size > 0;
    const flipped = active !== this.active;
    this.active = active;
    this.pids = pids;

    if (!flipped) {
      return false;
    }

    const change: ExternalRecordingChange = { active, pids: [...pids] };
    this.logger?.info('External recording state changed', { ...change });
    this.emit('changed', change);
    return true;
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      void this.tick();
    }, this.options.intervalMs);
  }

  private async tick(): Promise<void> {
    if (!this.running) {
      return;
    }

    try {
      if (this.shouldPoll()) {
        await this.poll();
      }
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('External recording listener failed', { detail });
    } finally {
      if (this.running) {
        this.schedule();
      }
    }
  }
}
