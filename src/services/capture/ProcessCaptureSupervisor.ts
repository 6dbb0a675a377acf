import { spawn } from 'node:child_process';
import readline from 'node:readline';
import { Readable, Writable } from 'node:stream';
import { ProgressSink } from '../../core/pipeline/ProgressEvent';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { ProducedFile } from '../../types';
import { CaptureOptions, CaptureStatus, CaptureSupervisor } from './CaptureSupervisor';
import { SupervisorLine, buildCaptureArgs, parseSupervisorLine, toProgressEvent } from './supervisorProtocol';

const STDERR_TAIL_LIMIT = 4000;
const DEFAULT_STOP_TIMEOUT_MS = 2000;

// The subset of a spawned child the supervisor relies on.
export interface CaptureProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: 'error', listener: (error: Error) => void): this;
  once(event: 'spawn', listener: () => void): this;
}

export type SpawnCapture = (command: string, args: string[]) => CaptureProcess;

export interface ProcessCaptureSupervisorOptions {
  command: string;
  startDelayMs: number;
  // Wait between SIGINT, SIGTERM and SIGKILL when stopping the recorder.
  stopTimeoutMs?: number;
  spawnProcess?: SpawnCapture;
}

type ProcessExit = { code: number | null; signal: NodeJS.Signals | null } | { error: Error };

const spawnCaptureProcess: SpawnCapture = (command, args) => spawn(command, args, { stdio: 'pipe' });

const tailString = (text: string, limit: number): string =>
  text.length <= limit ? text : text.slice(text.length - limit);

const describeExit = (
  label: string,
  stderr: string,
  code: number | null,
  signal: NodeJS.Signals | null = null
): string => {
  const detail = stderr.trim();
  const base = signal ? `${label} was terminated by ${signal}` : `${label} exited with code ${code}`;
  return detail ? `${base}: ${detail}` : base;
};

// One long-lived `record` child per session, then a `process` child whose JSON lines feed the pipeline.
export class ProcessCaptureSupervisor implements CaptureSupervisor {
  private recorder: CaptureProcess | undefined;
  private processor: CaptureProcess | undefined;
  private session: CaptureOptions | undefined;
  private producedFiles: ProducedFile[] = [];
  private readonly spawnProcess: SpawnCapture;
  private readonly stopTimeoutMs: number;

  public constructor(
    private readonly options: ProcessCaptureSupervisorOptions,
    private readonly logger?: StructuredLogger
  ) {
    this.spawnProcess = options.spawnProcess ?? spawnCaptureProcess;
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
  }

  public getStatus(): CaptureStatus {
    return {
      isRecording: Boolean(this.recorder),
      outputDir: this.session?.outputDir,
      producedFiles: [...this.producedFiles]
    };
  }

  public useSession(options: CaptureOptions): void {
    if (this.recorder) {
      throw new Error('Capture is already running');
    }

    this.session = options;
    this.producedFiles = [];
  }

  public async start(options: CaptureOptions): Promise<void> {
    if (this.recorder) {
      throw new Error('Capture is already running');
    }

    this.session = options;
    this.producedFiles = [];

    const args = buildCaptureArgs('record', options);
    const child = this.spawnProcess(this.options.command, args);
    let stderrLog = '';
    let settled = false;

    child.stdin.end();

    child.on('close', () => {
      if (this.recorder === child) {
        this.recorder = undefined;
        this.logger?.warn('Capture process exited while recording', {
          stderr: tailString(stderrLog, STDERR_TAIL_LIMIT).trim()
        });
      }
    });

    child.stderr.on('data', (chunk: Buffer) => {
      stderrLog = tailString(`${stderrLog}${chunk.toString()}`, STDERR_TAIL_LIMIT);
    });

    this.consumeLines(child, (line) => this.handleFileLine(line));

    await new Promise<void>((resolve, reject) => {
      child.once('error', (error) => {
        if (settled) {
          return;
        }

        settled = true;
        reject(error);
      });

      child.once('spawn', () => {
        setTimeout(() => {
          if (settled) {
            return;
          }

          if (child.exitCode !== null) {
            settled = true;
            reject(new Error(describeExit('Capture process', stderrLog, child.exitCode)));
            return;
          }

          this.recorder = child;
          settled = true;
          resolve();
        }, this.options.startDelayMs);
      });

      child.once('close', (code, signal) => {
        if (settled) {
          return;
        }

        settled = true;
        reject(new Error(describeExit('Capture process', stderrLog, code, signal)));
      });
    });

    this.logger?.info('Capture started', { command: this.options.command, args });
  }

  public async stop(): Promise<void> {
    const current = this.recorder;
    if (!current) {
      return;
    }

    // Cleared before signalling so the close listener from start() sees an expected exit.
    this.recorder = undefined;

    await new Promise<void>((resolve, reject) => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const settle = (error?: Error): void => {
        if (settled) {
          return;
        }

        settled = true;
        if (timer) {
          clearTimeout(timer);
          timer = undefined;
        }

        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const escalate = (remaining: NodeJS.Signals[]): void => {
        if (settled) {
          return;
        }

        timer = setTimeout(() => {
          const [signal, ...rest] = remaining;
          if (!signal) {
            settle(new Error('Capture process did not exit after SIGKILL'));
            return;
          }

          this.logger?.warn('Capture process still running; escalating', { signal });
          current.kill(signal);
          escalate(rest);
        }, this.stopTimeoutMs);
      };

      current.once('close', (code, signal) => {
        if (code === 0 || code === 255 || signal === 'SIGINT' || signal === 'SIGTERM') {
          settle();
          return;
        }

        if (signal === 'SIGKILL') {
          settle(new Error('Capture process ignored SIGINT and SIGTERM and was killed'));
          return;
        }

        settle(new Error(`Capture process exited with code ${code}`));
      });

      current.once('error', (error) => settle(error));

      current.kill('SIGINT');
      escalate(['SIGTERM', 'SIGKILL']);
    });

    this.logger?.info('Capture stopped', { producedFiles: this.producedFiles.length });
  }

  public abortProcessing(): void {
    const current = this.processor;
    if (!current) {
      return;
    }

    this.logger?.warn('Aborting post-processing');
    current.kill('SIGTERM');
  }

  public async runPipelineWithProgress(sink: ProgressSink): Promise<void> {
    const session = this.session;
    if (!session) {
      throw new Error('No capture session to process');
    }

    const args = buildCaptureArgs('process', session);
    const child = this.spawnProcess(this.options.command, args);
    let stderrLog = '';

    this.processor = child;
    child.stdin.end();
    child.stderr.on('data', (chunk: Buffer) => {
      stderrLog = tailString(`${stderrLog}${chunk.toString()}`, STDERR_TAIL_LIMIT);
    });

    const exit = new Promise<ProcessExit>((resolve) => {
      child.once('error', (error) => resolve({ error }));
      child.once('close', (code, signal) => resolve({ code, signal }));
    });

    this.logger?.info('Post-processing started', { command: this.options.command, args });

    const lines = readline.createInterface({ input: child.stdout, crlfDelay: Infinity });

    try {
      for await (const raw of lines) {
        const line = this.parseLine(raw);
        if (!line) {
          continue;
        }

        this.handleFileLine(line);
        const event = toProgressEvent(line);
        if (event) {
          await sink(event);
        }
      }

      const result = await exit;
      if ('error' in result) {
        throw result.error;
      }

      if (result.code !== 0) {
        throw new Error(describeExit('Post-processing', stderrLog, result.code, result.signal));
      }
    } catch (error) {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill('SIGTERM');
      }
      throw error;
    } finally {
      lines.close();
      if (this.processor === child) {
        this.processor = undefined;
      }
    }

    this.logger?.info('Post-processing finished', { producedFiles: this.producedFiles.length });
  }

  private consumeLines(child: CaptureProcess, onLine: (line: SupervisorLine) => void): void {
    const lines = readline.createInterface({ input: child.stdout, crlfDelay: Infinity });
    lines.on('line', (raw) => {
      const line = this.parseLine(raw);
      if (line) {
        onLine(line);
      }
    });
  }

  private parseLine(raw: string): SupervisorLine | undefined {
    const line = parseSupervisorLine(raw);
    if (!line && raw.trim()) {
      this.logger?.debug('Capture tool emitted an unrecognised line', { line: raw });
    }

    return line;
  }

  private handleFileLine(line: SupervisorLine): void {
    if (line.type !== 'file') {
      return;
    }

    this.producedFiles.push({ kind: line.kind, path: line.path });

    const metadata = this.session?.metadata;
    if (!metadata) {
      return;
    }

    void metadata.recordFile(line.kind, line.path).catch((error) => {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Failed to record produced file', { kind: line.kind, detail });
    });
  }
}
