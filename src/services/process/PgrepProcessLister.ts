import { CaptureProcessLister } from '../../core/ExternalRecordingSentinel';
import { CommandError, runCommand } from './runCommand';

const PGREP_TIMEOUT_MS = 3000;

export const parsePgrepOutput = (stdout: string): Set<string> => {
  const pids = new Set<string>();

  for (const line of stdout.split('\n')) {
    const [pid] = line.trim().split(/\s+/);
    if (pid) {
      pids.add(pid);
    }
  }

  return pids;
};

export class PgrepProcessLister implements CaptureProcessLister {
  public constructor(
    private readonly processName: string,
    private readonly run: typeof runCommand = runCommand
  ) {}

  public async listActiveCaptureProcesses(): Promise<ReadonlySet<string>> {
    try {
      const { stdout } = await this.run('pgrep', ['-a', this.processName], {
        timeoutMs: PGREP_TIMEOUT_MS
      });
      return parsePgrepOutput(stdout);
    } catch (error) {
      // pgrep exits 1 when nothing matches.
      if (error instanceof CommandError && error.exitCode === 1) {
        return new Set();
      }

      throw error;
    }
  }
}
