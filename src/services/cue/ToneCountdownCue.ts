import { StructuredLogger } from '../../logging/StructuredLogger';
import { runCommand } from '../process/runCommand';

export interface CountdownCue {
  play(count: number): Promise<void>;
}

// Descending A5 to C#5, one tone per remaining second.
export const CUE_FREQUENCIES: ReadonlyMap<number, number> = new Map([
  [5, 880],
  [4, 784],
  [3, 698],
  [2, 622],
  [1, 554]
]);

const TONE_SECONDS = 0.1;
const PLAYER_TIMEOUT_MS = 2000;
const PLAYERS = ['pw-cat --playback -', 'aplay -q -'];

export const toneCommand = (frequency: number, player: string): string =>
  `ffmpeg -hide_banner -loglevel error -f lavfi -i 'sine=frequency=${frequency}:duration=${TONE_SECONDS}' -f wav - | ${player}`;

export class ToneCountdownCue implements CountdownCue {
  public constructor(
    private readonly logger?: StructuredLogger,
    private readonly run: typeof runCommand = runCommand,
    private readonly writeBell: () => void = () => {
      process.stdout.write('\u0007');
    }
  ) {}

  public async play(count: number): Promise<void> {
    const frequency = CUE_FREQUENCIES.get(count);
    if (frequency === undefined) {
      return;
    }

    for (const player of PLAYERS) {
      try {
        await this.run('bash', ['-c', toneCommand(frequency, player)], { timeoutMs: PLAYER_TIMEOUT_MS });
        return;
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.debug('Countdown tone player unavailable', { player, detail });
      }
    }

    this.writeBell();
  }
}
