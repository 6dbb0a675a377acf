import fs from 'node:fs/promises';
import { constants as fsConstants } from 'node:fs';
import path from 'node:path';
import { StructuredLogger } from '../logging/StructuredLogger';
import { runCommand } from '../services/process/runCommand';
import { AppConfig } from '../types';

const CHECK_TIMEOUT_MS = 8000;

export interface StartupCheckResult {
  // False when pgrep is unavailable; the sentinel is then left idle.
  sentinelAvailable: boolean;
}

const isMissingBinary = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

const assertWritableDirectory = async (directory: string, label: string): Promise<void> => {
  const absolute = path.resolve(directory);

  try {
    await fs.mkdir(absolute, { recursive: true });
    await fs.access(absolute, fsConstants.W_OK);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(`${label} '${absolute}' is not writable: ${detail}`);
  }
};

const checkOptionalTool = async (
  command: string,
  args: string[],
  logger: StructuredLogger,
  consequence: string
): Promise<boolean> => {
  try {
    await runCommand(command, args, { timeoutMs: CHECK_TIMEOUT_MS });
    return true;
  } catch (error) {
    if (!isMissingBinary(error)) {
      // A non-zero exit still means the binary is present.
      const detail = error instanceof Error ? error.message : String(error);
      logger.debug('Optional tool check returned an error', { command, detail });
      return true;
    }

    logger.warn(`${command} not found; ${consequence}`, { command });
    return false;
  }
};

export const runStartupChecks = async (
  config: AppConfig,
  logger: StructuredLogger
): Promise<StartupCheckResult> => {
  logger.info('Running startup checks');

  await assertWritableDirectory(config.videosDir, 'Videos directory');

  try {
    await runCommand(config.captureBin, ['--version'], { timeoutMs: CHECK_TIMEOUT_MS });
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(
      `Capture tool '${config.captureBin}' is not usable (${detail}). Set CASTLINE_CAPTURE_BIN.`
    );
  }

  const sentinelAvailable = await checkOptionalTool(
    'pgrep',
    ['--version'],
    logger,
    'external recording detection is disabled'
  );

  if (config.audioCues) {
    await checkOptionalTool('ffmpeg', ['-version'], logger, 'countdown tones fall back to the terminal bell');
  }

  logger.info('Startup checks completed successfully', { sentinelAvailable });
  return { sentinelAvailable };
};
