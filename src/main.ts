#!/usr/bin/env node
import { config as loadEnv } from 'dotenv';
import { runStartupChecks } from './bootstrap/startupChecks';
import { runTerminal } from './cli/terminal';
import { resolveConfig, validateConfig } from './config';
import { ExternalRecordingSentinel } from './core/ExternalRecordingSentinel';
import { SessionController } from './core/SessionController';
import { StructuredLogger } from './logging/StructuredLogger';
import { ProcessCaptureSupervisor } from './services/capture/ProcessCaptureSupervisor';
import { ToneCountdownCue } from './services/cue/ToneCountdownCue';
import { FileRecordingInfoStore } from './services/metadata/FileRecordingInfoStore';
import { PgrepProcessLister } from './services/process/PgrepProcessLister';
import { AppConfig, RecordingRequest } from './types';

const initialDraft = (config: AppConfig): RecordingRequest => ({
  title: '',
  description: '',
  topic: '',
  presenter: config.presenter,
  recordAudio: config.recordAudio,
  recordScreen: config.recordScreen,
  recordWebcam: config.recordWebcam,
  verticalVideo: config.verticalVideo,
  logos: config.logos
});

const bootstrap = async (): Promise<void> => {
  loadEnv();

  const config = resolveConfig();
  const configErrors = validateConfig(config);

  if (configErrors.length > 0) {
    throw new Error(`Invalid Castline configuration:\n- ${configErrors.join('\n- ')}`);
  }

  const logger = await StructuredLogger.create(config.logDir, { echoToConsole: config.logToConsole });
  logger.info('Castline bootstrap started', {
    logPath: logger.getLogPath(),
    videosDir: config.videosDir,
    captureBin: config.captureBin
  });

  let startupError: string | undefined;
  let sentinelAvailable = false;

  try {
    ({ sentinelAvailable } = await runStartupChecks(config, logger));
  } catch (error) {
    startupError = error instanceof Error ? error.message : String(error);
    logger.error('Startup checks failed', { detail: startupError });
  }

  const sentinel = sentinelAvailable
    ? new ExternalRecordingSentinel(
        new PgrepProcessLister(config.externalCaptureProcess),
        { intervalMs: config.sentinelPollMs },
        logger
      )
    : undefined;

  const controller = new SessionController(
    {
      supervisor: new ProcessCaptureSupervisor(
        {
          command: config.captureBin,
          startDelayMs: config.captureStartDelayMs,
          stopTimeoutMs: config.captureStopTimeoutMs
        },
        logger
      ),
      metadata: new FileRecordingInfoStore(config.videosDir, logger),
      cue: config.audioCues ? new ToneCountdownCue(logger) : undefined,
      sentinel
    },
    {
      countdownSeconds: config.countdownSeconds,
      completeHoldMs: config.completeHoldMs,
      defaultMonitor: config.defaultMonitor,
      relayQueueCapacity: config.relayQueueCapacity
    },
    logger
  );

  if (startupError) {
    controller.setError(`Startup check failed: ${startupError}`);
  }

  controller.start();

  await runTerminal(controller, initialDraft(config), {
    defaultMonitor: config.defaultMonitor,
    logger,
    terminal: Boolean(process.stdin.isTTY)
  });

  logger.info('Castline exited');
  await logger.flush();
};

bootstrap()
  .then(() => {
    process.exit(0);
  })
  .catch((error) => {
    const detail = error instanceof Error ? error.message : String(error);
    process.stderr.write(`${detail}\n`);
    process.exit(1);
  });
