import readline from 'node:readline';
import { SessionController, SessionSnapshot } from '../core/SessionController';
import { StructuredLogger } from '../logging/StructuredLogger';
import { RecordingRequest } from '../types';
import { renderCountdownView } from '../ui/CountdownView';
import { DisplayContext, applySnapshot, createDisplayContext, renderHeader } from '../ui/DisplayContext';
import { renderProcessingView } from '../ui/ProcessingView';
import { CaptureToggle, parseTerminalCommand } from './commands';

const ELAPSED_REFRESH_MS = 1000;
const CLEAR_SCREEN = '\u001b[2J\u001b[H';

const TOGGLE_FIELDS: Record<CaptureToggle, 'recordAudio' | 'recordScreen' | 'recordWebcam' | 'verticalVideo'> = {
  audio: 'recordAudio',
  screen: 'recordScreen',
  webcam: 'recordWebcam',
  vertical: 'verticalVideo'
};

const onOff = (value: boolean): string => (value ? 'on' : 'off');

const printHelp = (out: NodeJS.WritableStream): void => {
  out.write('\n');
  out.write('Commands:\n');
  out.write('  <enter>             Start recording / stop and process\n');
  out.write('  /cancel             Cancel the countdown\n');
  out.write('  /title <text>       Set the recording title\n');
  out.write('  /monitor <name>     Set the monitor to capture\n');
  out.write('  /audio on|off       Toggle microphone capture\n');
  out.write('  /screen on|off      Toggle screen capture\n');
  out.write('  /webcam on|off      Toggle webcam capture\n');
  out.write('  /vertical on|off    Toggle the vertical variant\n');
  out.write('  /reprocess <folder> Run post-processing again for a recording\n');
  out.write('  /status             Print current state\n');
  out.write('  /quit               Exit\n');
  out.write('\n');
};

const describeDraft = (draft: RecordingRequest, fallbackMonitor: string): string =>
  [
    `title=${draft.title ? JSON.stringify(draft.title) : '(unset)'}`,
    `monitor=${draft.monitor ?? (fallbackMonitor || '(default)')}`,
    `audio=${onOff(draft.recordAudio)}`,
    `screen=${onOff(draft.recordScreen)}`,
    `webcam=${onOff(draft.recordWebcam)}`,
    `vertical=${onOff(draft.verticalVideo)}`
  ].join(' ');

export interface TerminalOptions {
  defaultMonitor: string;
  logger?: StructuredLogger;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  errorOutput?: NodeJS.WritableStream;
  // Raw-mode line editing; off when the input is not a TTY.
  terminal?: boolean;
}

// Resolves once the user quits and the controller has shut down.
export const runTerminal = (
  controller: SessionController,
  initialDraft: RecordingRequest,
  options: TerminalOptions
): Promise<void> =>
  new Promise<void>((resolve) => {
    const { logger } = options;
    const input = options.input ?? process.stdin;
    const out = options.output ?? process.stdout;
    const errOut = options.errorOutput ?? process.stderr;
    let draft: RecordingRequest = { ...initialDraft, logos: { ...initialDraft.logos } };
    let context: DisplayContext = createDisplayContext();
    let lastStage = controller.getStage();
    let refreshTimer: NodeJS.Timeout | undefined;
    let shuttingDown = false;
    let shownError: string | undefined;

    const report = (error: unknown): void => {
      const detail = error instanceof Error ? error.message : String(error);
      logger?.error('Terminal command failed', { detail });
      errOut.write(`\n[error] ${detail}\n`);
    };

    const renderProcessing = (snapshot: SessionSnapshot): void => {
      out.write(`${CLEAR_SCREEN}${renderProcessingView(snapshot.processing, context, Date.now())}\n`);
    };

    const stopRefresh = (): void => {
      if (refreshTimer) {
        clearInterval(refreshTimer);
        refreshTimer = undefined;
      }
    };

    const startRefresh = (): void => {
      if (refreshTimer) {
        return;
      }

      refreshTimer = setInterval(() => {
        const snapshot = controller.getSnapshot();
        if (snapshot.stage !== 'processing' || !snapshot.processing.isProcessing) {
          stopRefresh();
          return;
        }

        renderProcessing(snapshot);
      }, ELAPSED_REFRESH_MS);
    };

    controller.on('stateChanged', (snapshot) => {
      context = applySnapshot(context, snapshot);
      const entered = snapshot.stage !== lastStage;
      lastStage = snapshot.stage;

      if (shuttingDown) {
        return;
      }

      if (snapshot.stage === 'processing') {
        renderProcessing(snapshot);
        if (snapshot.processing.isProcessing) {
          startRefresh();
        }
        return;
      }

      stopRefresh();

      if (snapshot.stage === 'recording' && entered) {
        out.write(`\n${renderHeader(context)}\n`);
        out.write(`Recording to ${snapshot.outputDir ?? '(unknown)'}. Press <enter> to stop.\n`);
        return;
      }

      if (snapshot.stage !== 'idle') {
        return;
      }

      if (entered) {
        out.write(`\n${renderHeader(context)}\n`);
      }

      if (snapshot.error && snapshot.error !== shownError) {
        errOut.write(`[error] ${snapshot.error}\n`);
      }
      shownError = snapshot.error;

      if (entered) {
        out.write('Ready. Press <enter> to start recording.\n');
      }
    });

    controller.on('countdownTick', (remaining) => {
      out.write(`${CLEAR_SCREEN}${renderCountdownView(remaining, context)}\n`);
    });

    controller.on('pipelineDone', (outcome) => {
      if (outcome.status === 'failed' && !shuttingDown) {
        out.write('Processing failed. Use /quit to exit.\n');
      }
    });

    controller.on('externalRecordingChanged', (change) => {
      if (change.active) {
        out.write(`\n[external] another recording is active (pid ${change.pids.join(', ')})\n`);
      } else {
        out.write('\n[external] external recording ended\n');
      }
    });

    const rl = readline.createInterface({
      input,
      output: out,
      terminal: options.terminal ?? true
    });

    const onProcessSignal = (): void => {
      runShutdown();
    };

    const shutdown = async (): Promise<void> => {
      if (shuttingDown) {
        return;
      }
      shuttingDown = true;

      stopRefresh();
      process.off('SIGINT', onProcessSignal);
      // Aborts a running pipeline, so quitting never waits on processing.
      await controller.shutdown();
      rl.close();
      out.write('\nBye.\n');
      resolve();
    };

    const runShutdown = (): void => {
      void shutdown().catch((error) => {
        report(error);
        resolve();
      });
    };

    const toggleRecording = (): void => {
      const stage = controller.getStage();

      if (stage === 'idle') {
        if (!draft.title.trim()) {
          out.write('Set a title first with /title <text>.\n');
          return;
        }

        controller.requestNewRecording(draft);
        return;
      }

      if (stage === 'recording') {
        out.write('\n[stop]\n');
        void controller.requestStop().catch(report);
        return;
      }

      if (stage === 'countdown') {
        out.write('Countdown in progress. Use /cancel to abort.\n');
        return;
      }

      out.write('Processing in progress. Use /quit to abort it and exit.\n');
    };

    const reprocess = (folder: string): void => {
      if (controller.getStage() !== 'idle') {
        out.write('Reprocessing is only possible while idle.\n');
        return;
      }

      out.write(`[reprocess] ${folder}\n`);
      void controller.requestReprocess(folder).catch(report);
    };

    process.on('SIGINT', onProcessSignal);

    rl.on('line', (line) => {
      if (shuttingDown) {
        return;
      }

      const command = parseTerminalCommand(line);

      switch (command.kind) {
        case 'toggleRecording':
          toggleRecording();
          return;
        case 'cancel':
          if (!controller.cancelCountdown()) {
            out.write('Nothing to cancel.\n');
          }
          return;
        case 'title':
          draft = { ...draft, title: command.value };
          out.write(`[title] ${command.value}\n`);
          return;
        case 'monitor':
          draft = { ...draft, monitor: command.value };
          out.write(`[monitor] ${command.value}\n`);
          return;
        case 'reprocess':
          reprocess(command.folder);
          return;
        case 'capture':
          draft = { ...draft };
          draft[TOGGLE_FIELDS[command.option]] = command.enabled;
          out.write(`[${command.option}] ${onOff(command.enabled)}\n`);
          return;
        case 'status': {
          const snapshot = controller.getSnapshot();
          const capture = controller.getCaptureStatus();
          out.write(
            `[status] stage=${snapshot.stage}${snapshot.error ? ` error=${snapshot.error}` : ''}` +
              `${capture.outputDir ? ` output=${capture.outputDir}` : ''}\n`
          );
          out.write(`[draft] ${describeDraft(draft, options.defaultMonitor)}\n`);
          return;
        }
        case 'help':
          printHelp(out);
          return;
        case 'quit':
          runShutdown();
          return;
        case 'invalid':
          out.write(`${command.message}\n`);
          return;
      }
    });

    rl.on('SIGINT', runShutdown);
    rl.on('close', runShutdown);

    out.write(`${renderHeader(context)}\n`);
    out.write(`Draft: ${describeDraft(draft, options.defaultMonitor)}\n`);
    printHelp(out);
  });
