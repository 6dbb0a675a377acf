import { PassThrough, Writable } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { stepCompleted, stepStarted } from '../core/pipeline/ProgressEvent';
import { SessionController } from '../core/SessionController';
import { createRecordingInfo } from '../services/metadata/RecordingInfo';
import { FakeStore, FakeSupervisor } from '../testing/sessionFakes';
import { RecordingRequest } from '../types';
import { runTerminal } from './terminal';

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

const draft: RecordingRequest = {
  title: 'Demo',
  description: '',
  topic: '',
  presenter: '',
  recordAudio: true,
  recordScreen: true,
  recordWebcam: false,
  verticalVideo: false,
  logos: {}
};

const collector = (): { stream: Writable; text: () => string } => {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    }
  });

  return { stream, text: () => chunks.join('') };
};

describe('runTerminal', () => {
  let supervisor: FakeSupervisor;
  let store: FakeStore;
  let controller: SessionController;
  let input: PassThrough;
  let output: ReturnType<typeof collector>;
  let errors: ReturnType<typeof collector>;

  const open = (): Promise<void> =>
    runTerminal(controller, draft, {
      defaultMonitor: 'DP-1',
      input,
      output: output.stream,
      errorOutput: errors.stream,
      terminal: false
    });

  const type = async (line: string): Promise<void> => {
    input.write(`${line}\n`);
    await flush();
  };

  const recordThenStop = async (): Promise<void> => {
    await type('');
    await vi.advanceTimersByTimeAsync(1000);
    await flush();
    expect(controller.getStage()).toBe('recording');

    await type('');
    expect(controller.getStage()).toBe('processing');
  };

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'setInterval', 'clearInterval'] });
    supervisor = new FakeSupervisor();
    store = new FakeStore();
    controller = new SessionController(
      { supervisor, metadata: store },
      { countdownSeconds: 0, completeHoldMs: 1500, defaultMonitor: 'DP-1', relayQueueCapacity: 8 }
    );
    input = new PassThrough();
    output = collector();
    errors = collector();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('quits while the pipeline is still running', async () => {
    supervisor.hangUntilAborted();
    const done = open();

    await recordThenStop();
    await type('/quit');
    await done;

    expect(supervisor.abortCalls).toBe(1);
    expect(store.processed).toEqual(['Post-processing was terminated by SIGTERM']);
    expect(output.text()).toContain('\nBye.\n');
    expect(output.text()).not.toContain('Processing failed.');
  });

  it('shuts down when the input closes during processing', async () => {
    supervisor.hangUntilAborted();
    const done = open();

    await recordThenStop();
    input.end();
    await done;

    expect(supervisor.abortCalls).toBe(1);
    expect(output.text()).toContain('\nBye.\n');
  });

  it('tells the user how to leave while processing', async () => {
    supervisor.hangUntilAborted();
    const done = open();

    await recordThenStop();
    await type('');

    expect(output.text()).toContain('Processing in progress. Use /quit to abort it and exit.\n');

    await type('/quit');
    await done;
  });

  it('reprocesses a recording folder from the idle prompt', async () => {
    store.stored = createRecordingInfo({
      request: draft,
      recordingNumber: 9,
      monitor: 'DP-1',
      baseDir: '/videos',
      now: new Date('2026-02-01T10:00:00.000Z')
    });
    supervisor.pipeline = async (sink) => {
      for (const stepIndex of [1, 2, 3]) {
        await sink(stepStarted(stepIndex));
        await sink(stepCompleted(stepIndex));
      }
    };
    const done = open();

    await type('/reprocess 009-demo');

    expect(output.text()).toContain('[reprocess] 009-demo\n');
    expect(store.calls[0]).toBe('load 009-demo');
    expect(supervisor.sessions).toHaveLength(1);
    expect(supervisor.stopCalls).toBe(0);
    expect(controller.getSnapshot().pipelineResult).toBe('completed');

    await type('/quit');
    await done;
  });

  it('shows why a recording could not be reprocessed', async () => {
    const done = open();

    await type('/reprocess missing');

    expect(controller.getStage()).toBe('idle');
    expect(errors.text()).toBe(
      "[error] Failed to load recording metadata: ENOENT: no such file or directory, open 'missing/recording.json'\n"
    );

    await type('/quit');
    await done;
  });
});
