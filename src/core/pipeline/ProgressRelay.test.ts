import { describe, expect, it, vi } from 'vitest';
import { CaptureCapabilities } from '../../types';
import { ProcessingState } from './ProcessingState';
import {
  ProgressEvent,
  stepCompleted,
  stepFailed,
  stepPercent,
  stepSkipped,
  stepStarted
} from './ProgressEvent';
import { ProgressRelay } from './ProgressRelay';

const allCapabilities: CaptureCapabilities = {
  hasAudio: true,
  hasScreen: true,
  hasWebcam: true,
  createVertical: true
};

const startedState = (capabilities: CaptureCapabilities = allCapabilities): ProcessingState => {
  const state = new ProcessingState();
  state.configureSkips(capabilities);
  state.start();
  return state;
};

async function* fromArray(events: ProgressEvent[]): AsyncGenerator<ProgressEvent> {
  for (const event of events) {
    yield event;
  }
}

describe('ProgressRelay', () => {
  it('stops progression at a failed step and reports the error once', async () => {
    const state = startedState();
    const onStateChanged = vi.fn();
    const onPipelineDone = vi.fn();
    const onStepCompleted = vi.fn();
    const relay = new ProgressRelay(state, { onStateChanged, onPipelineDone }, { onStepCompleted });
    const error = new Error('loudnorm exited with code 1');

    const outcome = await relay.run(
      fromArray([
        stepStarted(0),
        stepCompleted(0),
        stepStarted(1),
        stepPercent(1, 40),
        stepCompleted(1),
        stepStarted(2),
        stepFailed(2, error),
        stepCompleted(2),
        stepStarted(3)
      ])
    );

    expect(outcome.status).toBe('failed');
    expect(outcome.status === 'failed' ? outcome.error : undefined).toBe(error);
    expect(outcome.snapshot.steps.map((step) => step.status)).toEqual([
      'complete',
      'complete',
      'failed',
      'pending',
      'pending'
    ]);
    expect(outcome.snapshot.isProcessing).toBe(false);
    expect(onStateChanged).toHaveBeenCalledTimes(7);
    expect(onStepCompleted.mock.calls).toEqual([[0], [1]]);
    expect(onPipelineDone).toHaveBeenCalledTimes(1);
    expect(onPipelineDone).toHaveBeenCalledWith(outcome);
  });

  it('completes the run when the stream closes without a failure', async () => {
    const state = startedState({ hasAudio: true, hasScreen: true, hasWebcam: false, createVertical: false });
    const relay = new ProgressRelay(state);

    const outcome = await relay.run(
      fromArray([
        stepStarted(0),
        stepCompleted(0),
        stepStarted(1),
        stepCompleted(1),
        stepStarted(2),
        stepCompleted(2),
        stepStarted(3),
        stepPercent(3, 75),
        stepCompleted(3),
        stepSkipped(4)
      ])
    );

    expect(outcome.status).toBe('completed');
    expect(outcome.snapshot.steps.map((step) => step.status)).toEqual([
      'complete',
      'complete',
      'complete',
      'complete',
      'skipped'
    ]);
    expect(outcome.snapshot.currentStepIndex).toBe(5);
    expect(outcome.snapshot.isProcessing).toBe(false);
    expect(outcome.snapshot.endTime).toBeDefined();
  });

  it('ignores events for a step that is not the running one', () => {
    const state = startedState();
    const relay = new ProgressRelay(state);
    relay.apply(stepCompleted(0));

    expect(relay.apply(stepPercent(3, 50))).toBe('ignored');
    expect(relay.apply(stepCompleted(2))).toBe('ignored');
    expect(relay.apply(stepStarted(4))).toBe('ignored');

    expect(state.getCurrentStepIndex()).toBe(1);
    expect(state.snapshot().steps[3].progress).toBe(-1);
  });

  it('maps each event kind to one state operation', () => {
    const state = startedState({ hasAudio: false, hasScreen: true, hasWebcam: false, createVertical: false });
    const relay = new ProgressRelay(state);

    expect(relay.apply(stepStarted(0))).toBe('acknowledge');
    expect(relay.apply(stepPercent(0, 30))).toBe('setProgress');
    expect(state.snapshot().steps[0].progress).toBe(30);

    expect(relay.apply(stepSkipped(1))).toBe('ignored');
    expect(relay.apply(stepCompleted(0))).toBe('advance');
    expect(state.getCurrentStepIndex()).toBe(3);

    expect(relay.apply(stepSkipped(3))).toBe('advance');
    expect(state.getCurrentStepIndex()).toBe(5);
    expect(state.getStepStatus(3)).toBe('complete');
  });

  it('records a failure even when its step index disagrees with the running step', () => {
    const state = startedState();
    const relay = new ProgressRelay(state);
    relay.apply(stepCompleted(0));

    expect(relay.apply(stepFailed(4, new Error('late failure')))).toBe('fail');

    expect(state.getStepStatus(1)).toBe('failed');
    expect(state.getStepStatus(4)).toBe('pending');
    expect(state.snapshot().error?.message).toBe('late failure');
    expect(relay.apply(stepCompleted(1))).toBe('ignored');
  });

  it('keeps relaying when a listener throws', async () => {
    const state = startedState({ hasAudio: false, hasScreen: false, hasWebcam: false, createVertical: false });
    const relay = new ProgressRelay(state, {
      onStateChanged: () => {
        throw new Error('render failed');
      }
    });

    const outcome = await relay.run(fromArray([stepStarted(0), stepCompleted(0)]));

    expect(outcome.status).toBe('completed');
    expect(outcome.snapshot.steps[0].status).toBe('complete');
  });
});
