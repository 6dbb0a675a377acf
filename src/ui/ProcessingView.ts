import { ProcessingSnapshot, ProcessingStep } from '../core/pipeline/ProcessingState';
import { StepStatus } from '../types';
import { DisplayContext, renderHeader } from './DisplayContext';

const PROGRESS_BAR_WIDTH = 20;

const INDICATORS: Record<StepStatus, string> = {
  pending: '○',
  running: '◐',
  complete: '●',
  failed: '✗',
  skipped: '–'
};

// Empty for indeterminate progress.
export const renderProgressBar = (progress: number, width = PROGRESS_BAR_WIDTH): string => {
  if (progress < 0) {
    return '';
  }

  const clamped = Math.min(progress, 100);
  const filled = Math.floor((clamped / 100) * width);
  const percent = `${Math.round(clamped)}`.padStart(3);
  return ` ${'█'.repeat(filled)}${'░'.repeat(width - filled)} ${percent}%`;
};

export const formatDuration = (ms: number): string => `${(Math.round(ms / 100) / 10).toFixed(1)}s`;

export const formatElapsed = (ms: number): string => {
  const totalSeconds = Math.max(0, Math.round(ms / 1000));
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return minutes > 0 ? `${minutes}m${seconds}s` : `${seconds}s`;
};

export const renderStepLine = (step: Readonly<ProcessingStep>): string => {
  let suffix = '';

  if (step.status === 'running' && step.progress >= 0) {
    suffix = renderProgressBar(step.progress);
  } else if (
    (step.status === 'complete' || step.status === 'failed') &&
    step.startTime !== undefined &&
    step.endTime !== undefined
  ) {
    suffix = ` (${formatDuration(step.endTime - step.startTime)})`;
  } else if (step.status === 'skipped') {
    suffix = ' (skipped)';
  }

  return `  ${INDICATORS[step.status]} ${step.name}${suffix}`;
};

export const elapsedFor = (snapshot: ProcessingSnapshot, now: number): number => {
  if (snapshot.startTime === undefined) {
    return 0;
  }

  // Frozen once the run has ended, whether it completed or failed.
  if (!snapshot.isProcessing && snapshot.endTime !== undefined) {
    return snapshot.endTime - snapshot.startTime;
  }

  return now - snapshot.startTime;
};

const statusLine = (snapshot: ProcessingSnapshot): string => {
  if (snapshot.error) {
    return `Error: ${snapshot.error.message}`;
  }

  return snapshot.isProcessing ? 'Please wait...' : 'Processing complete!';
};

export const renderProcessingView = (
  snapshot: ProcessingSnapshot,
  context: DisplayContext,
  now: number
): string =>
  [
    renderHeader(context),
    '',
    'Processing Recording...',
    `Elapsed: ${formatElapsed(elapsedFor(snapshot, now))}`,
    '',
    ...snapshot.steps.map(renderStepLine),
    '',
    statusLine(snapshot)
  ].join('\n');
