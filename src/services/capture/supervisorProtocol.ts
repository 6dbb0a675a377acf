import { z } from 'zod';
import { STEP_INDEX } from '../../core/pipeline/ProcessingState';
import {
  ProgressEvent,
  stepCompleted,
  stepFailed,
  stepPercent,
  stepSkipped,
  stepStarted
} from '../../core/pipeline/ProgressEvent';
import { CaptureOptions } from './CaptureSupervisor';

export type CaptureSubcommand = 'record' | 'process';

// The stopping step belongs to this process, so the tool only reports the later ones.
const workerStepSchema = z.enum(['analyzing', 'normalizing', 'merging', 'vertical']);

const supervisorLineSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('file'),
    kind: z.enum(['video', 'audio', 'webcam', 'merged', 'vertical']),
    path: z.string().min(1)
  }),
  z.object({
    type: z.literal('step'),
    step: workerStepSchema,
    status: z.enum(['started', 'completed', 'skipped', 'failed']),
    error: z.string().optional()
  }),
  z.object({
    type: z.literal('percent'),
    step: workerStepSchema,
    percent: z.number()
  })
]);

export type SupervisorLine = z.infer<typeof supervisorLineSchema>;

export const parseSupervisorLine = (line: string): SupervisorLine | undefined => {
  const trimmed = line.trim();
  if (!trimmed) {
    return undefined;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch {
    return undefined;
  }

  const parsed = supervisorLineSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
};

export const toProgressEvent = (line: SupervisorLine): ProgressEvent | undefined => {
  if (line.type === 'file') {
    return undefined;
  }

  const stepIndex = STEP_INDEX[line.step];

  if (line.type === 'percent') {
    return stepPercent(stepIndex, line.percent);
  }

  switch (line.status) {
    case 'started':
      return stepStarted(stepIndex);
    case 'completed':
      return stepCompleted(stepIndex);
    case 'skipped':
      return stepSkipped(stepIndex);
    case 'failed':
      return stepFailed(stepIndex, new Error(line.error ?? `Step '${line.step}' failed`));
  }
};

export const buildCaptureArgs = (
  subcommand: CaptureSubcommand,
  options: Omit<CaptureOptions, 'metadata'>
): string[] => {
  const args = [subcommand, '--output-dir', options.outputDir];

  if (options.monitor) {
    args.push('--monitor', options.monitor);
  }

  if (!options.audioEnabled) {
    args.push('--no-audio');
  }

  if (!options.screenEnabled) {
    args.push('--no-screen');
  }

  if (!options.webcamEnabled) {
    args.push('--no-webcam');
  }

  if (options.verticalEnabled) {
    args.push('--vertical');
  }

  const { logos } = options;
  if (logos.left) {
    args.push('--logo-left', logos.left);
  }

  if (logos.right) {
    args.push('--logo-right', logos.right);
  }

  if (logos.bottom) {
    args.push('--logo-bottom', logos.bottom);
  }

  if (logos.titleColor) {
    args.push('--title-color', logos.titleColor);
  }

  return args;
};
