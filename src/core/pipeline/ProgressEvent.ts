// Each step reports `started`, any number of `percent` updates, then one terminal kind.
export type ProgressEvent =
  | { readonly kind: 'started'; readonly stepIndex: number }
  | { readonly kind: 'percent'; readonly stepIndex: number; readonly percent: number }
  | { readonly kind: 'skipped'; readonly stepIndex: number }
  | { readonly kind: 'failed'; readonly stepIndex: number; readonly error: Error }
  | { readonly kind: 'completed'; readonly stepIndex: number };

export type ProgressSink = (event: ProgressEvent) => Promise<void>;

export const stepStarted = (stepIndex: number): ProgressEvent =>
  ({ kind: 'started', stepIndex });

export const stepPercent = (stepIndex: number, percent: number): ProgressEvent =>
  ({ kind: 'percent', stepIndex, percent });

export const stepSkipped = (stepIndex: number): ProgressEvent =>
  ({ kind: 'skipped', stepIndex });

export const stepFailed = (stepIndex: number, error: Error): ProgressEvent =>
  ({ kind: 'failed', stepIndex, error });

export const stepCompleted = (stepIndex: number): ProgressEvent =>
  ({ kind: 'completed', stepIndex });

export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));
