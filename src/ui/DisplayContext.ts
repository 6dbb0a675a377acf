import { SessionSnapshot } from '../core/SessionController';

export interface DisplayContext {
  status: string;
  isRecording: boolean;
  externalRecording: boolean;
  title?: string;
}

export const createDisplayContext = (): DisplayContext => ({
  status: 'Ready',
  isRecording: false,
  externalRecording: false
});

export const statusForSnapshot = (snapshot: SessionSnapshot): string => {
  switch (snapshot.stage) {
    case 'idle':
      return snapshot.error ? 'Error' : 'Ready';
    case 'countdown':
      return 'Starting';
    case 'recording':
      return 'Recording';
    case 'processing':
      if (snapshot.pipelineResult === 'completed') {
        return 'Complete';
      }

      return snapshot.pipelineResult === 'failed' ? 'Failed' : 'Processing';
  }
};

export const applySnapshot = (context: DisplayContext, snapshot: SessionSnapshot): DisplayContext => ({
  ...context,
  status: statusForSnapshot(snapshot),
  isRecording: snapshot.stage === 'recording',
  externalRecording: snapshot.externalRecording.active,
  title: snapshot.title
});

export const renderHeader = (context: DisplayContext): string => {
  const parts = [`Castline [${context.status}]`];

  if (context.title) {
    parts.push(context.title);
  }

  if (context.isRecording) {
    parts.push('● REC');
  }

  if (context.externalRecording) {
    parts.push('external recording active');
  }

  return parts.join('  |  ');
};
