import { DisplayContext, renderHeader } from './DisplayContext';

export const renderCountdownView = (remaining: number, context: DisplayContext): string => {
  const counting = remaining > 0;

  return [
    renderHeader(context),
    '',
    counting ? `    ${remaining}` : '    GO!',
    '',
    counting ? 'Get ready... Recording starts soon!' : 'Recording!',
    counting ? 'Type /cancel to abort.' : ''
  ]
    .join('\n')
    .trimEnd();
};
