export type CaptureToggle = 'audio' | 'screen' | 'webcam' | 'vertical';

export type TerminalCommand =
  | { kind: 'toggleRecording' }
  | { kind: 'cancel' }
  | { kind: 'title'; value: string }
  | { kind: 'monitor'; value: string }
  | { kind: 'reprocess'; folder: string }
  | { kind: 'capture'; option: CaptureToggle; enabled: boolean }
  | { kind: 'status' }
  | { kind: 'help' }
  | { kind: 'quit' }
  | { kind: 'invalid'; message: string };

const CAPTURE_TOGGLES: readonly CaptureToggle[] = ['audio', 'screen', 'webcam', 'vertical'];

const isCaptureToggle = (value: string): value is CaptureToggle =>
  CAPTURE_TOGGLES.some((toggle) => toggle === value);

const UNKNOWN_COMMAND = 'Unknown command. Use /help for the list of commands.';

export const parseTerminalCommand = (line: string): TerminalCommand => {
  const input = line.trim();
  if (input.length === 0) {
    return { kind: 'toggleRecording' };
  }

  if (!input.startsWith('/')) {
    return { kind: 'invalid', message: UNKNOWN_COMMAND };
  }

  const separator = input.search(/\s/);
  const name = (separator === -1 ? input : input.slice(0, separator)).slice(1).toLowerCase();
  const rest = separator === -1 ? '' : input.slice(separator).trim();

  switch (name) {
    case 'cancel':
      return { kind: 'cancel' };
    case 'status':
      return { kind: 'status' };
    case 'help':
      return { kind: 'help' };
    case 'quit':
      return { kind: 'quit' };
    case 'title':
      return rest ? { kind: 'title', value: rest } : { kind: 'invalid', message: 'Usage: /title <text>' };
    case 'monitor':
      return rest
        ? { kind: 'monitor', value: rest }
        : { kind: 'invalid', message: 'Usage: /monitor <name>' };
    case 'reprocess':
      return rest
        ? { kind: 'reprocess', folder: rest }
        : { kind: 'invalid', message: 'Usage: /reprocess <folder>' };
  }

  if (isCaptureToggle(name)) {
    const value = rest.toLowerCase();
    if (value === 'on' || value === 'off') {
      return { kind: 'capture', option: name, enabled: value === 'on' };
    }

    return { kind: 'invalid', message: `Usage: /${name} on|off` };
  }

  return { kind: 'invalid', message: UNKNOWN_COMMAND };
};
