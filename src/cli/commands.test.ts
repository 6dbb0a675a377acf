import { describe, expect, it } from 'vitest';
import { parseTerminalCommand } from './commands';

describe('parseTerminalCommand', () => {
  it('treats an empty line as start/stop', () => {
    expect(parseTerminalCommand('')).toEqual({ kind: 'toggleRecording' });
    expect(parseTerminalCommand('   ')).toEqual({ kind: 'toggleRecording' });
  });

  it('parses the argument-free commands', () => {
    expect(parseTerminalCommand('/cancel')).toEqual({ kind: 'cancel' });
    expect(parseTerminalCommand('/status')).toEqual({ kind: 'status' });
    expect(parseTerminalCommand(' /HELP ')).toEqual({ kind: 'help' });
    expect(parseTerminalCommand('/quit')).toEqual({ kind: 'quit' });
  });

  it('keeps the full text of a title, including inner spaces', () => {
    expect(parseTerminalCommand('/title  Weekly  Demo ')).toEqual({ kind: 'title', value: 'Weekly  Demo' });
    expect(parseTerminalCommand('/title')).toEqual({ kind: 'invalid', message: 'Usage: /title <text>' });
  });

  it('parses a monitor name', () => {
    expect(parseTerminalCommand('/monitor HDMI-A-1')).toEqual({ kind: 'monitor', value: 'HDMI-A-1' });
    expect(parseTerminalCommand('/monitor ')).toEqual({ kind: 'invalid', message: 'Usage: /monitor <name>' });
  });

  it('parses the folder to reprocess', () => {
    expect(parseTerminalCommand('/reprocess 012-weekly demo')).toEqual({
      kind: 'reprocess',
      folder: '012-weekly demo'
    });
    expect(parseTerminalCommand('/reprocess')).toEqual({
      kind: 'invalid',
      message: 'Usage: /reprocess <folder>'
    });
  });

  it('parses capture toggles', () => {
    expect(parseTerminalCommand('/audio off')).toEqual({ kind: 'capture', option: 'audio', enabled: false });
    expect(parseTerminalCommand('/webcam ON')).toEqual({ kind: 'capture', option: 'webcam', enabled: true });
    expect(parseTerminalCommand('/vertical maybe')).toEqual({
      kind: 'invalid',
      message: 'Usage: /vertical on|off'
    });
  });

  it('rejects unknown input', () => {
    const unknown = { kind: 'invalid', message: 'Unknown command. Use /help for the list of commands.' };

    expect(parseTerminalCommand('/record')).toEqual(unknown);
    expect(parseTerminalCommand('hello')).toEqual(unknown);
  });
});
