import path from 'node:path';
import { Writable } from 'node:stream';

import { describe, expect, it, vi } from 'vitest';

import { ConsoleEditor, parseLineRange } from './consoleEditor';

const SOURCE = 'const a = 1;\nconst b = 2;\r\nconst c = 3;\n';

describe('parseLineRange', () => {
  it('reads single lines and inclusive ranges', () => {
    expect(parseLineRange('4')).toEqual({ start: 4, end: 4 });
    expect(parseLineRange(' 2-5 ')).toEqual({ start: 2, end: 5 });
  });

  it('rejects malformed and backwards ranges', () => {
    expect(parseLineRange('0')).toBeUndefined();
    expect(parseLineRange('5-2')).toBeUndefined();
    expect(parseLineRange('a-b')).toBeUndefined();
    expect(parseLineRange('')).toBeUndefined();
  });
});

describe('ConsoleEditor', () => {
  it('writes notices to stderr with a level prefix', () => {
    const chunks: string[] = [];
    const stderr = new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        chunks.push(chunk.toString());
        callback();
      },
    });
    const editor = new ConsoleEditor({ cwd: '/repo', stderr });

    editor.notify('warn', 'Nothing to send.');
    editor.notify('error', 'Unknown prompt: nope');
    editor.notify('info', 'done');

    expect(chunks).toEqual([
      'warning: Nothing to send.\n',
      'error: Unknown prompt: nope\n',
      'done\n',
    ]);
  });

  it('has only the working directory without a file', () => {
    const editor = new ConsoleEditor({ cwd: '/repo' });

    expect(editor.context()).toEqual({ cwd: '/repo' });
    expect(editor.isVisualMode()).toBe(false);
  });

  it('resolves the file and reads the requested line', () => {
    const readFile = vi.fn((_filePath: string) => SOURCE);
    const editor = new ConsoleEditor({ cwd: '/repo', file: 'src/a.ts', line: 2, readFile });

    expect(editor.context()).toEqual({
      cwd: '/repo',
      file: { path: path.resolve('/repo', 'src/a.ts'), line: 2, lineText: 'const b = 2;' },
    });
    expect(readFile).toHaveBeenCalledWith(path.resolve('/repo', 'src/a.ts'));
  });

  it('treats a selection as visual mode until it is left', () => {
    const readFile = vi.fn((_filePath: string) => SOURCE);
    const editor = new ConsoleEditor({
      cwd: '/repo',
      file: 'src/a.ts',
      selection: { start: 1, end: 2 },
      readFile,
    });

    expect(editor.isVisualMode()).toBe(true);
    expect(editor.context().selection).toEqual({
      path: path.resolve('/repo', 'src/a.ts'),
      text: 'const a = 1;\nconst b = 2;',
      startLine: 1,
      endLine: 2,
    });

    editor.exitVisualMode();
    editor.context();

    expect(editor.isVisualMode()).toBe(false);
    expect(readFile).toHaveBeenCalledTimes(1);
  });
});
