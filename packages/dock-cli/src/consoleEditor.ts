import fs from 'node:fs';
import path from 'node:path';

import type { Editor, EditorContext, NoticeLevel } from '../../core/src';

export interface LineRange {
  start: number;
  end: number;
}

export interface ConsoleEditorOptions {
  cwd: string;
  /** File the message refers to, relative to `cwd`. */
  file?: string;
  line?: number;
  /** Lines of `file` sent as the selection. */
  selection?: LineRange;
  stderr?: NodeJS.WritableStream;
  readFile?: (filePath: string) => string;
}

const NOTICE_PREFIX: Record<NoticeLevel, string> = {
  info: '',
  warn: 'warning: ',
  error: 'error: ',
};

/**
 * Parses `12` or `12-20` (1-based, inclusive).
 */
export function parseLineRange(value: string): LineRange | undefined {
  const match = /^(\d+)(?:-(\d+))?$/.exec(value.trim());
  if (!match?.[1]) {
    return undefined;
  }
  const start = Number.parseInt(match[1], 10);
  const end = match[2] ? Number.parseInt(match[2], 10) : start;
  if (start < 1 || end < start) {
    return undefined;
  }
  return { start, end };
}

/**
 * Editor for a shell: the context comes from command-line flags and notices go to stderr.
 * A `--selection` acts as visual mode until a message has been sent.
 */
export class ConsoleEditor implements Editor {
  private readonly stderr: NodeJS.WritableStream;
  private readonly readFile: (filePath: string) => string;
  private visual: boolean;
  private lines: string[] | undefined;

  constructor(private readonly options: ConsoleEditorOptions) {
    this.stderr = options.stderr ?? process.stderr;
    this.readFile = options.readFile ?? ((filePath) => fs.readFileSync(filePath, 'utf8'));
    this.visual = options.selection !== undefined;
  }

  notify(level: NoticeLevel, message: string): void {
    this.stderr.write(`${NOTICE_PREFIX[level]}${message}\n`);
  }

  isVisualMode(): boolean {
    return this.visual;
  }

  exitVisualMode(): void {
    this.visual = false;
  }

  context(): EditorContext {
    const { cwd, file, line, selection } = this.options;
    if (!file) {
      return { cwd };
    }
    const filePath = path.resolve(cwd, file);
    const context: EditorContext = { cwd, file: { path: filePath } };

    if (line !== undefined) {
      context.file = { path: filePath, line, lineText: this.fileLines(filePath)[line - 1] };
    }
    if (selection) {
      const text = this.fileLines(filePath)
        .slice(selection.start - 1, selection.end)
        .join('\n');
      context.selection = {
        path: filePath,
        text,
        startLine: selection.start,
        endLine: selection.end,
      };
    }
    return context;
  }

  private fileLines(filePath: string): string[] {
    if (!this.lines) {
      this.lines = this.readFile(filePath).split(/\r?\n/);
    }
    return this.lines;
  }
}
