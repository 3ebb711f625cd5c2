import path from 'node:path';

import { DockError } from '../errors';
import type { EditorContext, RenderResult, Text, TextLine, TextSegment } from '../types';

export interface Message {
  /** Literal template. */
  msg?: string;
  /** Name of a configured prompt template; wins over `msg`. */
  prompt?: string;
}

const PLACEHOLDER = /\{(\w+)\}/g;

/**
 * Path as shown to the tool: relative to the working directory when it lies inside it.
 */
export function displayPath(filePath: string, cwd: string): string {
  if (!path.isAbsolute(filePath)) {
    return filePath;
  }
  const relative = path.relative(cwd, filePath);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    return filePath;
  }
  return relative;
}

export function textToString(text: Text): string {
  return text.map((line) => line.map((segment) => segment.text).join('')).join('\n');
}

/**
 * Expands message templates against the editor context into structured text.
 */
export class Renderer {
  constructor(private readonly prompts: Readonly<Record<string, string>>) {}

  promptNames(): string[] {
    return Object.keys(this.prompts);
  }

  template(message: Message): string {
    if (message.prompt !== undefined) {
      const template = this.prompts[message.prompt];
      if (template === undefined) {
        throw new DockError('unknown_prompt', `Unknown prompt: ${message.prompt}`);
      }
      return template;
    }
    return message.msg ?? '';
  }

  render(message: Message | string, context: EditorContext): RenderResult {
    const template = this.template(typeof message === 'string' ? { msg: message } : message);
    const text: Text = [];
    let current: TextLine = [];

    const append = (segments: TextSegment[][]) => {
      segments.forEach((line, index) => {
        if (index > 0) {
          text.push(current);
          current = [];
        }
        current.push(...line);
      });
    };

    template.split('\n').forEach((line, index) => {
      if (index > 0) {
        text.push(current);
        current = [];
      }
      let last = 0;
      for (const match of line.matchAll(PLACEHOLDER)) {
        const start = match.index ?? 0;
        if (start > last) {
          current.push({ kind: 'text', text: line.slice(last, start) });
        }
        last = start + match[0].length;
        const expansion = this.expand(match[1] ?? '', context);
        if (expansion === undefined) {
          current.push({ kind: 'text', text: match[0] });
        } else {
          append(expansion);
        }
      }
      if (last < line.length) {
        current.push({ kind: 'text', text: line.slice(last) });
      }
    });
    text.push(current);

    return { msg: textToString(text), text };
  }

  /**
   * Lines of segments for a placeholder, `[]` when it has no value here, `undefined`
   * when the placeholder is unknown.
   */
  private expand(name: string, context: EditorContext): TextSegment[][] | undefined {
    const { cwd, file, selection } = context;
    switch (name) {
      case 'cwd':
        return [[{ kind: 'text', text: cwd }]];
      case 'file': {
        if (!file) {
          return [];
        }
        const shown = displayPath(file.path, cwd);
        return [[{ kind: 'file', text: shown, path: shown }]];
      }
      case 'position':
        return this.position(context);
      case 'line':
        return file?.lineText !== undefined ? [[{ kind: 'text', text: file.lineText }]] : [];
      case 'selection':
        return this.selection(context);
      case 'this':
        return selection?.text ? this.selection(context) : this.position(context);
      default:
        return undefined;
    }
  }

  private position({ cwd, file }: EditorContext): TextSegment[][] {
    if (!file) {
      return [];
    }
    const shown = displayPath(file.path, cwd);
    const segment: TextSegment =
      file.line !== undefined
        ? { kind: 'position', text: `${shown}:${file.line}`, path: shown, line: file.line }
        : { kind: 'position', text: shown, path: shown };
    return [[segment]];
  }

  private selection({ cwd, selection }: EditorContext): TextSegment[][] {
    if (!selection?.text) {
      return [];
    }
    const shown = selection.path ? displayPath(selection.path, cwd) : undefined;
    return selection.text.split('\n').map((line) => {
      const segment: TextSegment = { kind: 'selection', text: line };
      if (shown) {
        segment.path = shown;
      }
      return line ? [segment] : [];
    });
  }
}
