import type { Proc, Text, TextSegment } from '../types';

export type ProcMatcher = RegExp | ((tool: Tool, proc: Proc) => boolean);

export type TextFormatter = (text: Text, str: string) => string | undefined;

export type ReferenceStyle = 'at' | 'plain';

export interface ToolDefinition {
  name: string;
  cmd: string[];
  env?: Record<string, string | false>;
  url?: string;
  isProc?: ProcMatcher;
  muxFocus?: boolean;
  format?: TextFormatter;
  references?: ReferenceStyle;
  nativeScroll?: boolean;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function basename(command: string): string {
  const parts = command.split(/[\\/]/);
  return parts[parts.length - 1] ?? command;
}

/**
 * Render one segment. `at` references are understood by tools that
 * resolve `@path` mentions to file attachments.
 */
export function formatSegment(segment: TextSegment, references: ReferenceStyle): string {
  if (segment.kind !== 'file' && segment.kind !== 'position') {
    return segment.text;
  }
  if (references === 'plain' || !segment.path) {
    return segment.text;
  }
  if (segment.kind === 'position' && segment.line !== undefined) {
    return `@${segment.path}#L${segment.line}`;
  }
  return `@${segment.path}`;
}

export function formatText(text: Text, references: ReferenceStyle = 'plain'): string {
  return text
    .map((line) => line.map((segment) => formatSegment(segment, references)).join(''))
    .join('\n');
}

/**
 * Immutable tool descriptor.
 */
export class Tool {
  readonly name: string;
  readonly cmd: readonly string[];
  readonly env: Readonly<Record<string, string | false>>;
  readonly url: string | undefined;
  readonly muxFocus: boolean;
  readonly nativeScroll: boolean;
  readonly references: ReferenceStyle;
  private readonly matcher: ProcMatcher;
  private readonly formatter: TextFormatter | undefined;

  constructor(definition: ToolDefinition) {
    if (definition.cmd.length === 0) {
      throw new Error(`Tool ${definition.name} has an empty command`);
    }
    this.name = definition.name;
    this.cmd = Object.freeze([...definition.cmd]);
    this.env = Object.freeze({ ...(definition.env ?? {}) });
    this.url = definition.url;
    this.muxFocus = definition.muxFocus ?? false;
    this.nativeScroll = definition.nativeScroll ?? false;
    this.references = definition.references ?? 'plain';
    this.formatter = definition.format;
    this.matcher =
      definition.isProc ?? new RegExp(`(^|[\\s/])${escapeRegExp(basename(this.command))}(\\s|$)`);
    Object.freeze(this);
  }

  get command(): string {
    return this.cmd[0] ?? this.name;
  }

  isProc(proc: Proc): boolean {
    if (typeof this.matcher === 'function') {
      return this.matcher(this, proc);
    }
    return this.matcher.test(proc.cmd);
  }

  format(text: Text, str = ''): string {
    const custom = this.formatter?.(text, str);
    if (custom !== undefined) {
      return custom;
    }
    return formatText(text, this.references);
  }
}
