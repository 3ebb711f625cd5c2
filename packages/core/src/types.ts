export type TextSegmentKind = 'text' | 'file' | 'position' | 'selection';

export interface TextSegment {
  kind: TextSegmentKind;
  text: string;
  /**
   * Path the segment refers to (file, position and selection segments).
   */
  path?: string;
  line?: number;
}

export type TextLine = TextSegment[];

/**
 * Structured message: ordered lines of typed segments.
 */
export type Text = TextLine[];

export interface RenderResult {
  msg: string;
  text: Text;
}

/**
 * A live OS process as reported by the process table.
 */
export interface Proc {
  pid: number;
  ppid: number;
  cmd: string;
  cwd?: string;
}

export type Logger = {
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
  debug?: (message: string, ...args: unknown[]) => void;
};

export type NoticeLevel = 'info' | 'warn' | 'error';

export interface EditorContext {
  cwd: string;
  file?: { path: string; line?: number; col?: number; lineText?: string };
  selection?: { path?: string; text: string; startLine?: number; endLine?: number };
}

/**
 * Host editing environment the dock runs inside.
 */
export interface Editor {
  notify(level: NoticeLevel, message: string): void;
  isVisualMode(): boolean;
  exitVisualMode(): void;
  context(): EditorContext;
  openUrl?(url: string): Promise<void>;
}

export interface PickerItem<T> {
  label: string;
  detail?: string;
  value: T;
}

export interface Picker {
  pick<T>(title: string, items: PickerItem<T>[]): Promise<T | undefined>;
}

export interface Disposable {
  dispose(): void;
}
