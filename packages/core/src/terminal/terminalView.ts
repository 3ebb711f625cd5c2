import { describeError } from '../errors';
import { silentLogger } from '../logger';
import type { Disposable, Logger } from '../types';

const MAX_BUFFERED_CHARS = 512 * 1024;
// Tools that repaint their own viewport only need the latest frame.
const MAX_BUFFERED_CHARS_NATIVE_SCROLL = 16 * 1024;

/**
 * Widget the host draws a session into.
 */
export interface TerminalSurface {
  open(): void;
  close(): void;
  focus(): void;
  blur(): void;
  write(data: string): void;
  dispose?(): void;
}

/**
 * What a view needs from the session behind it.
 */
export interface TerminalSource {
  onOutput(listener: (data: string) => void): Disposable | undefined;
  focus(): Promise<void>;
}

export interface TerminalHandle {
  show(): void;
  hide(): void;
  toggle(): void;
  focus(): void;
  blur(): void;
  isOpen(): boolean;
  isFocused(): boolean;
  dispose(): void;
}

export const nullSurface: TerminalSurface = {
  open: () => undefined,
  close: () => undefined,
  focus: () => undefined,
  blur: () => undefined,
  write: () => undefined,
};

export interface TerminalViewOptions {
  surface?: TerminalSurface;
  nativeScroll?: boolean;
  logger?: Logger;
}

export class TerminalView implements TerminalHandle {
  private open = false;
  private focused = false;
  private disposed = false;
  private pending = '';
  private readonly surface: TerminalSurface;
  private readonly maxPending: number;
  private readonly logger: Logger;
  private readonly subscription: Disposable | undefined;

  constructor(
    private readonly source: TerminalSource,
    options: TerminalViewOptions = {},
  ) {
    this.surface = options.surface ?? nullSurface;
    this.maxPending = options.nativeScroll ? MAX_BUFFERED_CHARS_NATIVE_SCROLL : MAX_BUFFERED_CHARS;
    this.logger = options.logger ?? silentLogger;
    this.subscription = source.onOutput((data) => this.handleOutput(data));
  }

  isOpen(): boolean {
    return this.open;
  }

  isFocused(): boolean {
    return this.focused;
  }

  show(): void {
    if (this.disposed || this.open) {
      return;
    }
    this.open = true;
    this.surface.open();
    if (this.pending) {
      const data = this.pending;
      this.pending = '';
      this.surface.write(data);
    }
  }

  hide(): void {
    if (this.disposed || !this.open) {
      return;
    }
    this.blur();
    this.open = false;
    this.surface.close();
  }

  toggle(): void {
    if (this.open) {
      this.hide();
      return;
    }
    this.show();
    this.focus();
  }

  focus(): void {
    if (this.disposed) {
      return;
    }
    this.show();
    if (this.focused) {
      return;
    }
    this.focused = true;
    this.surface.focus();
    this.source.focus().catch((err: unknown) => {
      this.logger.warn(`focus failed: ${describeError(err)}`);
    });
  }

  blur(): void {
    if (this.disposed || !this.focused) {
      return;
    }
    this.focused = false;
    this.surface.blur();
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.hide();
    this.disposed = true;
    this.pending = '';
    this.subscription?.dispose();
    this.surface.dispose?.();
  }

  private handleOutput(data: string): void {
    if (this.disposed) {
      return;
    }
    if (this.open) {
      this.surface.write(data);
      return;
    }
    this.pending = keepTail(this.pending + data, this.maxPending);
  }
}

/**
 * The last `max` UTF-16 units of `text`, moved forward to the first line break or escape
 * sequence so replay starts on a clean boundary. Without one, a dangling low surrogate is
 * dropped.
 */
function keepTail(text: string, max: number): string {
  if (text.length <= max) {
    return text;
  }
  const tail = text.slice(text.length - max);
  const boundary = tail.search(/[\n\u001b]/);
  if (boundary >= 0) {
    return tail.slice(tail[boundary] === '\n' ? boundary + 1 : boundary);
  }
  const first = tail.charCodeAt(0);
  return first >= 0xdc00 && first <= 0xdfff ? tail.slice(1) : tail;
}
