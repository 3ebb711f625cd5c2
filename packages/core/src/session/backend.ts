import type { Tool } from '../tools/tool';
import type { Disposable } from '../types';

export interface LaunchSpec {
  tool: Tool;
  cwd: string;
  cmd: readonly string[];
  /**
   * Overrides on top of the inherited environment; `false` unsets a variable.
   */
  env: Readonly<Record<string, string | false>>;
}

/**
 * Backend-specific handle to one running process.
 */
export interface BackendSession {
  /** Unique within the backend (pty id, tmux pane id). */
  readonly key: string;
  /** True when the process was found running rather than started by us. */
  readonly external: boolean;
  /** Resolves once the process has produced output or exited, when the backend can tell. */
  readonly ready?: Promise<void>;
  send(text: string): Promise<void>;
  submit(): Promise<void>;
  isAlive(): boolean;
  focus?(): Promise<void>;
  onOutput?(listener: (data: string) => void): Disposable;
  onExit(listener: () => void): Disposable;
  dispose(options?: { kill?: boolean }): Promise<void>;
}

export interface DiscoveredSession {
  tool: Tool;
  handle: BackendSession;
}

export interface SessionBackend {
  readonly id: string;
  start(spec: LaunchSpec): Promise<BackendSession>;
  discover?(tools: readonly Tool[]): Promise<DiscoveredSession[]>;
  shutdown?(): Promise<void>;
}

export function createListenerSet<T extends unknown[]>() {
  const listeners = new Set<(...args: T) => void>();
  return {
    add(listener: (...args: T) => void): Disposable {
      listeners.add(listener);
      return { dispose: () => listeners.delete(listener) };
    },
    emit(...args: T): void {
      for (const listener of Array.from(listeners)) {
        listener(...args);
      }
    },
    clear(): void {
      listeners.clear();
    },
  };
}
