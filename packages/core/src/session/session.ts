import path from 'node:path';

import { DockError, describeError } from '../errors';
import { silentLogger } from '../logger';
import type { Tool } from '../tools/tool';
import type { Disposable, Logger, Proc } from '../types';
import type { BackendSession, SessionBackend } from './backend';
import { PtyBackend } from './ptyBackend';
import { TmuxBackend } from './tmuxBackend';

export interface SessionOptions {
  logger?: Logger;
}

export interface StartSessionOptions extends SessionOptions {
  cwd?: string;
}

/**
 * One tool process behind a backend. Writes are queued so they reach the
 * process in call order; once the process is gone they resolve to `false`.
 */
export class Session {
  readonly id: string;
  readonly tool: Tool;
  readonly backend: string;
  private readonly handle: BackendSession;
  private readonly logger: Logger;
  private queue: Promise<unknown> = Promise.resolve();
  private detached = false;

  constructor(tool: Tool, backend: string, handle: BackendSession, options: SessionOptions = {}) {
    this.id = `${backend}:${handle.key}`;
    this.tool = tool;
    this.backend = backend;
    this.handle = handle;
    this.logger = options.logger ?? silentLogger;
  }

  static async start(
    tool: Tool,
    backend: SessionBackend,
    options: StartSessionOptions = {},
  ): Promise<Session> {
    const handle = await backend.start({
      tool,
      cwd: path.resolve(options.cwd ?? process.cwd()),
      cmd: tool.cmd,
      env: tool.env,
    });
    return new Session(tool, backend.id, handle, options);
  }

  get external(): boolean {
    return this.handle.external;
  }

  isAlive(): boolean {
    return !this.detached && this.handle.isAlive();
  }

  isProc(proc: Proc): boolean {
    return this.tool.isProc(proc);
  }

  /**
   * Readiness signal from the backend, when it has one.
   */
  whenReady(): Promise<void> | undefined {
    return this.handle.ready;
  }

  send(text: string): Promise<boolean> {
    return this.enqueue('send', async () => {
      if (this.tool.muxFocus && this.handle.focus) {
        await this.handle.focus();
      }
      await this.handle.send(text);
    });
  }

  submit(): Promise<boolean> {
    return this.enqueue('submit', () => this.handle.submit());
  }

  async focus(): Promise<void> {
    if (!this.isAlive() || !this.handle.focus) {
      return;
    }
    await this.handle.focus();
  }

  onOutput(listener: (data: string) => void): Disposable | undefined {
    return this.handle.onOutput?.(listener);
  }

  onExit(listener: () => void): Disposable {
    return this.handle.onExit(listener);
  }

  async detach(): Promise<void> {
    if (this.detached) {
      return;
    }
    this.detached = true;
    await this.queue;
    await this.handle.dispose();
  }

  private enqueue(operation: string, write: () => Promise<void>): Promise<boolean> {
    const next = this.queue.then(async () => {
      if (!this.isAlive()) {
        this.logger.debug?.(`${operation} skipped, process is gone`, { session: this.id });
        return false;
      }
      try {
        await write();
        return true;
      } catch (err) {
        this.logger.warn(`${operation} failed for ${this.id}: ${describeError(err)}`);
        return false;
      }
    });
    this.queue = next;
    return next;
  }
}

/**
 * Backends by id. `setup()` registers the built-in ones and may be called repeatedly.
 */
export class BackendRegistry {
  private readonly backends = new Map<string, SessionBackend>();
  private ready = false;

  constructor(private readonly options: { logger?: Logger } = {}) {}

  setup(): void {
    if (this.ready) {
      return;
    }
    this.ready = true;
    const logger = this.options.logger;
    for (const backend of [new PtyBackend({ logger }), new TmuxBackend({ logger })]) {
      if (!this.backends.has(backend.id)) {
        this.backends.set(backend.id, backend);
      }
    }
  }

  register(backend: SessionBackend): void {
    this.backends.set(backend.id, backend);
  }

  get(id: string): SessionBackend {
    const backend = this.backends.get(id);
    if (!backend) {
      throw new DockError('unknown_backend', `Unknown backend: ${id}`);
    }
    return backend;
  }

  list(): SessionBackend[] {
    return Array.from(this.backends.values());
  }

  async shutdown(): Promise<void> {
    await Promise.all(this.list().map((backend) => backend.shutdown?.()));
  }
}
