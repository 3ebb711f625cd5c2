import { randomUUID } from 'node:crypto';

import { spawn, type IPty } from 'node-pty';

import { DockError, describeError } from '../errors';
import { silentLogger } from '../logger';
import type { Disposable, Logger } from '../types';
import {
  createListenerSet,
  type BackendSession,
  type LaunchSpec,
  type SessionBackend,
} from './backend';
import { buildCliEnv } from './cliEnv';

const DEFAULT_COLS = 120;
const DEFAULT_ROWS = 40;

export interface PtyBackendOptions {
  cols?: number;
  rows?: number;
  logger?: Logger;
  spawnFn?: typeof spawn;
}

class PtySession implements BackendSession {
  readonly key = randomUUID();
  readonly external = false;
  readonly ready: Promise<void>;
  private alive = true;
  private markReady: () => void = () => undefined;
  private readonly output = createListenerSet<[string]>();
  private readonly exit = createListenerSet<[]>();
  private readonly subscriptions: Disposable[];

  constructor(
    private readonly pty: IPty,
    private readonly logger: Logger,
  ) {
    this.ready = new Promise<void>((resolve) => {
      this.markReady = resolve;
    });
    this.subscriptions = [
      pty.onData((data) => {
        this.markReady();
        this.output.emit(data);
      }),
      pty.onExit(({ exitCode, signal }) => {
        this.logger.debug?.('exit', { key: this.key, exitCode, signal: signal ?? null });
        this.handleExit();
      }),
    ];
  }

  async send(text: string): Promise<void> {
    this.pty.write(text);
  }

  async submit(): Promise<void> {
    this.pty.write('\r');
  }

  isAlive(): boolean {
    return this.alive;
  }

  onOutput(listener: (data: string) => void): Disposable {
    return this.output.add(listener);
  }

  onExit(listener: () => void): Disposable {
    return this.exit.add(listener);
  }

  async dispose({ kill = true }: { kill?: boolean } = {}): Promise<void> {
    const wasAlive = this.alive;
    this.alive = false;
    for (const subscription of this.subscriptions) {
      subscription.dispose();
    }
    if (kill && wasAlive) {
      try {
        this.pty.kill();
      } catch (err) {
        this.logger.debug?.('kill failed', { key: this.key, error: describeError(err) });
      }
    }
    this.markReady();
    if (wasAlive) {
      this.exit.emit();
    }
    this.output.clear();
    this.exit.clear();
  }

  private handleExit(): void {
    if (this.alive) {
      void this.dispose({ kill: false });
    }
  }
}

/**
 * Hosts each tool directly in a pseudo terminal owned by this process.
 */
export class PtyBackend implements SessionBackend {
  readonly id = 'pty';
  private readonly cols: number;
  private readonly rows: number;
  private readonly logger: Logger;
  private readonly spawnFn: typeof spawn;
  private readonly sessions = new Set<PtySession>();

  constructor(options: PtyBackendOptions = {}) {
    this.cols = options.cols ?? DEFAULT_COLS;
    this.rows = options.rows ?? DEFAULT_ROWS;
    this.logger = options.logger ?? silentLogger;
    this.spawnFn = options.spawnFn ?? spawn;
  }

  async start(spec: LaunchSpec): Promise<BackendSession> {
    const [file, ...args] = spec.cmd;
    if (!file) {
      throw new DockError('backend_failed', `Tool ${spec.tool.name} has an empty command`);
    }

    let pty: IPty;
    try {
      this.logger.debug?.('spawn', { tool: spec.tool.name, file, args, cwd: spec.cwd });
      pty = this.spawnFn(file, args, {
        name: 'xterm-256color',
        cols: this.cols,
        rows: this.rows,
        cwd: spec.cwd,
        env: buildCliEnv(spec.env),
      });
    } catch (err) {
      throw new DockError(
        'backend_failed',
        `Failed to start ${spec.tool.name} (${file}): ${describeError(err)}`,
      );
    }

    const session = new PtySession(pty, this.logger);
    this.sessions.add(session);
    session.onExit(() => {
      this.sessions.delete(session);
    });
    return session;
  }

  async shutdown(): Promise<void> {
    const sessions = Array.from(this.sessions);
    this.sessions.clear();
    await Promise.all(sessions.map((session) => session.dispose()));
  }
}
