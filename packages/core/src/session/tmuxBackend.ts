import { randomUUID } from 'node:crypto';

import { DockError, describeError } from '../errors';
import { silentLogger } from '../logger';
import type { Tool } from '../tools/tool';
import type { Disposable, Logger, Proc } from '../types';
import {
  createListenerSet,
  type BackendSession,
  type DiscoveredSession,
  type LaunchSpec,
  type SessionBackend,
} from './backend';
import { partitionEnv } from './cliEnv';
import {
  execCommand,
  listProcesses as listSystemProcesses,
  processTree,
  type ExecFn,
} from './processList';

const PANE_FORMAT = '#{pane_id}\t#{pane_pid}\t#{pane_current_path}';

export interface TmuxBackendOptions {
  exec?: ExecFn;
  listProcesses?: () => Promise<Proc[]>;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

type TmuxPane = { paneId: string; pid: number; cwd: string };

export function parsePanes(output: string): TmuxPane[] {
  const panes: TmuxPane[] = [];
  for (const line of output.split('\n')) {
    const [paneId, pid, cwd] = line.split('\t');
    if (!paneId || !pid || !paneId.startsWith('%')) {
      continue;
    }
    const parsedPid = Number(pid);
    if (!Number.isFinite(parsedPid)) {
      continue;
    }
    panes.push({ paneId, pid: parsedPid, cwd: cwd ?? '' });
  }
  return panes;
}

class TmuxPaneSession implements BackendSession {
  private alive = true;
  private readonly exit = createListenerSet<[]>();

  constructor(
    readonly key: string,
    readonly external: boolean,
    private readonly tmux: (args: readonly string[]) => Promise<string>,
  ) {}

  async send(text: string): Promise<void> {
    await this.run(['send-keys', '-t', this.key, '-l', '--', text]);
  }

  async submit(): Promise<void> {
    await this.run(['send-keys', '-t', this.key, 'Enter']);
  }

  async focus(): Promise<void> {
    await this.run(['select-window', '-t', this.key, ';', 'select-pane', '-t', this.key]);
  }

  isAlive(): boolean {
    return this.alive;
  }

  onExit(listener: () => void): Disposable {
    return this.exit.add(listener);
  }

  markDead(): void {
    if (!this.alive) {
      return;
    }
    this.alive = false;
    this.exit.emit();
    this.exit.clear();
  }

  async dispose({ kill = true }: { kill?: boolean } = {}): Promise<void> {
    try {
      if (kill && this.alive) {
        await this.tmux(['kill-pane', '-t', this.key]);
      }
    } catch (err) {
      if (!isPaneGone(err)) {
        throw err;
      }
    } finally {
      this.markDead();
    }
  }

  private async run(args: readonly string[]): Promise<void> {
    try {
      await this.tmux(args);
    } catch (err) {
      if (isPaneGone(err)) {
        this.markDead();
      }
      throw err;
    }
  }
}

function isPaneGone(err: unknown): boolean {
  return /can't find (pane|window)|no server running/i.test(describeError(err));
}

/**
 * Hosts tools in tmux panes. Panes outlive this process, so sessions started by an
 * earlier run are found again through `discover`.
 */
export class TmuxBackend implements SessionBackend {
  readonly id = 'tmux';
  private readonly exec: ExecFn;
  private readonly listProcesses: () => Promise<Proc[]>;
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: Logger;
  private readonly panes = new Map<string, TmuxPaneSession>();
  private available: boolean | undefined;

  constructor(options: TmuxBackendOptions = {}) {
    this.exec = options.exec ?? execCommand;
    this.listProcesses = options.listProcesses ?? (() => listSystemProcesses(this.exec));
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? silentLogger;
  }

  async start(spec: LaunchSpec): Promise<BackendSession> {
    await this.ensureAvailable();

    const { set, unset } = partitionEnv(spec.env);
    const envArgs = set.flatMap(([key, value]) => ['-e', `${key}=${value}`]);
    const command =
      unset.length > 0
        ? ['env', ...unset.flatMap((key) => ['-u', key]), ...spec.cmd]
        : [...spec.cmd];
    const insideTmux = Boolean(this.env['TMUX']);
    const target = insideTmux
      ? ['split-window', '-h', '-d']
      : ['new-session', '-d', '-s', `clidock-${spec.tool.name}-${randomUUID().slice(0, 8)}`];
    const args = [
      ...target,
      ...['-P', '-F', '#{pane_id}', '-c', spec.cwd],
      ...envArgs,
      '--',
      ...command,
    ];

    this.logger.debug?.('start', { tool: spec.tool.name, args });
    let output: string;
    try {
      output = await this.tmux(args);
    } catch (err) {
      throw new DockError(
        'backend_failed',
        `Failed to start ${spec.tool.name} in tmux: ${describeError(err)}`,
      );
    }

    const paneId = output.trim().split('\n')[0]?.trim() ?? '';
    if (!paneId.startsWith('%')) {
      throw new DockError('backend_failed', `tmux did not report a pane for ${spec.tool.name}`);
    }
    return this.track(paneId, false);
  }

  async discover(tools: readonly Tool[]): Promise<DiscoveredSession[]> {
    let output: string;
    try {
      output = await this.tmux(['list-panes', '-a', '-F', PANE_FORMAT]);
    } catch (err) {
      // No server running means no panes.
      this.logger.debug?.('list-panes failed', { error: describeError(err) });
      for (const pane of this.panes.values()) {
        pane.markDead();
      }
      this.panes.clear();
      return [];
    }

    const panes = parsePanes(output);
    const livePaneIds = new Set(panes.map((pane) => pane.paneId));
    for (const [paneId, session] of this.panes) {
      if (!livePaneIds.has(paneId)) {
        session.markDead();
        this.panes.delete(paneId);
      }
    }

    const procs = await this.listProcesses();
    const discovered: DiscoveredSession[] = [];
    for (const pane of panes) {
      const tree = processTree(pane.pid, procs);
      const tool = tools.find((candidate) => tree.some((proc) => candidate.isProc(proc)));
      if (!tool) {
        continue;
      }
      discovered.push({ tool, handle: this.track(pane.paneId, true) });
    }
    return discovered;
  }

  private track(paneId: string, external: boolean): TmuxPaneSession {
    const existing = this.panes.get(paneId);
    if (existing) {
      return existing;
    }
    const session = new TmuxPaneSession(paneId, external, (args) => this.tmux(args));
    this.panes.set(paneId, session);
    session.onExit(() => {
      this.panes.delete(paneId);
    });
    return session;
  }

  private async ensureAvailable(): Promise<void> {
    if (this.available === undefined) {
      try {
        await this.tmux(['-V']);
        this.available = true;
      } catch {
        this.available = false;
      }
    }
    if (!this.available) {
      throw new DockError('backend_unavailable', 'tmux is not installed or not on PATH');
    }
  }

  private tmux(args: readonly string[]): Promise<string> {
    return this.exec('tmux', args);
  }
}
