import { describeError } from '../errors';
import { silentLogger } from '../logger';
import type { SessionBackend } from '../session/backend';
import { Session } from '../session/session';
import { TerminalView, type TerminalHandle } from '../terminal/terminalView';
import type { Tool } from '../tools/tool';
import type { Logger } from '../types';
import { matchesFilter, type StateFilter } from './filter';

/**
 * One addressable tool instance: the tool, its session and, once attached, a terminal view.
 */
export interface State {
  readonly tool: Tool;
  readonly session: Session;
  terminal?: TerminalHandle;
}

export interface AttachOptions {
  show?: boolean;
  focus?: boolean;
}

export interface WithOptions {
  filter?: StateFilter;
  /** Act on every match instead of the first. */
  all?: boolean;
  /** Resolve a state when nothing matches, and make sure it has a terminal view. */
  attach?: boolean;
  show?: boolean;
  /** `true` focuses the terminal view after the action. */
  focus?: boolean;
}

/**
 * `justAttached` is true when this dispatch created the state's terminal view.
 */
export type StateAction<R> = (state: State, justAttached: boolean) => R | Promise<R>;

export interface StateRegistryOptions {
  logger?: Logger;
  createTerminal?: (state: State) => TerminalHandle;
  /**
   * Called by `with` when nothing matches and `attach` is set. May start or pick a session.
   */
  resolveMissing?: (filter: StateFilter) => Promise<State | undefined>;
}

export class StateRegistry {
  private readonly states = new Map<string, State>();
  private readonly logger: Logger;
  private readonly createTerminal: (state: State) => TerminalHandle;
  private readonly resolveMissing: StateRegistryOptions['resolveMissing'];

  constructor(options: StateRegistryOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.resolveMissing = options.resolveMissing;
    this.createTerminal =
      options.createTerminal ??
      ((state) =>
        new TerminalView(state.session, {
          nativeScroll: state.tool.nativeScroll,
          logger: this.logger,
        }));
  }

  get size(): number {
    return this.states.size;
  }

  /**
   * States matching every defined field of `filter`, in registration order.
   */
  get(filter: StateFilter = {}): State[] {
    return Array.from(this.states.values()).filter((state) =>
      matchesFilter(
        {
          name: state.tool.name,
          attached: state.session.isAlive(),
          terminal: state.terminal !== undefined,
        },
        filter,
      ),
    );
  }

  has(state: State): boolean {
    return this.states.get(state.session.id) === state;
  }

  /**
   * The state owning `session`, registering a new one the first time.
   */
  getState(session: Session): State {
    const existing = this.states.get(session.id);
    if (existing) {
      return existing;
    }
    const state: State = { tool: session.tool, session };
    this.states.set(session.id, state);
    this.logger.debug?.('registered', { session: session.id, tool: session.tool.name });
    session.onExit(() => {
      this.logger.debug?.('process exited', { session: session.id });
    });
    return state;
  }

  /**
   * Make sure `state` is registered and has a terminal view. A new view is opened.
   * Returns whether the view was created by this call.
   */
  attach(state: State, options: AttachOptions = {}): boolean {
    if (!this.has(state)) {
      this.states.set(state.session.id, state);
    }
    let justAttached = false;
    if (!state.terminal) {
      state.terminal = this.createTerminal(state);
      state.terminal.show();
      justAttached = true;
    } else if (options.show) {
      state.terminal.show();
    }
    if (options.focus) {
      state.terminal.focus();
    }
    return justAttached;
  }

  /**
   * Resolve target states and run `action` on each. Failures are logged per state.
   */
  async with<R>(action: StateAction<R>, options: WithOptions = {}): Promise<R[]> {
    let targets = this.get(options.filter);
    if (targets.length === 0 && options.attach && this.resolveMissing) {
      const resolved = await this.resolveMissing(options.filter ?? {});
      if (resolved) {
        targets = [resolved];
      }
    }
    if (!options.all) {
      targets = targets.slice(0, 1);
    }

    const results: R[] = [];
    for (const state of targets) {
      try {
        const justAttached =
          options.attach || options.show ? this.attach(state, { show: options.show }) : false;
        const result = await action(state, justAttached);
        if (options.focus === true) {
          state.terminal?.focus();
        }
        results.push(result);
      } catch (err) {
        this.logger.error(`${state.tool.name} (${state.session.id}): ${describeError(err)}`);
      }
    }
    return results;
  }

  /**
   * Remove `state`, close its view and end its session. Safe to call twice.
   */
  async detach(state: State): Promise<void> {
    if (!this.has(state)) {
      return;
    }
    this.states.delete(state.session.id);
    const terminal = state.terminal;
    state.terminal = undefined;
    terminal?.dispose();
    await state.session.detach();
  }

  /**
   * Register sessions that backends report as running. Returns the newly registered states.
   */
  async discover(backends: readonly SessionBackend[], tools: readonly Tool[]): Promise<State[]> {
    const added: State[] = [];
    for (const backend of backends) {
      if (!backend.discover) {
        continue;
      }
      try {
        for (const { tool, handle } of await backend.discover(tools)) {
          const session = new Session(tool, backend.id, handle, { logger: this.logger });
          if (this.states.has(session.id)) {
            continue;
          }
          added.push(this.getState(session));
        }
      } catch (err) {
        this.logger.warn(`discovery failed for ${backend.id}: ${describeError(err)}`);
      }
    }
    return added;
  }
}
