import { parseConfig, type DockConfig } from './config';
import { deprecate } from './deprecate';
import { describeError } from './errors';
import { createLogger } from './logger';
import { Renderer, type Message } from './render/renderer';
import { defaultScheduler, type Scheduler } from './scheduler';
import { BackendRegistry, Session } from './session/session';
import { mergeFilters, type StateFilter } from './state/filter';
import { StateRegistry, type State } from './state/stateRegistry';
import { TerminalView, type TerminalSurface } from './terminal/terminalView';
import { isExecutable, type ExecutableCheck } from './tools/executable';
import type { Tool } from './tools/tool';
import { ToolRegistry } from './tools/toolRegistry';
import type { Editor, Logger, Picker, PickerItem, RenderResult, Text } from './types';

export interface TargetOptions {
  name?: string;
  filter?: StateFilter;
  all?: boolean;
  focus?: boolean;
}

export interface SendOptions extends Omit<TargetOptions, 'all'>, Message {
  /** Pre-rendered text; skips template rendering. */
  text?: Text;
  submit?: boolean;
  /** Resolve a session through the picker when none matches (default true). */
  attach?: boolean;
}

export interface NewOptions {
  name?: string;
  focus?: boolean;
  backend?: string;
}

export interface SelectOptions {
  name?: string;
  filter?: StateFilter;
  focus?: boolean;
}

export interface DockOptions {
  editor: Editor;
  picker?: Picker;
  config?: DockConfig;
  tools?: ToolRegistry;
  backends?: BackendRegistry;
  scheduler?: Scheduler;
  logger?: Logger;
  isExecutable?: ExecutableCheck;
  /** Surface for a state's terminal view; views draw nowhere without one. */
  createSurface?: (state: State) => TerminalSurface | undefined;
  cwd?: string;
}

type WithFilter<T> = T & { filter: StateFilter };

function withFilter<T extends { name?: string; filter?: StateFilter }>(options: T): WithFilter<T> {
  const byName = options.name !== undefined ? { name: options.name } : undefined;
  return { ...options, filter: mergeFilters(options.filter, byName) };
}

/**
 * String shorthand is a tool name.
 */
export function normalizeTarget(options: TargetOptions | string = {}): WithFilter<TargetOptions> {
  const opts: TargetOptions = typeof options === 'string' ? { name: options } : options;
  return withFilter(opts);
}

/**
 * String shorthand is the message.
 */
export function normalizeSend(options: SendOptions | string = {}): WithFilter<SendOptions> {
  const opts: SendOptions = typeof options === 'string' ? { msg: options } : options;
  return withFilter(opts);
}

type Choice = { state: State } | { tool: Tool };

/**
 * Command surface over the tool sessions of one host.
 */
export class Dock {
  readonly config: DockConfig;
  readonly tools: ToolRegistry;
  readonly backends: BackendRegistry;
  readonly registry: StateRegistry;
  private readonly editor: Editor;
  private readonly picker: Picker | undefined;
  private readonly scheduler: Scheduler;
  private readonly logger: Logger;
  private readonly isExecutable: ExecutableCheck;
  private readonly renderer: Renderer;
  private readonly cwd: string | undefined;
  private readonly notices: Pick<Logger, 'warn'>;
  private readonly starting = new Map<string, Promise<State | undefined>>();

  constructor(options: DockOptions) {
    this.config = options.config ?? parseConfig({});
    this.editor = options.editor;
    this.picker = options.picker;
    this.logger = options.logger ?? createLogger('dock', { debug: this.config.debug });
    this.tools = options.tools ?? new ToolRegistry(this.config.tools);
    this.backends = options.backends ?? new BackendRegistry({ logger: this.logger });
    this.scheduler = options.scheduler ?? defaultScheduler;
    this.isExecutable = options.isExecutable ?? isExecutable;
    this.renderer = new Renderer(this.config.prompts);
    this.cwd = options.cwd;
    this.notices = { warn: (message) => this.editor.notify('warn', message) };

    const createSurface = options.createSurface;
    this.registry = new StateRegistry({
      logger: this.logger,
      createTerminal: (state) =>
        new TerminalView(state.session, {
          surface: createSurface?.(state),
          nativeScroll: state.tool.nativeScroll,
          logger: this.logger,
        }),
      resolveMissing: (filter) => this.choose(filter),
    });
  }

  /**
   * Start a new session of a tool without looking for running ones.
   */
  async new(options: NewOptions | string = {}): Promise<State | undefined> {
    const opts: NewOptions = typeof options === 'string' ? { name: options } : options;
    const { name = this.config.defaultTool, focus, backend } = opts;
    const state = await this.launch(name, backend);
    if (!state) {
      return undefined;
    }
    this.registry.attach(state, { show: true, focus: focus !== false });
    return state;
  }

  async show(options?: TargetOptions | string): Promise<void> {
    const { filter, all, focus } = normalizeTarget(options);
    await this.registry.with(() => undefined, { all, attach: true, filter, focus, show: true });
  }

  async hide(options?: TargetOptions | string): Promise<void> {
    const { filter, all } = normalizeTarget(options);
    await this.registry.with((state) => state.terminal?.hide(), {
      all,
      filter: mergeFilters(filter, { terminal: true }),
    });
  }

  /**
   * A terminal created by this call stays open; an existing one flips between shown and hidden.
   */
  async toggle(options?: TargetOptions | string): Promise<void> {
    const { filter, focus } = normalizeTarget(options);
    await this.registry.with(
      (state, justAttached) => {
        const terminal = state.terminal;
        if (!terminal) {
          return;
        }
        if (!justAttached) {
          terminal.toggle();
        }
        if (terminal.isOpen() && focus !== false) {
          terminal.focus();
        }
      },
      { attach: true, filter },
    );
  }

  /**
   * Move focus into the terminal, or out of it when it already has focus.
   */
  async focus(options?: TargetOptions | string): Promise<void> {
    const { filter } = normalizeTarget(options);
    await this.registry.with(
      (state) => {
        const terminal = state.terminal;
        if (!terminal) {
          return;
        }
        if (terminal.isFocused()) {
          terminal.blur();
        } else {
          terminal.focus();
        }
      },
      { attach: true, filter, focus: false, show: true },
    );
  }

  async close(options?: TargetOptions | string): Promise<void> {
    const { filter, all } = normalizeTarget(options);
    await this.registry.with((state) => this.registry.detach(state), { all, filter });
  }

  render(message: Message | string = ''): RenderResult {
    return this.renderer.render(message, this.editor.context());
  }

  async send(options?: SendOptions | string): Promise<void> {
    const opts = normalizeSend(options);

    let msg = opts.msg;
    if (msg === undefined && opts.prompt === undefined && this.editor.isVisualMode()) {
      msg = '{selection}';
    }

    let text = opts.text;
    let str = '';
    if (!text) {
      let rendered: RenderResult;
      try {
        rendered = this.render({ msg, prompt: opts.prompt });
      } catch (err) {
        this.editor.notify('error', describeError(err));
        return;
      }
      if (rendered.msg === '') {
        this.editor.notify('warn', 'Nothing to send.');
        return;
      }
      if (rendered.msg === '\n') {
        text = [];
      } else {
        str = rendered.msg;
        text = rendered.text;
      }
    }

    const payload = text;
    await this.registry.with(
      (state) => {
        this.editor.exitVisualMode();
        this.scheduler.defer(() => {
          this.deliver(state, payload, str, opts.submit === true).catch((err: unknown) => {
            this.logger.error(`delivery to ${state.session.id} failed: ${describeError(err)}`);
          });
        });
      },
      { attach: opts.attach ?? true, filter: opts.filter, focus: opts.focus, show: true },
    );
  }

  /**
   * Send to an attached session, starting one first when there is none.
   */
  async mySend(options?: SendOptions | string): Promise<void> {
    const opts = normalizeSend(options);
    const target = await this.ensureAttached(opts, this.config.graceMs.send);
    if (target) {
      await this.send({ ...opts, filter: target });
    }
  }

  /**
   * Pick a configured prompt and send it.
   */
  async prompt(options: SendOptions = {}): Promise<void> {
    if (options.prompt !== undefined) {
      await this.send(options);
      return;
    }
    if (!this.picker) {
      this.editor.notify('warn', 'No picker available to choose a prompt');
      return;
    }
    const items: PickerItem<string>[] = this.renderer.promptNames().map((name) => ({
      label: name,
      detail: this.renderer.template({ prompt: name }),
      value: name,
    }));
    const prompt = await this.picker.pick('Select a prompt', items);
    if (prompt === undefined) {
      return;
    }
    await this.send({ ...options, prompt });
  }

  async myPrompt(options: SendOptions = {}): Promise<void> {
    const opts = normalizeSend(options);
    const target = await this.ensureAttached(opts, this.config.graceMs.prompt);
    if (target) {
      await this.prompt({ ...opts, filter: target });
    }
  }

  /**
   * Pick a running session or a tool to start, then show it.
   */
  async select(options: SelectOptions = {}): Promise<State | undefined> {
    const { filter, focus } = withFilter(options);
    const state = await this.choose(filter);
    if (!state) {
      return undefined;
    }
    this.registry.attach(state, { show: true, focus: focus !== false });
    return state;
  }

  /**
   * Register sessions the backends report as running.
   */
  async discover(): Promise<State[]> {
    this.backends.setup();
    return this.registry.discover(this.backends.list(), this.tools.list());
  }

  async shutdown(): Promise<void> {
    await this.backends.shutdown();
  }

  /** @deprecated use {@link Dock.prompt} */
  selectPrompt(options?: SendOptions): Promise<void> {
    deprecate(this.notices, 'selectPrompt', 'prompt');
    return this.prompt(options);
  }

  /** @deprecated use {@link Dock.select} */
  selectTool(options?: SelectOptions): Promise<State | undefined> {
    deprecate(this.notices, 'selectTool', 'select');
    return this.select(options);
  }

  /** @deprecated use {@link Dock.send} */
  ask(options?: SendOptions | string): Promise<void> {
    deprecate(this.notices, 'ask', 'send');
    return this.send(options);
  }

  /**
   * Filter that reaches an attached session, starting a new one and waiting for it when
   * none matches. Undefined when starting failed. Concurrent calls for the same tool share
   * one start.
   */
  private async ensureAttached(
    opts: WithFilter<SendOptions>,
    graceMs: number,
  ): Promise<StateFilter | undefined> {
    await this.discover();
    const attached = mergeFilters(opts.filter, { attached: true });
    if (this.registry.get(attached).length > 0) {
      return attached;
    }
    const name = opts.filter.name ?? this.config.defaultTool;
    let starting = this.starting.get(name);
    if (!starting) {
      starting = this.startAndWait(name, opts.focus, graceMs).finally(() => {
        this.starting.delete(name);
      });
      this.starting.set(name, starting);
    }
    const state = await starting;
    if (!state) {
      return undefined;
    }
    return mergeFilters(attached, { name: state.tool.name });
  }

  private async startAndWait(
    name: string,
    focus: boolean | undefined,
    graceMs: number,
  ): Promise<State | undefined> {
    const state = await this.new({ name, focus });
    if (state) {
      await this.waitUntilReady(state, graceMs);
    }
    return state;
  }

  private async waitUntilReady(state: State, graceMs: number): Promise<void> {
    const ready = state.session.whenReady();
    const timeout = this.scheduler.timeout(ready ? this.config.readyTimeoutMs : graceMs);
    try {
      await (ready ? Promise.race([ready, timeout.promise]) : timeout.promise);
    } finally {
      timeout.cancel();
    }
  }

  private async deliver(state: State, text: Text, str: string, submit: boolean): Promise<void> {
    if (!this.registry.has(state) || !state.session.isAlive()) {
      this.logger.debug?.('dropping message for a closed session', { session: state.session.id });
      return;
    }
    const writes = [state.session.send(`${state.tool.format(text, str)}\n`)];
    if (submit) {
      writes.push(state.session.submit());
    }
    await Promise.all(writes);
  }

  private async launch(name: string, backendId?: string): Promise<State | undefined> {
    const tool = this.tools.get(name);
    if (!tool) {
      this.editor.notify('error', `Unknown tool: ${name}`);
      return undefined;
    }
    if (!this.isExecutable(tool.command)) {
      await this.onMissing(tool);
      return undefined;
    }

    this.backends.setup();
    try {
      const backend = this.backends.get(backendId ?? this.config.backend);
      const session = await Session.start(tool, backend, { cwd: this.cwd, logger: this.logger });
      this.logger.info(`started ${tool.name} as ${session.id}`);
      return this.registry.getState(session);
    } catch (err) {
      this.editor.notify('error', describeError(err));
      return undefined;
    }
  }

  private async onMissing(tool: Tool): Promise<void> {
    if (!tool.url) {
      this.editor.notify('warn', `${tool.name} is not installed`);
      return;
    }
    this.editor.notify('warn', `${tool.name} is not installed. See ${tool.url}`);
    if (!this.picker || !this.editor.openUrl) {
      return;
    }
    const open = await this.picker.pick(`Open the ${tool.name} install page?`, [
      { label: 'Open', value: true },
      { label: 'Cancel', value: false },
    ]);
    if (!open) {
      return;
    }
    try {
      await this.editor.openUrl(tool.url);
    } catch (err) {
      this.editor.notify('error', `Cannot open ${tool.url}: ${describeError(err)}`);
    }
  }

  private async choose(filter: StateFilter): Promise<State | undefined> {
    if (!this.picker) {
      return undefined;
    }
    await this.discover();
    const states = this.registry.get(mergeFilters(filter, { attached: true }));
    const tools = this.tools
      .list()
      .filter((tool) => filter.name === undefined || tool.name === filter.name);
    const items: PickerItem<Choice>[] = [
      ...states.map((state) => ({
        label: `${state.tool.name} [${state.session.backend}]`,
        detail: state.session.external ? `${state.session.id} (external)` : state.session.id,
        value: { state },
      })),
      ...tools.map((tool) => ({
        label: tool.name,
        detail: this.isExecutable(tool.command) ? 'start a new session' : 'not installed',
        value: { tool },
      })),
    ];
    const choice = await this.picker.pick('Select a CLI tool', items);
    if (!choice) {
      return undefined;
    }
    if ('state' in choice) {
      return choice.state;
    }
    return this.launch(choice.tool.name);
  }
}
