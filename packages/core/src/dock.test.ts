import { beforeEach, describe, expect, it, vi } from 'vitest';

import { parseConfig, type DockConfigInput } from './config';
import { resetDeprecationWarnings } from './deprecate';
import { Dock, normalizeSend, normalizeTarget } from './dock';
import type { ExecFn } from './session/processList';
import { BackendRegistry, Session } from './session/session';
import { TmuxBackend } from './session/tmuxBackend';
import {
  FakeBackend,
  FakeHandle,
  ManualScheduler,
  createRecordingSurface,
  settle,
} from './test/fakes';
import type { EditorContext, NoticeLevel, Picker, PickerItem } from './types';

vi.mock('node-pty', () => ({
  spawn: vi.fn(),
}));

const CONTEXT: EditorContext = {
  cwd: '/repo',
  file: { path: '/repo/src/app.ts', line: 12, lineText: 'run();' },
};

function createPicker(choose: (labels: string[]) => string | undefined) {
  const titles: string[] = [];
  const picker: Picker = {
    async pick<T>(title: string, items: PickerItem<T>[]): Promise<T | undefined> {
      titles.push(title);
      const label = choose(items.map((item) => item.label));
      return items.find((item) => item.label === label)?.value;
    },
  };
  return { picker, titles };
}

function createHarness(
  options: { config?: DockConfigInput; picker?: Picker; installed?: boolean } = {},
) {
  const events: string[] = [];
  const notices: Array<[NoticeLevel, string]> = [];
  let visual = false;
  let context: EditorContext = CONTEXT;
  const editor = {
    notify: (level: NoticeLevel, message: string) => {
      notices.push([level, message]);
    },
    isVisualMode: () => visual,
    exitVisualMode: vi.fn(() => {
      visual = false;
    }),
    context: () => context,
    openUrl: vi.fn(async (_url: string) => undefined),
  };
  const pty = new FakeBackend('pty');
  const tmux = new FakeBackend('tmux');
  const backends = new BackendRegistry();
  backends.register(pty);
  backends.register(tmux);
  const scheduler = new ManualScheduler();
  const isExecutable = vi.fn((_command: string) => options.installed ?? true);

  const dock = new Dock({
    editor,
    picker: options.picker,
    config: parseConfig(options.config ?? {}),
    backends,
    scheduler,
    isExecutable,
    logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn() },
    createSurface: (state) => createRecordingSurface(events, state.session.id),
    cwd: '/repo',
  });

  return {
    dock,
    editor,
    events,
    notices,
    pty,
    tmux,
    scheduler,
    isExecutable,
    setVisual: (value: boolean, selection?: EditorContext['selection']) => {
      visual = value;
      context = selection ? { ...CONTEXT, selection } : CONTEXT;
    },
    /** Register a state that has no terminal view yet. */
    addDetachedState: (name: string, key: string) => {
      const tool = dock.tools.get(name);
      if (!tool) {
        throw new Error(`no tool ${name}`);
      }
      const handle = new FakeHandle(key);
      return { state: dock.registry.getState(new Session(tool, 'pty', handle)), handle };
    },
    deliver: async () => {
      await settle();
      scheduler.flushDeferred();
      await settle();
    },
  };
}

beforeEach(() => {
  resetDeprecationWarnings();
});

describe('normalizing options', () => {
  it('reads string shorthand as a tool name or a message', () => {
    expect(normalizeTarget('codex')).toEqual({ name: 'codex', filter: { name: 'codex' } });
    expect(normalizeSend('hi')).toEqual({ msg: 'hi', filter: {} });
  });

  it('lets an explicit name win over the filter name', () => {
    const options = { name: 'codex', filter: { name: 'claude', attached: true } };
    expect(normalizeTarget(options).filter).toEqual({ name: 'codex', attached: true });
  });
});

describe('Dock.new', () => {
  it('starts the tool on the configured backend and shows it focused', async () => {
    const { dock, pty, events } = createHarness();

    const state = await dock.new('codex');

    expect(pty.starts).toEqual([
      { tool: dock.tools.get('codex'), cwd: '/repo', cmd: ['codex', '--search'], env: {} },
    ]);
    expect(state?.session.id).toBe('pty:pty-1');
    expect(dock.registry.get()).toEqual([state]);
    expect(events).toEqual(['pty:pty-1:open', 'pty:pty-1:focus']);
  });

  it('uses the default tool and an explicit backend', async () => {
    const { dock, tmux, events } = createHarness({ config: { defaultTool: 'gemini' } });

    const state = await dock.new({ backend: 'tmux', focus: false });

    expect(state?.tool.name).toBe('gemini');
    expect(tmux.starts).toHaveLength(1);
    expect(events).toEqual(['tmux:tmux-1:open']);
  });

  it('reports unknown tools without starting anything', async () => {
    const { dock, pty, notices } = createHarness();

    expect(await dock.new('nope')).toBeUndefined();
    expect(notices).toEqual([['error', 'Unknown tool: nope']]);
    expect(pty.starts).toEqual([]);
  });

  it('offers the install page when the executable is missing', async () => {
    const { picker, titles } = createPicker((labels) => labels[0]);
    const { dock, pty, notices, editor, isExecutable } = createHarness({
      picker,
      installed: false,
    });

    expect(await dock.new('codex')).toBeUndefined();

    expect(isExecutable).toHaveBeenCalledWith('codex');
    expect(notices).toEqual([
      ['warn', 'codex is not installed. See https://github.com/openai/codex'],
    ]);
    expect(titles).toEqual(['Open the codex install page?']);
    expect(editor.openUrl).toHaveBeenCalledWith('https://github.com/openai/codex');
    expect(pty.starts).toEqual([]);
  });

  it('reports backend failures as notices', async () => {
    const { dock, pty, notices } = createHarness();
    pty.start = async () => {
      throw new Error('spawn failed');
    };

    expect(await dock.new('claude')).toBeUndefined();
    expect(notices).toEqual([['error', 'spawn failed']]);
    expect(dock.registry.size).toBe(0);
  });
});

describe('Dock.send', () => {
  it('formats the rendered message for the tool and sends it with a newline', async () => {
    const harness = createHarness();
    await harness.dock.new({ name: 'claude', focus: false });

    await harness.dock.send({ prompt: 'explain', submit: true });
    expect(harness.pty.sent).toEqual([]);
    await harness.deliver();

    expect(harness.pty.sent).toEqual(['Explain @src/app.ts#L12\n']);
    expect(harness.pty.handles[0]?.submits).toBe(1);
  });

  it('sends an empty line for empty structured text', async () => {
    const harness = createHarness();
    await harness.dock.new('claude');

    await harness.dock.send({ text: [] });
    await harness.deliver();

    expect(harness.pty.sent).toEqual(['\n']);
    expect(harness.notices).toEqual([]);
  });

  it('sends an empty line when the message renders to a newline', async () => {
    const harness = createHarness();
    await harness.dock.new('codex');

    await harness.dock.send('\n');
    await harness.deliver();

    expect(harness.pty.sent).toEqual(['\n']);
  });

  it('warns when there is nothing to send and touches no session', async () => {
    const harness = createHarness();
    await harness.dock.new('claude');

    await harness.dock.send();

    expect(harness.notices).toEqual([['warn', 'Nothing to send.']]);
    expect(harness.editor.exitVisualMode).not.toHaveBeenCalled();
    expect(harness.scheduler.pendingDeferred).toBe(0);
    await harness.deliver();
    expect(harness.pty.sent).toEqual([]);
  });

  it('sends the selection in visual mode and leaves visual mode first', async () => {
    const harness = createHarness();
    await harness.dock.new('codex');
    harness.setVisual(true, { path: '/repo/src/app.ts', text: 'a()\nb()' });

    await harness.dock.send();

    expect(harness.editor.exitVisualMode).toHaveBeenCalledTimes(1);
    expect(harness.pty.sent).toEqual([]);
    await harness.deliver();
    expect(harness.pty.sent).toEqual(['a()\nb()\n']);
  });

  it('keeps call order for one session', async () => {
    const harness = createHarness();
    await harness.dock.new('codex');

    await harness.dock.send('one');
    await harness.dock.send({ msg: 'two', submit: true });
    await harness.dock.send('three');
    await harness.deliver();

    expect(harness.pty.sent).toEqual(['one\n', 'two\n', 'three\n']);
  });

  it('drops a delivery whose session was closed meanwhile', async () => {
    const harness = createHarness();
    await harness.dock.new('codex');

    await harness.dock.send('late');
    await harness.dock.close();
    await harness.deliver();

    expect(harness.pty.sent).toEqual([]);
    expect(harness.notices).toEqual([]);
  });

  it('drops a delivery whose process exited meanwhile', async () => {
    const harness = createHarness();
    await harness.dock.new('codex');

    await harness.dock.send('late');
    harness.pty.handles[0]?.kill();
    await harness.deliver();

    expect(harness.pty.sent).toEqual([]);
  });

  it('reports unknown prompts', async () => {
    const harness = createHarness();
    await harness.dock.new('codex');

    await harness.dock.send({ prompt: 'missing' });

    expect(harness.notices).toEqual([['error', 'Unknown prompt: missing']]);
  });

  it('targets the named tool', async () => {
    const harness = createHarness();
    await harness.dock.new('claude');
    await harness.dock.new('codex');

    await harness.dock.send({ name: 'codex', msg: 'hi' });
    await harness.deliver();

    expect(harness.pty.handles.map((handle) => handle.sent)).toEqual([[], ['hi\n']]);
  });

  it('asks the picker for a session when nothing matches', async () => {
    const { picker, titles } = createPicker((labels) =>
      labels.includes('aider') ? 'aider' : undefined,
    );
    const harness = createHarness({ picker });

    await harness.dock.send({ name: 'aider', msg: 'hello' });
    await harness.deliver();

    expect(titles).toEqual(['Select a CLI tool']);
    expect(harness.pty.sent).toEqual(['hello\n']);
    expect(harness.events).toEqual(['pty:pty-1:open']);
  });

  it('does nothing when nothing matches and no picker exists', async () => {
    const harness = createHarness();

    await harness.dock.send('hello');
    await harness.deliver();

    expect(harness.pty.starts).toEqual([]);
    expect(harness.notices).toEqual([]);
  });
});

describe('Dock.mySend', () => {
  it('starts a session and sends once the grace period is over', async () => {
    const harness = createHarness();

    const pending = harness.dock.mySend('hello');
    await settle();

    expect(harness.dock.registry.size).toBe(1);
    expect(harness.scheduler.pendingTimeouts).toEqual([2000]);
    expect(harness.pty.sent).toEqual([]);

    harness.scheduler.fireTimeouts();
    await harness.deliver();
    await pending;

    expect(harness.pty.sent).toEqual(['hello\n']);
    expect(harness.pty.starts).toHaveLength(1);
    expect(harness.dock.registry.size).toBe(1);
  });

  it('sends immediately to an attached session', async () => {
    const harness = createHarness();
    await harness.dock.new('claude');

    await harness.dock.mySend('hello');
    expect(harness.scheduler.pendingTimeouts).toEqual([]);
    await harness.deliver();

    expect(harness.pty.sent).toEqual(['hello\n']);
    expect(harness.pty.starts).toHaveLength(1);
  });

  it('waits for the readiness signal instead of the grace period', async () => {
    const harness = createHarness({ config: { readyTimeoutMs: 5000 } });
    let markReady: () => void = () => undefined;
    harness.pty.nextReady = new Promise<void>((resolve) => {
      markReady = resolve;
    });

    const pending = harness.dock.mySend({ name: 'codex', msg: 'go' });
    await settle();
    expect(harness.scheduler.pendingTimeouts).toEqual([5000]);

    markReady();
    await harness.deliver();
    await pending;

    expect(harness.pty.sent).toEqual(['go\n']);
    expect(harness.scheduler.pendingTimeouts).toEqual([]);
  });

  it('starts the named tool when only another tool is attached', async () => {
    const harness = createHarness();
    await harness.dock.new('claude');

    const pending = harness.dock.mySend({ name: 'codex', msg: 'hi' });
    await settle();
    harness.scheduler.fireTimeouts();
    await harness.deliver();
    await pending;

    expect(harness.pty.starts.map((spec) => spec.tool.name)).toEqual(['claude', 'codex']);
    expect(harness.pty.handles.map((handle) => handle.sent)).toEqual([[], ['hi\n']]);
  });

  it('shares one start between concurrent sends', async () => {
    const harness = createHarness();

    const first = harness.dock.mySend('one');
    const second = harness.dock.mySend('two');
    await settle();

    expect(harness.pty.starts).toHaveLength(1);
    expect(harness.scheduler.pendingTimeouts).toEqual([2000]);

    harness.scheduler.fireTimeouts();
    await harness.deliver();
    await Promise.all([first, second]);

    expect(harness.pty.sent).toEqual(['one\n', 'two\n']);
    expect(harness.dock.registry.size).toBe(1);
  });

  it('gives up quietly when the tool cannot start', async () => {
    const harness = createHarness();

    await harness.dock.mySend({ name: 'nope', msg: 'hi' });

    expect(harness.notices).toEqual([['error', 'Unknown tool: nope']]);
    expect(harness.scheduler.pendingTimeouts).toEqual([]);
  });
});

describe('Dock.mySend on tmux', () => {
  it('starts a new pane when the attached one has gone away', async () => {
    const live = new Set<string>();
    const calls: string[][] = [];
    let panes = 0;
    const exec: ExecFn = async (_file, args) => {
      calls.push([...args]);
      if (args[0] === 'new-session') {
        panes += 1;
        live.add(`%${panes}`);
        return `%${panes}\n`;
      }
      if (args[0] === 'list-panes') {
        return [...live].map((paneId, index) => `${paneId}\t${100 + index}\t/repo\n`).join('');
      }
      return '';
    };
    const backends = new BackendRegistry();
    backends.register(new TmuxBackend({ exec, env: {}, listProcesses: async () => [] }));
    const scheduler = new ManualScheduler();
    const dock = new Dock({
      editor: {
        notify: vi.fn(),
        isVisualMode: () => false,
        exitVisualMode: vi.fn(),
        context: () => CONTEXT,
      },
      config: parseConfig({ backend: 'tmux' }),
      backends,
      scheduler,
      isExecutable: () => true,
      logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn() },
      cwd: '/repo',
    });
    const sendTo = async (msg: string) => {
      const pending = dock.mySend(msg);
      await settle();
      scheduler.fireTimeouts();
      await settle();
      scheduler.flushDeferred();
      await settle();
      await pending;
    };

    await sendTo('first');
    live.delete('%1');
    await sendTo('hello');

    expect(calls.filter((args) => args[0] === 'new-session')).toHaveLength(2);
    const literal = calls.filter((args) => args[0] === 'send-keys' && args[3] === '-l');
    expect(literal.map((args) => [args[2], args[5]])).toEqual([
      ['%1', 'first\n'],
      ['%2', 'hello\n'],
    ]);
  });
});

describe('Dock.prompt', () => {
  it('sends the picked prompt', async () => {
    const { picker, titles } = createPicker(() => 'fix');
    const harness = createHarness({ picker });
    await harness.dock.new('codex');

    await harness.dock.prompt();
    await harness.deliver();

    expect(titles).toEqual(['Select a prompt']);
    expect(harness.pty.sent).toEqual(['Can you fix src/app.ts:12?\n']);
  });

  it('does nothing when the picker is dismissed', async () => {
    const { picker } = createPicker(() => undefined);
    const harness = createHarness({ picker });
    await harness.dock.new('codex');

    await harness.dock.prompt();
    await harness.deliver();

    expect(harness.pty.sent).toEqual([]);
  });

  it('waits the prompt grace period for a new session', async () => {
    const { picker } = createPicker(() => 'tests');
    const harness = createHarness({ picker });

    const pending = harness.dock.myPrompt({ name: 'codex' });
    await settle();
    expect(harness.scheduler.pendingTimeouts).toEqual([500]);

    harness.scheduler.fireTimeouts();
    await harness.deliver();
    await pending;

    expect(harness.pty.sent).toEqual(['Can you write tests for src/app.ts:12?\n']);
  });
});

describe('Dock terminal commands', () => {
  it('toggles a fresh terminal open and focused, then hides and reopens it', async () => {
    const harness = createHarness();
    const { state } = harness.addDetachedState('claude', 'a');

    await harness.dock.toggle();
    expect(state.terminal?.isOpen()).toBe(true);
    expect(state.terminal?.isFocused()).toBe(true);

    await harness.dock.toggle();
    expect(state.terminal?.isOpen()).toBe(false);

    await harness.dock.toggle();
    expect(harness.events).toEqual([
      'pty:a:open',
      'pty:a:focus',
      'pty:a:blur',
      'pty:a:close',
      'pty:a:open',
      'pty:a:focus',
    ]);
  });

  it('leaves focus alone when toggling with focus disabled', async () => {
    const harness = createHarness();
    harness.addDetachedState('claude', 'a');

    await harness.dock.toggle({ focus: false });

    expect(harness.events).toEqual(['pty:a:open']);
  });

  it('flips focus of an open terminal', async () => {
    const harness = createHarness();
    const state = await harness.dock.new({ name: 'codex', focus: false });

    await harness.dock.focus();
    expect(state?.terminal?.isFocused()).toBe(true);
    await harness.dock.focus('codex');
    expect(state?.terminal?.isFocused()).toBe(false);
  });

  it('shows a terminal for a state that has none', async () => {
    const harness = createHarness();
    harness.addDetachedState('claude', 'a');
    harness.addDetachedState('codex', 'b');

    await harness.dock.show({ name: 'codex', focus: true });

    expect(harness.events).toEqual(['pty:b:open', 'pty:b:focus']);
  });

  it('hides only states that have a terminal', async () => {
    const harness = createHarness();
    harness.addDetachedState('claude', 'a');
    await harness.dock.new({ name: 'codex', focus: false });
    await harness.dock.new({ name: 'gemini', focus: false });

    await harness.dock.hide({ all: true });

    expect(harness.events).toEqual([
      'pty:pty-1:open',
      'pty:pty-2:open',
      'pty:pty-1:close',
      'pty:pty-2:close',
    ]);
  });

  it('closes every state with all', async () => {
    const harness = createHarness();
    await harness.dock.new('claude');
    await harness.dock.new('claude');
    await harness.dock.new('codex');

    await harness.dock.close({ all: true });

    expect(harness.dock.registry.size).toBe(0);
    expect(harness.pty.handles.map((handle) => handle.disposeCalls)).toEqual([1, 1, 1]);
  });

  it('closes only the first match by default', async () => {
    const harness = createHarness();
    await harness.dock.new('claude');
    await harness.dock.new('claude');

    await harness.dock.close('claude');

    expect(harness.dock.registry.get().map((state) => state.session.id)).toEqual(['pty:pty-2']);
  });
});

describe('Dock.select', () => {
  it('lists running sessions before tools and attaches the choice', async () => {
    let offered: string[] = [];
    const { picker } = createPicker((labels) => {
      offered = labels;
      return 'codex [tmux]';
    });
    const harness = createHarness({ picker });
    const codex = harness.dock.tools.get('codex');
    if (!codex) {
      throw new Error('codex missing');
    }
    harness.tmux.running = [{ tool: codex, handle: new FakeHandle('%4', true) }];

    const state = await harness.dock.select();

    expect(offered.slice(0, 2)).toEqual(['codex [tmux]', 'claude']);
    expect(offered).toHaveLength(1 + harness.dock.tools.list().length);
    expect(state?.session.id).toBe('tmux:%4');
    expect(harness.events).toEqual(['tmux:%4:open', 'tmux:%4:focus']);
  });

  it('starts the chosen tool', async () => {
    const { picker } = createPicker(() => 'aider');
    const harness = createHarness({ picker });

    const state = await harness.dock.select({ focus: false });

    expect(state?.tool.name).toBe('aider');
    expect(harness.pty.starts).toHaveLength(1);
    expect(harness.events).toEqual(['pty:pty-1:open']);
  });
});

describe('deprecated aliases', () => {
  it('forward to the new names and warn once', async () => {
    const harness = createHarness();
    await harness.dock.new('codex');

    await harness.dock.ask('one');
    await harness.dock.ask('two');
    await harness.deliver();

    expect(harness.pty.sent).toEqual(['one\n', 'two\n']);
    expect(harness.notices).toEqual([
      ['warn', '`dock.ask()` is deprecated, use `dock.send()` instead'],
    ]);
  });

  it('cover prompt and tool selection', async () => {
    const { picker } = createPicker(() => undefined);
    const harness = createHarness({ picker });

    await harness.dock.selectPrompt();
    await harness.dock.selectTool();

    expect(harness.notices).toEqual([
      ['warn', '`dock.selectPrompt()` is deprecated, use `dock.prompt()` instead'],
      ['warn', '`dock.selectTool()` is deprecated, use `dock.select()` instead'],
    ]);
  });
});
