import { format } from 'node:util';

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import {
  Dock,
  createLogger,
  isDockError,
  isExecutable,
  loadConfig,
  type DockConfig,
  type DockOptions,
  type ExecutableCheck,
  type Logger,
  type Picker,
  type SendOptions,
} from '../../core/src';

import { ConsoleEditor, parseLineRange, type ConsoleEditorOptions } from './consoleEditor';
import { createReadlinePicker } from './readlinePicker';

const EXIT_OK = 0;
const EXIT_UNKNOWN_ERROR = 1;
const EXIT_USAGE = 2;
const EXIT_CONFIG = 3;

/** Sessions started from a shell have to outlive the command, so only tmux will do. */
const CLI_BACKEND: DockConfig['backend'] = 'tmux';

export class CliExitError extends Error {
  constructor(
    message: string,
    readonly exitCode: number,
  ) {
    super(message);
    this.name = 'CliExitError';
  }
}

export interface DockCliOptions {
  argv?: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  /** Offer a terminal picker. Defaults to whether stdin is a TTY. */
  interactive?: boolean;
  picker?: Picker;
  isExecutable?: ExecutableCheck;
  createDock?: (options: DockOptions) => Dock;
}

/**
 * Runs one `clidock` command and returns its exit code.
 */
export async function runDockCli(options: DockCliOptions = {}): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const checkExecutable = options.isExecutable ?? isExecutable;
  const createDock = options.createDock ?? ((dockOptions: DockOptions) => new Dock(dockOptions));
  const interactive = options.interactive ?? process.stdin.isTTY === true;
  const picker = options.picker ?? (interactive ? createReadlinePicker() : undefined);
  let exitCode = EXIT_OK;

  const openDock = (editorOptions: Partial<ConsoleEditorOptions>) => {
    const config = asConfigError(() => ({ ...loadConfig(cwd, env), backend: CLI_BACKEND }));
    return asConfigError(() =>
      createDock({
        editor: new ConsoleEditor({ cwd, stderr, ...editorOptions }),
        picker,
        config,
        cwd,
        isExecutable: checkExecutable,
        logger: createCliLogger(config, stderr),
      }),
    );
  };

  // Without a picker, a send with no running session would resolve nothing.
  const hasTarget = (dock: Dock, name: string | undefined): boolean => {
    if (picker) {
      return true;
    }
    const filter = name !== undefined ? { name, attached: true } : { attached: true };
    if (dock.registry.get(filter).length > 0) {
      return true;
    }
    stderr.write(`No running ${name ?? 'tool'} session. Use --new to start one.\n`);
    exitCode = EXIT_UNKNOWN_ERROR;
    return false;
  };

  try {
    const parser = yargs(options.argv ?? hideBin(process.argv))
      .scriptName('clidock')
      .usage('Usage: $0 <command> [options]')
      .exitProcess(false)
      .fail((msg: string | undefined, err: Error | undefined) => {
        if (err instanceof CliExitError) {
          throw err;
        }
        const message = err?.message ?? msg ?? 'Invalid command usage. Run with --help for usage.';
        throw new CliExitError(message, EXIT_USAGE);
      })
      .command(
        'tools',
        'List configured tools and whether they are installed',
        (y) => y,
        () => {
          const dock = openDock({});
          for (const tool of dock.tools.list()) {
            const status = checkExecutable(tool.command) ? 'installed' : 'missing';
            stdout.write(`${tool.name}\t${status}\t${tool.cmd.join(' ')}\n`);
          }
        },
      )
      .command(
        'list',
        'List running tool sessions',
        (y) => y,
        async () => {
          const dock = openDock({});
          await dock.discover();
          const states = dock.registry.get();
          if (states.length === 0) {
            stderr.write('No running sessions.\n');
            return;
          }
          for (const state of states) {
            const status = state.session.isAlive() ? 'running' : 'exited';
            stdout.write(`${state.session.id}\t${state.tool.name}\t${status}\n`);
          }
        },
      )
      .command(
        'new [tool]',
        'Start a new session of a tool',
        (y) => y.positional('tool', { type: 'string', describe: 'Tool name (default: config)' }),
        async (argv) => {
          const dock = openDock({});
          const state = await dock.new({ name: argv.tool, focus: false });
          if (!state) {
            exitCode = EXIT_UNKNOWN_ERROR;
            return;
          }
          stdout.write(`${state.session.id}\n`);
        },
      )
      .command(
        'send [message..]',
        'Send a message to a running tool session',
        (y) =>
          y
            .positional('message', { type: 'string', array: true, describe: 'Message template' })
            .option('name', { alias: 'n', type: 'string', describe: 'Tool name' })
            .option('submit', { type: 'boolean', default: false, describe: 'Press Enter after' })
            .option('new', {
              type: 'boolean',
              default: false,
              describe: 'Start a session when none is running',
            })
            .option('file', { alias: 'f', type: 'string', describe: 'File for {file}' })
            .option('line', { alias: 'l', type: 'number', describe: 'Line for {position}' })
            .option('selection', {
              type: 'string',
              describe: 'Line range of --file sent as {selection}, e.g. 10-20',
            }),
        async (argv) => {
          const dock = openDock(readEditorFlags(argv));
          await dock.discover();
          if (!argv.new && !hasTarget(dock, argv.name)) {
            return;
          }
          const words = argv.message?.join(' ');
          const opts: SendOptions = {
            name: argv.name,
            submit: argv.submit,
            msg: words || undefined,
          };
          await (argv.new ? dock.mySend(opts) : dock.send(opts));
        },
      )
      .command(
        'prompt [prompt]',
        'Send a configured prompt, or pick one',
        (y) =>
          y
            .positional('prompt', { type: 'string', describe: 'Prompt name' })
            .option('name', { alias: 'n', type: 'string', describe: 'Tool name' })
            .option('submit', { type: 'boolean', default: false, describe: 'Press Enter after' })
            .option('new', {
              type: 'boolean',
              default: false,
              describe: 'Start a session when none is running',
            })
            .option('file', { alias: 'f', type: 'string', describe: 'File for {file}' })
            .option('line', { alias: 'l', type: 'number', describe: 'Line for {position}' })
            .option('selection', {
              type: 'string',
              describe: 'Line range of --file sent as {selection}, e.g. 10-20',
            }),
        async (argv) => {
          const dock = openDock(readEditorFlags(argv));
          await dock.discover();
          if (!argv.new && !hasTarget(dock, argv.name)) {
            return;
          }
          const opts: SendOptions = { name: argv.name, submit: argv.submit, prompt: argv.prompt };
          if (opts.prompt !== undefined) {
            await (argv.new ? dock.mySend(opts) : dock.send(opts));
          } else {
            await (argv.new ? dock.myPrompt(opts) : dock.prompt(opts));
          }
        },
      )
      .command(
        'select',
        'Pick a running session or a tool to start',
        (y) => y,
        async () => {
          if (!picker) {
            throw new CliExitError('select needs an interactive terminal', EXIT_USAGE);
          }
          const dock = openDock({});
          const state = await dock.select();
          if (state) {
            stdout.write(`${state.session.id}\n`);
          }
        },
      )
      .command(
        'close',
        'End tool sessions',
        (y) =>
          y
            .option('name', { alias: 'n', type: 'string', describe: 'Tool name' })
            .option('all', { type: 'boolean', default: false, describe: 'Close every match' }),
        async (argv) => {
          const dock = openDock({});
          await dock.discover();
          await dock.close({ name: argv.name, all: argv.all });
        },
      )
      .demandCommand(1, 'You must specify a command')
      .strict()
      .help();

    await parser.parseAsync();
    return exitCode;
  } catch (error: unknown) {
    return handleCliError(error, stderr);
  }
}

function readEditorFlags(argv: {
  file?: string;
  line?: number;
  selection?: string;
}): Partial<ConsoleEditorOptions> {
  if (argv.selection === undefined) {
    return { file: argv.file, line: argv.line };
  }
  if (!argv.file) {
    throw new CliExitError('--selection needs --file', EXIT_USAGE);
  }
  const selection = parseLineRange(argv.selection);
  if (!selection) {
    throw new CliExitError(`Invalid --selection: ${argv.selection}`, EXIT_USAGE);
  }
  return { file: argv.file, line: argv.line ?? selection.start, selection };
}

/** Config problems exit with EXIT_CONFIG, from the file as well as from tool definitions. */
function asConfigError<T>(build: () => T): T {
  try {
    return build();
  } catch (error: unknown) {
    if (isDockError(error) && error.code === 'invalid_config') {
      throw new CliExitError(error.message, EXIT_CONFIG);
    }
    throw error;
  }
}

/**
 * Everything goes to stderr so stdout stays parseable. Info lines only with debug on.
 */
function createCliLogger(config: DockConfig, stderr: NodeJS.WritableStream): Logger {
  const write = (message: string, ...args: unknown[]) => {
    stderr.write(`${format(message, ...args)}\n`);
  };
  return createLogger('clidock', {
    debug: config.debug,
    sink: {
      info: config.debug ? write : () => undefined,
      warn: write,
      error: write,
      debug: write,
    },
  });
}

function handleCliError(error: unknown, stderr: NodeJS.WritableStream): number {
  if (error instanceof CliExitError) {
    stderr.write(`${error.message}\n`);
    return error.exitCode;
  }
  const message = error instanceof Error ? error.message : String(error);
  stderr.write(`Unexpected error: ${message}\n`);
  return EXIT_UNKNOWN_ERROR;
}
