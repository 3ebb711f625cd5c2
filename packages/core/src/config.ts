import fs from 'node:fs';
import path from 'node:path';

import yaml from 'yaml';
import { z } from 'zod';

import { DockError, describeError } from './errors';

const NonEmptyTrimmedStringSchema = z.string().trim().min(1);

const ToolConfigSchema = z.object({
  cmd: z.array(NonEmptyTrimmedStringSchema).min(1).optional(),
  env: z.record(z.union([z.string(), z.literal(false)])).optional(),
  url: NonEmptyTrimmedStringSchema.optional(),
  /**
   * Regular expression matched against a process command line.
   */
  isProc: NonEmptyTrimmedStringSchema.optional(),
  muxFocus: z.boolean().optional(),
  nativeScroll: z.boolean().optional(),
  /**
   * How file references are written: `@path` or the bare path.
   */
  references: z.enum(['at', 'plain']).optional(),
});

const BackendIdSchema = z.enum(['pty', 'tmux']);

const DockConfigSchema = z.object({
  defaultTool: NonEmptyTrimmedStringSchema.default('claude'),
  backend: BackendIdSchema.default('pty'),
  debug: z.boolean().default(false),
  graceMs: z
    .object({
      send: z.number().int().min(0).default(2000),
      prompt: z.number().int().min(0).default(500),
    })
    .default({}),
  readyTimeoutMs: z.number().int().min(0).default(10_000),
  tools: z.record(ToolConfigSchema).default({}),
  prompts: z.record(NonEmptyTrimmedStringSchema).default({}),
});

export type ToolConfig = z.infer<typeof ToolConfigSchema>;
export type BackendId = z.infer<typeof BackendIdSchema>;
export type DockConfig = z.infer<typeof DockConfigSchema>;
export type DockConfigInput = z.input<typeof DockConfigSchema>;

export const DEFAULT_PROMPTS: Readonly<Record<string, string>> = {
  changes: 'Can you review my changes?',
  document: 'Add documentation to {this}',
  explain: 'Explain {this}',
  fix: 'Can you fix {this}?',
  optimize: 'How can {this} be optimized?',
  review: 'Can you review {file} for any issues or improvements?',
  tests: 'Can you write tests for {this}?',
};

const DEFAULT_CONFIG_FILENAMES = [
  'clidock.config.json',
  'clidock.config.yaml',
  'clidock.config.yml',
];

export function parseConfig(raw: unknown, source = 'config'): DockConfig {
  const result = DockConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new DockError('invalid_config', `Invalid ${source}: ${issues}`, result.error.issues);
  }
  const config = result.data;
  return { ...config, prompts: { ...DEFAULT_PROMPTS, ...config.prompts } };
}

/**
 * Settings from `defaults`, then the config file, then `CLIDOCK_*` environment variables.
 */
export function loadConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
  defaults: DockConfigInput = {},
): DockConfig {
  const envPath = env['CLIDOCK_CONFIG']?.trim();
  const configPath = envPath ? path.resolve(cwd, envPath) : findConfigFile(cwd);

  let raw: Record<string, unknown> = { ...defaults };
  if (configPath) {
    raw = { ...raw, ...readConfigFile(configPath) };
  }

  const envBackend = env['CLIDOCK_BACKEND']?.trim();
  if (envBackend) {
    raw = { ...raw, backend: envBackend };
  }
  const envDebug = env['CLIDOCK_DEBUG']?.trim().toLowerCase();
  if (envDebug) {
    raw = { ...raw, debug: envDebug === '1' || envDebug === 'true' };
  }

  return parseConfig(raw, configPath ? path.basename(configPath) : 'config');
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf8');
  } catch (err) {
    throw new DockError('invalid_config', `Cannot read ${configPath}: ${describeError(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = configPath.endsWith('.json') ? JSON.parse(content) : yaml.parse(content);
  } catch (err) {
    throw new DockError('invalid_config', `Cannot parse ${configPath}: ${describeError(err)}`);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new DockError('invalid_config', `${configPath} must contain an object`);
  }
  return { ...parsed };
}

function findConfigFile(cwd: string): string | undefined {
  for (const filename of DEFAULT_CONFIG_FILENAMES) {
    const fullPath = path.join(cwd, filename);
    if (fs.existsSync(fullPath)) {
      return fullPath;
    }
  }
  return undefined;
}
