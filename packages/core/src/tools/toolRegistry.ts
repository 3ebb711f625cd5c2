import type { ToolConfig } from '../config';
import { DockError, describeError } from '../errors';
import { BUILTIN_TOOLS } from './builtinTools';
import { Tool, type ToolDefinition } from './tool';

function compilePattern(name: string, source: string): RegExp {
  try {
    return new RegExp(source);
  } catch (err) {
    throw new DockError(
      'invalid_config',
      `tools.${name}.isProc is not a valid regular expression: ${describeError(err)}`,
    );
  }
}

function mergeDefinition(
  name: string,
  base: ToolDefinition | undefined,
  override: ToolConfig,
): ToolDefinition {
  const cmd = override.cmd ?? base?.cmd;
  if (!cmd) {
    throw new DockError('invalid_config', `tools.${name}.cmd is required for a new tool`);
  }
  const env = base?.env || override.env ? { ...base?.env, ...override.env } : undefined;
  const isProc = override.isProc ? compilePattern(name, override.isProc) : base?.isProc;
  const url = override.url ?? base?.url;
  const muxFocus = override.muxFocus ?? base?.muxFocus;
  const nativeScroll = override.nativeScroll ?? base?.nativeScroll;
  const references = override.references ?? base?.references;
  return {
    name,
    cmd,
    ...(env ? { env } : {}),
    ...(url ? { url } : {}),
    ...(isProc ? { isProc } : {}),
    ...(muxFocus !== undefined ? { muxFocus } : {}),
    ...(nativeScroll !== undefined ? { nativeScroll } : {}),
    ...(references ? { references } : {}),
    ...(base?.format ? { format: base.format } : {}),
  };
}

/**
 * Catalogue of known tools: the built-in table plus configured overrides.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  constructor(
    overrides: Record<string, ToolConfig> = {},
    builtins: readonly ToolDefinition[] = BUILTIN_TOOLS,
  ) {
    const definitions = new Map<string, ToolDefinition>();
    for (const definition of builtins) {
      definitions.set(definition.name, definition);
    }
    for (const [name, override] of Object.entries(overrides)) {
      definitions.set(name, mergeDefinition(name, definitions.get(name), override));
    }
    for (const [name, definition] of definitions) {
      this.tools.set(name, new Tool(definition));
    }
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name.trim());
  }

  list(): Tool[] {
    return Array.from(this.tools.values());
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }
}
