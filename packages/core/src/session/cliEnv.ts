/** npm keys that child tools should not inherit, besides `npm_*`. */
const NPM_INJECTED_KEYS = new Set(['INIT_CWD']);

/**
 * Build the environment for a tool process: the inherited environment without npm
 * noise, terminal defaults, then the tool's overrides (`false` removes a key).
 */
export function buildCliEnv(
  overrides: Readonly<Record<string, string | false>> = {},
  baseEnv: NodeJS.ProcessEnv = process.env,
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {};
  for (const [key, value] of Object.entries(baseEnv)) {
    if (!key || /^npm_/i.test(key) || NPM_INJECTED_KEYS.has(key)) {
      continue;
    }
    if (value !== undefined) {
      env[key] = value;
    }
  }

  // Drop node_modules/.bin entries npm prepends to PATH
  if (env['PATH']) {
    env['PATH'] = env['PATH']
      .split(':')
      .filter((p) => !p.includes('/node_modules/.bin'))
      .join(':');
  }

  if (!env['TERM'] || env['TERM'].trim().length === 0) {
    env['TERM'] = 'xterm-256color';
  }
  if (!env['COLORTERM'] || env['COLORTERM'].trim().length === 0) {
    env['COLORTERM'] = 'truecolor';
  }

  for (const [key, value] of Object.entries(overrides)) {
    if (value === false) {
      delete env[key];
    } else {
      env[key] = value;
    }
  }

  return env;
}

/**
 * Split overrides into variables to set and variables to unset.
 */
export function partitionEnv(overrides: Readonly<Record<string, string | false>>): {
  set: Array<[string, string]>;
  unset: string[];
} {
  const set: Array<[string, string]> = [];
  const unset: string[] = [];
  for (const [key, value] of Object.entries(overrides)) {
    if (value === false) {
      unset.push(key);
    } else {
      set.push([key, value]);
    }
  }
  return { set, unset };
}
