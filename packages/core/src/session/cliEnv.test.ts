import { describe, expect, it } from 'vitest';

import { buildCliEnv, partitionEnv } from './cliEnv';

describe('buildCliEnv', () => {
  it('drops npm variables and node_modules/.bin PATH entries', () => {
    const env = buildCliEnv(
      {},
      {
        PATH: '/repo/node_modules/.bin:/usr/bin:/bin',
        npm_config_cache: '/tmp/npm',
        INIT_CWD: '/repo',
        HOME: '/home/test',
        TERM: 'screen',
      },
    );

    expect(env).toEqual({
      PATH: '/usr/bin:/bin',
      HOME: '/home/test',
      TERM: 'screen',
      COLORTERM: 'truecolor',
    });
  });

  it('applies tool overrides and removes unset keys', () => {
    const env = buildCliEnv(
      { OPENCODE_THEME: 'system', NO_COLOR: false },
      { HOME: '/home/test', NO_COLOR: '1' },
    );

    expect(env['OPENCODE_THEME']).toBe('system');
    expect(env['TERM']).toBe('xterm-256color');
    expect('NO_COLOR' in env).toBe(false);
  });
});

describe('partitionEnv', () => {
  it('separates assignments from removals', () => {
    expect(partitionEnv({ A: '1', B: false, C: '3' })).toEqual({
      set: [
        ['A', '1'],
        ['C', '3'],
      ],
      unset: ['B'],
    });
  });
});
