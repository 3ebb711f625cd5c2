import type { ToolDefinition } from './tool';

export const BUILTIN_TOOLS: readonly ToolDefinition[] = [
  {
    name: 'claude',
    cmd: ['claude'],
    url: 'https://github.com/anthropics/claude-code',
    references: 'at',
  },
  {
    name: 'codex',
    cmd: ['codex', '--search'],
    url: 'https://github.com/openai/codex',
  },
  {
    name: 'gemini',
    cmd: ['gemini'],
    url: 'https://github.com/google-gemini/gemini-cli',
    references: 'at',
  },
  {
    name: 'opencode',
    cmd: ['opencode'],
    env: { OPENCODE_THEME: 'system' },
    url: 'https://github.com/sst/opencode',
    references: 'at',
    nativeScroll: true,
  },
  {
    name: 'aider',
    cmd: ['aider'],
    url: 'https://github.com/Aider-AI/aider',
  },
  {
    name: 'copilot',
    cmd: ['copilot', '--banner'],
    url: 'https://github.com/github/copilot-cli',
  },
  {
    name: 'cursor',
    cmd: ['cursor-agent'],
    url: 'https://cursor.com/cli',
    muxFocus: true,
  },
  {
    name: 'grok',
    cmd: ['grok'],
    url: 'https://github.com/superagent-ai/grok-cli',
  },
  {
    name: 'qwen',
    cmd: ['qwen'],
    url: 'https://github.com/QwenLM/qwen-code',
    references: 'at',
  },
  {
    name: 'amazon_q',
    cmd: ['q', 'chat'],
    url: 'https://github.com/aws/amazon-q-developer-cli',
    isProc: /(^|[\s/])q\s+chat(\s|$)/,
  },
];
