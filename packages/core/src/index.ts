export * from './types';
export * from './errors';
export { createLogger, silentLogger } from './logger';
export {
  DEFAULT_PROMPTS,
  loadConfig,
  parseConfig,
  type BackendId,
  type DockConfig,
  type DockConfigInput,
  type ToolConfig,
} from './config';
export { defaultScheduler, type ScheduledTimeout, type Scheduler } from './scheduler';
export { deprecate } from './deprecate';
export {
  Tool,
  formatText,
  type ProcMatcher,
  type ReferenceStyle,
  type TextFormatter,
  type ToolDefinition,
} from './tools/tool';
export { BUILTIN_TOOLS } from './tools/builtinTools';
export { ToolRegistry } from './tools/toolRegistry';
export { isExecutable, resolveExecutable, type ExecutableCheck } from './tools/executable';
export type {
  BackendSession,
  DiscoveredSession,
  LaunchSpec,
  SessionBackend,
} from './session/backend';
export { PtyBackend, type PtyBackendOptions } from './session/ptyBackend';
export { TmuxBackend, type TmuxBackendOptions } from './session/tmuxBackend';
export { BackendRegistry, Session } from './session/session';
export {
  TerminalView,
  nullSurface,
  type TerminalHandle,
  type TerminalSurface,
} from './terminal/terminalView';
export { matchesFilter, mergeFilters, type StateFilter } from './state/filter';
export {
  StateRegistry,
  type AttachOptions,
  type State,
  type StateAction,
  type WithOptions,
} from './state/stateRegistry';
export { Renderer, displayPath, type Message } from './render/renderer';
export {
  Dock,
  normalizeSend,
  normalizeTarget,
  type DockOptions,
  type NewOptions,
  type SelectOptions,
  type SendOptions,
  type TargetOptions,
} from './dock';
