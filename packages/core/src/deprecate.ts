import type { Logger } from './types';

const warned = new Set<string>();

/**
 * Warn about a renamed method, once per process.
 */
export function deprecate(logger: Pick<Logger, 'warn'>, oldName: string, newName: string): void {
  if (warned.has(oldName)) {
    return;
  }
  warned.add(oldName);
  logger.warn(`\`dock.${oldName}()\` is deprecated, use \`dock.${newName}()\` instead`);
}

export function resetDeprecationWarnings(): void {
  warned.clear();
}
