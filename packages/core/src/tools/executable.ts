import { accessSync, constants, statSync } from 'node:fs';
import path from 'node:path';

// Searched after PATH.
const COMMON_PATHS = ['/usr/bin', '/usr/local/bin', '/bin', '/opt/homebrew/bin'];

function isExecutableFile(filePath: string): boolean {
  try {
    accessSync(filePath, constants.X_OK);
    return statSync(filePath).isFile();
  } catch {
    return false;
  }
}

function findInPath(cmd: string, envPath: string | undefined): string | null {
  for (const dir of (envPath ?? '').split(path.delimiter)) {
    if (!dir) {
      continue;
    }
    const candidate = path.join(dir, cmd);
    if (isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Resolve a command name the way the shell would, or null when it cannot be run.
 */
export function resolveExecutable(
  command: string,
  envPath: string | undefined = process.env['PATH'],
): string | null {
  const trimmed = command.trim();
  if (!trimmed) {
    return null;
  }

  if (trimmed.includes('/')) {
    return isExecutableFile(trimmed) ? path.resolve(trimmed) : null;
  }

  const found = findInPath(trimmed, envPath);
  if (found) {
    return found;
  }

  for (const dir of COMMON_PATHS) {
    const fullPath = path.join(dir, trimmed);
    if (isExecutableFile(fullPath)) {
      return fullPath;
    }
  }

  return null;
}

export type ExecutableCheck = (command: string) => boolean;

export const isExecutable: ExecutableCheck = (command) => resolveExecutable(command) !== null;
