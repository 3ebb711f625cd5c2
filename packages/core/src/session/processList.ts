import { execFile } from 'node:child_process';

import type { Proc } from '../types';

export type ExecFn = (file: string, args: readonly string[]) => Promise<string>;

export class CommandFailedError extends Error {
  readonly stderr: string;

  constructor(message: string, stderr: string) {
    super(message);
    this.name = 'CommandFailedError';
    this.stderr = stderr;
  }
}

export const execCommand: ExecFn = (file, args) =>
  new Promise((resolve, reject) => {
    execFile(file, [...args], { encoding: 'utf8', timeout: 5000 }, (error, stdout, stderr) => {
      if (error) {
        const detail = stderr.trim() || error.message;
        reject(new CommandFailedError(`${file} ${args[0] ?? ''} failed: ${detail}`, stderr));
        return;
      }
      resolve(stdout);
    });
  });

const PS_LINE = /^\s*(\d+)\s+(\d+)\s+(.*)$/;

export function parsePsOutput(output: string): Proc[] {
  const procs: Proc[] = [];
  for (const line of output.split('\n')) {
    const match = PS_LINE.exec(line);
    if (!match) {
      continue;
    }
    const [, pid, ppid, cmd] = match;
    if (!pid || !ppid || !cmd) {
      continue;
    }
    procs.push({ pid: Number(pid), ppid: Number(ppid), cmd: cmd.trim() });
  }
  return procs;
}

export async function listProcesses(exec: ExecFn = execCommand): Promise<Proc[]> {
  const output = await exec('ps', ['-A', '-o', 'pid=,ppid=,args=']);
  return parsePsOutput(output);
}

/**
 * The process itself followed by its descendants, breadth first.
 */
export function processTree(rootPid: number, procs: readonly Proc[]): Proc[] {
  const children = new Map<number, Proc[]>();
  const byPid = new Map<number, Proc>();
  for (const proc of procs) {
    byPid.set(proc.pid, proc);
    const siblings = children.get(proc.ppid);
    if (siblings) {
      siblings.push(proc);
    } else {
      children.set(proc.ppid, [proc]);
    }
  }

  const tree: Proc[] = [];
  const root = byPid.get(rootPid);
  if (root) {
    tree.push(root);
  }
  const queue = [rootPid];
  const seen = new Set<number>(queue);
  while (queue.length > 0) {
    const pid = queue.shift();
    if (pid === undefined) {
      break;
    }
    for (const child of children.get(pid) ?? []) {
      if (seen.has(child.pid)) {
        continue;
      }
      seen.add(child.pid);
      tree.push(child);
      queue.push(child.pid);
    }
  }
  return tree;
}
