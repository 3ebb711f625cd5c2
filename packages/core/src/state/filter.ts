export interface StateFilter {
  /** Tool name. */
  name?: string;
  /** Whether the session's process is alive. */
  attached?: boolean;
  /** Whether a terminal view exists. */
  terminal?: boolean;
}

export interface FilterSubject {
  name: string;
  attached: boolean;
  terminal: boolean;
}

/**
 * Conjunctive match over the defined fields of `filter`.
 */
export function matchesFilter(subject: FilterSubject, filter: StateFilter = {}): boolean {
  if (filter.name !== undefined && filter.name !== subject.name) {
    return false;
  }
  if (filter.attached !== undefined && filter.attached !== subject.attached) {
    return false;
  }
  if (filter.terminal !== undefined && filter.terminal !== subject.terminal) {
    return false;
  }
  return true;
}

export function mergeFilters(...filters: Array<StateFilter | undefined>): StateFilter {
  const merged: StateFilter = {};
  for (const filter of filters) {
    if (!filter) {
      continue;
    }
    if (filter.name !== undefined) {
      merged.name = filter.name;
    }
    if (filter.attached !== undefined) {
      merged.attached = filter.attached;
    }
    if (filter.terminal !== undefined) {
      merged.terminal = filter.terminal;
    }
  }
  return merged;
}
