import { Mutex } from 'async-mutex';

interface LockEntry {
  mutex: Mutex;
  /** Callers holding or waiting for the mutex. */
  users: number;
}

/**
 * Serializes work on the same (repository, branch). Shared by every publisher
 * of a process; unrelated keys never wait on each other. An entry lives only
 * while someone holds or waits for it.
 */
export class BranchLocks {
  private entries: Map<string, LockEntry> = new Map();

  async runExclusive<T>(repo: string, branch: string, action: () => Promise<T>): Promise<T> {
    const key = `${repo}#${branch}`;
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), users: 0 };
      this.entries.set(key, entry);
    }

    entry.users++;
    try {
      return await entry.mutex.runExclusive(action);
    } finally {
      entry.users--;
      if (entry.users === 0) this.entries.delete(key);
    }
  }

  isLocked(repo: string, branch: string): boolean {
    return this.entries.get(`${repo}#${branch}`)?.mutex.isLocked() ?? false;
  }

  /** Number of (repository, branch) keys currently held or awaited. */
  get size(): number {
    return this.entries.size;
  }
}
