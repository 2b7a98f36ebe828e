import type { SqliteDatabase } from "./database.js";

type CommitHook = () => void;

/**
 * Wraps a mutation in one SQLite transaction. Rows and audit events written by
 * every store inside `run` commit together or not at all; nested `run` calls join
 * the outermost unit. Hooks registered with `afterCommit` fire only once the
 * outermost unit has committed.
 */
export class UnitOfWork {
  private pendingHooks: CommitHook[] | null = null;

  constructor(private readonly db: SqliteDatabase) {}

  get active(): boolean {
    return this.pendingHooks !== null;
  }

  run<T>(work: () => T): T {
    if (this.pendingHooks) {
      return work();
    }

    const hooks: CommitHook[] = [];
    const result = this.commit(work, hooks);
    for (const hook of hooks) {
      hook();
    }
    return result;
  }

  private commit<T>(work: () => T, hooks: CommitHook[]): T {
    this.pendingHooks = hooks;
    try {
      return this.db.transaction(work)();
    } finally {
      this.pendingHooks = null;
    }
  }

  afterCommit(hook: CommitHook): void {
    if (this.pendingHooks) {
      this.pendingHooks.push(hook);
      return;
    }
    hook();
  }
}
