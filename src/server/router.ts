import type { WorkspaceAgent } from '../agent/loop.js';
import { ReadWriteLock } from '../concurrency/locks.js';

/**
 * Path → workspace table of one listener. Lookups run concurrently; `replace` waits for them to
 * drain and swaps the whole table at once.
 */
export class WorkspaceRouter {
  private routes: ReadonlyMap<string, WorkspaceAgent>;
  private readonly lock = new ReadWriteLock();

  constructor(routes: ReadonlyMap<string, WorkspaceAgent> = new Map()) {
    this.routes = new Map(routes);
  }

  resolve(path: string): Promise<WorkspaceAgent | undefined> {
    return this.lock.read(async () => this.routes.get(path));
  }

  replace(routes: ReadonlyMap<string, WorkspaceAgent>): Promise<void> {
    const next = new Map(routes);
    return this.lock.write(async () => {
      this.routes = next;
    });
  }

  paths(): string[] {
    return [...this.routes.keys()];
  }
}
