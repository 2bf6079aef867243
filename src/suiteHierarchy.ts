import { CycleError, NotFoundError } from './errors.js';
import type { Suite } from './models.js';

export const PATH_SEPARATOR = '/';

/**
 * Parent/child view over one snapshot of a plan's suites. Suites form a forest;
 * a suite whose parent is not part of the snapshot counts as a root.
 */
export class SuiteHierarchy {
  private byId = new Map<string, Suite>();
  private children = new Map<string, Suite[]>();
  private roots: Suite[] = [];
  private pathCache = new Map<string, string>();

  constructor(suites: readonly Suite[]) {
    for (const suite of suites) {
      if (!this.byId.has(suite.id)) {
        this.byId.set(suite.id, Object.freeze({ ...suite }));
      }
    }

    for (const suite of this.byId.values()) {
      const parentId = this.parentOf(suite);
      if (parentId === undefined) {
        this.roots.push(suite);
        continue;
      }
      const siblings = this.children.get(parentId);
      if (siblings) {
        siblings.push(suite);
      } else {
        this.children.set(parentId, [suite]);
      }
    }
  }

  get size(): number {
    return this.byId.size;
  }

  get suites(): readonly Suite[] {
    return [...this.byId.values()];
  }

  get(id: string): Suite {
    const suite = this.byId.get(id);
    if (!suite) {
      throw new NotFoundError(`Suite '${id}' is not part of this plan`);
    }
    return suite;
  }

  topLevel(): readonly Suite[] {
    return [...this.roots];
  }

  childrenOf(parentId: string): readonly Suite[] {
    return [...(this.children.get(parentId) ?? [])];
  }

  rootAncestorOf(id: string): string {
    const chain = this.ancestry(id);
    return chain[chain.length - 1].id;
  }

  pathOf(id: string): string {
    const cached = this.pathCache.get(id);
    if (cached !== undefined) {
      return cached;
    }
    const path = this.ancestry(id)
      .map((suite) => suite.name)
      .reverse()
      .join(PATH_SEPARATOR);
    this.pathCache.set(id, path);
    return path;
  }

  /** The suite itself followed by its ancestors, root last. */
  private ancestry(id: string): Suite[] {
    const chain: Suite[] = [];
    const seen = new Set<string>();
    let current: Suite | undefined = this.get(id);

    while (current) {
      if (seen.has(current.id)) {
        throw new CycleError([...chain.map((suite) => suite.id), current.id]);
      }
      seen.add(current.id);
      chain.push(current);

      const parentId = this.parentOf(current);
      current = parentId === undefined ? undefined : this.byId.get(parentId);
    }
    return chain;
  }

  private parentOf(suite: Suite): string | undefined {
    if (suite.parentId === undefined || !this.byId.has(suite.parentId)) {
      return undefined;
    }
    return suite.parentId;
  }
}
