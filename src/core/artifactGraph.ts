import { LRUCache } from "lru-cache";

export type ArtifactCount = {
  identifier: string;
  count: number;
};

/**
 * Process-wide occurrence counts of payment identifiers across every session.
 * Bounded by capacity; the least recently observed identifier is evicted first.
 */
export class ArtifactGraph {
  private counts: LRUCache<string, number>;

  constructor(capacity: number) {
    this.counts = new LRUCache<string, number>({ max: Math.max(1, capacity) });
  }

  record(identifier: string): number {
    const key = identifier.trim().toLowerCase();
    if (!key) return 0;
    const next = (this.counts.get(key) ?? 0) + 1;
    this.counts.set(key, next);
    return next;
  }

  count(identifier: string): number {
    return this.counts.peek(identifier.trim().toLowerCase()) ?? 0;
  }

  top(limit: number): ArtifactCount[] {
    const rows: ArtifactCount[] = [];
    for (const [identifier, count] of this.counts.entries()) {
      rows.push({ identifier, count });
    }
    return rows.sort((a, b) => b.count - a.count || a.identifier.localeCompare(b.identifier)).slice(0, limit);
  }

  get size(): number {
    return this.counts.size;
  }
}
