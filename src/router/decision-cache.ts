import type { CommandContext } from "../matching/normalizer.js";
import type { Optimizer } from "../optimizers/types.js";
import type { CommandClassification } from "../safety/classifier.js";
import type { OutputCategory } from "../shared/category.js";

/** Everything the router derives from the command text alone. */
export interface CommandInsight {
  ctx: CommandContext;
  classification: CommandClassification;
  category: OutputCategory;
  /** Matching specialized optimizer, if any. */
  specialized: Optimizer | undefined;
}

interface CacheEntry {
  insight: CommandInsight;
  expiresAt: number;
}

/**
 * Short-lived memo of per-command analysis, keyed by the command text.
 * Entries expire by TTL only; a TTL of 0 disables caching.
 */
export class DecisionCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(
    private readonly ttlMs: number,
    private readonly clock: () => number = Date.now,
  ) {}

  get size(): number {
    return this.entries.size;
  }

  resolve(command: string, compute: () => CommandInsight): CommandInsight {
    const now = this.clock();
    this.prune(now);
    const cached = this.entries.get(command);
    if (cached && now < cached.expiresAt) return cached.insight;

    const insight = compute();
    if (this.ttlMs > 0) this.entries.set(command, { insight, expiresAt: now + this.ttlMs });
    return insight;
  }

  private prune(now: number): void {
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) this.entries.delete(key);
    }
  }
}
