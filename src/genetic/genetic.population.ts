import type { Chromosome, Score, ScoredChromosome } from './genetic.types';

/**
 * Fitness-ordered multiset of (score, chromosome) entries for one generation.
 *
 * Entries are kept ascending by score. Inserting a score equal to existing
 * ones places the new entry after them, so the ordering is stable with respect
 * to insertion and the last entry among equals is always the most recent one.
 * That is what makes {@link best} resolve ties to the latest insertion.
 *
 * The engine builds a fresh store every generation and only publishes it once
 * every chromosome has been inserted; readers never see a partial store.
 */
export class PopulationStore<G> {
  private readonly _entries: ScoredChromosome<G>[] = [];
  private _total?: number;

  /** Build a store from unsorted entries, inserting them in order. */
  static from<G>(entries: Iterable<ScoredChromosome<G>>): PopulationStore<G> {
    const store = new PopulationStore<G>();
    for (const entry of entries) store.insert(entry.score, entry.chromosome);
    return store;
  }

  /** Number of entries. */
  get size(): number {
    return this._entries.length;
  }

  /**
   * Insert an entry, preserving ascending score order.
   * Binary search for the upper bound keeps equal scores in insertion order.
   */
  insert(score: Score, chromosome: Chromosome<G>): void {
    let lo = 0;
    let hi = this._entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this._entries[mid].score <= score) lo = mid + 1;
      else hi = mid;
    }
    this._entries.splice(lo, 0, { score, chromosome });
    this._total = undefined;
  }

  /**
   * Highest-scored entry (the most recent insertion among equal scores).
   * @throws Error when the store is empty.
   */
  best(): ScoredChromosome<G> {
    const last = this._entries[this._entries.length - 1];
    if (last === undefined) throw new Error('Population store is empty');
    return last;
  }

  /** Score at ascending rank `index`; 0 when out of range. */
  scoreAt(index: number): Score {
    const entry = this._entries[index];
    return entry === undefined ? 0 : entry.score;
  }

  /** Chromosome at ascending rank `index`; the best chromosome when out of range. */
  chromosomeAt(index: number): Chromosome<G> {
    const entry = this._entries[index];
    return entry === undefined ? this.best().chromosome : entry.chromosome;
  }

  /**
   * Walk the entries in ascending order accumulating scores and return the first
   * chromosome whose running total reaches `threshold`. Used to read the
   * roulette wheel. Falls back to the best chromosome when the threshold exceeds
   * the total.
   */
  cumulativeScoreAt(threshold: Score): Chromosome<G> {
    let cumulative = 0;
    for (const entry of this._entries) {
      cumulative += entry.score;
      if (threshold <= cumulative) return entry.chromosome;
    }
    return this.best().chromosome;
  }

  /** Sum of all scores. May be zero or negative; callers dividing by it must cope. */
  totalScore(): Score {
    if (this._total === undefined)
      this._total = this._entries.reduce((sum, entry) => sum + entry.score, 0);
    return this._total;
  }

  /** Mean score; 0 for an empty store. */
  averageScore(): Score {
    return this._entries.length ? this.totalScore() / this._entries.length : 0;
  }

  /** Read-only view of the entries in ascending order. */
  entries(): readonly ScoredChromosome<G>[] {
    return this._entries;
  }
}
