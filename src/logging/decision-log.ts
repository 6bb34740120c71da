import type { DecisionLogEntry } from './types.js';

export const DEFAULT_DECISION_LOG_CAPACITY = 500;

/**
 * Bounded in-memory record of recent classification decisions.
 * Oldest entries are dropped once `capacity` is reached. A capacity that is
 * not a positive integer (e.g. a mistyped `historySize`) uses the default.
 */
export class DecisionLog {
  private entries: DecisionLogEntry[] = [];
  private readonly capacity: number;

  constructor(capacity: unknown = DEFAULT_DECISION_LOG_CAPACITY) {
    this.capacity = typeof capacity === 'number' && Number.isInteger(capacity) && capacity >= 1
      ? capacity
      : DEFAULT_DECISION_LOG_CAPACITY;
  }

  append(entry: DecisionLogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  /**
   * Most recent `limit` entries, oldest first.
   */
  tail(limit: number): DecisionLogEntry[] {
    if (limit <= 0) return [];
    return this.entries.slice(-limit);
  }

  get size(): number {
    return this.entries.length;
  }
}
