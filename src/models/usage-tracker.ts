/**
 * Token and call counters for provider calls.
 *
 * One tracker is created per engine and handed to every adapter it builds,
 * so there is a single place to read usage from.
 */

export interface UsageCounters {
  calls: number;
  failures: number;
  inputTokens: number;
  outputTokens: number;
}

export interface UsageStats {
  embedding: UsageCounters;
  judge: UsageCounters;
  totalInputTokens: number;
  totalOutputTokens: number;
}

export type UsageComponent = 'embedding' | 'judge';

function emptyCounters(): UsageCounters {
  return { calls: 0, failures: 0, inputTokens: 0, outputTokens: 0 };
}

export class UsageTracker {
  private counters: Record<UsageComponent, UsageCounters> = {
    embedding: emptyCounters(),
    judge: emptyCounters(),
  };

  recordSuccess(component: UsageComponent, inputTokens: number, outputTokens = 0): void {
    const c = this.counters[component];
    c.calls++;
    c.inputTokens += inputTokens;
    c.outputTokens += outputTokens;
  }

  recordFailure(component: UsageComponent): void {
    const c = this.counters[component];
    c.calls++;
    c.failures++;
  }

  /**
   * Snapshot of the counters; later calls do not change it.
   */
  getStats(): UsageStats {
    const embedding = { ...this.counters.embedding };
    const judge = { ...this.counters.judge };
    return {
      embedding,
      judge,
      totalInputTokens: embedding.inputTokens + judge.inputTokens,
      totalOutputTokens: embedding.outputTokens + judge.outputTokens,
    };
  }

  reset(): void {
    this.counters = { embedding: emptyCounters(), judge: emptyCounters() };
  }
}
