export interface RelayStatsSnapshot {
  activeSessions: number
  submitted: number
  submitFailures: number
  completed: number
  failed: number
  timedOut: number
  cancelled: number
  /** Percentage of submitted jobs that completed successfully, 0 when none were submitted. */
  successRate: number
}

type Counter = Exclude<keyof RelayStatsSnapshot, 'activeSessions' | 'successRate'>

/** Counters for one server instance, shared by every session it hosts. */
export class RelayStats {
  private activeSessions = 0
  private readonly counters: Record<Counter, number> = {
    submitted: 0,
    submitFailures: 0,
    completed: 0,
    failed: 0,
    timedOut: 0,
    cancelled: 0,
  }

  record(counter: Counter): void {
    this.counters[counter]++
  }

  sessionOpened(): void {
    this.activeSessions++
  }

  sessionClosed(): void {
    this.activeSessions = Math.max(0, this.activeSessions - 1)
  }

  snapshot(): RelayStatsSnapshot {
    const { submitted, completed } = this.counters
    return {
      activeSessions: this.activeSessions,
      ...this.counters,
      successRate: submitted > 0 ? (completed / submitted) * 100 : 0,
    }
  }
}
