/** Progress reported once the job is accepted. */
export const SUBMITTED_PERCENT = 5
/** Progress while the job waits for a worker. */
export const QUEUED_PERCENT = 10
export const COMPLETE_PERCENT = 100

const RUNNING_BASE_PERCENT = 15
const RUNNING_PERCENT_PER_SECOND = 1.5
const RUNNING_CEILING_PERCENT = 90

/**
 * Linear estimate while the worker runs. The GPU API reports no real
 * progress, so this only tracks elapsed time and stops short of 100.
 */
export function estimateRunningProgress(elapsedSeconds: number): number {
  const t = Math.max(0, elapsedSeconds)
  return Math.min(RUNNING_BASE_PERCENT + t * RUNNING_PERCENT_PER_SECOND, RUNNING_CEILING_PERCENT)
}
