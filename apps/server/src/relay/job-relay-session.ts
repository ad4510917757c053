import type { GenerationRequest, PreprocessRequest, ServerEventName, ServerEvents } from '@gpu-relay/shared'
import type { EventChannel } from '../socket/channel'
import type { Logger } from '../lib/logger'
import { errorMessage } from '../lib/logger'
import type { Clock } from './clock'
import type { ComputeClient, RemoteJob } from './remote-compute-client'
import type { RelayStats } from './stats'
import {
  ConfigurationError,
  DEFAULT_GPU_ERROR,
  JobTimeout,
  POLL_ERROR_MESSAGE,
  RelayError,
  RemoteJobFailed,
  TransportError,
  describeFailure,
} from './errors'
import {
  COMPLETE_PERCENT,
  QUEUED_PERCENT,
  SUBMITTED_PERCENT,
  estimateRunningProgress,
} from './progress'

/** Everything one session needs, passed in explicitly. */
export interface SessionContext {
  sessionId: string
  client: ComputeClient
  channel: EventChannel
  clock: Clock
  logger: Logger
  stats: RelayStats
}

export const RELAY_TIMING = {
  pollIntervalMs: 2_000,
  submitTimeoutSeconds: 30,
  pollTimeoutSeconds: 10,
  wakeTimeoutSeconds: 5,
  jobTimeoutSeconds: 300,
  preprocessTimeoutSeconds: 60,
} as const

export const STATUS = {
  wakingUp: 'GPU waking up...',
  queuedToGpu: 'Job queued to GPU...',
  inQueue: 'Job in queue...',
  generating: 'Generating on GPU...',
  complete: 'Generation complete!',
  busy: 'A generation is already in progress.',
  cancelling: 'Cancelling...',
  preprocessing: 'Pre-processing...',
  preprocessingOnGpu: 'Processing on GPU...',
  preprocessReady: 'Ready! GPU cache warmed.',
  imageLoaded: 'Image loaded! Click Generate.',
} as const

/** Poll spacing for preprocessing: quick at first, then backing off. */
export function preprocessPollInterval(pollCount: number): number {
  if (pollCount < 10) return 500
  if (pollCount < 20) return 1_000
  return 2_000
}

function toRelayError(err: unknown): RelayError {
  return err instanceof RelayError ? err : new TransportError(errorMessage(err))
}

function failureMessage(output: Record<string, unknown> | undefined): string {
  const message = output?.['message']
  return typeof message === 'string' && message.length > 0 ? message : DEFAULT_GPU_ERROR
}

/**
 * Relays GPU jobs for one connected client.
 *
 * A generation attempt submits the job, then polls it every two seconds and
 * turns each remote status into `status` / `progress` events until the job
 * completes, fails, errors or runs past the five minute ceiling. Each of those
 * endings emits one terminal event and no further events follow.
 *
 * Only one attempt runs at a time. `cancel()` aborts it at the next
 * suspension point; the job itself keeps running on the GPU side.
 */
export class JobRelaySession {
  private generation: AbortController | null = null
  private preprocessing: AbortController | null = null
  private disposed = false

  constructor(private readonly ctx: SessionContext) {}

  get sessionId(): string {
    return this.ctx.sessionId
  }

  get generating(): boolean {
    return this.generation !== null
  }

  /** Best-effort health job to spin up a worker. Never rejects. */
  async wake(): Promise<void> {
    const { client, logger } = this.ctx
    if (!client.configured) {
      logger.warn('wake_skipped', { reason: 'missing GPU credentials' })
      return
    }

    try {
      const { jobId } = await client.submit({ endpoint: 'health' }, RELAY_TIMING.wakeTimeoutSeconds)
      logger.info('wake_submitted', { jobId })
      this.status(STATUS.wakingUp)
    } catch (err) {
      logger.warn('wake_failed', { error: errorMessage(err) })
    }
  }

  async startGeneration(request: GenerationRequest): Promise<void> {
    const { client, logger } = this.ctx

    if (!client.configured) {
      const err = new ConfigurationError('GPU API key or endpoint id is not configured')
      logger.error('generation_rejected', { reason: err.message })
      this.status(describeFailure(err))
      return
    }

    if (this.generation) {
      this.status(STATUS.busy)
      return
    }

    const controller = new AbortController()
    this.generation = controller
    try {
      await this.runGeneration(request, controller.signal)
    } finally {
      if (this.generation === controller) this.generation = null
    }
  }

  cancel(): void {
    this.ctx.logger.info('cancel_requested', { active: this.generating })
    this.status(STATUS.cancelling)
    if (this.generation) {
      this.generation.abort()
      this.generation = null
      this.ctx.stats.record('cancelled')
    }
  }

  /** Warm the worker's cache for an image ahead of generation. */
  async preprocess(request: PreprocessRequest): Promise<void> {
    this.status(STATUS.preprocessing)
    if (!this.ctx.client.configured) {
      this.status(STATUS.imageLoaded)
      return
    }

    // A newer image replaces whatever was being preprocessed.
    this.preprocessing?.abort()
    const controller = new AbortController()
    this.preprocessing = controller
    try {
      await this.runPreprocess(request, controller.signal)
    } finally {
      if (this.preprocessing === controller) this.preprocessing = null
    }
  }

  /** Stop every running task without emitting anything. */
  dispose(): void {
    this.disposed = true
    this.generation?.abort()
    this.preprocessing?.abort()
    this.generation = null
    this.preprocessing = null
  }

  private async runGeneration(request: GenerationRequest, signal: AbortSignal): Promise<void> {
    const { client, clock, logger, stats } = this.ctx

    let jobId: string
    try {
      const submitted = await client.submit(
        { endpoint: 'generate', imageData: request.imageData, params: request.params },
        RELAY_TIMING.submitTimeoutSeconds,
      )
      jobId = submitted.jobId
    } catch (err) {
      if (signal.aborted) return
      const failure = toRelayError(err)
      stats.record('submitFailures')
      logger.error('job_submit_failed', { kind: failure.kind, error: failure.message })
      this.status(describeFailure(failure))
      return
    }

    stats.record('submitted')
    logger.info('job_submitted', { jobId })
    if (signal.aborted) return

    this.status(STATUS.queuedToGpu)
    this.progress(SUBMITTED_PERCENT)

    const startedAt = clock.now()
    let lastStatus: string | undefined

    for (;;) {
      await clock.sleep(RELAY_TIMING.pollIntervalMs, signal)
      if (signal.aborted) return

      let job: RemoteJob
      try {
        job = await client.poll(jobId, RELAY_TIMING.pollTimeoutSeconds)
      } catch (err) {
        if (signal.aborted) return
        stats.record('failed')
        logger.error('job_poll_failed', { jobId, error: errorMessage(err) })
        this.status(POLL_ERROR_MESSAGE)
        return
      }
      if (signal.aborted) return

      const elapsedSeconds = (clock.now() - startedAt) / 1000
      if (job.rawStatus !== lastStatus) {
        logger.info('job_status', { jobId, status: job.rawStatus, elapsed: Number(elapsedSeconds.toFixed(1)) })
        lastStatus = job.rawStatus
      }

      if (elapsedSeconds > RELAY_TIMING.jobTimeoutSeconds) {
        const timeout = new JobTimeout(elapsedSeconds)
        stats.record('timedOut')
        logger.warn('job_timeout', { jobId, error: timeout.message })
        this.status(describeFailure(timeout))
        return
      }

      switch (job.status) {
        case 'QUEUED':
          this.status(STATUS.inQueue)
          this.progress(QUEUED_PERCENT)
          break
        case 'RUNNING':
          this.status(STATUS.generating)
          this.progress(estimateRunningProgress(elapsedSeconds))
          break
        case 'COMPLETED':
          this.finishCompleted(job, elapsedSeconds)
          return
        case 'FAILED':
          this.finishFailed(job)
          return
        case 'UNKNOWN':
          break
      }
    }
  }

  private finishCompleted(job: RemoteJob, elapsedSeconds: number): void {
    const { logger, stats } = this.ctx
    this.progress(COMPLETE_PERCENT)
    this.status(STATUS.complete)

    const output = job.output
    if (output && output['status'] === 'success') {
      stats.record('completed')
      logger.info('job_completed', { jobId: job.jobId, elapsed: Number(elapsedSeconds.toFixed(1)) })
      this.emit('final_sequence', output)
      return
    }

    const failure = new RemoteJobFailed(failureMessage(job.output))
    stats.record('failed')
    logger.error('job_failed', { jobId: job.jobId, status: job.rawStatus, error: failure.message })
    this.status(describeFailure(failure))
  }

  private finishFailed(job: RemoteJob): void {
    const failure = new RemoteJobFailed(failureMessage(job.output))
    this.ctx.stats.record('failed')
    this.ctx.logger.error('job_failed', { jobId: job.jobId, status: job.rawStatus, error: failure.message })
    this.status(describeFailure(failure))
  }

  private async runPreprocess(request: PreprocessRequest, signal: AbortSignal): Promise<void> {
    const { client, clock, logger } = this.ctx
    const submittedAt = clock.now()

    try {
      const { jobId } = await client.submit(
        {
          endpoint: 'preprocess',
          imageData: request.imageData,
          num_nails: request.params.num_nails,
          image_resolution: request.params.image_resolution,
        },
        RELAY_TIMING.submitTimeoutSeconds,
      )
      if (signal.aborted) return
      logger.info('preprocess_submitted', { jobId })
      this.status(STATUS.preprocessingOnGpu)

      const pollStart = clock.now()
      let polls = 0
      while (clock.now() - pollStart < RELAY_TIMING.preprocessTimeoutSeconds * 1000) {
        await clock.sleep(preprocessPollInterval(polls), signal)
        if (signal.aborted) return
        polls++

        const job = await client.poll(jobId, RELAY_TIMING.pollTimeoutSeconds)
        if (signal.aborted) return

        if (job.status === 'COMPLETED' && job.output?.['status'] === 'success') {
          const time = (clock.now() - submittedAt) / 1000
          logger.info('preprocess_completed', { jobId, time, polls })
          this.status(STATUS.preprocessReady)
          this.emit('preprocessing_complete', { cache_ready: true, time, cached: false, provider: 'runpod' })
          return
        }
        if (job.status === 'COMPLETED' || job.status === 'FAILED') {
          logger.warn('preprocess_failed', { jobId, status: job.rawStatus, error: failureMessage(job.output) })
          this.status(STATUS.imageLoaded)
          return
        }
      }

      logger.warn('preprocess_timeout', { jobId, polls })
    } catch (err) {
      if (signal.aborted) return
      logger.warn('preprocess_error', { error: errorMessage(err) })
    }

    this.status(STATUS.imageLoaded)
  }

  private status(msg: string): void {
    this.emit('status', { msg })
  }

  private progress(percent: number): void {
    this.emit('progress', { percent })
  }

  private emit<E extends ServerEventName>(event: E, data: ServerEvents[E]): void {
    if (this.disposed) return
    this.ctx.channel.emit(event, data)
  }
}
