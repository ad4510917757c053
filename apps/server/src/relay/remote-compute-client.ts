import { z } from 'zod'
import type { GenerationParams } from '@gpu-relay/shared'
import { ConfigurationError, RemoteRejected, TransportError } from './errors'

export type RemoteJobStatus = 'QUEUED' | 'RUNNING' | 'COMPLETED' | 'FAILED' | 'UNKNOWN'

export interface RemoteJob {
  jobId: string
  status: RemoteJobStatus
  /** Status string exactly as the GPU API sent it. */
  rawStatus: string
  output?: Record<string, unknown>
}

/** The `input` object the GPU worker receives; `endpoint` selects its handler. */
export type RemoteJobInput =
  | { endpoint: 'health' }
  | { endpoint: 'generate'; imageData: string; params: GenerationParams }
  | { endpoint: 'preprocess'; imageData: string; num_nails: number; image_resolution: number }

export interface SubmittedJob {
  jobId: string
}

/** Submit/poll surface the relay session drives. */
export interface ComputeClient {
  readonly configured: boolean
  submit(input: RemoteJobInput, timeoutSeconds: number): Promise<SubmittedJob>
  poll(jobId: string, timeoutSeconds: number): Promise<RemoteJob>
}

export interface RemoteComputeClientOptions {
  apiKey?: string
  endpointId?: string
  /** Base URL without the endpoint id, e.g. `https://api.runpod.ai/v2`. */
  baseUrl: string
  fetch?: typeof fetch
}

const submitResponseSchema = z.object({ id: z.string().min(1) })

const statusResponseSchema = z.object({
  status: z.string().min(1),
  output: z.unknown().optional(),
})

const STATUS_MAP: Record<string, RemoteJobStatus> = {
  IN_QUEUE: 'QUEUED',
  IN_PROGRESS: 'RUNNING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
  CANCELLED: 'FAILED',
  TIMED_OUT: 'FAILED',
}

export function normalizeStatus(raw: string): RemoteJobStatus {
  return STATUS_MAP[raw] ?? 'UNKNOWN'
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

function describeFetchError(err: unknown, timeoutSeconds: number): string {
  if (err instanceof Error && err.name === 'TimeoutError') {
    return `timed out after ${timeoutSeconds}s`
  }
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? `: ${err.cause.message}` : ''
    return `${err.message}${cause}`
  }
  return String(err)
}

/**
 * Stateless HTTP wrapper around a serverless GPU endpoint
 * (`POST /{endpoint}/run`, `GET /{endpoint}/status/{id}`). No retries.
 */
export class RemoteComputeClient implements ComputeClient {
  private readonly apiKey: string | undefined
  private readonly endpointId: string | undefined
  private readonly baseUrl: string
  private readonly fetchImpl: typeof fetch

  constructor(options: RemoteComputeClientOptions) {
    this.apiKey = options.apiKey
    this.endpointId = options.endpointId
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.fetchImpl = options.fetch ?? fetch
  }

  get configured(): boolean {
    return Boolean(this.apiKey && this.endpointId)
  }

  async submit(input: RemoteJobInput, timeoutSeconds: number): Promise<SubmittedJob> {
    const res = await this.request(`/run`, timeoutSeconds, {
      method: 'POST',
      body: JSON.stringify({ input }),
    })
    const text = await this.readBody(res, timeoutSeconds)
    const body = parseJson(text)

    if (res.status !== 200) {
      const detail = isRecord(body) && typeof body['error'] === 'string' ? body['error'] : `HTTP ${res.status}`
      throw new RemoteRejected(detail, res.status)
    }

    const parsed = submitResponseSchema.safeParse(body)
    if (!parsed.success) {
      throw new RemoteRejected('response did not include a job id', res.status)
    }
    return { jobId: parsed.data.id }
  }

  async poll(jobId: string, timeoutSeconds: number): Promise<RemoteJob> {
    const res = await this.request(`/status/${encodeURIComponent(jobId)}`, timeoutSeconds, {
      method: 'GET',
    })
    const text = await this.readBody(res, timeoutSeconds)

    if (!res.ok) {
      throw new TransportError(`status check returned HTTP ${res.status}`)
    }

    const parsed = statusResponseSchema.safeParse(parseJson(text))
    if (!parsed.success) {
      throw new TransportError('unreadable status response')
    }

    const { status, output } = parsed.data
    return {
      jobId,
      status: normalizeStatus(status),
      rawStatus: status,
      output: isRecord(output) ? output : undefined,
    }
  }

  private async request(path: string, timeoutSeconds: number, init: RequestInit): Promise<Response> {
    if (!this.apiKey || !this.endpointId) {
      throw new ConfigurationError('GPU API key or endpoint id is not configured')
    }

    try {
      return await this.fetchImpl(`${this.baseUrl}/${this.endpointId}${path}`, {
        ...init,
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        signal: AbortSignal.timeout(timeoutSeconds * 1000),
      })
    } catch (err) {
      throw new TransportError(describeFetchError(err, timeoutSeconds))
    }
  }

  private async readBody(res: Response, timeoutSeconds: number): Promise<string> {
    try {
      return await res.text()
    } catch (err) {
      throw new TransportError(describeFetchError(err, timeoutSeconds))
    }
  }
}
