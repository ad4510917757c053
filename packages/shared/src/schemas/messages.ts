import { z } from 'zod'

// ─── Client → server ────────────────────────────────────────────────────────

/** Generation parameters are forwarded to the GPU worker untouched. */
export const generationParamsSchema = z.record(z.string(), z.unknown())

export const startGenerationSchema = z.object({
  imageData: z.string().min(1, 'imageData is required'),
  params: generationParamsSchema,
})

export const preprocessImageSchema = z.object({
  imageData: z.string().min(1, 'imageData is required'),
  params: z
    .object({
      num_nails: z.number().int().positive(),
      image_resolution: z.number().int().positive(),
    })
    .passthrough(),
})

export const clientMessageSchema = z.discriminatedUnion('event', [
  z.object({ event: z.literal('wake_gpu') }),
  z.object({ event: z.literal('preprocess_image'), data: preprocessImageSchema }),
  z.object({ event: z.literal('start_generation'), data: startGenerationSchema }),
  z.object({ event: z.literal('cancel_generation') }),
])

export type GenerationParams = z.infer<typeof generationParamsSchema>
export type GenerationRequest = z.infer<typeof startGenerationSchema>
export type PreprocessRequest = z.infer<typeof preprocessImageSchema>
export type ClientMessage = z.infer<typeof clientMessageSchema>

// ─── Server → client ────────────────────────────────────────────────────────

export interface StatusEvent {
  msg: string
}

export interface ProgressEvent {
  percent: number
}

export interface PreprocessingCompleteEvent {
  cache_ready: boolean
  time: number
  cached: boolean
  provider: string
}

/** Payload of every event the relay can push, keyed by event name. */
export interface ServerEvents {
  status: StatusEvent
  progress: ProgressEvent
  /** The worker's output mapping, passed through verbatim. */
  final_sequence: Record<string, unknown>
  preprocessing_complete: PreprocessingCompleteEvent
}

export type ServerEventName = keyof ServerEvents
