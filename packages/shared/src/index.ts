// Wire contract between the browser client and the relay server.

export {
  generationParamsSchema,
  startGenerationSchema,
  preprocessImageSchema,
  clientMessageSchema,
  type GenerationParams,
  type GenerationRequest,
  type PreprocessRequest,
  type ClientMessage,
  type ServerEvents,
  type ServerEventName,
} from './schemas/messages'
