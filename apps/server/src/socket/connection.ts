import { clientMessageSchema, type ClientMessage } from '@gpu-relay/shared'
import type { Logger } from '../lib/logger'
import { errorMessage } from '../lib/logger'
import type { Clock } from '../relay/clock'
import { JobRelaySession } from '../relay/job-relay-session'
import type { ComputeClient } from '../relay/remote-compute-client'
import type { RelayStats } from '../relay/stats'
import { WebSocketChannel, type EventChannel, type SocketSink } from './channel'

export const INVALID_REQUEST_MESSAGE = 'Error: invalid request.'

/** Server-wide collaborators shared by every connection. */
export interface RelayDeps {
  client: ComputeClient
  clock: Clock
  logger: Logger
  stats: RelayStats
}

function decodeFrame(raw: unknown): unknown {
  if (typeof raw !== 'string') return undefined
  try {
    return JSON.parse(raw)
  } catch {
    return undefined
  }
}

/**
 * One client's WebSocket: validates inbound frames and hands them to the
 * client's relay session.
 */
export class RelayConnection {
  private readonly log: Logger

  constructor(
    private readonly session: JobRelaySession,
    private readonly channel: EventChannel,
    private readonly deps: RelayDeps,
  ) {
    this.log = deps.logger.child({ sessionId: session.sessionId })
  }

  /**
   * Dispatch one raw frame. The returned promise settles when the triggered
   * work is done and never rejects.
   */
  receive(raw: unknown): Promise<void> {
    const parsed = clientMessageSchema.safeParse(decodeFrame(raw))
    if (!parsed.success) {
      this.log.warn('invalid_message', { issues: parsed.error.issues.map((i) => i.message) })
      this.channel.emit('status', { msg: INVALID_REQUEST_MESSAGE })
      return Promise.resolve()
    }
    return this.dispatch(parsed.data)
  }

  close(): void {
    this.session.dispose()
    this.deps.stats.sessionClosed()
    this.log.info('disconnected')
  }

  private dispatch(message: ClientMessage): Promise<void> {
    this.log.info('message', { type: message.event })
    switch (message.event) {
      case 'wake_gpu':
        return this.track(message.event, this.session.wake())
      case 'preprocess_image':
        return this.track(message.event, this.session.preprocess(message.data))
      case 'start_generation':
        return this.track(message.event, this.session.startGeneration(message.data))
      case 'cancel_generation':
        this.session.cancel()
        return Promise.resolve()
    }
  }

  private track(event: ClientMessage['event'], task: Promise<void>): Promise<void> {
    return task.catch((err: unknown) => {
      this.log.error('handler_failed', { type: event, error: errorMessage(err) })
    })
  }
}

/** Build the session and connection for a freshly opened socket. */
export function openConnection(sessionId: string, socket: SocketSink, deps: RelayDeps): RelayConnection {
  const channel = new WebSocketChannel(socket)
  const session = new JobRelaySession({
    sessionId,
    channel,
    client: deps.client,
    clock: deps.clock,
    logger: deps.logger.child({ sessionId }),
    stats: deps.stats,
  })
  deps.stats.sessionOpened()
  deps.logger.info('connected', { sessionId })
  return new RelayConnection(session, channel, deps)
}

/**
 * Socket lifecycle handlers for one upgrade: the connection is built on open,
 * fed every frame, and torn down on close.
 */
export function relaySocketEvents(sessionId: string, deps: RelayDeps) {
  let connection: RelayConnection | undefined

  return {
    onOpen(_evt: unknown, ws: SocketSink) {
      connection = openConnection(sessionId, ws, deps)
    },
    onMessage(evt: { data: unknown }) {
      void connection?.receive(evt.data)
    },
    onClose() {
      connection?.close()
      connection = undefined
    },
  }
}
