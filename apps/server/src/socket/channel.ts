import type { ServerEventName, ServerEvents } from '@gpu-relay/shared'

/** Outbound half of a client connection. */
export interface EventChannel {
  emit<E extends ServerEventName>(event: E, data: ServerEvents[E]): void
}

/** The parts of a WebSocket the channel writes to. */
export interface SocketSink {
  send(data: string): void
  readonly readyState: number
}

const OPEN = 1

/**
 * Sends each event as a JSON `{ event, data }` frame. Frames for a socket
 * that is no longer open are dropped.
 */
export class WebSocketChannel implements EventChannel {
  constructor(private readonly socket: SocketSink) {}

  emit<E extends ServerEventName>(event: E, data: ServerEvents[E]): void {
    if (this.socket.readyState !== OPEN) return
    this.socket.send(encodeServerMessage(event, data))
  }
}

export function encodeServerMessage<E extends ServerEventName>(event: E, data: ServerEvents[E]): string {
  return JSON.stringify({ event, data })
}
