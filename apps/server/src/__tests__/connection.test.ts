import { describe, it, expect } from 'vitest'
import { INVALID_REQUEST_MESSAGE, openConnection, relaySocketEvents } from '../socket/connection'
import { encodeServerMessage } from '../socket/channel'
import { RelayStats } from '../relay/stats'
import { ManualClock, ScriptedComputeClient, captureLogger } from './fakes'

class FakeSocket {
  readonly sent: string[] = []
  readyState = 1
  failWith: Error | undefined

  send(data: string): void {
    if (this.failWith) throw this.failWith
    this.sent.push(data)
  }

  get frames(): unknown[] {
    return this.sent.map((s): unknown => JSON.parse(s))
  }
}

function connect(client = new ScriptedComputeClient()) {
  const socket = new FakeSocket()
  const stats = new RelayStats()
  const { logger, lines } = captureLogger()
  const connection = openConnection('sess-1', socket, { client, clock: new ManualClock(), logger, stats })
  return { connection, socket, stats, lines, client }
}

const invalidFrame = { event: 'status', data: { msg: INVALID_REQUEST_MESSAGE } }

// ─── inbound validation ─────────────────────────────────────────────────────

describe('RelayConnection.receive validation', () => {
  it('answers malformed JSON with an invalid-request status', async () => {
    const { connection, socket } = connect()
    await connection.receive('{not json')
    expect(socket.frames).toEqual([invalidFrame])
  })

  it('answers binary frames with an invalid-request status', async () => {
    const { connection, socket } = connect()
    await connection.receive(new ArrayBuffer(4))
    expect(socket.frames).toEqual([invalidFrame])
  })

  it('rejects unknown events', async () => {
    const { connection, socket, lines } = connect()
    await connection.receive(JSON.stringify({ event: 'shutdown' }))

    expect(socket.frames).toEqual([invalidFrame])
    expect(lines.some((l) => l.entry['event'] === 'invalid_message' && l.entry['sessionId'] === 'sess-1')).toBe(true)
  })

  it('rejects a generation request without image data', async () => {
    const { connection, socket, client } = connect()
    await connection.receive(JSON.stringify({ event: 'start_generation', data: { imageData: '', params: {} } }))

    expect(socket.frames).toEqual([invalidFrame])
    expect(client.submits).toHaveLength(0)
  })
})

// ─── dispatch ───────────────────────────────────────────────────────────────

describe('RelayConnection.receive dispatch', () => {
  it('runs a generation and streams its events as frames', async () => {
    const client = new ScriptedComputeClient({
      polls: [{ status: 'COMPLETED', output: { status: 'success', sequence: [7] } }],
    })
    const { connection, socket } = connect(client)

    await connection.receive(
      JSON.stringify({ event: 'start_generation', data: { imageData: 'abc', params: { lines: 5 } } }),
    )

    expect(socket.frames).toEqual([
      { event: 'status', data: { msg: 'Job queued to GPU...' } },
      { event: 'progress', data: { percent: 5 } },
      { event: 'progress', data: { percent: 100 } },
      { event: 'status', data: { msg: 'Generation complete!' } },
      { event: 'final_sequence', data: { status: 'success', sequence: [7] } },
    ])
    expect(client.submits).toEqual([{ endpoint: 'generate', imageData: 'abc', params: { lines: 5 } }])
  })

  it('wakes the GPU', async () => {
    const { connection, socket, client } = connect()
    await connection.receive(JSON.stringify({ event: 'wake_gpu' }))

    expect(client.submits).toEqual([{ endpoint: 'health' }])
    expect(socket.frames).toEqual([{ event: 'status', data: { msg: 'GPU waking up...' } }])
  })

  it('acknowledges a cancel', async () => {
    const { connection, socket } = connect()
    await connection.receive(JSON.stringify({ event: 'cancel_generation' }))

    expect(socket.frames).toEqual([{ event: 'status', data: { msg: 'Cancelling...' } }])
  })

  it('logs a handler that fails instead of rejecting', async () => {
    const { connection, socket, lines } = connect(new ScriptedComputeClient({ configured: false }))
    socket.failWith = new Error('socket closed')

    await expect(
      connection.receive(JSON.stringify({ event: 'start_generation', data: { imageData: 'abc', params: {} } })),
    ).resolves.toBeUndefined()

    const failure = lines.find((l) => l.entry['event'] === 'handler_failed')
    expect(failure?.level).toBe('error')
    expect(failure?.entry).toMatchObject({ type: 'start_generation', error: 'socket closed' })
  })
})

// ─── lifecycle ──────────────────────────────────────────────────────────────

describe('RelayConnection lifecycle', () => {
  it('counts open sessions', () => {
    const { connection, stats } = connect()
    expect(stats.snapshot().activeSessions).toBe(1)

    connection.close()
    expect(stats.snapshot().activeSessions).toBe(0)
  })

  it('stops a running generation when the socket closes', async () => {
    const handle: { close?: () => void } = {}
    const client = new ScriptedComputeClient({
      polls: [{ status: 'IN_QUEUE', before: () => handle.close?.() }, { status: 'COMPLETED' }],
    })
    const { connection, socket } = connect(client)
    handle.close = () => connection.close()

    await connection.receive(JSON.stringify({ event: 'start_generation', data: { imageData: 'abc', params: {} } }))

    expect(client.polls).toHaveLength(1)
    expect(socket.frames).toEqual([
      { event: 'status', data: { msg: 'Job queued to GPU...' } },
      { event: 'progress', data: { percent: 5 } },
    ])
  })

  it('drops frames once the socket is no longer open', async () => {
    const { connection, socket } = connect()
    socket.readyState = 3

    await connection.receive(JSON.stringify({ event: 'cancel_generation' }))

    expect(socket.sent).toHaveLength(0)
  })
})

describe('relaySocketEvents', () => {
  it('opens, feeds and closes one session under the given id', async () => {
    const socket = new FakeSocket()
    const stats = new RelayStats()
    const { logger, lines } = captureLogger()
    const events = relaySocketEvents('sess-cookie', {
      client: new ScriptedComputeClient(),
      clock: new ManualClock(),
      logger,
      stats,
    })

    events.onOpen(undefined, socket)
    expect(stats.snapshot().activeSessions).toBe(1)
    expect(lines.find((l) => l.entry['event'] === 'connected')?.entry['sessionId']).toBe('sess-cookie')

    events.onMessage({ data: JSON.stringify({ event: 'cancel_generation' }) })
    expect(socket.frames).toEqual([{ event: 'status', data: { msg: 'Cancelling...' } }])

    events.onClose()
    expect(stats.snapshot().activeSessions).toBe(0)
    expect(lines.find((l) => l.entry['event'] === 'disconnected')?.entry['sessionId']).toBe('sess-cookie')

    events.onMessage({ data: JSON.stringify({ event: 'cancel_generation' }) })
    expect(socket.sent).toHaveLength(1)
  })
})

describe('encodeServerMessage', () => {
  it('wraps the payload in an event envelope', () => {
    expect(encodeServerMessage('progress', { percent: 5 })).toBe('{"event":"progress","data":{"percent":5}}')
  })
})
