import { afterEach, describe, expect, it, vi } from 'vitest'
import WebSocket from 'ws'
import { z } from 'zod'

import { RetrievalAugmenter } from '../src/core/retrieval.js'
import { SessionOrchestrator } from '../src/core/session.js'
import { WS_PATH, WsTransport } from '../src/transport/ws-server.js'
import { ChunkFeed, ScriptedClient, chunksOf, endpoint, fakeLogger } from './fakes.js'

type Message = Record<string, unknown>

interface Connection {
  ws: WebSocket
  next(): Promise<Message>
}

/**
 * Connects a client and buffers every frame from the first one on, so the
 * session greeting is never missed.
 */
function connect(port: number): Promise<Connection> {
  const ws = new WebSocket(`ws://127.0.0.1:${port}${WS_PATH}`)
  const buffered: Message[] = []
  const waiters: Array<(message: Message) => void> = []

  ws.on('message', (data) => {
    const message: Message = JSON.parse(String(data))
    const waiter = waiters.shift()
    if (waiter) waiter(message)
    else buffered.push(message)
  })

  const next = (): Promise<Message> => {
    const message = buffered.shift()
    if (message) return Promise.resolve(message)
    return new Promise((resolve) => waiters.push(resolve))
  }

  return new Promise((resolve, reject) => {
    ws.on('open', () => resolve({ ws, next }))
    ws.on('error', reject)
  })
}

describe('WsTransport', () => {
  const logger = fakeLogger()
  let transport: WsTransport | null = null
  let feed: ChunkFeed

  async function startRelay(): Promise<{ port: number; orchestrator: SessionOrchestrator; vision: ScriptedClient }> {
    feed = new ChunkFeed()
    const vision = new ScriptedClient(endpoint('vision', ['text', 'image']), (request) => {
      const last = request.messages.at(-1)?.parts[0]
      return last?.kind === 'text' && last.value === 'wait' ? feed.chunks() : chunksOf('A ', 'cat ', 'sleeping.')
    })
    const orchestrator = new SessionOrchestrator({
      clients: new Map([['vision', vision]]),
      augmenter: new RetrievalAugmenter(null, { policy: 'degrade', logger }),
      prompts: { systemPrompt: 'Test prompt.', contextTemplate: '{{context}}' },
      defaultEndpoint: 'vision',
      idleTimeoutMs: 2_000,
      logger
    })
    transport = new WsTransport(
      {
        host: '127.0.0.1',
        port: 0,
        maxPayloadBytes: 1024 * 1024,
        maxStagedImages: 2,
        endpoints: [vision.endpoint]
      },
      orchestrator,
      logger
    )
    await transport.start()
    const port = transport.address?.port
    if (!port) throw new Error('transport did not bind')
    return { port, orchestrator, vision }
  }

  async function upload(port: number, image: string): Promise<Response> {
    return fetch(`http://127.0.0.1:${port}/api/upload-image`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ image })
    })
  }

  afterEach(async () => {
    await transport?.stop()
    transport = null
    vi.clearAllMocks()
  })

  it('serves health and endpoint listings over HTTP', async () => {
    const { port } = await startRelay()

    const health = await fetch(`http://127.0.0.1:${port}/health`)
    expect(health.status).toBe(200)
    expect(await health.json()).toEqual({ status: 'ok', sessions: 0 })

    const endpoints = await fetch(`http://127.0.0.1:${port}/api/endpoints`)
    expect(await endpoints.json()).toEqual([{ name: 'vision', kind: 'chat', modalities: ['text', 'image'] }])

    expect((await fetch(`http://127.0.0.1:${port}/nope`)).status).toBe(404)
    expect((await fetch(`http://127.0.0.1:${port}/health`, { method: 'POST' })).status).toBe(405)
  })

  it('allows cross-origin calls and answers preflight requests', async () => {
    const { port } = await startRelay()

    const preflight = await fetch(`http://127.0.0.1:${port}/api/endpoints`, {
      method: 'OPTIONS',
      headers: { origin: 'http://frontend.test', 'access-control-request-method': 'GET' }
    })
    expect(preflight.status).toBe(204)
    expect(preflight.headers.get('access-control-allow-origin')).toBe('*')

    const listing = await fetch(`http://127.0.0.1:${port}/api/endpoints`, {
      headers: { origin: 'http://frontend.test' }
    })
    expect(listing.status).toBe(200)
    expect(listing.headers.get('access-control-allow-origin')).toBe('*')
  })

  it('stages an uploaded image and serves it back', async () => {
    const { port } = await startRelay()

    const response = await upload(port, 'data:image/png;base64,iVBORw0KGgo=')
    expect(response.status).toBe(200)
    const body: unknown = await response.json()
    const staged = z.object({ id: z.string(), url: z.string() }).parse(body)
    expect(staged.url).toBe(`/api/images/${staged.id}`)

    const image = await fetch(`http://127.0.0.1:${port}${staged.url}`)
    expect(image.status).toBe(200)
    expect(image.headers.get('content-type')).toBe('image/png')
    expect([...new Uint8Array(await image.arrayBuffer())]).toEqual([137, 80, 78, 71, 13, 10, 26, 10])
  })

  it('rejects uploads that are not image data URLs', async () => {
    const { port } = await startRelay()

    const notImage = await upload(port, 'data:text/plain;base64,aGVsbG8=')
    expect(notImage.status).toBe(400)
    expect(await notImage.json()).toEqual({ error: 'Invalid image data' })

    const missing = await fetch(`http://127.0.0.1:${port}/api/upload-image`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{}'
    })
    expect(missing.status).toBe(400)
  })

  it('answers 404 for an unknown or evicted image', async () => {
    const { port } = await startRelay()

    const unknown = await fetch(`http://127.0.0.1:${port}/api/images/nope`)
    expect(unknown.status).toBe(404)
    expect(await unknown.json()).toEqual({ error: 'Image not found' })

    const first = z.object({ id: z.string() }).parse(await (await upload(port, 'data:image/png;base64,AQID')).json())
    await upload(port, 'data:image/png;base64,BAUG')
    await upload(port, 'data:image/png;base64,BwgJ')

    expect((await fetch(`http://127.0.0.1:${port}/api/images/${first.id}`)).status).toBe(404)
  })

  it('resolves a staged image referenced by a turn', async () => {
    const { port, vision } = await startRelay()
    const staged = z.object({ id: z.string() }).parse(await (await upload(port, 'data:image/jpeg;base64,AQID')).json())
    const { ws, next } = await connect(port)
    await next()

    ws.send(
      JSON.stringify({
        type: 'turn',
        parts: [
          { kind: 'text', value: 'Describe this image' },
          { kind: 'image', imageId: staged.id }
        ]
      })
    )

    const frames = [await next(), await next(), await next(), await next()]
    expect(frames.at(-1)).toMatchObject({ final: true, status: 'ok' })
    expect(vision.calls[0]?.messages.at(-1)?.parts[1]).toEqual({
      kind: 'image',
      mime: 'image/jpeg',
      data: new Uint8Array([1, 2, 3])
    })

    ws.send(JSON.stringify({ type: 'turn', parts: [{ kind: 'image', imageId: 'missing' }] }))
    expect(await next()).toMatchObject({ final: true, status: 'error', payload: 'Unknown image: missing' })

    ws.close()
  })

  it('streams fragments for a multimodal turn', async () => {
    const { port } = await startRelay()
    const { ws, next } = await connect(port)

    const greeting = await next()
    expect(greeting.type).toBe('session')
    expect(typeof greeting.sessionId).toBe('string')

    ws.send(
      JSON.stringify({
        type: 'turn',
        parts: [
          { kind: 'text', value: 'Describe this image' },
          { kind: 'image', mime: 'image/png', data: 'iVBORw0KGgo=' }
        ]
      })
    )

    const frames = [await next(), await next(), await next(), await next()]
    const turnId = frames[0]?.turnId
    expect(typeof turnId).toBe('string')
    expect(frames).toEqual([
      { type: 'fragment', turnId, seq: 0, final: false, status: 'ok', payload: 'A ' },
      { type: 'fragment', turnId, seq: 1, final: false, status: 'ok', payload: 'cat ' },
      { type: 'fragment', turnId, seq: 2, final: false, status: 'ok', payload: 'sleeping.' },
      { type: 'fragment', turnId, seq: 3, final: true, status: 'ok' }
    ])

    ws.close()
  })

  it('answers a malformed frame with a terminal error fragment', async () => {
    const { port } = await startRelay()
    const { ws, next } = await connect(port)
    await next()

    ws.send('not valid json')

    expect(await next()).toMatchObject({
      type: 'fragment',
      seq: 0,
      final: true,
      status: 'error',
      payload: 'Message is not valid JSON'
    })
    expect(logger.warn).toHaveBeenCalledWith(
      'transport.ws_parse_error',
      expect.objectContaining({ error: 'Message is not valid JSON' })
    )

    ws.close()
  })

  it('rejects a second turn while one is active, then cancels the first', async () => {
    const { port } = await startRelay()
    const { ws, next } = await connect(port)
    const greeting = await next()

    ws.send(JSON.stringify({ type: 'turn', parts: [{ kind: 'text', value: 'wait' }] }))
    feed.push('thinking')
    const first = await next()
    expect(first).toMatchObject({ seq: 0, status: 'ok', payload: 'thinking' })

    ws.send(JSON.stringify({ type: 'turn', parts: [{ kind: 'text', value: 'again' }] }))
    const rejected = await next()
    expect(rejected).toMatchObject({
      type: 'fragment',
      seq: 0,
      final: true,
      status: 'error',
      payload: `Session ${String(greeting.sessionId)} already has an active turn (${String(first.turnId)})`
    })
    expect(rejected.turnId).not.toBe(first.turnId)

    ws.send(JSON.stringify({ type: 'cancel' }))
    expect(await next()).toEqual({
      type: 'fragment',
      turnId: first.turnId,
      seq: 1,
      final: true,
      status: 'cancelled',
      payload: 'Turn cancelled'
    })

    ws.close()
  })

  it('closes the session when the client disconnects', async () => {
    const { port, orchestrator } = await startRelay()
    const { ws, next } = await connect(port)
    await next()
    expect(orchestrator.sessionCount).toBe(1)

    ws.close()

    await vi.waitFor(() => expect(orchestrator.sessionCount).toBe(0))
  })

  it('closes client connections on stop', async () => {
    const { port } = await startRelay()
    const { ws } = await connect(port)
    const closed = new Promise<void>((resolve) => ws.on('close', () => resolve()))

    await transport?.stop()
    transport = null
    await closed

    expect(ws.readyState).toBe(WebSocket.CLOSED)
  })
})
