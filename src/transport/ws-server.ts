import { randomUUID } from 'node:crypto'
import type { IncomingMessage, Server } from 'node:http'
import type { AddressInfo } from 'node:net'

import { WebSocket, WebSocketServer, type RawData } from 'ws'

import { RelayError, errorMessage } from '../core/errors.js'
import type { Session, SessionOrchestrator, TurnStream } from '../core/session.js'
import type { EndpointDescriptor, Logger } from '../core/types.js'
import { createHttpApp } from './http-app.js'
import { ImageStore } from './image-store.js'
import {
  parseInbound,
  rejectionMessage,
  toContentParts,
  toFragmentMessage,
  type OutboundMessage,
  type TurnMessage
} from './protocol.js'

export const WS_PATH = '/ws'

export interface TransportOptions {
  host: string
  port: number
  maxPayloadBytes: number
  maxStagedImages: number
  endpoints: readonly EndpointDescriptor[]
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8')
  if (Buffer.isBuffer(data)) return data.toString('utf8')
  return Buffer.from(data).toString('utf8')
}

function pathOf(req: IncomingMessage): string {
  return new URL(req.url ?? '/', 'http://localhost').pathname
}

const CLOSE_GRACE_MS = 1_000

/** Starts the closing handshake and terminates the socket if the peer never answers. */
function closeClient(client: WebSocket): Promise<void> {
  return new Promise((resolve) => {
    if (client.readyState === WebSocket.CLOSED) {
      resolve()
      return
    }
    const timer = setTimeout(() => client.terminate(), CLOSE_GRACE_MS)
    client.once('close', () => {
      clearTimeout(timer)
      resolve()
    })
    client.close(1001, 'server shutting down')
  })
}

/**
 * HTTP + WebSocket front door. The express app and the WebSocket server share
 * one `http.Server`. Each WebSocket connection owns one session; turns arrive
 * as JSON text frames and every fragment goes back as one frame.
 */
export class WsTransport {
  private server: Server | null = null
  private wss: WebSocketServer | null = null
  private readonly pumps = new Set<Promise<void>>()
  private readonly images: ImageStore

  constructor(
    private readonly options: TransportOptions,
    private readonly orchestrator: SessionOrchestrator,
    private readonly logger: Logger
  ) {
    this.images = new ImageStore(options.maxStagedImages)
  }

  get address(): AddressInfo | null {
    const address = this.server?.address()
    return address && typeof address === 'object' ? address : null
  }

  async start(): Promise<void> {
    if (this.server) return

    const app = createHttpApp({
      endpoints: this.options.endpoints,
      images: this.images,
      maxPayloadBytes: this.options.maxPayloadBytes,
      orchestrator: this.orchestrator,
      logger: this.logger
    })
    const wss = new WebSocketServer({ noServer: true, maxPayload: this.options.maxPayloadBytes })

    const server = await new Promise<Server>((resolve, reject) => {
      const listening = app.listen(this.options.port, this.options.host, () => {
        listening.off('error', reject)
        resolve(listening)
      })
      listening.once('error', reject)
    })

    server.on('upgrade', (req, socket, head) => {
      if (pathOf(req) !== WS_PATH) {
        socket.destroy()
        return
      }
      wss.handleUpgrade(req, socket, head, (ws) => wss.emit('connection', ws, req))
    })
    wss.on('connection', (ws: WebSocket) => this.handleConnection(ws))

    this.server = server
    this.wss = wss
    this.logger.info('transport.listening', { host: this.options.host, port: this.address?.port })
  }

  async stop(): Promise<void> {
    const { server, wss } = this
    if (!server || !wss) return
    this.server = null
    this.wss = null

    await Promise.all([...wss.clients].map((client) => closeClient(client)))
    await new Promise<void>((resolve) => wss.close(() => resolve()))
    server.closeAllConnections()
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())))
    await Promise.allSettled([...this.pumps])
    this.logger.info('transport.stopped')
  }

  private handleConnection(ws: WebSocket): void {
    const session = this.orchestrator.openSession()
    this.send(ws, { type: 'session', sessionId: session.id })

    ws.on('message', (data, isBinary) => {
      if (isBinary) {
        this.send(ws, rejectionMessage(randomUUID(), 'Binary frames are not supported'))
        return
      }
      this.handleMessage(ws, session, rawDataToString(data))
    })
    ws.on('close', () => {
      this.orchestrator.closeSession(session)
    })
    ws.on('error', (error) => {
      this.logger.error('transport.ws_error', { sessionId: session.id, error: error.message })
    })
  }

  private handleMessage(ws: WebSocket, session: Session, raw: string): void {
    const parsed = parseInbound(raw)
    if (!parsed.ok) {
      this.logger.warn('transport.ws_parse_error', { sessionId: session.id, error: parsed.error })
      this.send(ws, rejectionMessage(randomUUID(), parsed.error))
      return
    }

    if (parsed.message.type === 'cancel') {
      if (!session.closed) this.orchestrator.cancelTurn(session)
      return
    }

    const stream = this.submit(ws, session, parsed.message)
    if (stream) this.track(this.pump(ws, stream))
  }

  private submit(ws: WebSocket, session: Session, message: TurnMessage): TurnStream | null {
    try {
      const parts = toContentParts(message, this.images)
      return this.orchestrator.submitTurn(session, parts, { endpoint: message.endpoint })
    } catch (error) {
      const reason = error instanceof RelayError ? error.message : 'Turn could not be started'
      this.logger.warn('transport.turn_rejected', { sessionId: session.id, error: errorMessage(error) })
      this.send(ws, rejectionMessage(randomUUID(), reason))
      return null
    }
  }

  private async pump(ws: WebSocket, stream: TurnStream): Promise<void> {
    for await (const fragment of stream) {
      this.send(ws, toFragmentMessage(fragment))
    }
  }

  private track(work: Promise<void>): void {
    const tracked: Promise<void> = work
      .catch((error: unknown) => {
        this.logger.error('transport.pump_failed', { error: errorMessage(error) })
      })
      .finally(() => {
        this.pumps.delete(tracked)
      })
    this.pumps.add(tracked)
  }

  private send(ws: WebSocket, message: OutboundMessage): void {
    if (ws.readyState !== WebSocket.OPEN) return
    ws.send(JSON.stringify(message))
  }
}
