import type { RelayError } from './errors.js'

export interface Logger {
  info(event: string, data?: Record<string, unknown>): void
  warn(event: string, data?: Record<string, unknown>): void
  error(event: string, data?: Record<string, unknown>): void
}

export type Modality = 'text' | 'image'

export type EndpointKind = 'chat' | 'caption'

export type ContentPart =
  | { kind: 'text'; value: string }
  | { kind: 'image'; mime: string; data: Uint8Array }

export type ChatRole = 'system' | 'user' | 'assistant'

export interface ChatMessage {
  role: ChatRole
  parts: readonly ContentPart[]
}

export interface EndpointDescriptor {
  name: string
  kind: EndpointKind
  url: string
  apiKey?: string
  model?: string
  modalities: ReadonlySet<Modality>
}

/** One user submission. Frozen once created. */
export interface Turn {
  readonly id: string
  readonly parts: readonly ContentPart[]
  readonly createdAt: Date
  readonly endpoint: string
}

export interface ModelRequest {
  endpoint: EndpointDescriptor
  messages: ChatMessage[]
  modalities: ReadonlySet<Modality>
}

/** Adapter output. An error chunk is always the last one in a sequence. */
export type RawChunk = { type: 'text'; text: string } | { type: 'error'; error: RelayError }

export type FragmentStatus = 'ok' | 'error' | 'cancelled'

export interface Fragment {
  turnId: string
  seq: number
  final: boolean
  status: FragmentStatus
  payload?: string
  errorCode?: string
}

export interface HistoryEntry {
  turn: Turn
  response: string
}

export interface Passage {
  text: string
  score: number
  source?: string
}
