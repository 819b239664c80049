import { z } from 'zod'

import { InvalidTurnError } from '../core/errors.js'
import type { ContentPart, Fragment, FragmentStatus } from '../core/types.js'
import type { ImageStore } from './image-store.js'

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/

const textPartSchema = z.object({
  kind: z.literal('text'),
  value: z.string()
})

// Either inline (`mime` + `data`) or staged earlier through the upload route (`imageId`).
const imagePartSchema = z.object({
  kind: z.literal('image'),
  mime: z.string().regex(/^image\/[\w.+-]+$/, 'expected an image mime type').optional(),
  data: z.string().min(1).regex(BASE64_PATTERN, 'expected base64 data').optional(),
  imageId: z.string().min(1).optional()
})

export const turnMessageSchema = z.object({
  type: z.literal('turn'),
  parts: z.array(z.discriminatedUnion('kind', [textPartSchema, imagePartSchema])).min(1),
  endpoint: z.string().min(1).optional()
})

export const cancelMessageSchema = z.object({ type: z.literal('cancel') })

export const inboundMessageSchema = z.discriminatedUnion('type', [turnMessageSchema, cancelMessageSchema])

export type InboundMessage = z.infer<typeof inboundMessageSchema>
export type TurnMessage = z.infer<typeof turnMessageSchema>

export interface FragmentMessage {
  type: 'fragment'
  turnId: string
  seq: number
  final: boolean
  status: FragmentStatus
  payload?: string
}

export interface SessionMessage {
  type: 'session'
  sessionId: string
}

export type OutboundMessage = FragmentMessage | SessionMessage

export type ParseResult = { ok: true; message: InboundMessage } | { ok: false; error: string }

/** Parses one text frame. Never throws. */
export function parseInbound(raw: string): ParseResult {
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch {
    return { ok: false, error: 'Message is not valid JSON' }
  }
  const parsed = inboundMessageSchema.safeParse(json)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
    return { ok: false, error: `Invalid message: ${where}${issue?.message ?? 'unknown shape'}` }
  }
  return { ok: true, message: parsed.data }
}

export type ImageLookup = Pick<ImageStore, 'get'>

/** Throws InvalidTurnError for an unknown staged image or an incomplete inline one. */
export function toContentParts(message: TurnMessage, images?: ImageLookup): ContentPart[] {
  return message.parts.map((part): ContentPart => {
    if (part.kind === 'text') return { kind: 'text', value: part.value }
    if (part.imageId !== undefined) {
      const staged = images?.get(part.imageId)
      if (!staged) throw new InvalidTurnError(`Unknown image: ${part.imageId}`)
      return { kind: 'image', mime: staged.mime, data: staged.data }
    }
    if (part.mime === undefined || part.data === undefined) {
      throw new InvalidTurnError('An image part needs mime and data, or an imageId')
    }
    return { kind: 'image', mime: part.mime, data: new Uint8Array(Buffer.from(part.data, 'base64')) }
  })
}

export function toFragmentMessage(fragment: Fragment): FragmentMessage {
  const message: FragmentMessage = {
    type: 'fragment',
    turnId: fragment.turnId,
    seq: fragment.seq,
    final: fragment.final,
    status: fragment.status
  }
  if (fragment.payload !== undefined) message.payload = fragment.payload
  return message
}

/** Terminal error for a turn that never started, e.g. rejected by the orchestrator. */
export function rejectionMessage(turnId: string, error: string): FragmentMessage {
  return { type: 'fragment', turnId, seq: 0, final: true, status: 'error', payload: error }
}
