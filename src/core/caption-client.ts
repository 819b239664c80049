import { z } from 'zod'

import {
  AdapterTransportError,
  MalformedResponseError,
  UnsupportedModalityError,
  errorMessage,
  isAbortError
} from './errors.js'
import { assertModalities, type ModelClient } from './model-client.js'
import { retry } from './retry.js'
import type { ContentPart, EndpointDescriptor, Logger, ModelRequest, RawChunk } from './types.js'

type ImagePart = Extract<ContentPart, { kind: 'image' }>

const captionResponseSchema = z.union([
  z.array(z.object({ generated_text: z.string() })).nonempty(),
  z.object({ caption: z.string() })
])

export interface CaptionClientOptions {
  logger: Logger
  backoffMs: number
  fetch?: typeof fetch
}

function lastUserImage(request: ModelRequest): ImagePart | undefined {
  for (let i = request.messages.length - 1; i >= 0; i -= 1) {
    const message = request.messages[i]
    if (message?.role !== 'user') continue
    return message.parts.find((part): part is ImagePart => part.kind === 'image')
  }
  return undefined
}

/**
 * Image-captioning adapter. Posts the raw bytes of the turn's first image and
 * yields the caption as a single chunk; any text in the turn is ignored.
 */
export class CaptionClient implements ModelClient {
  private readonly fetchImpl: typeof fetch

  constructor(
    readonly endpoint: EndpointDescriptor,
    private readonly options: CaptionClientOptions
  ) {
    this.fetchImpl = options.fetch ?? fetch
  }

  stream(request: ModelRequest, signal: AbortSignal): AsyncIterable<RawChunk> {
    assertModalities(this.endpoint, request.modalities)
    const image = lastUserImage(request)
    if (!image) {
      throw new UnsupportedModalityError(
        this.endpoint.name,
        ['image'],
        `Endpoint ${this.endpoint.name} needs an image part to caption`
      )
    }
    return this.run(image, signal)
  }

  private async *run(image: ImagePart, signal: AbortSignal): AsyncGenerator<RawChunk> {
    const headers: Record<string, string> = { 'content-type': image.mime }
    if (this.endpoint.apiKey) headers.authorization = `Bearer ${this.endpoint.apiKey}`

    let response: Response
    try {
      // fetch rejects with a TypeError when no connection could be made.
      response = await retry(
        () => this.fetchImpl(this.endpoint.url, { method: 'POST', headers, body: image.data, signal }),
        {
          attempts: 2,
          backoffMs: this.options.backoffMs,
          shouldRetry: (error) => error instanceof TypeError,
          signal,
          onRetry: (error, attempt) => {
            this.options.logger.warn('model.retry', {
              endpoint: this.endpoint.name,
              attempt,
              error: errorMessage(error)
            })
          }
        }
      )
    } catch (error) {
      if (signal.aborted || isAbortError(error)) return
      yield {
        type: 'error',
        error: new AdapterTransportError(`Endpoint unavailable: ${errorMessage(error)}`, undefined, {
          cause: error
        })
      }
      return
    }

    if (!response.ok) {
      const bodyText = await response.text().catch(() => '')
      yield {
        type: 'error',
        error: new AdapterTransportError(
          `Caption endpoint responded ${response.status}: ${bodyText.slice(0, 200)}`,
          response.status
        )
      }
      return
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (error) {
      if (signal.aborted || isAbortError(error)) return
      yield {
        type: 'error',
        error:
          error instanceof SyntaxError
            ? new MalformedResponseError('Caption response is not JSON', { cause: error })
            : new AdapterTransportError(`Stream interrupted: ${errorMessage(error)}`, undefined, {
                cause: error
              })
      }
      return
    }

    const parsed = captionResponseSchema.safeParse(body)
    if (!parsed.success) {
      yield { type: 'error', error: new MalformedResponseError('Caption response has no caption text') }
      return
    }
    const caption = Array.isArray(parsed.data) ? parsed.data[0].generated_text : parsed.data.caption
    if (caption) yield { type: 'text', text: caption }
  }
}
