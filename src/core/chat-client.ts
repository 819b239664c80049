import OpenAI, { APIConnectionError, APIError } from 'openai'

import {
  AdapterTransportError,
  MalformedResponseError,
  errorMessage,
  isAbortError,
  type RelayError
} from './errors.js'
import { assertModalities, imageDataUrl, type ModelClient } from './model-client.js'
import { retry } from './retry.js'
import type { ChatMessage, EndpointDescriptor, Logger, ModelRequest, RawChunk } from './types.js'

type ChatParams = OpenAI.Chat.ChatCompletionCreateParamsStreaming
type ChatChunk = OpenAI.Chat.ChatCompletionChunk

/** Opens one streaming completion. Resolves once the response headers arrived. */
export type OpenChatStream = (
  body: ChatParams,
  options: { signal: AbortSignal }
) => Promise<AsyncIterable<ChatChunk>>

export interface ChatClientOptions {
  logger: Logger
  backoffMs: number
  /** Replaces the OpenAI SDK call, used by tests. */
  open?: OpenChatStream
}

// Local OpenAI-compatible servers accept any key, the SDK insists on one.
const PLACEHOLDER_API_KEY = 'not-needed'

function openAiStreamer(endpoint: EndpointDescriptor): OpenChatStream {
  const client = new OpenAI({
    apiKey: endpoint.apiKey ?? PLACEHOLDER_API_KEY,
    baseURL: endpoint.url,
    maxRetries: 0
  })
  return (body, options) => client.chat.completions.create(body, options)
}

function joinText(message: ChatMessage): string {
  return message.parts
    .map((part) => (part.kind === 'text' ? part.value : ''))
    .filter(Boolean)
    .join('\n')
}

export function toOpenAiMessages(messages: readonly ChatMessage[]): OpenAI.Chat.ChatCompletionMessageParam[] {
  return messages.map((message): OpenAI.Chat.ChatCompletionMessageParam => {
    if (message.role === 'system') return { role: 'system', content: joinText(message) }
    if (message.role === 'assistant') return { role: 'assistant', content: joinText(message) }

    if (message.parts.every((part) => part.kind === 'text')) {
      return { role: 'user', content: joinText(message) }
    }
    const content = message.parts.map((part): OpenAI.Chat.ChatCompletionContentPart =>
      part.kind === 'text'
        ? { type: 'text', text: part.value }
        : { type: 'image_url', image_url: { url: imageDataUrl(part.mime, part.data) } }
    )
    return { role: 'user', content }
  })
}

function isConnectionFailure(error: unknown): boolean {
  return error instanceof APIConnectionError
}

function fromOpenAiError(error: unknown, phase: 'connect' | 'stream'): RelayError {
  if (error instanceof SyntaxError) {
    return new MalformedResponseError(`Unparseable stream payload: ${error.message}`, { cause: error })
  }
  if (error instanceof APIError && !(error instanceof APIConnectionError)) {
    return new AdapterTransportError(`Endpoint responded with an error: ${error.message}`, error.status, {
      cause: error
    })
  }
  const prefix = phase === 'connect' ? 'Endpoint unavailable' : 'Stream interrupted'
  return new AdapterTransportError(`${prefix}: ${errorMessage(error)}`, undefined, { cause: error })
}

/**
 * Streaming chat-completion adapter for OpenAI-compatible endpoints
 * (vLLM, TGI, OpenAI itself). Image parts are sent inline as data URLs.
 */
export class ChatCompletionClient implements ModelClient {
  private readonly open: OpenChatStream

  constructor(
    readonly endpoint: EndpointDescriptor,
    private readonly options: ChatClientOptions
  ) {
    this.open = options.open ?? openAiStreamer(endpoint)
  }

  stream(request: ModelRequest, signal: AbortSignal): AsyncIterable<RawChunk> {
    assertModalities(this.endpoint, request.modalities)
    return this.run(request, signal)
  }

  private async *run(request: ModelRequest, signal: AbortSignal): AsyncGenerator<RawChunk> {
    const body: ChatParams = {
      model: this.endpoint.model ?? this.endpoint.name,
      messages: toOpenAiMessages(request.messages),
      stream: true
    }

    let source: AsyncIterable<ChatChunk>
    try {
      // Only establishing the connection is retried, partial output cannot be replayed.
      source = await retry(() => this.open(body, { signal }), {
        attempts: 2,
        backoffMs: this.options.backoffMs,
        shouldRetry: isConnectionFailure,
        signal,
        onRetry: (error, attempt) => {
          this.options.logger.warn('model.retry', {
            endpoint: this.endpoint.name,
            attempt,
            error: errorMessage(error)
          })
        }
      })
    } catch (error) {
      if (signal.aborted || isAbortError(error)) return
      yield { type: 'error', error: fromOpenAiError(error, 'connect') }
      return
    }

    try {
      for await (const chunk of source) {
        const text = chunk.choices[0]?.delta?.content
        if (text) yield { type: 'text', text }
      }
    } catch (error) {
      if (signal.aborted || isAbortError(error)) return
      yield { type: 'error', error: fromOpenAiError(error, 'stream') }
    }
  }
}
