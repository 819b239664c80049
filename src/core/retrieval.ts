import OpenAI from 'openai'
import { z } from 'zod'

import type { RelayConfig, RetrievalPolicy, VectorStoreConfig } from '../config/schema.js'
import { RetrievalError, errorMessage } from './errors.js'
import type { Logger, Passage } from './types.js'

/** Anything that can turn a query into ranked passages. */
export interface PassageSource {
  retrieve(query: string, signal?: AbortSignal): Promise<Passage[]>
}

export interface Embedder {
  embed(text: string, signal?: AbortSignal): Promise<number[]>
}

export interface VectorStore {
  search(vector: number[], topK: number, signal?: AbortSignal): Promise<Passage[]>
}

export class OpenAiEmbedder implements Embedder {
  private readonly client: OpenAI

  constructor(
    private readonly model: string,
    options: { url: string; apiKey?: string }
  ) {
    this.client = new OpenAI({ apiKey: options.apiKey ?? 'not-needed', baseURL: options.url, maxRetries: 0 })
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const response = await this.client.embeddings.create({ model: this.model, input: text }, { signal })
    const first = response.data[0]
    if (!first) throw new RetrievalError('Embedding endpoint returned no vectors')
    return first.embedding
  }
}

const searchResponseSchema = z.object({
  result: z.array(
    z.object({
      score: z.number(),
      payload: z.record(z.unknown()).nullish()
    })
  )
})

/** Qdrant REST search against a single collection. */
export class QdrantVectorStore implements VectorStore {
  private readonly fetchImpl: typeof fetch

  constructor(
    private readonly config: Pick<VectorStoreConfig, 'url' | 'apiKey' | 'collection' | 'textField' | 'sourceField'>,
    fetchImpl?: typeof fetch
  ) {
    this.fetchImpl = fetchImpl ?? fetch
  }

  async search(vector: number[], topK: number, signal?: AbortSignal): Promise<Passage[]> {
    const base = this.config.url.replace(/\/+$/, '')
    const headers: Record<string, string> = { 'content-type': 'application/json' }
    if (this.config.apiKey) headers['api-key'] = this.config.apiKey

    const response = await this.fetchImpl(
      `${base}/collections/${encodeURIComponent(this.config.collection)}/points/search`,
      {
        method: 'POST',
        headers,
        body: JSON.stringify({ vector, limit: topK, with_payload: true }),
        signal
      }
    )
    if (!response.ok) {
      throw new RetrievalError(`Vector store responded ${response.status}`)
    }

    const parsed = searchResponseSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw new RetrievalError('Vector store returned an unexpected search payload')
    }

    const passages: Passage[] = []
    for (const hit of parsed.data.result) {
      const text = hit.payload?.[this.config.textField]
      if (typeof text !== 'string' || !text.trim()) continue
      const source = hit.payload?.[this.config.sourceField]
      passages.push({ text, score: hit.score, ...(typeof source === 'string' ? { source } : {}) })
    }
    return passages
  }
}

export class VectorStoreRetriever implements PassageSource {
  constructor(
    private readonly embedder: Embedder,
    private readonly store: VectorStore,
    private readonly topK: number
  ) {}

  async retrieve(query: string, signal?: AbortSignal): Promise<Passage[]> {
    const vector = await this.embedder.embed(query, signal)
    return this.store.search(vector, this.topK, signal)
  }
}

export interface AugmenterOptions {
  policy: RetrievalPolicy
  logger: Logger
}

export interface AugmentOptions {
  /** The turn's signal; aborting it ends the lookup with no passages. */
  signal?: AbortSignal
  /** Longest wait for the store before the lookup counts as failed. */
  timeoutMs?: number
}

/**
 * Looks up passages for a turn's text. Without a source it returns nothing.
 * Under the `degrade` policy a failed or timed-out lookup is logged and the
 * turn goes on without context; under `fail` it raises RetrievalError.
 */
export class RetrievalAugmenter {
  constructor(
    private readonly source: PassageSource | null,
    private readonly options: AugmenterOptions
  ) {}

  get enabled(): boolean {
    return this.source !== null
  }

  async augment(query: string, options: AugmentOptions = {}): Promise<Passage[]> {
    const { signal } = options
    if (!this.source || !query.trim() || signal?.aborted) return []

    // The lookup runs under its own controller so a slow store is cut off
    // without aborting the turn that asked for it.
    const lookup = new AbortController()
    const onAbort = (): void => lookup.abort()
    signal?.addEventListener('abort', onAbort, { once: true })

    try {
      return await this.lookup(this.source, query, lookup, options.timeoutMs)
    } catch (error) {
      if (signal?.aborted) return []
      if (this.options.policy === 'fail') {
        throw error instanceof RetrievalError
          ? error
          : new RetrievalError(`Retrieval failed: ${errorMessage(error)}`, { cause: error })
      }
      this.options.logger.warn('retrieval.failed', { error: errorMessage(error) })
      return []
    } finally {
      signal?.removeEventListener('abort', onAbort)
      lookup.abort()
    }
  }

  private lookup(
    source: PassageSource,
    query: string,
    controller: AbortController,
    timeoutMs: number | undefined
  ): Promise<Passage[]> {
    return new Promise((resolve, reject) => {
      const timer =
        timeoutMs === undefined
          ? undefined
          : setTimeout(() => {
              reject(new RetrievalError(`Retrieval timed out after ${timeoutMs}ms`))
              controller.abort()
            }, timeoutMs)
      const onAbort = (): void => {
        clearTimeout(timer)
        resolve([])
      }
      controller.signal.addEventListener('abort', onAbort, { once: true })

      source.retrieve(query, controller.signal).then(
        (passages) => {
          clearTimeout(timer)
          controller.signal.removeEventListener('abort', onAbort)
          resolve(passages)
        },
        (error: unknown) => {
          clearTimeout(timer)
          controller.signal.removeEventListener('abort', onAbort)
          reject(error)
        }
      )
    })
  }
}

export function createRetrievalAugmenter(config: RelayConfig, logger: Logger): RetrievalAugmenter {
  const store = config.vectorStore
  const options = { policy: config.retrieval.policy, logger }
  if (!store) return new RetrievalAugmenter(null, options)

  const embedder = new OpenAiEmbedder(store.embedding.model, store.embedding)
  return new RetrievalAugmenter(
    new VectorStoreRetriever(embedder, new QdrantVectorStore(store), store.topK),
    options
  )
}
