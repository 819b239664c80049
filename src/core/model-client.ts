import type { RelayConfig } from '../config/schema.js'
import { UnsupportedModalityError } from './errors.js'
import type { ChatMessage, EndpointDescriptor, Modality, ModelRequest, RawChunk } from './types.js'

/**
 * Per-endpoint streaming contract shared by every session. Implementations
 * keep no per-call state on the instance so concurrent calls are safe.
 */
export interface ModelClient {
  readonly endpoint: EndpointDescriptor
  /**
   * Throws UnsupportedModalityError synchronously when the request needs a
   * modality the endpoint lacks. Otherwise returns chunks in arrival order;
   * failures end the sequence with one error chunk. Aborting the signal ends
   * it without one.
   */
  stream(request: ModelRequest, signal: AbortSignal): AsyncIterable<RawChunk>
}

export function modalitiesOf(messages: readonly ChatMessage[]): Set<Modality> {
  const found = new Set<Modality>()
  for (const message of messages) {
    for (const part of message.parts) {
      found.add(part.kind)
    }
  }
  return found
}

export function assertModalities(endpoint: EndpointDescriptor, requested: ReadonlySet<Modality>): void {
  const missing = [...requested].filter((modality) => !endpoint.modalities.has(modality))
  if (missing.length > 0) {
    throw new UnsupportedModalityError(endpoint.name, missing)
  }
}

export function toEndpointDescriptors(config: RelayConfig): EndpointDescriptor[] {
  return Object.entries(config.endpoints).map(([name, entry]) => ({
    name,
    kind: entry.kind,
    url: entry.url,
    apiKey: entry.apiKey,
    model: entry.model,
    modalities: new Set(entry.modalities)
  }))
}

export function imageDataUrl(mime: string, data: Uint8Array): string {
  return `data:${mime};base64,${Buffer.from(data).toString('base64')}`
}
