import { randomUUID } from 'node:crypto'

const DATA_URL_PATTERN = /^data:(image\/[\w.+-]+);base64,([A-Za-z0-9+/]*={0,2})$/

export interface StagedImage {
  id: string
  mime: string
  data: Uint8Array
}

/** Splits an `image/*` base64 data URL. Returns null for anything else. */
export function parseImageDataUrl(value: string): { mime: string; data: Uint8Array } | null {
  const match = DATA_URL_PATTERN.exec(value)
  const mime = match?.[1]
  const encoded = match?.[2]
  if (!mime || !encoded) return null
  return { mime, data: new Uint8Array(Buffer.from(encoded, 'base64')) }
}

/**
 * Images uploaded ahead of a turn, kept in memory. Holds at most `limit`
 * entries and evicts the oldest first.
 */
export class ImageStore {
  private readonly images = new Map<string, StagedImage>()

  constructor(private readonly limit: number) {}

  get size(): number {
    return this.images.size
  }

  put(mime: string, data: Uint8Array): StagedImage {
    const image: StagedImage = { id: randomUUID(), mime, data }
    this.images.set(image.id, image)
    for (const oldest of this.images.keys()) {
      if (this.images.size <= this.limit) break
      this.images.delete(oldest)
    }
    return image
  }

  get(id: string): StagedImage | undefined {
    return this.images.get(id)
  }
}
