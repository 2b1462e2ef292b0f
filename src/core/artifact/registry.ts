import { hashContent } from '../../utils/hash.js'
import type { BuildImage } from './backend.js'

/**
 * Content-addressed image storage
 */
export interface ArtifactRegistry {
  /** Store an image and return its content digest */
  push(image: BuildImage): Promise<string>
  /** Fetch an image back by digest, undefined when unknown */
  pull(digest: string): Promise<BuildImage | undefined>
}

export function contentDigest(image: Pick<BuildImage, 'content'>): string {
  return `sha256:${hashContent(image.content)}`
}

/**
 * Registry kept in memory
 */
export class InMemoryArtifactRegistry implements ArtifactRegistry {
  private readonly images = new Map<string, BuildImage>()
  pushes = 0

  async push(image: BuildImage): Promise<string> {
    this.pushes++
    const digest = contentDigest(image)
    this.images.set(digest, { ...image })
    return digest
  }

  async pull(digest: string): Promise<BuildImage | undefined> {
    const image = this.images.get(digest)
    return image ? { ...image } : undefined
  }

  get size(): number {
    return this.images.size
  }
}
