import type { ChangeEvent } from '../../types/index.js'
import { hashDirectory, stableStringify } from '../../utils/hash.js'

/**
 * Build output before it is pushed to a registry
 */
export interface BuildImage {
  service: string
  commitSha: string
  /** Image content; the registry derives the digest from it */
  content: string
}

/**
 * Turns a change into image content. Must be deterministic for a given source tree.
 */
export interface BuildBackend {
  build(change: ChangeEvent, signal?: AbortSignal): Promise<BuildImage>
}

/**
 * Packages the checked-out tree as a content manifest.
 * The commit is kept out of the content so an unchanged tree yields the same digest.
 */
export class SourceTreeBuildBackend implements BuildBackend {
  async build(change: ChangeEvent, signal?: AbortSignal): Promise<BuildImage> {
    if (!change.sourcePath) {
      throw new Error(`Change ${change.id} has no source tree to build`)
    }

    const tree = await hashDirectory(change.sourcePath)
    signal?.throwIfAborted()

    return {
      service: change.service,
      commitSha: change.commitSha,
      content: stableStringify({ service: change.service, tree })
    }
  }
}
