import { createHash } from 'crypto'
import { readFile, readdir } from 'fs/promises'
import { join, relative, sep } from 'path'

const IGNORED_ENTRIES = new Set(['.git', 'node_modules'])

/**
 * Calculate SHA-256 hash of a string or buffer
 */
export function hashContent(content: string | Uint8Array): string {
  return createHash('sha256').update(content).digest('hex')
}

/**
 * Digest of a value serialised as JSON with sorted object keys
 */
export function hashJson(value: unknown): string {
  return hashContent(stableStringify(value))
}

/**
 * JSON serialisation independent of object key insertion order
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`)
    return `{${entries.join(',')}}`
  }
  return JSON.stringify(value) ?? 'null'
}

/**
 * Calculate SHA-256 hash of a directory tree.
 * Depends only on relative paths and file contents.
 */
export async function hashDirectory(dirPath: string): Promise<string> {
  const hash = createHash('sha256')
  const files = await getFilesRecursively(dirPath)

  files.sort()

  for (const file of files) {
    const content = await readFile(file)
    hash.update(relative(dirPath, file).split(sep).join('/'))
    hash.update('\0')
    hash.update(content)
  }

  return hash.digest('hex')
}

async function getFilesRecursively(dirPath: string): Promise<string[]> {
  const files: string[] = []
  const entries = await readdir(dirPath, { withFileTypes: true })

  for (const entry of entries) {
    if (IGNORED_ENTRIES.has(entry.name)) {
      continue
    }

    const fullPath = join(dirPath, entry.name)
    if (entry.isDirectory()) {
      files.push(...await getFilesRecursively(fullPath))
    } else if (entry.isFile()) {
      files.push(fullPath)
    }
  }

  return files
}
