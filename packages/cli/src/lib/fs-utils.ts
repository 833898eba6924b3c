import { access, readdir, rm, rmdir, stat } from 'node:fs/promises'
import { join, sep } from 'node:path'

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

export async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile()
  } catch {
    return false
  }
}

export interface FindOptions {
  type: 'file' | 'directory'
  name: string
  // Match only paths ending in these segments (forward slashes)
  pathSuffix?: string
}

/**
 * Depth-first search for the first entry matching `options`, in sorted order
 * so results are stable across runs. Symlinks are not followed.
 */
export async function findFirst(root: string, options: FindOptions): Promise<string | null> {
  let entries
  try {
    entries = await readdir(root, { withFileTypes: true })
  } catch {
    return null
  }
  entries.sort((a, b) => a.name.localeCompare(b.name))

  for (const entry of entries) {
    const full = join(root, entry.name)
    const typeMatches = options.type === 'file' ? entry.isFile() : entry.isDirectory()
    if (typeMatches && entry.name === options.name && matchesSuffix(full, options.pathSuffix)) {
      return full
    }
  }

  for (const entry of entries) {
    if (!entry.isDirectory()) continue
    const found = await findFirst(join(root, entry.name), options)
    if (found) return found
  }
  return null
}

function matchesSuffix(fullPath: string, suffix: string | undefined): boolean {
  if (!suffix) return true
  const normalized = fullPath.split(sep).join('/')
  return normalized.endsWith(`/${suffix}`)
}

export async function listFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true })
    return entries.filter(e => e.isFile()).map(e => e.name).sort()
  } catch {
    return []
  }
}

/**
 * Remove `.gitkeep` placeholders, then every directory left empty (bottom-up).
 * Returns true when `dir` itself ended up empty and was removed.
 */
export async function pruneStaging(dir: string, isRoot = true): Promise<boolean> {
  const entries = await readdir(dir, { withFileTypes: true })
  let remaining = entries.length
  for (const entry of entries) {
    const full = join(dir, entry.name)
    if (entry.isFile() && entry.name === '.gitkeep') {
      await rm(full)
      remaining--
    } else if (entry.isDirectory()) {
      if (await pruneStaging(full, false)) remaining--
    }
  }
  if (remaining === 0 && !isRoot) {
    await rmdir(dir)
    return true
  }
  return false
}
