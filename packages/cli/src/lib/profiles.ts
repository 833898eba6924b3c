import { readdir } from 'node:fs/promises'
import { join } from 'node:path'
import type { Profile, ProfileClass } from 'shared'
import { BASE_PROFILE } from './config.js'
import { listFiles } from './fs-utils.js'

const CLIENT_BUNDLE = 'ioquake3.app'
const MOD_PACKAGE = /^z_(.+)\.pk3$/

export function modPackageName(modName: string): string {
  return `z_${modName}.pk3`
}

export function classifyProfile(name: string, files: string[], baseName: string = BASE_PROFILE): ProfileClass {
  if (name === baseName) return { kind: 'base' }
  for (const file of files) {
    const match = file.match(MOD_PACKAGE)
    if (match) return { kind: 'mod', name: match[1] }
  }
  return { kind: 'none' }
}

export interface DiscoverOptions {
  includeAll?: boolean
}

/**
 * Direct subdirectories of the dist dir that hold a playable configuration.
 * `includeAll` widens the scan to every subdirectory except the client bundle.
 */
export async function discoverProfiles(distDir: string, options: DiscoverOptions = {}): Promise<Profile[]> {
  const entries = await readdir(distDir, { withFileTypes: true })
  const profiles: Profile[] = []

  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    if (!entry.isDirectory() || entry.name === CLIENT_BUNDLE) continue
    const directory = join(distDir, entry.name)
    const classification = classifyProfile(entry.name, await listFiles(directory))
    if (classification.kind === 'none' && !options.includeAll) continue
    profiles.push({ name: entry.name, directory, classification })
  }

  return profiles
}
