import { join, resolve } from 'node:path'
import type { Result } from 'shared'
import { createContext, type PipelineDeps } from '../lib/context.js'
import { upsertCvarFile } from '../lib/cvar.js'
import { fileExists } from '../lib/fs-utils.js'
import { discoverProfiles } from '../lib/profiles.js'

export interface VideoDefaultsOptions {
  root?: string
  dist?: string
  mode?: string
  fullscreen?: string
  noborder?: string
  width?: string
  height?: string
  includeAll?: boolean
}

export interface VideoDefaultsResult {
  updated: string[]
  values: [string, string][]
}

export const VIDEO_CONFIG_FILE = 'q3config.cfg'

const INTEGER = /^-?[0-9]+$/

function requireInteger(value: string, label: string): string | null {
  return INTEGER.test(value) ? null : `${label} must be an integer, got '${value}'.`
}

function requireBool01(value: string, label: string): string | null {
  return value === '0' || value === '1' ? null : `${label} must be 0 or 1, got '${value}'.`
}

/**
 * Turn raw flag values into the cvar list to write. Every check runs before
 * any file is touched.
 */
export function resolveVideoValues(options: VideoDefaultsOptions): Result<[string, string][], string> {
  const mode = options.mode ?? '-2'
  const fullscreen = options.fullscreen ?? '1'
  const noborder = options.noborder ?? '0'

  const problems = [
    requireInteger(mode, 'r_mode'),
    requireBool01(fullscreen, 'r_fullscreen'),
    requireBool01(noborder, 'r_noborder'),
    options.width !== undefined ? requireInteger(options.width, 'r_customwidth') : null,
    options.height !== undefined ? requireInteger(options.height, 'r_customheight') : null,
  ]
  const first = problems.find(p => p !== null)
  if (first) return { ok: false, error: first }

  if (options.width !== undefined && options.height === undefined) {
    return { ok: false, error: '--width requires --height.' }
  }
  if (options.height !== undefined && options.width === undefined) {
    return { ok: false, error: '--height requires --width.' }
  }

  const values: [string, string][] = [
    ['r_mode', mode],
    ['r_fullscreen', fullscreen],
    ['r_noborder', noborder],
  ]
  if (options.width !== undefined && options.height !== undefined) {
    values.push(['r_customwidth', options.width], ['r_customheight', options.height])
  }
  return { ok: true, value: values }
}

export async function setVideoDefaultsCommand(
  options: VideoDefaultsOptions = {},
  deps: Partial<PipelineDeps> = {},
): Promise<Result<VideoDefaultsResult, string>> {
  const values = resolveVideoValues(options)
  if (!values.ok) return values

  const created = await createContext(options.root ?? process.cwd(), deps)
  if (!created.ok) return { ok: false, error: created.error.message }
  const ctx = created.value

  const distDir = options.dist ? resolve(options.dist) : ctx.config.distDir
  if (!(await fileExists(distDir))) {
    return { ok: false, error: `distribution directory not found: ${distDir}` }
  }

  const profiles = await discoverProfiles(distDir, { includeAll: options.includeAll })
  if (profiles.length === 0) {
    const hint = options.includeAll ? '' : '\nHint: use --include-all to force updating every subdirectory.'
    return { ok: false, error: `no eligible profile directories found under ${distDir}${hint}` }
  }

  const updated: string[] = []
  for (const profile of profiles) {
    const configFile = join(profile.directory, VIDEO_CONFIG_FILE)
    await upsertCvarFile(configFile, values.value)
    ctx.log(`Updated ${configFile}`)
    updated.push(configFile)
  }

  ctx.log('')
  ctx.log(`Applied video defaults to ${updated.length} profile(s):`)
  for (const [key, value] of values.value) ctx.log(`  ${key}=${value}`)

  return { ok: true, value: { updated, values: values.value } }
}
