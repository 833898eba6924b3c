import { readFile, rm, writeFile } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import type { Result } from 'shared'
import { createContext, type PipelineContext, type PipelineDeps } from '../lib/context.js'
import { formatDirective } from '../lib/cvar.js'
import { fileExists } from '../lib/fs-utils.js'
import { discoverProfiles } from '../lib/profiles.js'

export interface HighFidelityOptions {
  root?: string
  dist?: string
}

export const AUTOEXEC_FILE = 'autoexec.cfg'
export const HIGH_FIDELITY_MARKER = 'ArenaForge High Fidelity Defaults'

const HIGH_FIDELITY_CVARS: [string, string][] = [
  ['cl_renderer', 'opengl2'],
  ['r_hdr', '1'],
  ['r_toneMap', '1'],
  ['r_sunlightMode', '1'],
  ['r_postProcess', '1'],
  ['r_dynamiclight', '2'],
  ['r_shadowFilter', '1'],
  ['r_detailtextures', '1'],
  ['r_ext_texture_filter_anisotropic', '16'],
  ['r_picmip', '0'],
]

export function renderHighFidelityConfig(): string {
  return [
    `// ${HIGH_FIDELITY_MARKER}`,
    ...HIGH_FIDELITY_CVARS.map(([key, value]) => formatDirective({ verb: 'seta', key, value })),
    'echo "ArenaForge High Fidelity Loaded"',
    '',
  ].join('\n')
}

export async function isManagedConfig(filePath: string): Promise<boolean> {
  const content = await readFile(filePath, 'utf-8')
  return content.includes(HIGH_FIDELITY_MARKER)
}

async function resolveDist(options: HighFidelityOptions, deps: Partial<PipelineDeps>): Promise<Result<{ ctx: PipelineContext; distDir: string }, string>> {
  const created = await createContext(options.root ?? process.cwd(), deps)
  if (!created.ok) return { ok: false, error: created.error.message }
  const distDir = options.dist ? resolve(options.dist) : created.value.config.distDir
  if (!(await fileExists(distDir))) {
    return { ok: false, error: `distribution directory not found: ${distDir}` }
  }
  return { ok: true, value: { ctx: created.value, distDir } }
}

export async function enableHighFidelityCommand(
  options: HighFidelityOptions = {},
  deps: Partial<PipelineDeps> = {},
): Promise<Result<{ updated: string[]; skipped: string[] }, string>> {
  const resolved = await resolveDist(options, deps)
  if (!resolved.ok) return resolved
  const { ctx, distDir } = resolved.value

  const profiles = await discoverProfiles(distDir)
  if (profiles.length === 0) {
    return { ok: false, error: `no eligible profile directories found under ${distDir}` }
  }

  const updated: string[] = []
  const skipped: string[] = []
  for (const profile of profiles) {
    const configFile = join(profile.directory, AUTOEXEC_FILE)
    if ((await fileExists(configFile)) && !(await isManagedConfig(configFile))) {
      ctx.log(`Skipped ${configFile} (not managed by arenaforge)`)
      skipped.push(configFile)
      continue
    }
    await writeFile(configFile, renderHighFidelityConfig())
    ctx.log(`Updated ${configFile}`)
    updated.push(configFile)
  }

  ctx.log('')
  ctx.log(`Applied high-fidelity defaults to ${updated.length} profile(s).`)
  if (skipped.length > 0) ctx.log(`Skipped ${skipped.length} non-managed autoexec file(s).`)

  return { ok: true, value: { updated, skipped } }
}

export async function disableHighFidelityCommand(
  options: HighFidelityOptions = {},
  deps: Partial<PipelineDeps> = {},
): Promise<Result<{ removed: string[]; skipped: string[] }, string>> {
  const resolved = await resolveDist(options, deps)
  if (!resolved.ok) return resolved
  const { ctx, distDir } = resolved.value

  const removed: string[] = []
  const skipped: string[] = []
  for (const profile of await discoverProfiles(distDir)) {
    const configFile = join(profile.directory, AUTOEXEC_FILE)
    if (!(await fileExists(configFile))) continue

    if (await isManagedConfig(configFile)) {
      await rm(configFile, { force: true })
      ctx.log(`Removed ${configFile}`)
      removed.push(configFile)
    } else {
      ctx.log(`Skipped ${configFile} (not managed by arenaforge)`)
      skipped.push(configFile)
    }
  }

  ctx.log('')
  ctx.log(`Removed high-fidelity autoexec from ${removed.length} profile(s).`)
  if (skipped.length > 0) ctx.log(`Skipped ${skipped.length} non-managed autoexec file(s).`)

  return { ok: true, value: { removed, skipped } }
}
