import { basename, join } from 'node:path'
import { cp, mkdir, rm } from 'node:fs/promises'
import type { PipelineError, Result } from 'shared'
import type { ExtractedAssets } from './assets.js'
import { RENDERER_PREFIX, type EngineArtifacts } from './compiler.js'
import type { PipelineContext } from './context.js'
import { BASE_PROFILE } from './config.js'
import { listFiles } from './fs-utils.js'
import { renderBaseLauncher, writeLauncher } from './launcher.js'

export const BASE_LAUNCHER = 'play.sh'

export interface Distribution {
  distDir: string
  client: string
  server: string
  renderers: string[]
  profileDir: string
  launcher: string
}

/**
 * Copy the built engine and base assets into the dist directory. Only the
 * entries the base build owns are replaced; mod profiles and mod launchers
 * already in the directory are left alone. Renderer libraries from an earlier
 * build count as owned.
 */
export async function assembleDistribution(
  ctx: PipelineContext,
  artifacts: EngineArtifacts,
  assets: ExtractedAssets,
): Promise<Result<Distribution, PipelineError>> {
  const { distDir, platform, hunkMegs } = ctx.config
  ctx.log('Assembling portable distribution...')

  const client = join(distDir, basename(artifacts.client))
  const server = join(distDir, basename(artifacts.server))
  const profileDir = join(distDir, BASE_PROFILE)
  const launcher = join(distDir, BASE_LAUNCHER)

  const renderers = artifacts.renderers.map(r => join(distDir, basename(r)))
  const staleRenderers = (await listFiles(distDir))
    .filter(f => f.startsWith(RENDERER_PREFIX))
    .map(f => join(distDir, f))

  await mkdir(distDir, { recursive: true })
  for (const owned of [client, server, profileDir, launcher, ...staleRenderers]) {
    await rm(owned, { recursive: true, force: true })
  }

  await cp(artifacts.client, client, { recursive: true, verbatimSymlinks: true })
  await cp(artifacts.server, server)
  for (const [i, renderer] of artifacts.renderers.entries()) {
    await cp(renderer, renderers[i])
  }
  await cp(assets.profileDir, profileDir, { recursive: true })
  await writeLauncher(launcher, renderBaseLauncher(platform, { hunkMegs }))

  return { ok: true, value: { distDir, client, server, renderers, profileDir, launcher } }
}
