import { rm } from 'node:fs/promises'
import type { PipelineError, Result } from 'shared'
import { pipelineError, type PipelineContext } from './context.js'
import { fileExists, findFirst, listFiles } from './fs-utils.js'
import type { ProcessRunner } from './process-runner.js'

export type ArchiveSource = 'cache' | 'primary' | 'fallback'

export interface ExtractedAssets {
  profileDir: string
  packages: string[]
}

/**
 * An archive is only usable when it exists and `unzip -tq` reads every entry
 * without error.
 */
export async function isValidArchive(runner: ProcessRunner, archivePath: string): Promise<boolean> {
  if (!(await fileExists(archivePath))) return false
  const test = await runner.run('unzip', ['-tq', archivePath])
  return test.code === 0
}

/**
 * Cached copy if it passes the integrity check, else the primary URL, else
 * one retry from the fallback mirror. Two attempts at most.
 */
export async function acquireAssetArchive(ctx: PipelineContext): Promise<Result<ArchiveSource, PipelineError>> {
  const { assets } = ctx.config

  if (await isValidArchive(ctx.runner, assets.archivePath)) {
    ctx.log(`Using cached ${assets.name} archive: ${assets.archivePath}`)
    return { ok: true, value: 'cache' }
  }

  ctx.log(`Downloading ${assets.name} ${assets.version} assets...`)
  const attempts: [Exclude<ArchiveSource, 'cache'>, string][] = [
    ['primary', assets.primaryUrl],
    ['fallback', assets.fallbackUrl],
  ]
  for (const [source, url] of attempts) {
    if (source === 'fallback') {
      ctx.log('Primary URL did not return a valid zip, retrying fallback mirror...')
    }
    const download = await ctx.downloader.download(url, assets.archivePath)
    if (!download.ok) {
      ctx.log(download.error)
      continue
    }
    if (await isValidArchive(ctx.runner, assets.archivePath)) {
      return { ok: true, value: source }
    }
  }

  return pipelineError('acquisition', `unable to fetch a valid ${assets.name} ${assets.version} zip archive.`)
}

export async function extractAssets(ctx: PipelineContext): Promise<Result<ExtractedAssets, PipelineError>> {
  const { assets } = ctx.config

  ctx.log(`Extracting ${assets.name} assets...`)
  await rm(assets.extractDir, { recursive: true, force: true })
  const unzip = await ctx.runner.run('unzip', ['-q', assets.archivePath, '-d', assets.extractDir])
  if (unzip.code !== 0) {
    return pipelineError('artifact', `unzip of ${assets.archivePath} failed: ${unzip.stderr.trim()}`)
  }

  const profileDir = await findFirst(assets.extractDir, { type: 'directory', name: assets.profileDirName })
  if (!profileDir) {
    return pipelineError('artifact', `${assets.profileDirName} directory not found in extracted ${assets.name} archive.`)
  }

  const packages = (await listFiles(profileDir)).filter(f => f.endsWith(assets.packageExtension))
  if (packages.length === 0) {
    return pipelineError('artifact', `no ${assets.packageExtension} files found in ${profileDir}.`)
  }

  return { ok: true, value: { profileDir, packages } }
}
