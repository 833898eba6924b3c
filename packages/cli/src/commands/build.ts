import type { PipelineError, Result } from 'shared'
import { acquireAssetArchive, extractAssets, type ArchiveSource } from '../lib/assets.js'
import { buildEngine } from '../lib/compiler.js'
import { createContext, pipelineError, type PipelineContext, type PipelineDeps } from '../lib/context.js'
import { assembleDistribution } from '../lib/distribution.js'
import { engineRevision, ensureCheckout } from '../lib/source.js'
import { requireCommands, resolveToolchain } from '../lib/toolchain.js'
import { verifyDistribution, type VerificationOutcome } from '../lib/verify.js'

export interface BuildOptions {
  root?: string
  strictVerify?: boolean
}

export interface BuildSummary {
  distDir: string
  launcher: string
  revision: string
  assets: ArchiveSource
  verification: VerificationOutcome
}

export const BUILD_REQUIRED_COMMANDS = ['git', 'tar', 'unzip']

/**
 * Toolchain -> checkout -> compile -> assets -> assemble -> smoke test.
 * Each stage runs to completion before the next; the first fatal error
 * stops the pipeline.
 */
export async function runBasePipeline(
  ctx: PipelineContext,
  options: Pick<BuildOptions, 'strictVerify'> = {},
): Promise<Result<BuildSummary, PipelineError>> {
  const tools = await requireCommands(ctx, BUILD_REQUIRED_COMMANDS)
  if (!tools.ok) return tools

  const cmake = await resolveToolchain(ctx)
  if (!cmake.ok) return cmake
  ctx.log(`Using CMake: ${cmake.value}`)

  const checkout = await ensureCheckout(ctx)
  if (!checkout.ok) return checkout

  const artifacts = await buildEngine(ctx, cmake.value)
  if (!artifacts.ok) return artifacts

  const archive = await acquireAssetArchive(ctx)
  if (!archive.ok) return archive

  const assets = await extractAssets(ctx)
  if (!assets.ok) return assets

  const dist = await assembleDistribution(ctx, artifacts.value, assets.value)
  if (!dist.ok) return dist

  const verification = await verifyDistribution(ctx, dist.value)
  if (verification.mode === 'none') {
    if (options.strictVerify) {
      return pipelineError('artifact', `neither the client nor the dedicated server completed a +quit run; see ${verification.clientLog}`)
    }
    ctx.log(`Warning: verification did not pass; logs left in ${verification.clientLog} and ${verification.dedicatedLog}`)
  }

  return {
    ok: true,
    value: {
      distDir: dist.value.distDir,
      launcher: dist.value.launcher,
      revision: await engineRevision(ctx),
      assets: archive.value,
      verification,
    },
  }
}

export async function buildCommand(
  options: BuildOptions = {},
  deps: Partial<PipelineDeps> = {},
): Promise<Result<BuildSummary, string>> {
  const created = await createContext(options.root ?? process.cwd(), deps)
  if (!created.ok) return { ok: false, error: created.error.message }
  const ctx = created.value

  const result = await runBasePipeline(ctx, options)
  if (!result.ok) return { ok: false, error: result.error.message }

  const { assets, rootDir } = ctx.config
  const summary = result.value
  ctx.log('')
  ctx.log('Build complete.')
  ctx.log(`Date:   ${new Date().toISOString().split('T')[0]}`)
  ctx.log(`Engine: ioquake3 (${summary.revision})`)
  ctx.log(`Assets: ${assets.name} ${assets.version}`)
  ctx.log(`Run:    ${summary.launcher}`)
  ctx.log(`Logs:   ${summary.verification.clientLog}${summary.verification.dedicatedLog ? ` and ${summary.verification.dedicatedLog}` : ''}`)
  if (rootDir !== process.cwd()) ctx.log(`Root:   ${rootDir}`)

  return { ok: true, value: summary }
}
