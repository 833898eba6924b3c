import { join, resolve } from 'node:path'
import type { ModSpec, PipelineError, Result } from 'shared'
import { buildGameModule } from '../lib/compiler.js'
import { BASE_PROFILE } from '../lib/config.js'
import { createContext, pipelineError, type PipelineContext, type PipelineDeps } from '../lib/context.js'
import { BASE_LAUNCHER } from '../lib/distribution.js'
import { fileExists } from '../lib/fs-utils.js'
import { injectMainMenuBackground } from '../lib/mainmenu.js'
import {
  DEFAULT_MOD_NAME,
  modPaths,
  packageMod,
  parseVariant,
  stageCompiledModule,
  stageModAssets,
  validateMainMenuImage,
  validateModName,
  verifyModuleIdentity,
  writeModLauncher,
  writeModSource,
} from '../lib/mod.js'
import { hasCheckout, withDisposableWorktree } from '../lib/source.js'
import { requireCommands, resolveToolchain } from '../lib/toolchain.js'
import { runBasePipeline } from './build.js'

export interface GenerateModOptions {
  root?: string
  variant?: string
  debugVisible?: boolean
  mainmenuImage?: string
}

export interface GeneratedMod {
  spec: ModSpec
  patchFile: string
  modulePath: string
  packageFile: string
  launcher: string
  mainMenuImage: string | null
}

export const MOD_REQUIRED_COMMANDS = ['git', 'tar', 'unzip', 'zip']

/**
 * Validate everything the caller passed before anything touches disk.
 */
export async function resolveModSpec(
  name: string | undefined,
  options: GenerateModOptions,
): Promise<Result<ModSpec, PipelineError>> {
  const validName = validateModName(name ?? DEFAULT_MOD_NAME)
  if (!validName.ok) return validName

  const variant = parseVariant(options.debugVisible ? 'debug-visible' : options.variant ?? 'default')
  if (!variant.ok) return variant

  const spec: ModSpec = { name: validName.value, variant: variant.value }
  if (options.mainmenuImage !== undefined) {
    const image = await validateMainMenuImage(resolve(options.mainmenuImage))
    if (!image.ok) return image
    spec.mainMenuImage = image.value
  }
  return { ok: true, value: spec }
}

async function ensureBaseSetup(ctx: PipelineContext): Promise<Result<void, PipelineError>> {
  const { distDir, engineDir } = ctx.config
  const launcherReady = await fileExists(join(distDir, BASE_LAUNCHER))
  const assetsReady = await fileExists(join(distDir, BASE_PROFILE, 'pak0.pk3'))

  if (!launcherReady || !assetsReady) {
    ctx.log('Base build not found; running the base build first...')
    const base = await runBasePipeline(ctx)
    if (!base.ok) return base
  }

  if (!(await hasCheckout(engineDir))) {
    return pipelineError('environment', `engine source checkout not found at ${engineDir}.`)
  }
  return { ok: true, value: undefined }
}

export async function generateMod(ctx: PipelineContext, spec: ModSpec): Promise<Result<GeneratedMod, PipelineError>> {
  const tools = await requireCommands(ctx, MOD_REQUIRED_COMMANDS)
  if (!tools.ok) return tools

  const base = await ensureBaseSetup(ctx)
  if (!base.ok) return base

  const cmake = await resolveToolchain(ctx)
  if (!cmake.ok) return cmake

  const paths = modPaths(ctx.config, spec.name)
  await writeModSource(spec, paths)

  const compiled = await withDisposableWorktree(ctx, spec.name, paths.patchFile, async (worktree): Promise<Result<string, PipelineError>> => {
    const built = await buildGameModule(ctx, cmake.value, worktree)
    if (!built.ok) return built
    return { ok: true, value: await stageCompiledModule(built.value, paths) }
  })
  if (!compiled.ok) return compiled

  const identity = await verifyModuleIdentity(compiled.value)
  if (!identity.ok) return identity

  await stageModAssets(paths)
  const mainMenu = await injectMainMenuBackground(ctx, spec.mainMenuImage, paths, join(ctx.config.distDir, BASE_PROFILE))
  if (!mainMenu.ok) return mainMenu

  const packaged = await packageMod(ctx, paths)
  if (!packaged.ok) return packaged

  const launcher = await writeModLauncher(ctx, spec, paths)

  return {
    ok: true,
    value: {
      spec,
      patchFile: paths.patchFile,
      modulePath: compiled.value,
      packageFile: packaged.value,
      launcher,
      mainMenuImage: mainMenu.value,
    },
  }
}

export async function generateModCommand(
  name: string | undefined,
  options: GenerateModOptions = {},
  deps: Partial<PipelineDeps> = {},
): Promise<Result<GeneratedMod, string>> {
  const spec = await resolveModSpec(name, options)
  if (!spec.ok) return { ok: false, error: spec.error.message }

  const created = await createContext(options.root ?? process.cwd(), deps)
  if (!created.ok) return { ok: false, error: created.error.message }
  const ctx = created.value

  const result = await generateMod(ctx, spec.value)
  if (!result.ok) return { ok: false, error: result.error.message }

  const mod = result.value
  ctx.log('')
  ctx.log(`Mod generated: ${mod.spec.name} (variant: ${mod.spec.variant})`)
  ctx.log(`Patch source: ${mod.patchFile}`)
  ctx.log(`Built qagame VM: ${mod.modulePath}`)
  ctx.log(`Packaged mod: ${mod.packageFile}`)
  ctx.log(`Main menu background: ${mod.mainMenuImage ? `enabled (${mod.mainMenuImage})` : 'disabled (no image provided)'}`)
  ctx.log(`Launcher: ${mod.launcher}`)

  return { ok: true, value: mod }
}
