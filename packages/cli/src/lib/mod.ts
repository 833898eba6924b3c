import { cp, mkdir, readFile, rm, writeFile } from 'node:fs/promises'
import { extname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { MOD_VARIANTS } from 'shared'
import type { ModSpec, ModVariant, PipelineError, Result } from 'shared'
import type { PipelineConfig } from './config.js'
import { pipelineError, type PipelineContext } from './context.js'
import { fileExists, isRegularFile, pruneStaging } from './fs-utils.js'
import { renderModLauncher, writeLauncher } from './launcher.js'
import { modPackageName } from './profiles.js'

export const DEFAULT_MOD_NAME = 'bounce_twice_rockets'
export const MOD_NAME_PATTERN = /^[A-Za-z0-9_-]+$/
export const PATCH_FILE_NAME = 'rocket_bounce_twice.patch'
export const MAINMENU_EXTENSIONS = ['jpg', 'jpeg', 'png', 'tga']

// Only these top-level directories of a mod's source end up in its package
export const PACKAGE_ASSET_DIRS = [
  'scripts',
  'maps',
  'textures',
  'sound',
  'models',
  'music',
  'gfx',
  'ui',
  'fonts',
  'sprites',
  'env',
  'video',
]

const SCAFFOLD_DIRS = ['scripts', 'maps', 'textures', 'sound', 'vm', join('assets', 'mainmenu')]

export const COMPATIBILITY_MARKER = 'baseoa-1'
export const LEGACY_MARKER = 'baseq3-1'

const TEMPLATES_DIR = fileURLToPath(new URL('../../templates/', import.meta.url))

export interface ModPaths {
  modDir: string
  patchFile: string
  buildDir: string
  vmDir: string
  mainMenuAssetsDir: string
  distDir: string
  packageFile: string
  launcher: string
}

export function modPaths(config: PipelineConfig, name: string): ModPaths {
  const modDir = join(config.modsDir, name)
  const buildDir = join(modDir, 'build')
  const distDir = join(config.distDir, name)
  return {
    modDir,
    patchFile: join(modDir, 'patches', PATCH_FILE_NAME),
    buildDir,
    vmDir: join(buildDir, 'vm'),
    mainMenuAssetsDir: join(modDir, 'assets', 'mainmenu'),
    distDir,
    packageFile: join(distDir, modPackageName(name)),
    launcher: join(config.distDir, `run_${name}.sh`),
  }
}

export function validateModName(name: string): Result<string, PipelineError> {
  if (!MOD_NAME_PATTERN.test(name)) {
    return pipelineError('usage', `invalid mod name '${name}'. Use letters, numbers, '_' or '-'.`)
  }
  return { ok: true, value: name }
}

export function parseVariant(value: string): Result<ModVariant, PipelineError> {
  const variant = MOD_VARIANTS.find(v => v === value)
  if (!variant) {
    return pipelineError('usage', `invalid variant '${value}'. Use 'default' or 'debug-visible'.`)
  }
  return { ok: true, value: variant }
}

export function imageExtension(path: string): string {
  return extname(path).slice(1).toLowerCase()
}

export async function validateMainMenuImage(path: string): Promise<Result<string, PipelineError>> {
  if (!(await isRegularFile(path))) {
    return pipelineError('usage', `--mainmenu-image file not found: ${path}`)
  }
  const ext = imageExtension(path)
  if (!MAINMENU_EXTENSIONS.includes(ext)) {
    return pipelineError('usage', `unsupported main menu image format '${ext}'. Use .jpg, .jpeg, .png, or .tga.`)
  }
  return { ok: true, value: path }
}

export async function readPatchTemplate(variant: ModVariant): Promise<string> {
  return readFile(join(TEMPLATES_DIR, 'patches', `${variant}.patch`), 'utf-8')
}

export async function renderModReadme(spec: ModSpec): Promise<string> {
  const template = await readFile(join(TEMPLATES_DIR, 'readme', `${spec.variant}.md`), 'utf-8')
  return template.replaceAll('{{MOD_NAME}}', spec.name)
}

/**
 * Write the committed side of a mod: its patch, README and the empty asset
 * directories a modder fills in.
 */
export async function writeModSource(spec: ModSpec, paths: ModPaths): Promise<void> {
  await mkdir(join(paths.modDir, 'patches'), { recursive: true })
  await writeFile(paths.patchFile, await readPatchTemplate(spec.variant))

  for (const dir of SCAFFOLD_DIRS) {
    await mkdir(join(paths.modDir, dir), { recursive: true })
    const keep = join(paths.modDir, dir, '.gitkeep')
    if (!(await fileExists(keep))) await writeFile(keep, '')
  }

  await writeFile(join(paths.modDir, 'README.md'), await renderModReadme(spec))
}

export async function stageCompiledModule(modulePath: string, paths: ModPaths): Promise<string> {
  await rm(paths.buildDir, { recursive: true, force: true })
  await mkdir(paths.vmDir, { recursive: true })
  const staged = join(paths.vmDir, 'qagame.qvm')
  await cp(modulePath, staged)
  return staged
}

/**
 * The module must announce the OpenArena game version; a leftover baseq3
 * version string makes clients and servers refuse each other.
 */
export async function verifyModuleIdentity(modulePath: string): Promise<Result<void, PipelineError>> {
  const bytes = await readFile(modulePath)
  if (!bytes.includes(COMPATIBILITY_MARKER)) {
    return pipelineError('artifact', `generated qagame.qvm does not contain ${COMPATIBILITY_MARKER} (OpenArena compatibility marker).`)
  }
  if (bytes.includes(LEGACY_MARKER)) {
    return pipelineError('artifact', `generated qagame.qvm still contains ${LEGACY_MARKER}, which causes a client/server mismatch with OpenArena.`)
  }
  return { ok: true, value: undefined }
}

export async function stageModAssets(paths: ModPaths): Promise<string[]> {
  const staged: string[] = []
  for (const dir of PACKAGE_ASSET_DIRS) {
    const source = join(paths.modDir, dir)
    if (!(await fileExists(source))) continue
    await cp(source, join(paths.buildDir, dir), { recursive: true })
    staged.push(dir)
  }
  return staged
}

export async function packageMod(ctx: PipelineContext, paths: ModPaths): Promise<Result<string, PipelineError>> {
  await pruneStaging(paths.buildDir)
  await mkdir(paths.distDir, { recursive: true })
  await rm(paths.packageFile, { force: true })

  const zip = await ctx.runner.run('zip', ['-q', '-r', paths.packageFile, '.'], { cwd: paths.buildDir })
  if (zip.code !== 0) {
    return pipelineError('artifact', `zip failed for ${paths.packageFile}: ${zip.stderr.trim()}`)
  }
  if (!(await fileExists(paths.packageFile))) {
    return pipelineError('artifact', `zip reported success but ${paths.packageFile} was not written`)
  }
  return { ok: true, value: paths.packageFile }
}

export async function writeModLauncher(ctx: PipelineContext, spec: ModSpec, paths: ModPaths): Promise<string> {
  const script = renderModLauncher(ctx.config.platform, { hunkMegs: ctx.config.hunkMegs, modName: spec.name })
  await writeLauncher(paths.launcher, script)
  return paths.launcher
}
