import { cp, mkdir, writeFile } from 'node:fs/promises'
import { basename, join } from 'node:path'
import type { PipelineError, Result } from 'shared'
import { pipelineError, type PipelineContext } from './context.js'
import { fileExists, listFiles } from './fs-utils.js'
import { imageExtension, MAINMENU_EXTENSIONS, type ModPaths } from './mod.js'

export const MENU_SHADER_FILE = 'scripts/oanew.shader'

const PREFERRED_SHADER_PACKAGES = ['pak6-patch088.pk3', 'pak6-patch085.pk3', 'pak0.pk3']

// Longest names first so a shorter name never matches inside a longer one
const MENU_SHADERS = ['menubacknologo_blueish', 'menuback_blueish', 'menubacknologo', 'menuback']

export function menuShaderBlock(name: string, imagePath: string): string {
  return `${name}\n{\n\tnopicmip\n\t{\n\t\tclampmap ${imagePath}\n\t\trgbGen identity\n\t}\n}\n`
}

/**
 * Point every main-menu backdrop shader at `imagePath` and add the
 * `menubackRagePro` shader some menus fall back to.
 */
export function rewriteMenuShaders(shader: string, imagePath: string): Result<string, PipelineError> {
  let rewritten = shader
  for (const name of MENU_SHADERS) {
    const block = new RegExp(`\\b${name}\\s*\\{(?:[^{}]|\\{[^{}]*\\})*\\}`, 'g')
    rewritten = rewritten.replace(block, () => menuShaderBlock(name, imagePath))
  }

  if (!rewritten.includes(`clampmap ${imagePath}`)) {
    return pipelineError('artifact', `failed to rewrite main menu shader blocks in ${MENU_SHADER_FILE}.`)
  }

  rewritten += [
    '',
    'menubackRagePro',
    '{',
    '  nopicmip',
    '  {',
    `    clampmap ${imagePath}`,
    '    rgbGen identity',
    '  }',
    '}',
    '',
  ].join('\n')
  return { ok: true, value: rewritten }
}

/**
 * An explicit image wins; otherwise look for `background.<ext>` in the mod's
 * main-menu asset directory.
 */
export async function resolveMainMenuImage(explicit: string | undefined, assetsDir: string): Promise<string | null> {
  if (explicit) return explicit
  for (const ext of MAINMENU_EXTENSIONS) {
    const candidate = join(assetsDir, `background.${ext}`)
    if (await fileExists(candidate)) return candidate
  }
  return null
}

export async function findShaderPackage(ctx: PipelineContext, profileDir: string): Promise<string | null> {
  const all = (await listFiles(profileDir)).filter(f => f.endsWith('.pk3'))
  const ordered = [
    ...PREFERRED_SHADER_PACKAGES.filter(p => all.includes(p)),
    ...all.filter(p => !PREFERRED_SHADER_PACKAGES.includes(p)),
  ]

  for (const pk3 of ordered) {
    const path = join(profileDir, pk3)
    const listing = await ctx.runner.run('unzip', ['-l', path, MENU_SHADER_FILE])
    if (listing.code === 0) return path
  }
  return null
}

/**
 * Stage a custom main-menu background into the mod build. Returns the source
 * image used, or null when the mod has none.
 */
export async function injectMainMenuBackground(
  ctx: PipelineContext,
  explicitImage: string | undefined,
  paths: ModPaths,
  baseProfileDir: string,
): Promise<Result<string | null, PipelineError>> {
  const sourceImage = await resolveMainMenuImage(explicitImage, paths.mainMenuAssetsDir)
  if (!sourceImage) return { ok: true, value: null }

  const ext = imageExtension(sourceImage)
  if (!MAINMENU_EXTENSIONS.includes(ext)) {
    return pipelineError('usage', `unsupported main menu image format '${ext}'. Use .jpg, .jpeg, .png, or .tga.`)
  }

  const shaderImagePath = `gfx/arenaforge/mainmenu_background.${ext}`
  await mkdir(join(paths.buildDir, 'gfx', 'arenaforge'), { recursive: true })
  await mkdir(join(paths.buildDir, 'scripts'), { recursive: true })
  await cp(sourceImage, join(paths.buildDir, shaderImagePath))

  const sourcePackage = await findShaderPackage(ctx, baseProfileDir)
  if (!sourcePackage) {
    return pipelineError('artifact', `could not locate ${MENU_SHADER_FILE} in ${basename(baseProfileDir)} pk3 assets.`)
  }

  const extracted = await ctx.runner.run('unzip', ['-p', sourcePackage, MENU_SHADER_FILE])
  if (extracted.code !== 0) {
    return pipelineError('artifact', `unable to read ${MENU_SHADER_FILE} from ${sourcePackage}`)
  }

  const rewritten = rewriteMenuShaders(extracted.stdout, shaderImagePath)
  if (!rewritten.ok) return rewritten
  await writeFile(join(paths.buildDir, MENU_SHADER_FILE), rewritten.value)

  return { ok: true, value: sourceImage }
}
