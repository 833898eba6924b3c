import { readFile } from 'node:fs/promises'
import { join, resolve, isAbsolute } from 'node:path'
import { platform as osPlatform } from 'node:os'
import { Ajv } from 'ajv'
import { parse as parseYaml } from 'yaml'
import { arenaForgeConfigSchema } from 'shared'
import type { ArenaForgeConfigFile, AssetSource, Platform, Result, ToolchainSpec, ValidationError } from 'shared'
import { fileExists } from './fs-utils.js'

export const CONFIG_FILE = 'arenaforge.yaml'

const ajv = new Ajv({ allErrors: true })
const validateConfig = ajv.compile<ArenaForgeConfigFile>(arenaForgeConfigSchema)

export const DEFAULTS = {
  engineRepository: 'https://github.com/ioquake/ioq3.git',
  engineDirectory: 'quake_engine',
  toolchainMinimum: '3.25',
  toolchainPinned: '3.31.6',
  assetsVersion: '0.8.8',
  assetsPrimaryUrl: 'https://sourceforge.net/projects/oarena/files/openarena-0.8.8.zip/download',
  assetsFallbackUrl: 'https://downloads.sourceforge.net/project/oarena/openarena-0.8.8.zip',
  distDirectory: 'ArenaForge_Build',
  hunkMegs: 256,
} as const

export const BASE_PROFILE = 'baseoa'

export interface PipelineConfig {
  platform: Platform
  rootDir: string
  engineRepository: string
  engineDir: string
  engineBuildDir: string
  distDir: string
  toolsDir: string
  tmpDir: string
  modsDir: string
  clientLog: string
  dedicatedLog: string
  hunkMegs: number
  toolchain: ToolchainSpec
  assets: AssetSource
}

export function detectPlatform(): Platform {
  return osPlatform() === 'darwin' ? 'macos' : 'linux'
}

/**
 * Load `arenaforge.yaml` from the project root. A missing file is not an
 * error: every field has a default.
 */
export async function loadConfigFile(rootDir: string): Promise<Result<ArenaForgeConfigFile, ValidationError[]>> {
  const configPath = join(rootDir, CONFIG_FILE)
  if (!(await fileExists(configPath))) {
    return { ok: true, value: {} }
  }

  let parsed: unknown
  try {
    parsed = parseYaml(await readFile(configPath, 'utf-8'))
  } catch (error) {
    return { ok: false, error: [{ path: CONFIG_FILE, message: `Failed to parse ${CONFIG_FILE}: ${error}` }] }
  }

  // An empty file parses to null
  if (parsed === null || parsed === undefined) {
    return { ok: true, value: {} }
  }

  if (!validateConfig(parsed)) {
    const schemaErrors = (validateConfig.errors ?? []).map(e => ({
      path: `${CONFIG_FILE}${e.instancePath}`,
      message: e.message ?? 'Unknown validation error',
    }))
    return { ok: false, error: schemaErrors }
  }

  return { ok: true, value: parsed }
}

function parseMinimum(minimum: string): { major: number; minor: number } {
  const [major, minor] = minimum.split('.').map(n => parseInt(n, 10))
  return { major, minor }
}

export function resolvePipelineConfig(
  rootDir: string,
  file: ArenaForgeConfigFile = {},
  platform: Platform = detectPlatform(),
): PipelineConfig {
  const root = resolve(rootDir)
  const inRoot = (p: string) => (isAbsolute(p) ? p : join(root, p))

  const engineDir = inRoot(file.engine?.directory ?? DEFAULTS.engineDirectory)
  const assetsVersion = file.assets?.version ?? DEFAULTS.assetsVersion

  return {
    platform,
    rootDir: root,
    engineRepository: file.engine?.repository ?? DEFAULTS.engineRepository,
    engineDir,
    engineBuildDir: join(engineDir, `build-${platform}`),
    distDir: inRoot(file.dist?.directory ?? DEFAULTS.distDirectory),
    toolsDir: join(root, '.tools'),
    tmpDir: join(root, '.tmp'),
    modsDir: join(root, 'mods'),
    clientLog: join(root, 'verify_client.log'),
    dedicatedLog: join(root, 'verify_dedicated.log'),
    hunkMegs: file.dist?.hunkMegs ?? DEFAULTS.hunkMegs,
    toolchain: {
      command: 'cmake',
      minimum: parseMinimum(file.toolchain?.minimum ?? DEFAULTS.toolchainMinimum),
      pinnedVersion: file.toolchain?.pinnedVersion ?? DEFAULTS.toolchainPinned,
    },
    assets: {
      name: 'OpenArena',
      version: assetsVersion,
      primaryUrl: file.assets?.primaryUrl ?? DEFAULTS.assetsPrimaryUrl,
      fallbackUrl: file.assets?.fallbackUrl ?? DEFAULTS.assetsFallbackUrl,
      archivePath: join(root, `openarena-${assetsVersion}.zip`),
      extractDir: join(root, `openarena_${assetsVersion}`),
      profileDirName: BASE_PROFILE,
      packageExtension: '.pk3',
    },
  }
}
