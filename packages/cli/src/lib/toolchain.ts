import { arch } from 'node:os'
import { join } from 'node:path'
import { mkdir } from 'node:fs/promises'
import type { PipelineError, Platform, Result, ToolchainSpec, ToolVersion } from 'shared'
import { pipelineError, type PipelineContext } from './context.js'
import { fileExists } from './fs-utils.js'
import { which } from './process-runner.js'

export interface PinnedToolchain {
  url: string
  archivePath: string
  installDir: string
  binary: string
}

export function parseToolVersion(output: string): ToolVersion | null {
  const match = output.match(/version\s+(\d+)\.(\d+)(?:\.(\d+))?/)
  if (!match) return null
  return {
    major: parseInt(match[1], 10),
    minor: parseInt(match[2], 10),
    patch: match[3] ? parseInt(match[3], 10) : 0,
  }
}

export function satisfiesMinimum(version: ToolVersion, minimum: ToolchainSpec['minimum']): boolean {
  if (version.major !== minimum.major) return version.major > minimum.major
  return version.minor >= minimum.minor
}

export function pinnedToolchain(spec: ToolchainSpec, platform: Platform, toolsDir: string, cpuArch: string = arch()): PinnedToolchain {
  const v = spec.pinnedVersion
  const name = platform === 'macos'
    ? `cmake-${v}-macos-universal`
    : `cmake-${v}-linux-${cpuArch === 'arm64' ? 'aarch64' : 'x86_64'}`
  const installDir = join(toolsDir, name)
  return {
    url: `https://github.com/Kitware/CMake/releases/download/v${v}/${name}.tar.gz`,
    archivePath: join(toolsDir, `${name}.tar.gz`),
    installDir,
    binary: platform === 'macos'
      ? join(installDir, 'CMake.app', 'Contents', 'bin', 'cmake')
      : join(installDir, 'bin', 'cmake'),
  }
}

async function probeVersion(ctx: PipelineContext, binary: string): Promise<ToolVersion | null> {
  const result = await ctx.runner.run(binary, ['--version'])
  if (result.code !== 0) return null
  return parseToolVersion(result.stdout)
}

/**
 * Fail before any side effect when a required external tool is missing.
 */
export async function requireCommands(ctx: PipelineContext, commands: string[]): Promise<Result<void, PipelineError>> {
  for (const command of commands) {
    if (!(await which(ctx.runner, command))) {
      return pipelineError('environment', `required command '${command}' not found in PATH.`)
    }
  }
  return { ok: true, value: undefined }
}

/**
 * Find a CMake that meets the minimum version: the one on PATH if it is new
 * enough, otherwise a pinned release bootstrapped into the tools directory.
 */
export async function resolveToolchain(ctx: PipelineContext): Promise<Result<string, PipelineError>> {
  const { toolchain, toolsDir, platform } = ctx.config
  const required = `${toolchain.minimum.major}.${toolchain.minimum.minor}`

  const systemBinary = await which(ctx.runner, toolchain.command)
  if (systemBinary) {
    const version = await probeVersion(ctx, systemBinary)
    if (version && satisfiesMinimum(version, toolchain.minimum)) {
      return { ok: true, value: systemBinary }
    }
  }

  const pinned = pinnedToolchain(toolchain, platform, toolsDir)
  await mkdir(toolsDir, { recursive: true })

  if (!(await fileExists(pinned.binary))) {
    ctx.log(`Bootstrapping local CMake ${toolchain.pinnedVersion} into .tools/`)
    const download = await ctx.downloader.download(pinned.url, pinned.archivePath)
    if (!download.ok) {
      return pipelineError('environment', `unable to download CMake ${toolchain.pinnedVersion}: ${download.error}`)
    }
    const extract = await ctx.runner.run('tar', ['-xzf', pinned.archivePath, '-C', toolsDir])
    if (extract.code !== 0) {
      return pipelineError('environment', `unable to extract ${pinned.archivePath}: ${extract.stderr.trim()}`)
    }
  }

  const version = (await fileExists(pinned.binary)) ? await probeVersion(ctx, pinned.binary) : null
  if (!version || !satisfiesMinimum(version, toolchain.minimum)) {
    return pipelineError('environment', `local CMake does not satisfy >= ${required}`)
  }
  return { ok: true, value: pinned.binary }
}
