import { cpus } from 'node:os'
import { dirname, join } from 'node:path'
import type { ArtifactPattern, BuildTarget, PipelineError, Platform, Result } from 'shared'
import { pipelineError, type PipelineContext } from './context.js'
import { findFirst, listFiles } from './fs-utils.js'

export const GAME_MODULE_TARGET = 'qagameqvm_baseq3'

export const GAME_MODULE_ARTIFACT: ArtifactPattern = {
  kind: 'file',
  name: 'qagame.qvm',
  pathSuffix: 'baseq3/vm/qagame.qvm',
}

export const SERVER_ARTIFACT: ArtifactPattern = { kind: 'file', name: 'ioq3ded' }

/** Renderer libraries the Linux client loads from its own directory at startup. */
export const RENDERER_PREFIX = 'renderer_'

export function clientArtifact(platform: Platform): ArtifactPattern {
  return platform === 'macos'
    ? { kind: 'directory', name: 'ioquake3.app' }
    : { kind: 'file', name: 'ioquake3' }
}

export function defaultJobCount(cpuCount: number = cpus().length): number {
  return Number.isInteger(cpuCount) && cpuCount > 0 ? cpuCount : 4
}

export async function runCmakeBuild(
  ctx: PipelineContext,
  cmake: string,
  target: BuildTarget,
): Promise<Result<void, PipelineError>> {
  const configure = await ctx.runner.run(
    cmake,
    ['-S', target.sourceDir, '-B', target.buildDir, '-DCMAKE_BUILD_TYPE=Release'],
    { inherit: true },
  )
  if (configure.code !== 0) {
    return pipelineError('build', `configuring ${target.label} failed with exit code ${configure.code}`)
  }

  const jobs = defaultJobCount(ctx.cpuCount)
  const targetArgs = (target.targets ?? []).flatMap(t => ['--target', t])
  ctx.log(`Building ${target.label} with ${jobs} job(s)...`)
  const build = await ctx.runner.run(
    cmake,
    ['--build', target.buildDir, ...targetArgs, `-j${jobs}`],
    { inherit: true },
  )
  if (build.code !== 0) {
    return pipelineError('build', `building ${target.label} failed with exit code ${build.code}`)
  }
  return { ok: true, value: undefined }
}

export async function locateArtifact(buildDir: string, pattern: ArtifactPattern): Promise<string | null> {
  return findFirst(buildDir, { type: pattern.kind, name: pattern.name, pathSuffix: pattern.pathSuffix })
}

async function requireArtifact(target: BuildTarget, pattern: ArtifactPattern): Promise<Result<string, PipelineError>> {
  const found = await locateArtifact(target.buildDir, pattern)
  if (!found) {
    return pipelineError('artifact', `${target.label} build reported success but ${pattern.name} was not produced in ${target.buildDir}`)
  }
  return { ok: true, value: found }
}

export interface EngineArtifacts {
  client: string
  server: string
  renderers: string[]
}

async function locateRenderers(client: string, platform: Platform): Promise<string[]> {
  if (clientArtifact(platform).kind === 'directory') return []
  const dir = dirname(client)
  return (await listFiles(dir)).filter(f => f.startsWith(RENDERER_PREFIX)).map(f => join(dir, f))
}

export async function buildEngine(ctx: PipelineContext, cmake: string): Promise<Result<EngineArtifacts, PipelineError>> {
  const target: BuildTarget = {
    label: 'ioquake3',
    sourceDir: ctx.config.engineDir,
    buildDir: ctx.config.engineBuildDir,
  }
  ctx.log('Configuring ioquake3...')
  const built = await runCmakeBuild(ctx, cmake, target)
  if (!built.ok) return built

  const client = await requireArtifact(target, clientArtifact(ctx.config.platform))
  if (!client.ok) return client
  const server = await requireArtifact(target, SERVER_ARTIFACT)
  if (!server.ok) return server

  const renderers = await locateRenderers(client.value, ctx.config.platform)
  return { ok: true, value: { client: client.value, server: server.value, renderers } }
}

export async function buildGameModule(
  ctx: PipelineContext,
  cmake: string,
  sourceDir: string,
): Promise<Result<string, PipelineError>> {
  const target: BuildTarget = {
    label: 'qagame module',
    sourceDir,
    buildDir: join(sourceDir, 'build-mod'),
    targets: [GAME_MODULE_TARGET],
  }
  const built = await runCmakeBuild(ctx, cmake, target)
  if (!built.ok) return built
  return requireArtifact(target, GAME_MODULE_ARTIFACT)
}
