import type { PipelineError, Platform, Result } from 'shared'
import { CleanupRegistry, processCleanup } from './cleanup.js'
import { loadConfigFile, resolvePipelineConfig, type PipelineConfig } from './config.js'
import { fetchDownloader, type Downloader } from './downloader.js'
import { spawnRunner, type ProcessRunner } from './process-runner.js'

/**
 * Everything a pipeline stage needs, passed explicitly instead of living in
 * module-level state.
 */
export interface PipelineContext {
  config: PipelineConfig
  runner: ProcessRunner
  downloader: Downloader
  cleanup: CleanupRegistry
  log: (message: string) => void
  cpuCount?: number
}

export interface PipelineDeps {
  runner: ProcessRunner
  downloader: Downloader
  cleanup: CleanupRegistry
  log: (message: string) => void
  platform: Platform
  cpuCount: number
}

export function pipelineError(kind: PipelineError['kind'], message: string): { ok: false; error: PipelineError } {
  return { ok: false, error: { kind, message } }
}

export async function createContext(
  rootDir: string,
  deps: Partial<PipelineDeps> = {},
): Promise<Result<PipelineContext, PipelineError>> {
  const fileResult = await loadConfigFile(rootDir)
  if (!fileResult.ok) {
    const messages = fileResult.error.map(e => `  ${e.path}: ${e.message}`).join('\n')
    return pipelineError('usage', `Invalid configuration:\n${messages}`)
  }

  return {
    ok: true,
    value: {
      config: resolvePipelineConfig(rootDir, fileResult.value, deps.platform),
      runner: deps.runner ?? spawnRunner,
      downloader: deps.downloader ?? fetchDownloader,
      cleanup: deps.cleanup ?? processCleanup,
      log: deps.log ?? ((message) => console.error(message)),
      cpuCount: deps.cpuCount,
    },
  }
}
