import { readFile } from 'node:fs/promises'
import { BASE_PROFILE } from './config.js'
import type { PipelineContext } from './context.js'
import type { Distribution } from './distribution.js'
import { fileExists } from './fs-utils.js'
import { FORCE_DIRECT_ENV } from './launcher.js'
import type { RunOptions } from './process-runner.js'

export const CLIENT_QUIT_MARKER = 'Client Shutdown (Client quit)'

export type VerificationMode = 'client' | 'dedicated' | 'none'

export interface VerificationOutcome {
  mode: VerificationMode
  clientLog: string
  dedicatedLog?: string
}

async function runLogged(
  ctx: PipelineContext,
  command: string,
  args: string[],
  options: RunOptions,
): Promise<number> {
  try {
    const result = await ctx.runner.run(command, args, options)
    return result.code
  } catch (error) {
    ctx.log(`Could not start ${command}: ${error}`)
    return -1
  }
}

async function logContains(path: string, marker: string): Promise<boolean> {
  if (!(await fileExists(path))) return false
  const content = await readFile(path, 'utf-8')
  return content.includes(marker)
}

/**
 * Smoke-test the assembled install: a client `+quit` run, falling back to
 * the dedicated server when the client cannot finish (no display or audio).
 * Never throws; the caller decides whether `mode: 'none'` is fatal.
 */
export async function verifyDistribution(ctx: PipelineContext, dist: Distribution): Promise<VerificationOutcome> {
  const { clientLog, dedicatedLog } = ctx.config

  ctx.log('Running client dry-run verification...')
  await runLogged(ctx, dist.launcher, ['+quit'], {
    cwd: dist.distDir,
    logFile: clientLog,
    env: { [FORCE_DIRECT_ENV]: '1' },
  })
  if (await logContains(clientLog, CLIENT_QUIT_MARKER)) {
    ctx.log('Client verification passed (clean +quit).')
    return { mode: 'client', clientLog }
  }

  ctx.log('Client did not complete clean +quit; running dedicated fallback verification...')
  const code = await runLogged(ctx, dist.server, [
    '+set', 'net_enabled', '0',
    '+set', 'fs_basepath', dist.distDir,
    '+set', 'fs_homepath', dist.distDir,
    '+set', 'com_basegame', BASE_PROFILE,
    '+set', 'fs_game', BASE_PROFILE,
    '+quit',
  ], { cwd: dist.distDir, logFile: dedicatedLog })

  return { mode: code === 0 ? 'dedicated' : 'none', clientLog, dedicatedLog }
}
