import { join } from 'node:path'
import { mkdir, rm } from 'node:fs/promises'
import type { PipelineError, Result } from 'shared'
import { pipelineError, type PipelineContext } from './context.js'
import { fileExists } from './fs-utils.js'

export async function hasCheckout(engineDir: string): Promise<boolean> {
  return fileExists(join(engineDir, '.git'))
}

/**
 * Reuse the engine checkout when its `.git` metadata is present, otherwise
 * clone it.
 */
export async function ensureCheckout(ctx: PipelineContext): Promise<Result<{ reused: boolean }, PipelineError>> {
  const { engineDir, engineRepository } = ctx.config
  if (await hasCheckout(engineDir)) {
    ctx.log(`Using existing engine checkout at ${engineDir}`)
    return { ok: true, value: { reused: true } }
  }

  ctx.log('Cloning ioquake3 source...')
  const clone = await ctx.runner.run('git', ['clone', engineRepository, engineDir], { inherit: true })
  if (clone.code !== 0) {
    return pipelineError('environment', `git clone of ${engineRepository} failed with exit code ${clone.code}`)
  }
  return { ok: true, value: { reused: false } }
}

export async function engineRevision(ctx: PipelineContext): Promise<string> {
  const result = await ctx.runner.run('git', ['-C', ctx.config.engineDir, 'rev-parse', '--short', 'HEAD'])
  return result.code === 0 ? result.stdout.trim() : 'unknown'
}

/**
 * Run `fn` inside a detached linked worktree of the engine checkout with one
 * patch applied. The worktree is removed on every exit path; the teardown is
 * registered with the cleanup registry as soon as the worktree exists so a
 * signal mid-build still removes it.
 */
export async function withDisposableWorktree<T>(
  ctx: PipelineContext,
  label: string,
  patchFile: string,
  fn: (worktreeDir: string) => Promise<Result<T, PipelineError>>,
): Promise<Result<T, PipelineError>> {
  const { engineDir, tmpDir } = ctx.config
  const tmpRoot = join(tmpDir, `modgen-${label}-${process.pid}`)
  const worktreeDir = join(tmpRoot, 'engine')
  let worktreeAdded = false

  const teardown = async () => {
    if (worktreeAdded) {
      const removal = await ctx.runner.run('git', ['-C', engineDir, 'worktree', 'remove', '--force', worktreeDir])
      if (removal.code !== 0) {
        ctx.log(`Warning: git worktree remove failed for ${worktreeDir}; pruning`)
        await ctx.runner.run('git', ['-C', engineDir, 'worktree', 'prune'])
      }
      worktreeAdded = false
    }
    await rm(tmpRoot, { recursive: true, force: true })
  }
  const unregister = ctx.cleanup.register(teardown)

  try {
    await mkdir(tmpRoot, { recursive: true })
    const add = await ctx.runner.run('git', ['-C', engineDir, 'worktree', 'add', '--detach', worktreeDir])
    if (add.code !== 0) {
      return pipelineError('build', `git worktree add failed: ${add.stderr.trim()}`)
    }
    worktreeAdded = true

    const apply = await ctx.runner.run('git', ['-C', worktreeDir, 'apply', patchFile])
    if (apply.code !== 0) {
      return pipelineError('build', `patch ${patchFile} does not apply cleanly to the engine source: ${apply.stderr.trim()}`)
    }

    return await fn(worktreeDir)
  } finally {
    unregister()
    await teardown()
  }
}
