import { mkdir, mkdtemp, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { tmpdir } from 'node:os'
import type { Platform, Result } from 'shared'
import { CleanupRegistry } from '../src/lib/cleanup.js'
import { resolvePipelineConfig } from '../src/lib/config.js'
import type { PipelineContext, PipelineDeps } from '../src/lib/context.js'
import type { Downloader } from '../src/lib/downloader.js'
import type { ProcessRunner, RunOptions, RunResult } from '../src/lib/process-runner.js'

export interface RecordedCall {
  command: string
  args: string[]
  options: RunOptions
  line: string
}

type Reply = Partial<RunResult> | void
type Handler = (call: RecordedCall) => Reply | Promise<Reply>

/**
 * Records every invocation and answers from rules matched by command-line
 * prefix. Later rules win; unmatched calls exit 0 with no output.
 */
export class FakeRunner implements ProcessRunner {
  readonly calls: RecordedCall[] = []
  private rules: { prefix: string; handler: Handler }[] = []

  on(prefix: string, reply: Handler | Partial<RunResult> = {}): this {
    const handler: Handler = typeof reply === 'function' ? reply : () => reply
    this.rules.unshift({ prefix, handler })
    return this
  }

  withTools(...names: string[]): this {
    return this.on('sh -c command -v ', (call) => {
      const name = call.args[1].slice('command -v '.length)
      return names.includes(name) ? { stdout: `/usr/bin/${name}\n` } : { code: 1 }
    })
  }

  async run(command: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
    const line = [command, ...args].join(' ')
    const call = { command, args, options, line }
    this.calls.push(call)

    const rule = this.rules.find(r => line.startsWith(r.prefix))
    const reply = rule ? await rule.handler(call) : undefined
    const extra = typeof reply === 'object' ? reply : {}
    const result: RunResult = { code: 0, stdout: '', stderr: '', ...extra }

    if (options.logFile) {
      await writeFile(options.logFile, result.stdout + result.stderr)
    }
    return result
  }

  lines(): string[] {
    return this.calls.map(c => c.line)
  }
}

export class FakeDownloader implements Downloader {
  readonly requests: string[] = []

  constructor(private responses: Record<string, string | null> = {}) {}

  async download(url: string, destination: string): Promise<Result<void, string>> {
    this.requests.push(url)
    const body = this.responses[url]
    if (body === undefined || body === null) {
      return { ok: false, error: `unreachable: ${url}` }
    }
    await mkdir(dirname(destination), { recursive: true })
    await writeFile(destination, body)
    return { ok: true, value: undefined }
  }
}

export interface TestContext extends PipelineContext {
  logs: string[]
}

export function testContext(
  rootDir: string,
  deps: { runner?: FakeRunner; downloader?: FakeDownloader; platform?: Platform } = {},
): TestContext {
  const logs: string[] = []
  return {
    config: resolvePipelineConfig(rootDir, {}, deps.platform ?? 'linux'),
    runner: deps.runner ?? new FakeRunner(),
    downloader: deps.downloader ?? new FakeDownloader(),
    cleanup: new CleanupRegistry(),
    log: (message) => logs.push(message),
    cpuCount: 8,
    logs,
  }
}

export function testDeps(runner: FakeRunner, downloader: FakeDownloader = new FakeDownloader()): Partial<PipelineDeps> & { logs: string[] } {
  const logs: string[] = []
  return {
    runner,
    downloader,
    platform: 'linux',
    cleanup: new CleanupRegistry(),
    cpuCount: 4,
    log: (message) => logs.push(message),
    logs,
  }
}

export function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `arenaforge-${prefix}-`))
}

export async function touch(path: string, content = ''): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, content)
}
