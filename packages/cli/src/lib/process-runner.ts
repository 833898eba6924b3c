import { spawn } from 'node:child_process'
import { writeFile } from 'node:fs/promises'

export interface RunOptions {
  cwd?: string
  env?: Record<string, string>
  // Combined stdout/stderr is written here once the process exits
  logFile?: string
  // Stream output to the terminal instead of capturing it
  inherit?: boolean
}

export interface RunResult {
  code: number
  stdout: string
  stderr: string
}

/**
 * Every external tool (git, cmake, tar, unzip, zip, the built engine) goes
 * through this interface so pipeline logic can be exercised with a fake.
 */
export interface ProcessRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<RunResult>
}

export const spawnRunner: ProcessRunner = {
  run(command, args, options = {}) {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        stdio: options.inherit ? ['ignore', 'inherit', 'inherit'] : ['ignore', 'pipe', 'pipe'],
      })

      let stdout = ''
      let stderr = ''
      let combined = ''
      child.stdout?.on('data', (chunk: Buffer) => {
        const text = chunk.toString('utf-8')
        stdout += text
        combined += text
      })
      child.stderr?.on('data', (chunk: Buffer) => {
        const text = chunk.toString('utf-8')
        stderr += text
        combined += text
      })

      child.on('error', reject)
      child.on('close', (code) => {
        const result = { code: code ?? 1, stdout, stderr }
        if (!options.logFile) {
          resolve(result)
          return
        }
        writeFile(options.logFile, combined).then(() => resolve(result), reject)
      })
    })
  },
}

/**
 * Resolve a command on PATH the way a POSIX shell does.
 */
export async function which(runner: ProcessRunner, command: string): Promise<string | null> {
  const result = await runner.run('sh', ['-c', `command -v ${command}`])
  if (result.code !== 0) return null
  const path = result.stdout.trim().split('\n')[0]
  return path ? path : null
}
