export type CleanupTask = () => Promise<void>

export interface SignalSource {
  once(signal: NodeJS.Signals, listener: () => void): unknown
  exit(code: number): void
}

const SIGNAL_EXIT_CODES = [
  ['SIGINT', 130],
  ['SIGTERM', 143],
] as const

/**
 * Teardown hooks that must run on every exit path. Scoped resources register
 * here when acquired and unregister once their own `finally` has run, so a
 * signal arriving mid-stage still tears them down.
 */
export class CleanupRegistry {
  private tasks = new Map<number, CleanupTask>()
  private nextId = 0
  private bound = false

  register(task: CleanupTask): () => void {
    const id = this.nextId++
    this.tasks.set(id, task)
    return () => {
      this.tasks.delete(id)
    }
  }

  get size(): number {
    return this.tasks.size
  }

  async runAll(): Promise<string[]> {
    const failures: string[] = []
    const pending = [...this.tasks.values()].reverse()
    this.tasks.clear()
    for (const task of pending) {
      try {
        await task()
      } catch (error) {
        failures.push(String(error))
      }
    }
    return failures
  }

  bindToProcess(proc: SignalSource = process): void {
    if (this.bound) return
    this.bound = true
    for (const [signal, code] of SIGNAL_EXIT_CODES) {
      proc.once(signal, () => {
        this.runAll().then(
          (failures) => {
            for (const failure of failures) console.error(`Cleanup failed: ${failure}`)
            proc.exit(code)
          },
          () => proc.exit(code),
        )
      })
    }
  }
}

export const processCleanup = new CleanupRegistry()
