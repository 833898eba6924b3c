import { readFile, writeFile } from 'node:fs/promises'
import type { CvarDirective } from 'shared'
import { fileExists } from './fs-utils.js'

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function directivePattern(key: string): RegExp {
  return new RegExp(`^\\s*(?:seta|set)\\s+${escapeRegExp(key)}(?:\\s|$)`)
}

export function formatDirective(directive: CvarDirective): string {
  return `${directive.verb} ${directive.key} "${directive.value}"`
}

export function parseDirective(line: string): CvarDirective | null {
  const match = line.match(/^(seta|set)\s+(\S+)\s+(?:"([^"]*)"|(\S+))\s*$/)
  if (!match) return null
  return {
    verb: match[1] === 'seta' ? 'seta' : 'set',
    key: match[2],
    value: match[3] ?? match[4],
  }
}

/**
 * Rewrite the first `set`/`seta` line for `key` in place, drop any later
 * lines for the same key, and append when there is none. Lines are matched
 * on verb and key alone, so indentation, trailing comments or a missing
 * value still count as the key's directive.
 */
export function upsertCvar(content: string, key: string, value: string): string {
  const pattern = directivePattern(key)
  const line = formatDirective({ verb: 'seta', key, value })
  const lines = content.split('\n')

  let replaced = false
  const out: string[] = []
  for (const existing of lines) {
    if (!pattern.test(existing.replace(/\r$/, ''))) {
      out.push(existing)
      continue
    }
    if (!replaced) {
      out.push(line)
      replaced = true
    }
  }

  if (replaced) return out.join('\n')

  const separator = content.length === 0 || content.endsWith('\n') ? '' : '\n'
  return `${content}${separator}${line}\n`
}

export function readDirectives(content: string): CvarDirective[] {
  return content
    .split('\n')
    .map(l => parseDirective(l.replace(/\r$/, '')))
    .filter((d): d is CvarDirective => d !== null)
}

export async function upsertCvarFile(filePath: string, values: [string, string][]): Promise<void> {
  let content = (await fileExists(filePath)) ? await readFile(filePath, 'utf-8') : ''
  for (const [key, value] of values) {
    content = upsertCvar(content, key, value)
  }
  await writeFile(filePath, content)
}
