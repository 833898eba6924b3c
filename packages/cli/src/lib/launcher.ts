import { chmod, mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { Platform } from 'shared'
import { BASE_PROFILE } from './config.js'

export const FORCE_DIRECT_ENV = 'ARENAFORGE_FORCE_DIRECT'

export interface LaunchFlags {
  hunkMegs: number
  // Mod launchers only
  modName?: string
}

export function clientExecutable(platform: Platform): string {
  return platform === 'macos' ? '"$HERE/ioquake3.app/Contents/MacOS/ioquake3"' : '"$HERE/ioquake3"'
}

export function launchArgs(flags: LaunchFlags): string[] {
  const args = [
    '+set fs_basepath "$HERE"',
    '+set fs_homepath "$HERE"',
    `+set com_basegame ${BASE_PROFILE}`,
    '+set dedicated 0',
  ]
  if (flags.modName !== undefined) {
    // Interpreted bytecode, so a native game library cannot shadow the mod
    args.push('+set vm_game 2')
    args.push(`+set fs_game "${flags.modName}"`)
  }
  args.push(`+set com_hunkMegs ${flags.hunkMegs}`)
  args.push('"$@"')
  return args
}

function execLine(command: string, args: string[]): string {
  return [`exec ${command}`, ...args.map(a => `  ${a}`)].join(' \\\n') + '\n'
}

const HEADER = [
  '#!/usr/bin/env bash',
  'set -euo pipefail',
  'HERE="$(cd "$(dirname "$0")" && pwd)"',
  '',
].join('\n')

export function renderBaseLauncher(platform: Platform, flags: LaunchFlags): string {
  const args = launchArgs({ hunkMegs: flags.hunkMegs })
  let script = HEADER

  if (platform === 'macos') {
    script += [
      '',
      '# Interactive launches open the app bundle so macOS creates a window',
      `if [ -t 0 ] && [ "\${${FORCE_DIRECT_ENV}:-0}" != "1" ] && command -v open >/dev/null 2>&1; then`,
      execLine('open "$HERE/ioquake3.app" --args', args).replace(/^/gm, '  ').trimEnd(),
      'fi',
      '',
      '',
    ].join('\n')
  }

  return script + execLine(clientExecutable(platform), args)
}

export function renderModLauncher(platform: Platform, flags: LaunchFlags & { modName: string }): string {
  return HEADER + execLine(clientExecutable(platform), launchArgs(flags))
}

export async function writeLauncher(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, content)
  await chmod(path, 0o755)
}
