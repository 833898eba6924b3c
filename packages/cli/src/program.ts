import { Command } from 'commander'
import { buildCommand } from './commands/build.js'
import { generateModCommand } from './commands/generate-mod.js'
import { setVideoDefaultsCommand } from './commands/video-defaults.js'
import { enableHighFidelityCommand, disableHighFidelityCommand } from './commands/high-fidelity.js'
import { processCleanup } from './lib/cleanup.js'

/**
 * The arenaforge command tree. Positional arguments beyond the ones a command
 * declares are rejected rather than ignored.
 */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('arenaforge')
    .description('Build a portable ioquake3 + OpenArena install and generate gameplay mods')
    .version('0.1.0')
    .option('--root <dir>', 'Project root holding the engine checkout, mods and dist directory')
    .allowExcessArguments(false)

  function rootOption(): string | undefined {
    const { root } = program.opts<{ root?: string }>()
    return root
  }

  async function finish(result: { ok: true } | { ok: false; error: string }): Promise<void> {
    const failures = await processCleanup.runAll()
    for (const failure of failures) console.error(`Cleanup failed: ${failure}`)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  }

  program
    .command('build')
    .description('Compile the engine, fetch assets and assemble the distribution')
    .option('--strict-verify', 'Fail when neither the client nor the dedicated server passes the smoke test')
    .action(async (options: { strictVerify?: boolean }) => {
      await finish(await buildCommand({ ...options, root: rootOption() }))
    })

  program
    .command('generate-mod [name]')
    .description('Patch, compile and package a gameplay mod with its own launcher')
    .option('--variant <variant>', 'Patch variant: default or debug-visible')
    .option('--debug-visible', 'Shorthand for --variant debug-visible')
    .option('--mainmenu-image <path>', 'Main menu background image (.jpg, .jpeg, .png, .tga)')
    .action(async (name: string | undefined, options: { variant?: string; debugVisible?: boolean; mainmenuImage?: string }) => {
      await finish(await generateModCommand(name, { ...options, root: rootOption() }))
    })

  program
    .command('set-video-defaults')
    .description('Upsert display cvars into q3config.cfg of every profile')
    .option('--dist <path>', 'Distribution directory')
    .option('--mode <value>', 'r_mode value', '-2')
    .option('--fullscreen <0|1>', 'r_fullscreen value', '1')
    .option('--noborder <0|1>', 'r_noborder value', '0')
    .option('--width <pixels>', 'r_customwidth value (requires --height)')
    .option('--height <pixels>', 'r_customheight value (requires --width)')
    .option('--include-all', 'Include every subdirectory under dist (unsafe)')
    .action(async (options: {
      dist?: string
      mode?: string
      fullscreen?: string
      noborder?: string
      width?: string
      height?: string
      includeAll?: boolean
    }) => {
      await finish(await setVideoDefaultsCommand({ ...options, root: rootOption() }))
    })

  program
    .command('enable-high-fidelity')
    .description('Write the managed high-fidelity autoexec.cfg into every profile')
    .option('--dist <path>', 'Distribution directory')
    .action(async (options: { dist?: string }) => {
      await finish(await enableHighFidelityCommand({ ...options, root: rootOption() }))
    })

  program
    .command('disable-high-fidelity')
    .description('Remove managed autoexec.cfg files, leaving unmanaged ones alone')
    .option('--dist <path>', 'Distribution directory')
    .action(async (options: { dist?: string }) => {
      await finish(await disableHighFidelityCommand({ ...options, root: rootOption() }))
    })

  return program
}
