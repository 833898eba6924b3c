import { describe, it, expect, afterEach } from 'vitest'
import { mkdir, readFile, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { generateModCommand } from '../src/commands/generate-mod.js'
import { fileExists } from '../src/lib/fs-utils.js'
import { readPatchTemplate } from '../src/lib/mod.js'
import { FakeRunner, makeTempDir, testDeps, touch } from './helpers.js'

const MENU_SHADER = 'menuback\n{\n\t{\n\t\tmap menu/art/menuback.tga\n\t}\n}\n'

/**
 * A finished base build plus fakes for the worktree, the qagame compile and
 * zip. `qvmContent` is what the compiler "produces".
 */
async function setupProject(root: string, qvmContent = 'code\0baseoa-1\0data'): Promise<FakeRunner> {
  const engineDir = join(root, 'quake_engine')
  await touch(join(root, 'ArenaForge_Build', 'play.sh'))
  await touch(join(root, 'ArenaForge_Build', 'baseoa', 'pak0.pk3'))
  await mkdir(join(engineDir, '.git'), { recursive: true })

  return new FakeRunner()
    .withTools('git', 'tar', 'unzip', 'zip', 'cmake')
    .on('/usr/bin/cmake --version', { stdout: 'cmake version 3.31.6\n' })
    .on(`git -C ${engineDir} worktree add`, async (call) => {
      await mkdir(call.args[call.args.length - 1], { recursive: true })
    })
    .on('/usr/bin/cmake --build', async (call) => {
      await touch(join(call.args[1], 'Release', 'baseq3', 'vm', 'qagame.qvm'), qvmContent)
    })
    .on('unzip -p', { stdout: MENU_SHADER })
    .on('zip -q -r', async (call) => { await touch(call.args[2], 'PK') })
}

describe('generate-mod', () => {
  const dirs: string[] = []

  afterEach(async () => {
    for (const d of dirs) await rm(d, { recursive: true, force: true })
    dirs.length = 0
  })

  async function setupRoot(): Promise<string> {
    const root = await makeTempDir('genmod')
    dirs.push(root)
    return root
  }

  it('builds, packages and wires up a debug-visible mod', async () => {
    const root = await setupRoot()
    const runner = await setupProject(root)
    const dist = join(root, 'ArenaForge_Build')
    const modDir = join(root, 'mods', 'demo_mod')

    const result = await generateModCommand('demo_mod', { root, variant: 'debug-visible' }, testDeps(runner))

    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value.spec).toEqual({ name: 'demo_mod', variant: 'debug-visible' })
      expect(result.value.packageFile).toBe(join(dist, 'demo_mod', 'z_demo_mod.pk3'))
      expect(result.value.launcher).toBe(join(dist, 'run_demo_mod.sh'))
      expect(result.value.mainMenuImage).toBeNull()
    }

    expect(await readFile(join(modDir, 'patches', 'rocket_bounce_twice.patch'), 'utf-8'))
      .toBe(await readPatchTemplate('debug-visible'))
    expect(await readFile(join(modDir, 'build', 'vm', 'qagame.qvm'), 'utf-8')).toBe('code\0baseoa-1\0data')
    expect(await fileExists(join(dist, 'demo_mod', 'z_demo_mod.pk3'))).toBe(true)

    const launcher = await readFile(join(dist, 'run_demo_mod.sh'), 'utf-8')
    expect(launcher).toContain('  +set fs_game "demo_mod" \\\n')
    expect(launcher).toContain('  +set vm_game 2 \\\n')
  })

  it('compiles in a disposable worktree that is gone afterwards', async () => {
    const root = await setupRoot()
    const runner = await setupProject(root)
    const tmpRoot = join(root, '.tmp', `modgen-demo_mod-${process.pid}`)
    const engineDir = join(root, 'quake_engine')

    await generateModCommand('demo_mod', { root }, testDeps(runner))

    expect(runner.lines()).toContain(`git -C ${join(tmpRoot, 'engine')} apply ${join(root, 'mods', 'demo_mod', 'patches', 'rocket_bounce_twice.patch')}`)
    expect(runner.lines()).toContain(`git -C ${engineDir} worktree remove --force ${join(tmpRoot, 'engine')}`)
    expect(await fileExists(tmpRoot)).toBe(false)
  })

  it('zips from inside the staging directory', async () => {
    const root = await setupRoot()
    const runner = await setupProject(root)

    await generateModCommand('demo_mod', { root }, testDeps(runner))

    const zip = runner.calls.find(c => c.command === 'zip')
    expect(zip?.options.cwd).toBe(join(root, 'mods', 'demo_mod', 'build'))
  })

  it('uses the bounce_twice_rockets default name', async () => {
    const root = await setupRoot()
    const runner = await setupProject(root)

    const result = await generateModCommand(undefined, { root }, testDeps(runner))

    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value.spec).toEqual({ name: 'bounce_twice_rockets', variant: 'default' })
  })

  it('injects a main menu background from the mod assets', async () => {
    const root = await setupRoot()
    const runner = await setupProject(root)
    const background = join(root, 'mods', 'demo_mod', 'assets', 'mainmenu', 'background.jpg')
    await touch(background, 'jpeg bytes')

    const result = await generateModCommand('demo_mod', { root }, testDeps(runner))

    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value.mainMenuImage).toBe(background)
    const build = join(root, 'mods', 'demo_mod', 'build')
    expect(await readFile(join(build, 'gfx', 'arenaforge', 'mainmenu_background.jpg'), 'utf-8')).toBe('jpeg bytes')
    expect(await readFile(join(build, 'scripts', 'oanew.shader'), 'utf-8'))
      .toContain('clampmap gfx/arenaforge/mainmenu_background.jpg')
  })

  it('rejects a module without the OpenArena marker and packages nothing', async () => {
    const root = await setupRoot()
    const runner = await setupProject(root, 'code\0baseq3-1\0data')

    const result = await generateModCommand('demo_mod', { root }, testDeps(runner))

    expect(result).toEqual({
      ok: false,
      error: 'generated qagame.qvm does not contain baseoa-1 (OpenArena compatibility marker).',
    })
    expect(await fileExists(join(root, 'ArenaForge_Build', 'demo_mod'))).toBe(false)
    expect(runner.calls.some(c => c.command === 'zip')).toBe(false)
  })

  it.each(['bad name', 'a/b', '../escape', 'semi;colon'])('rejects the name %j before touching anything', async (name) => {
    const root = await setupRoot()
    const runner = await setupProject(root)

    const result = await generateModCommand(name, { root }, testDeps(runner))

    expect(result).toEqual({ ok: false, error: `invalid mod name '${name}'. Use letters, numbers, '_' or '-'.` })
    expect(runner.calls).toEqual([])
    expect(await fileExists(join(root, 'mods'))).toBe(false)
  })

  it('rejects an unknown variant', async () => {
    const root = await setupRoot()
    const runner = await setupProject(root)

    const result = await generateModCommand('demo_mod', { root, variant: 'loud' }, testDeps(runner))

    expect(result).toEqual({ ok: false, error: "invalid variant 'loud'. Use 'default' or 'debug-visible'." })
    expect(runner.calls).toEqual([])
  })

  it('rejects a missing main menu image', async () => {
    const root = await setupRoot()
    const runner = await setupProject(root)

    const result = await generateModCommand('demo_mod', { root, mainmenuImage: join(root, 'missing.png') }, testDeps(runner))

    expect(result).toEqual({ ok: false, error: `--mainmenu-image file not found: ${join(root, 'missing.png')}` })
    expect(runner.calls).toEqual([])
  })

  it('requires the engine checkout when the base install exists', async () => {
    const root = await setupRoot()
    const runner = await setupProject(root)
    await rm(join(root, 'quake_engine'), { recursive: true, force: true })

    const result = await generateModCommand('demo_mod', { root }, testDeps(runner))

    expect(result).toEqual({ ok: false, error: `engine source checkout not found at ${join(root, 'quake_engine')}.` })
  })

  it('reports a patch that does not apply and cleans up', async () => {
    const root = await setupRoot()
    const runner = await setupProject(root)
    const tmpRoot = join(root, '.tmp', `modgen-demo_mod-${process.pid}`)
    runner.on(`git -C ${join(tmpRoot, 'engine')} apply`, { code: 1, stderr: 'error: corrupt patch\n' })

    const result = await generateModCommand('demo_mod', { root }, testDeps(runner))

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error).toContain('does not apply cleanly')
    expect(await fileExists(tmpRoot)).toBe(false)
    expect(runner.lines().some(l => l.startsWith('/usr/bin/cmake -S'))).toBe(false)
  })
})
