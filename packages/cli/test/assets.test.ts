import { describe, it, expect, afterEach, vi } from 'vitest'
import { readFile, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { acquireAssetArchive, extractAssets } from '../src/lib/assets.js'
import { DEFAULTS } from '../src/lib/config.js'
import { fetchDownloader } from '../src/lib/downloader.js'
import { fileExists } from '../src/lib/fs-utils.js'
import { FakeDownloader, FakeRunner, makeTempDir, testContext, touch, type RecordedCall } from './helpers.js'

const VALID_ZIP = 'PK valid archive'
const primaryUrl = DEFAULTS.assetsPrimaryUrl
const fallbackUrl = DEFAULTS.assetsFallbackUrl

// `unzip -tq` passes only for archives holding the valid marker
async function integrityCheck(call: RecordedCall) {
  const content = await readFile(call.args[1], 'utf-8')
  return { code: content === VALID_ZIP ? 0 : 1 }
}

describe('acquireAssetArchive', () => {
  const dirs: string[] = []

  afterEach(async () => {
    vi.unstubAllGlobals()
    for (const d of dirs) await rm(d, { recursive: true, force: true })
    dirs.length = 0
  })

  async function setup(responses: Record<string, string | null>) {
    const root = await makeTempDir('assets')
    dirs.push(root)
    const runner = new FakeRunner().on('unzip -tq', integrityCheck)
    const downloader = new FakeDownloader(responses)
    const ctx = testContext(root, { runner, downloader })
    return { ctx, downloader, assets: ctx.config.assets }
  }

  it('uses a cached archive that passes the integrity check', async () => {
    const { ctx, downloader, assets } = await setup({})
    await touch(assets.archivePath, VALID_ZIP)

    expect(await acquireAssetArchive(ctx)).toEqual({ ok: true, value: 'cache' })
    expect(downloader.requests).toEqual([])
  })

  it('replaces a corrupt cached archive from the primary URL', async () => {
    const { ctx, downloader, assets } = await setup({ [primaryUrl]: VALID_ZIP })
    await touch(assets.archivePath, 'truncated')

    const result = await acquireAssetArchive(ctx)

    expect(result).toEqual({ ok: true, value: 'primary' })
    expect(downloader.requests).toEqual([primaryUrl])
    expect(await readFile(assets.archivePath, 'utf-8')).toBe(VALID_ZIP)
  })

  it('retries the fallback mirror when the primary returns a bad archive', async () => {
    const { ctx, downloader } = await setup({ [primaryUrl]: '<html>mirror page</html>', [fallbackUrl]: VALID_ZIP })

    expect(await acquireAssetArchive(ctx)).toEqual({ ok: true, value: 'fallback' })
    expect(downloader.requests).toEqual([primaryUrl, fallbackUrl])
  })

  it('retries the fallback mirror when the primary is unreachable', async () => {
    const { ctx } = await setup({ [primaryUrl]: null, [fallbackUrl]: VALID_ZIP })

    expect(await acquireAssetArchive(ctx)).toEqual({ ok: true, value: 'fallback' })
  })

  it('retries the fallback mirror when the primary body fails mid-transfer', async () => {
    const root = await makeTempDir('assets')
    dirs.push(root)
    const fetchMock = vi.fn(async (url: string) => url === primaryUrl
      ? { ok: true, status: 200, arrayBuffer: async () => { throw new Error('ECONNRESET') } }
      : new Response(VALID_ZIP, { status: 200 }))
    vi.stubGlobal('fetch', fetchMock)
    const runner = new FakeRunner().on('unzip -tq', integrityCheck)
    const ctx = { ...testContext(root, { runner }), downloader: fetchDownloader }

    const result = await acquireAssetArchive(ctx)

    expect(result).toEqual({ ok: true, value: 'fallback' })
    expect(fetchMock.mock.calls.map(call => call[0])).toEqual([primaryUrl, fallbackUrl])
    expect(ctx.logs).toContain(`Download of ${primaryUrl} failed: Error: ECONNRESET`)
    expect(await readFile(ctx.config.assets.archivePath, 'utf-8')).toBe(VALID_ZIP)
  })

  it('gives up after two attempts', async () => {
    const { ctx, downloader } = await setup({ [primaryUrl]: '<html></html>', [fallbackUrl]: '<html></html>' })

    const result = await acquireAssetArchive(ctx)

    expect(result).toEqual({
      ok: false,
      error: { kind: 'acquisition', message: 'unable to fetch a valid OpenArena 0.8.8 zip archive.' },
    })
    expect(downloader.requests).toHaveLength(2)
  })
})

describe('extractAssets', () => {
  const dirs: string[] = []

  afterEach(async () => {
    for (const d of dirs) await rm(d, { recursive: true, force: true })
    dirs.length = 0
  })

  async function setup(files: string[]) {
    const root = await makeTempDir('extract')
    dirs.push(root)
    const ctx = testContext(root)
    const runner = new FakeRunner().on('unzip -q', async () => {
      for (const file of files) await touch(join(ctx.config.assets.extractDir, file))
    })
    return { ...ctx, runner }
  }

  it('finds the base profile and its packages', async () => {
    const ctx = await setup(['openarena-0.8.8/baseoa/pak0.pk3', 'openarena-0.8.8/baseoa/pak1-maps.pk3', 'openarena-0.8.8/baseoa/readme.txt'])
    const stale = join(ctx.config.assets.extractDir, 'stale.txt')
    await touch(stale)

    const result = await extractAssets(ctx)

    expect(result).toEqual({
      ok: true,
      value: {
        profileDir: join(ctx.config.assets.extractDir, 'openarena-0.8.8', 'baseoa'),
        packages: ['pak0.pk3', 'pak1-maps.pk3'],
      },
    })
    expect(await fileExists(stale)).toBe(false)
  })

  it('fails when the archive has no base profile', async () => {
    const ctx = await setup(['openarena-0.8.8/missionpack/pak0.pk3'])

    const result = await extractAssets(ctx)

    expect(result).toEqual({
      ok: false,
      error: { kind: 'artifact', message: 'baseoa directory not found in extracted OpenArena archive.' },
    })
  })

  it('fails when the base profile holds no packages', async () => {
    const ctx = await setup(['openarena-0.8.8/baseoa/readme.txt'])

    const result = await extractAssets(ctx)

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toContain('no .pk3 files found')
  })
})
