import { mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { Result } from 'shared'

export interface Downloader {
  download(url: string, destination: string): Promise<Result<void, string>>
}

export const fetchDownloader: Downloader = {
  async download(url, destination) {
    let res: Response
    try {
      res = await fetch(url, { redirect: 'follow' })
    } catch (error) {
      return { ok: false, error: `Request to ${url} failed: ${error}` }
    }
    if (!res.ok) {
      return { ok: false, error: `Download failed: ${res.status} from ${url}` }
    }

    try {
      const buffer = Buffer.from(await res.arrayBuffer())
      await mkdir(dirname(destination), { recursive: true })
      await writeFile(destination, buffer)
    } catch (error) {
      return { ok: false, error: `Download of ${url} failed: ${error}` }
    }
    return { ok: true, value: undefined }
  },
}
