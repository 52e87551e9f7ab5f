import { describe, it, expect, vi } from 'vitest'
import { classifyAttachment, fetchAttachments, type Fetcher } from './attachments.js'

/** Fetcher serving fixed bodies per URL; unknown URLs get a 404. */
function fakeFetcher(routes: Record<string, { status?: number; body?: string }>): Fetcher {
  return vi.fn(async (url: string) => {
    const route = routes[url]
    if (!route) {
      return new Response('missing', { status: 404 })
    }
    return new Response(route.body ?? '', { status: route.status ?? 200 })
  })
}

describe('classifyAttachment', () => {
  it('maps image extensions case-insensitively', () => {
    expect(classifyAttachment('photo.PNG')).toBe('image/png')
    expect(classifyAttachment('photo.png')).toBe('image/png')
    expect(classifyAttachment('scan.JpEg')).toBe('image/jpeg')
  })

  it('maps audio and text extensions', () => {
    expect(classifyAttachment('voice.mp3')).toBe('audio/mp3')
    expect(classifyAttachment('track.flac')).toBe('audio/flac')
    expect(classifyAttachment('notes.md')).toBe('text/md')
    expect(classifyAttachment('table.csv')).toBe('text/csv')
  })

  it('maps application types to their fixed content types', () => {
    expect(classifyAttachment('paper.pdf')).toBe('application/pdf')
    expect(classifyAttachment('app.js')).toBe('application/x-javascript')
    expect(classifyAttachment('tool.py')).toBe('application/x-python')
  })

  it('uses the last extension only', () => {
    expect(classifyAttachment('archive.tar.pdf')).toBe('application/pdf')
    expect(classifyAttachment('image.png.exe')).toBeNull()
  })

  it('returns null for unknown or missing extensions', () => {
    expect(classifyAttachment('script.exe')).toBeNull()
    expect(classifyAttachment('README')).toBeNull()
    expect(classifyAttachment('anim.gif')).toBeNull()
    expect(classifyAttachment('toString')).toBeNull()
    expect(classifyAttachment('weird.constructor')).toBeNull()
  })
})

describe('fetchAttachments', () => {
  it('downloads supported attachments in order', async () => {
    const fetcher = fakeFetcher({
      'https://cdn.test/a.png': { body: 'png-bytes' },
      'https://cdn.test/b.md': { body: '# notes' },
    })

    const result = await fetchAttachments([
      { url: 'https://cdn.test/a.png', filename: 'a.png' },
      { url: 'https://cdn.test/b.md', filename: 'b.md' },
    ], fetcher)

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.map((a) => a.contentType)).toEqual(['image/png', 'text/md'])
    expect(result.value.map((a) => a.data.toString('utf-8'))).toEqual(['png-bytes', '# notes'])
  })

  it('skips unsupported attachments without fetching them', async () => {
    const fetcher = fakeFetcher({ 'https://cdn.test/a.png': { body: 'png' } })

    const result = await fetchAttachments([
      { url: 'https://cdn.test/run.exe', filename: 'run.exe' },
      { url: 'https://cdn.test/a.png', filename: 'a.png' },
    ], fetcher)

    expect(result.ok && result.value.length).toBe(1)
    expect(fetcher).toHaveBeenCalledTimes(1)
    expect(fetcher).toHaveBeenCalledWith('https://cdn.test/a.png')
  })

  it('returns an empty list when every attachment is unsupported', async () => {
    const fetcher = fakeFetcher({})

    const result = await fetchAttachments([
      { url: 'https://cdn.test/x.exe', filename: 'x.exe' },
      { url: 'https://cdn.test/y.zip', filename: 'y.zip' },
    ], fetcher)

    expect(result).toEqual({ ok: true, value: [] })
    expect(fetcher).not.toHaveBeenCalled()
  })

  it('fails the whole batch when a later download returns an error status', async () => {
    const fetcher = fakeFetcher({
      'https://cdn.test/a.png': { body: 'first' },
      'https://cdn.test/b.png': { status: 503 },
    })

    const result = await fetchAttachments([
      { url: 'https://cdn.test/a.png', filename: 'a.png' },
      { url: 'https://cdn.test/b.png', filename: 'b.png' },
    ], fetcher)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('transport')
    expect(result.error.details).toEqual({
      url: 'https://cdn.test/b.png',
      filename: 'b.png',
      status: 503,
    })
  })

  it('fails the batch when the fetch itself throws', async () => {
    const fetcher: Fetcher = async () => {
      throw new Error('socket hang up')
    }

    const result = await fetchAttachments([{ url: 'https://cdn.test/a.png', filename: 'a.png' }], fetcher)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('transport')
    expect(result.error.cause).toBeInstanceOf(Error)
  })
})
