/**
 * Attachment Resolver
 * Classifies attachments by file extension and downloads the supported ones
 */

import { BotError, fail, ok, type AttachmentData, type AttachmentRef, type Result } from '../types.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('attachments')

const IMAGE_EXTENSIONS = ['png', 'jpeg', 'jpg', 'heic', 'webp', 'heif']
const AUDIO_EXTENSIONS = ['wav', 'mp3', 'aiff', 'aac', 'ogg', 'flac']
const TEXT_EXTENSIONS = ['html', 'css', 'md', 'csv', 'xml', 'rtf']
const APPLICATION_TYPES: Record<string, string> = {
  pdf: 'application/pdf',
  js: 'application/x-javascript',
  py: 'application/x-python',
}

export type Fetcher = (url: string) => Promise<Response>

/**
 * Content type for a file name, or null when the extension is not on the
 * allow-list. Case-insensitive.
 */
export function classifyAttachment(filename: string): string | null {
  const dot = filename.lastIndexOf('.')
  if (dot === -1) {
    return null
  }
  const ext = filename.slice(dot + 1).toLowerCase()

  if (IMAGE_EXTENSIONS.includes(ext)) return `image/${ext}`
  if (AUDIO_EXTENSIONS.includes(ext)) return `audio/${ext}`
  if (TEXT_EXTENSIONS.includes(ext)) return `text/${ext}`
  return Object.hasOwn(APPLICATION_TYPES, ext) ? (APPLICATION_TYPES[ext] ?? null) : null
}

/**
 * Download every supported attachment, in order. Unsupported ones are skipped
 * without an error, so an all-unsupported batch yields an empty list. Any
 * failed download fails the whole batch and nothing is returned.
 */
export async function fetchAttachments(
  refs: readonly AttachmentRef[],
  fetcher: Fetcher = fetch
): Promise<Result<AttachmentData[]>> {
  const results: AttachmentData[] = []

  for (const ref of refs) {
    const contentType = classifyAttachment(ref.filename)
    if (!contentType) {
      logger.debug({ filename: ref.filename }, 'Skipping unsupported attachment')
      continue
    }

    let data: Buffer
    try {
      const response = await fetcher(ref.url)
      if (response.ok) {
        data = Buffer.from(await response.arrayBuffer())
      } else {
        logger.warn({ status: response.status, url: ref.url }, 'Attachment download failed')
        return fail(new BotError('transport', `Failed to download ${ref.filename}: HTTP ${response.status}`, {
          url: ref.url,
          filename: ref.filename,
          status: response.status,
        }))
      }
    } catch (error) {
      return fail(new BotError('transport', `Failed to download ${ref.filename}`, {
        url: ref.url,
        filename: ref.filename,
      }, { cause: error }))
    }

    results.push({ contentType, data })
  }

  return ok(results)
}
