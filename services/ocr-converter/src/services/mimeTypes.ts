import path from 'path'
import mime from 'mime-types'

export const DEFAULT_IMAGE_MIME_TYPE = 'image/jpeg'

const IMAGE_MIME_BY_EXTENSION: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp'
}

export type MimeLookup = (fileName: string) => string | false

export function resolveImageMimeType(fileName: string, lookup: MimeLookup = mime.lookup): string {
  const guessed = lookup(fileName)
  if (guessed) return guessed

  const extension = path.extname(fileName).toLowerCase()
  return IMAGE_MIME_BY_EXTENSION[extension] || DEFAULT_IMAGE_MIME_TYPE
}

export function buildDataUrl(mimeType: string, content: Buffer): string {
  return `data:${mimeType};base64,${content.toString('base64')}`
}
