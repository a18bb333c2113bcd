import type { Logger } from '../types.js'
import type { OcrPage, OcrResult } from './ocrProvider.js'

// Downstream consumers split on this to recover page boundaries.
export const PAGE_SEPARATOR = '\n\n---\n\n'
export const EMBEDDED_IMAGE_MIME_TYPE = 'image/png'

function replaceImagePlaceholders(markdown: string, dataUrlsById: Map<string, string>): string {
  let updated = markdown
  for (const [id, dataUrl] of dataUrlsById) {
    updated = updated.split(`![${id}](${id})`).join(`![${id}](${dataUrl})`)
  }
  return updated
}

function renderPage(page: OcrPage, embedImages: boolean, logger: Logger): string {
  if (!embedImages || page.images.length === 0) return page.markdown

  const dataUrlsById = new Map<string, string>()
  for (const image of page.images) {
    if (!image.id || !image.imageBase64) {
      logger.warn(`[markdown] image on page ${page.index + 1} is missing its id or base64 payload, skipping`)
      continue
    }
    dataUrlsById.set(image.id, `data:${EMBEDDED_IMAGE_MIME_TYPE};base64,${image.imageBase64}`)
  }
  return replaceImagePlaceholders(page.markdown, dataUrlsById)
}

export function synthesizeMarkdown(result: OcrResult, embedImages: boolean, logger: Logger = console): string {
  if (result.pages.length === 0) return ''

  return [...result.pages]
    .sort((a, b) => a.index - b.index)
    .map((page) => renderPage(page, embedImages, logger))
    .join(PAGE_SEPARATOR)
}
