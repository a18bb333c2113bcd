import { z } from 'zod'
import { MAX_TIMER_DELAY_MS } from '../config.js'
import { ConverterError, describeError } from '../errors.js'

export type OcrProviderConfig = {
  baseUrl: string
  apiKey: string
  model: string
  requestTimeoutMs: number
  signedUrlExpiryHours: number
  fetchImpl?: typeof fetch
}

export type OcrDocumentRef =
  | { type: 'document_url'; url: string }
  | { type: 'image_url'; url: string }

export type OcrPageImage = {
  id: string | null
  imageBase64: string | null
}

export type OcrPage = {
  index: number
  markdown: string
  images: OcrPageImage[]
}

export type OcrResult = {
  pages: OcrPage[]
}

export type OcrProcessOptions = {
  includeImageBase64?: boolean
}

// Remote OCR capabilities. One client is built per run and shared by every file.
export type OcrClient = {
  stage(content: Buffer, fileName: string, purpose: string): Promise<string>
  locate(fileId: string): Promise<string>
  process(document: OcrDocumentRef, options?: OcrProcessOptions): Promise<OcrResult>
  release(fileId: string): Promise<void>
}

const uploadedFileSchema = z.object({
  id: z.string().min(1)
})

const signedUrlSchema = z.object({
  url: z.string().nullish()
})

const ocrImageSchema = z.object({
  id: z.string().nullish(),
  image_base64: z.string().nullish()
})

const ocrPageSchema = z.object({
  index: z.number().int().nonnegative().optional(),
  markdown: z.string(),
  images: z.array(ocrImageSchema).nullish()
})

const ocrResponseSchema = z.object({
  pages: z.array(ocrPageSchema).nullish()
})

type RequestOptions = {
  method: 'GET' | 'POST' | 'DELETE'
  headers?: Record<string, string>
  body?: string | FormData
}

function normalizeBaseUrl(value: string): string {
  return value.endsWith('/') ? value.slice(0, -1) : value
}

function resolveBaseUrl(value: string): string {
  let url: URL
  try {
    url = new URL(String(value || '').trim())
  } catch (error) {
    throw new ConverterError('CLIENT_INIT', `OCR_BASE_URL_INVALID: ${value}`, { cause: error })
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new ConverterError('CLIENT_INIT', `OCR_BASE_URL_INVALID: ${value}`)
  }
  return normalizeBaseUrl(url.toString())
}

function parseResponse<S extends z.ZodTypeAny>(schema: S, value: unknown, code: string): z.infer<S> {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
      .join('; ')
    throw new ConverterError('REMOTE_SERVICE', `${code}: ${issues}`)
  }
  return parsed.data
}

function toOcrResult(body: z.infer<typeof ocrResponseSchema>): OcrResult {
  const pages = (body.pages || []).map((page, position) => ({
    index: page.index ?? position,
    markdown: page.markdown,
    images: (page.images || []).map((image) => ({
      id: image.id || null,
      imageBase64: image.image_base64 || null
    }))
  }))
  return { pages: pages.sort((a, b) => a.index - b.index) }
}

function toDocumentPayload(document: OcrDocumentRef) {
  if (document.type === 'document_url') {
    return { type: 'document_url', document_url: document.url }
  }
  return { type: 'image_url', image_url: document.url }
}

export function createOcrClient(config: OcrProviderConfig): OcrClient {
  const baseUrl = resolveBaseUrl(config.baseUrl)
  const apiKey = String(config.apiKey || '').trim()
  const model = String(config.model || '').trim()
  if (!apiKey || !model) {
    throw new ConverterError('CLIENT_INIT', 'OCR_CONFIG_INCOMPLETE')
  }
  const fetchImpl = config.fetchImpl ?? fetch
  const timeoutMs = Math.min(Math.max(config.requestTimeoutMs, 1), MAX_TIMER_DELAY_MS)

  async function request(path: string, options: RequestOptions): Promise<unknown> {
    const controller = new AbortController()
    const timeout = setTimeout(() => controller.abort(), timeoutMs)

    try {
      const response = await fetchImpl(`${baseUrl}${path}`, {
        method: options.method,
        headers: {
          Authorization: `Bearer ${apiKey}`,
          Accept: 'application/json',
          ...options.headers
        },
        body: options.body,
        signal: controller.signal
      })

      if (!response.ok) {
        const body = await response.text().catch(() => '')
        throw new ConverterError('REMOTE_SERVICE', `OCR_FAILED: ${response.status} ${body}`.trim())
      }

      const text = await response.text()
      if (!text.trim()) return null
      try {
        return JSON.parse(text)
      } catch (error) {
        throw new ConverterError('REMOTE_SERVICE', `OCR_RESPONSE_NOT_JSON: ${describeError(error)}`, { cause: error })
      }
    } catch (error) {
      if (error instanceof ConverterError) throw error
      if (error instanceof Error && error.name === 'AbortError') {
        throw new ConverterError('REMOTE_SERVICE', 'OCR_TIMEOUT', { cause: error })
      }
      throw new ConverterError('REMOTE_SERVICE', `OCR_REQUEST_FAILED: ${describeError(error)}`, { cause: error })
    } finally {
      clearTimeout(timeout)
    }
  }

  return {
    async stage(content, fileName, purpose) {
      const form = new FormData()
      form.append('purpose', purpose)
      form.append('file', new Blob([new Uint8Array(content)]), fileName)
      const body = await request('/v1/files', { method: 'POST', body: form })
      return parseResponse(uploadedFileSchema, body, 'OCR_UPLOAD_INVALID').id
    },

    async locate(fileId) {
      const body = await request(
        `/v1/files/${encodeURIComponent(fileId)}/url?expiry=${config.signedUrlExpiryHours}`,
        { method: 'GET' }
      )
      const url = String(parseResponse(signedUrlSchema, body, 'OCR_SIGNED_URL_INVALID').url || '').trim()
      if (!url) {
        throw new ConverterError('REMOTE_SERVICE', 'OCR_SIGNED_URL_MISSING')
      }
      return url
    },

    async process(document, options = {}) {
      const body = await request('/v1/ocr', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model,
          document: toDocumentPayload(document),
          include_image_base64: Boolean(options.includeImageBase64)
        })
      })
      return toOcrResult(parseResponse(ocrResponseSchema, body, 'OCR_RESPONSE_INVALID'))
    },

    async release(fileId) {
      await request(`/v1/files/${encodeURIComponent(fileId)}`, { method: 'DELETE' })
    }
  }
}
