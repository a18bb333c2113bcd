import { readFile } from 'node:fs/promises'
import { ConverterError, describeError, toConverterError, type ConverterErrorKind } from '../errors.js'
import type { Logger, SourceFile } from '../types.js'
import { buildDataUrl, resolveImageMimeType } from './mimeTypes.js'
import type { OcrClient, OcrResult } from './ocrProvider.js'

export const OCR_UPLOAD_PURPOSE = 'ocr'

export type PipelineResult =
  | { ok: true; result: OcrResult }
  | { ok: false; error: ConverterError }

export type DocumentPipelineParams = {
  client: OcrClient
  file: SourceFile
  embedImages: boolean
  logger?: Logger
}

function fail(kind: ConverterErrorKind, message: string, cause?: unknown): PipelineResult {
  return { ok: false, error: new ConverterError(kind, message, { cause }) }
}

async function releaseStagedResource(client: OcrClient, fileId: string, logger: Logger) {
  try {
    await client.release(fileId)
    logger.log(`[ocr-pipeline] cleaned up uploaded file ${fileId}`)
  } catch (error) {
    const warning = new ConverterError(
      'RELEASE_WARNING',
      `Could not delete uploaded file ${fileId}: ${describeError(error)}`,
      { cause: error }
    )
    logger.warn(`[ocr-pipeline] ${warning.message}`)
  }
}

// Stages the content, hands the remote file id to `use`, and releases it exactly once however `use` exits.
// A failed stage leaves nothing to release and rejects with the stage error.
export async function withStagedResource<T>(
  params: { client: OcrClient; content: Buffer; fileName: string; logger: Logger },
  use: (fileId: string) => Promise<T>
): Promise<T> {
  const fileId = await params.client.stage(params.content, params.fileName, OCR_UPLOAD_PURPOSE)
  params.logger.log(`[ocr-pipeline] uploaded ${params.fileName} as ${fileId}`)

  try {
    return await use(fileId)
  } finally {
    await releaseStagedResource(params.client, fileId, params.logger)
  }
}

async function runPdfPipeline(params: Required<DocumentPipelineParams>): Promise<PipelineResult> {
  const { client, file, embedImages, logger } = params

  let content: Buffer
  try {
    content = await readFile(file.path)
  } catch (error) {
    return fail('LOCAL_IO', `File error reading PDF ${file.name}: ${describeError(error)}`, error)
  }

  try {
    const result = await withStagedResource({ client, content, fileName: file.name, logger }, async (fileId) => {
      const url = (await client.locate(fileId)).trim()
      if (!url) {
        throw new ConverterError('REMOTE_SERVICE', 'OCR_SIGNED_URL_MISSING')
      }
      logger.log(`[ocr-pipeline] sending ${file.name} to OCR`)
      return client.process({ type: 'document_url', url }, { includeImageBase64: embedImages })
    })
    return { ok: true, result }
  } catch (error) {
    return { ok: false, error: toConverterError('REMOTE_SERVICE', error) }
  }
}

async function runImagePipeline(params: Required<DocumentPipelineParams>): Promise<PipelineResult> {
  const { client, file, logger } = params

  let content: Buffer
  try {
    content = await readFile(file.path)
  } catch (error) {
    return fail('LOCAL_IO', `File error reading image ${file.name}: ${describeError(error)}`, error)
  }
  if (content.length === 0) {
    return fail('LOCAL_IO', `Read 0 bytes from image file ${file.name}`)
  }

  const mimeType = resolveImageMimeType(file.name)
  logger.log(`[ocr-pipeline] sending ${file.name} to OCR as ${mimeType} (${content.length} bytes)`)

  try {
    const result = await client.process({ type: 'image_url', url: buildDataUrl(mimeType, content) })
    return { ok: true, result }
  } catch (error) {
    return { ok: false, error: toConverterError('REMOTE_SERVICE', error) }
  }
}

export async function runDocumentPipeline(params: DocumentPipelineParams): Promise<PipelineResult> {
  const resolved = { ...params, logger: params.logger ?? console }
  if (params.file.kind === 'pdf') {
    return runPdfPipeline(resolved)
  }
  return runImagePipeline(resolved)
}
