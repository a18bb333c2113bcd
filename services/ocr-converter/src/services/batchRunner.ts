import path from 'path'
import { access, writeFile } from 'node:fs/promises'
import type { ConverterConfig } from '../config.js'
import { ConverterError, describeError, toConverterError } from '../errors.js'
import type { Logger, SourceFile } from '../types.js'
import { synthesizeMarkdown } from './markdownSynthesis.js'
import type { OcrClient } from './ocrProvider.js'
import { runDocumentPipeline } from './ocrPipeline.js'
import { listSourceFiles } from './sourceFiles.js'

export type SkipReason = 'output_exists' | 'self'

export type FileOutcome =
  | { file: SourceFile; status: 'processed' }
  | { file: SourceFile; status: 'skipped'; reason: SkipReason }
  | { file: SourceFile; status: 'failed'; error: ConverterError }

export type RunSummary = {
  processed: number
  skipped: number
  errors: number
}

export type BatchReport = {
  candidates: number
  summary: RunSummary
  outcomes: FileOutcome[]
}

export type BatchParams = {
  directory: string
  client: OcrClient
  config: Pick<ConverterConfig, 'embedImages' | 'supportedExtensions'>
  selfPath?: string | null
  logger?: Logger
}

async function pathExists(target: string) {
  return access(target).then(() => true, () => false)
}

function isSelf(file: SourceFile, selfPath?: string | null) {
  if (!selfPath) return false
  return path.resolve(file.path) === path.resolve(selfPath)
}

export function summarizeOutcomes(outcomes: FileOutcome[]): RunSummary {
  return {
    processed: outcomes.filter((outcome) => outcome.status === 'processed').length,
    skipped: outcomes.filter((outcome) => outcome.status === 'skipped').length,
    errors: outcomes.filter((outcome) => outcome.status === 'failed').length
  }
}

async function convertFile(file: SourceFile, params: BatchParams, logger: Logger): Promise<FileOutcome> {
  if (await pathExists(file.outputPath)) {
    logger.log(`  skipping: output file ${path.basename(file.outputPath)} already exists`)
    return { file, status: 'skipped', reason: 'output_exists' }
  }
  if (isSelf(file, params.selfPath)) {
    logger.log(`  skipping: cannot process the program file itself (${file.name})`)
    return { file, status: 'skipped', reason: 'self' }
  }

  const pipeline = await runDocumentPipeline({
    client: params.client,
    file,
    embedImages: params.config.embedImages,
    logger
  })
  if (!pipeline.ok) {
    logger.error(`  failed ${file.name}: ${pipeline.error.kind} ${pipeline.error.message}`)
    return { file, status: 'failed', error: pipeline.error }
  }

  const markdown = synthesizeMarkdown(pipeline.result, file.kind === 'pdf' && params.config.embedImages, logger)
  if (!markdown) {
    const detail = pipeline.result.pages.length > 0 ? ', though pages were present' : ''
    logger.warn(`  markdown for ${file.name} is empty${detail}`)
  }

  try {
    // `wx` refuses to replace a file that appeared after the existence check.
    await writeFile(file.outputPath, markdown, { encoding: 'utf8', flag: 'wx' })
  } catch (error) {
    const writeError = new ConverterError(
      'WRITE',
      `Error writing Markdown file ${path.basename(file.outputPath)}: ${describeError(error)}`,
      { cause: error }
    )
    logger.error(`  failed ${file.name}: ${writeError.kind} ${writeError.message}`)
    return { file, status: 'failed', error: writeError }
  }

  logger.log(`  saved ${path.basename(file.outputPath)}`)
  return { file, status: 'processed' }
}

export async function runBatch(params: BatchParams): Promise<BatchReport> {
  const logger = params.logger ?? console
  const files = await listSourceFiles(params.directory, params.config.supportedExtensions)

  if (files.length === 0) {
    logger.log('[ocr-batch] no supported files found to process')
    return { candidates: 0, summary: { processed: 0, skipped: 0, errors: 0 }, outcomes: [] }
  }

  logger.log(`[ocr-batch] found ${files.length} potential files to process`)

  const outcomes: FileOutcome[] = []
  for (const file of files) {
    logger.log(`\n[ocr-batch] processing file: ${file.name}`)
    try {
      outcomes.push(await convertFile(file, params, logger))
    } catch (error) {
      const unexpected = toConverterError('LOCAL_IO', error)
      logger.error(`  failed ${file.name}: ${unexpected.kind} ${unexpected.message}`)
      outcomes.push({ file, status: 'failed', error: unexpected })
    }
  }

  const summary = summarizeOutcomes(outcomes)
  logger.log('\n[ocr-batch] Summary')
  logger.log(`processed: ${summary.processed}`)
  logger.log(`skipped: ${summary.skipped}`)
  logger.log(`errors: ${summary.errors}`)

  return { candidates: files.length, summary, outcomes }
}
