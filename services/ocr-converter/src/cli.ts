import path from 'path'
import { loadConverterConfig, parseBooleanSetting, type ConverterEnv } from './config.js'
import { ConverterError, describeError, toConverterError } from './errors.js'
import { runBatch } from './services/batchRunner.js'
import { createOcrClient, type OcrClient, type OcrProviderConfig } from './services/ocrProvider.js'
import type { Logger } from './types.js'

export type CliOptions = {
  argv: string[]
  env: ConverterEnv
  cwd: string
  selfPath?: string | null
  logger?: Logger
  createClient?: (config: OcrProviderConfig) => OcrClient
}

export function parseArgs(argv: string[]) {
  const map = new Map<string, string>()
  for (let i = 2; i < argv.length; i += 1) {
    const arg = argv[i]
    if (!arg.startsWith('--')) continue
    const key = arg.slice(2)
    const next = argv[i + 1]
    const value = next && !next.startsWith('--') ? next : 'true'
    map.set(key, value)
    if (value !== 'true') i += 1
  }
  return map
}

function resolveEmbedImagesFlag(args: Map<string, string>): boolean | undefined {
  if (args.has('no-embed-images')) return false
  if (args.has('embed-images')) return parseBooleanSetting(args.get('embed-images'), true)
  return undefined
}

// Resolves to the process exit status: 0 when nothing failed, 1 otherwise.
export async function runCli(options: CliOptions): Promise<number> {
  const logger = options.logger ?? console
  const createClient = options.createClient ?? createOcrClient
  const args = parseArgs(options.argv)

  try {
    const config = loadConverterConfig(options.env, { embedImages: resolveEmbedImagesFlag(args) })
    logger.log('[ocr-batch] API key loaded')

    let client: OcrClient
    try {
      client = createClient({
        baseUrl: config.baseUrl,
        apiKey: config.apiKey,
        model: config.model,
        requestTimeoutMs: config.requestTimeoutMs,
        signedUrlExpiryHours: config.signedUrlExpiryHours
      })
    } catch (error) {
      throw toConverterError('CLIENT_INIT', error)
    }
    logger.log(`[ocr-batch] OCR client initialized (${config.baseUrl}, model=${config.model})`)

    const directory = path.resolve(options.cwd, String(args.get('dir') || '.'))
    logger.log(`[ocr-batch] starting OCR processing in directory: ${directory}`)
    logger.log(`[ocr-batch] include base64 images from PDFs: ${config.embedImages}`)
    logger.log(`[ocr-batch] supported extensions: ${Array.from(config.supportedExtensions).join(', ')}`)

    const report = await runBatch({
      directory,
      client,
      config,
      selfPath: options.selfPath,
      logger
    })
    return report.summary.errors > 0 ? 1 : 0
  } catch (error) {
    if (error instanceof ConverterError) {
      logger.error(`[ocr-batch] FAIL ${error.kind}: ${error.message}`)
    } else {
      logger.error(`[ocr-batch] FAIL ${describeError(error)}`)
    }
    return 1
  }
}
