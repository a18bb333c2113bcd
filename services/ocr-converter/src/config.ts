import { ConverterError } from './errors.js'

export const DEFAULT_SUPPORTED_EXTENSIONS = ['.pdf', '.png', '.jpg', '.jpeg', '.webp'] as const
export const DEFAULT_OCR_BASE_URL = 'https://api.mistral.ai'
export const DEFAULT_OCR_MODEL = 'mistral-ocr-latest'
export const DEFAULT_REQUEST_TIMEOUT_MS = 120000
export const DEFAULT_SIGNED_URL_EXPIRY_HOURS = 24
// setTimeout fires immediately for delays beyond a signed 32-bit millisecond count.
export const MAX_TIMER_DELAY_MS = 2147483647

export type ConverterConfig = {
  apiKey: string
  baseUrl: string
  model: string
  embedImages: boolean
  supportedExtensions: ReadonlySet<string>
  requestTimeoutMs: number
  signedUrlExpiryHours: number
}

export type ConverterEnv = Record<string, string | undefined>

export type ConverterConfigOverrides = {
  embedImages?: boolean
}

export function parseBooleanSetting(value: string | undefined, fallback: boolean): boolean {
  const normalized = String(value || '').trim().toLowerCase()
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  return fallback
}

function parsePositiveInteger(value: string | undefined, fallback: number, max = Number.MAX_SAFE_INTEGER): number {
  const parsed = Math.floor(Number(String(value || '').trim() || fallback))
  return Number.isFinite(parsed) && parsed > 0 ? Math.min(parsed, max) : fallback
}

export function loadConverterConfig(env: ConverterEnv, overrides: ConverterConfigOverrides = {}): ConverterConfig {
  const apiKey = String(env.MISTRAL_API_KEY || '').trim()
  if (!apiKey) {
    throw new ConverterError('MISSING_CREDENTIAL', 'MISTRAL_API_KEY not found in environment variables or .env file')
  }

  return {
    apiKey,
    baseUrl: String(env.OCR_BASE_URL || '').trim() || DEFAULT_OCR_BASE_URL,
    model: String(env.OCR_MODEL || '').trim() || DEFAULT_OCR_MODEL,
    embedImages: overrides.embedImages ?? parseBooleanSetting(env.OCR_EMBED_IMAGES, false),
    supportedExtensions: new Set<string>(DEFAULT_SUPPORTED_EXTENSIONS),
    requestTimeoutMs: parsePositiveInteger(env.OCR_REQUEST_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT_MS, MAX_TIMER_DELAY_MS),
    signedUrlExpiryHours: parsePositiveInteger(env.OCR_SIGNED_URL_EXPIRY_HOURS, DEFAULT_SIGNED_URL_EXPIRY_HOURS)
  }
}
