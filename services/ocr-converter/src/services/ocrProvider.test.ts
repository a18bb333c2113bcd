import test from 'node:test'
import assert from 'node:assert/strict'
import { ConverterError } from '../errors.js'
import { createOcrClient, type OcrProviderConfig } from './ocrProvider.js'

type RecordedRequest = {
  url: string
  method: string
  authorization: string | null
  body: RequestInit['body']
}

function createFakeFetch(responses: Array<{ status?: number; body: unknown }>) {
  const requests: RecordedRequest[] = []
  const fetchImpl: typeof fetch = async (input, init) => {
    requests.push({
      url: String(input),
      method: String(init?.method || 'GET'),
      authorization: new Headers(init?.headers).get('authorization'),
      body: init?.body
    })
    const next = responses.shift()
    if (!next) throw new Error('unexpected request')
    const text = typeof next.body === 'string' ? next.body : JSON.stringify(next.body)
    return new Response(text, { status: next.status ?? 200 })
  }
  return { fetchImpl, requests }
}

function providerConfig(fetchImpl: typeof fetch, overrides: Partial<OcrProviderConfig> = {}): OcrProviderConfig {
  return {
    baseUrl: 'https://ocr.test/',
    apiKey: 'test-key',
    model: 'mistral-ocr-latest',
    requestTimeoutMs: 1000,
    signedUrlExpiryHours: 24,
    fetchImpl,
    ...overrides
  }
}

async function expectConverterError(promise: Promise<unknown>, kind: string, message: string | RegExp) {
  await assert.rejects(promise, (error: unknown) => {
    assert.ok(error instanceof ConverterError)
    assert.equal(error.kind, kind)
    if (typeof message === 'string') {
      assert.equal(error.message, message)
    } else {
      assert.match(error.message, message)
    }
    return true
  })
}

test('stage uploads the file as multipart with the ocr purpose', async () => {
  const fake = createFakeFetch([{ body: { id: 'file-123', object: 'file' } }])
  const client = createOcrClient(providerConfig(fake.fetchImpl))

  const fileId = await client.stage(Buffer.from('PDFDATA'), 'report.pdf', 'ocr')

  assert.equal(fileId, 'file-123')
  assert.equal(fake.requests[0]?.url, 'https://ocr.test/v1/files')
  assert.equal(fake.requests[0]?.method, 'POST')
  assert.equal(fake.requests[0]?.authorization, 'Bearer test-key')

  const form = fake.requests[0]?.body
  assert.ok(form instanceof FormData)
  assert.equal(form.get('purpose'), 'ocr')
  const file = form.get('file')
  assert.ok(file && typeof file !== 'string')
  assert.equal(file.name, 'report.pdf')
  assert.equal(await file.text(), 'PDFDATA')
})

test('locate requests a signed url with the configured expiry', async () => {
  const fake = createFakeFetch([{ body: { url: 'https://files.test/signed' } }])
  const client = createOcrClient(providerConfig(fake.fetchImpl, { signedUrlExpiryHours: 2 }))

  const url = await client.locate('file-123')

  assert.equal(url, 'https://files.test/signed')
  assert.equal(fake.requests[0]?.url, 'https://ocr.test/v1/files/file-123/url?expiry=2')
  assert.equal(fake.requests[0]?.method, 'GET')
})

test('locate fails when the response carries no url', async () => {
  const fake = createFakeFetch([{ body: { url: '' } }])
  const client = createOcrClient(providerConfig(fake.fetchImpl))

  await expectConverterError(client.locate('file-123'), 'REMOTE_SERVICE', 'OCR_SIGNED_URL_MISSING')
})

test('process sends the document reference and maps pages in index order', async () => {
  const fake = createFakeFetch([{
    body: {
      model: 'mistral-ocr-latest',
      pages: [
        { index: 1, markdown: 'second', images: [] },
        { index: 0, markdown: 'first ![img-0.jpeg](img-0.jpeg)', images: [{ id: 'img-0.jpeg', image_base64: 'QQ==' }] }
      ]
    }
  }])
  const client = createOcrClient(providerConfig(fake.fetchImpl))

  const result = await client.process({ type: 'document_url', url: 'https://files.test/signed' }, { includeImageBase64: true })

  assert.deepEqual(result, {
    pages: [
      { index: 0, markdown: 'first ![img-0.jpeg](img-0.jpeg)', images: [{ id: 'img-0.jpeg', imageBase64: 'QQ==' }] },
      { index: 1, markdown: 'second', images: [] }
    ]
  })
  assert.equal(fake.requests[0]?.url, 'https://ocr.test/v1/ocr')
  assert.deepEqual(JSON.parse(String(fake.requests[0]?.body)), {
    model: 'mistral-ocr-latest',
    document: { type: 'document_url', document_url: 'https://files.test/signed' },
    include_image_base64: true
  })
})

test('process sends inline images as image_url without image embedding', async () => {
  const fake = createFakeFetch([{ body: { pages: [{ index: 0, markdown: 'text' }] } }])
  const client = createOcrClient(providerConfig(fake.fetchImpl))

  const result = await client.process({ type: 'image_url', url: 'data:image/png;base64,QQ==' })

  assert.deepEqual(result, { pages: [{ index: 0, markdown: 'text', images: [] }] })
  assert.deepEqual(JSON.parse(String(fake.requests[0]?.body)), {
    model: 'mistral-ocr-latest',
    document: { type: 'image_url', image_url: 'data:image/png;base64,QQ==' },
    include_image_base64: false
  })
})

test('process accepts a response without pages as an empty result', async () => {
  const fake = createFakeFetch([{ body: { model: 'mistral-ocr-latest' } }])
  const client = createOcrClient(providerConfig(fake.fetchImpl))

  assert.deepEqual(await client.process({ type: 'image_url', url: 'data:image/png;base64,QQ==' }), { pages: [] })
})

test('process rejects pages without markdown', async () => {
  const fake = createFakeFetch([{ body: { pages: [{ index: 0, images: [] }] } }])
  const client = createOcrClient(providerConfig(fake.fetchImpl))

  await expectConverterError(
    client.process({ type: 'image_url', url: 'data:image/png;base64,QQ==' }),
    'REMOTE_SERVICE',
    /^OCR_RESPONSE_INVALID: pages\.0\.markdown /
  )
})

test('non-2xx responses surface the status and body', async () => {
  const fake = createFakeFetch([{ status: 401, body: 'unauthorized' }])
  const client = createOcrClient(providerConfig(fake.fetchImpl))

  await expectConverterError(client.stage(Buffer.from('x'), 'x.pdf', 'ocr'), 'REMOTE_SERVICE', 'OCR_FAILED: 401 unauthorized')
})

test('release deletes the uploaded file', async () => {
  const fake = createFakeFetch([{ body: { id: 'file-123', deleted: true } }])
  const client = createOcrClient(providerConfig(fake.fetchImpl))

  await client.release('file-123')

  assert.equal(fake.requests[0]?.url, 'https://ocr.test/v1/files/file-123')
  assert.equal(fake.requests[0]?.method, 'DELETE')
})

test('requests that exceed the deadline fail with OCR_TIMEOUT', async () => {
  const fetchImpl: typeof fetch = (_input, init) => new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => {
      const error = new Error('aborted')
      error.name = 'AbortError'
      reject(error)
    })
  })
  const client = createOcrClient(providerConfig(fetchImpl, { requestTimeoutMs: 5 }))

  await expectConverterError(client.release('file-123'), 'REMOTE_SERVICE', 'OCR_TIMEOUT')
})

test('createOcrClient rejects an invalid base url', () => {
  const { fetchImpl } = createFakeFetch([])
  assert.throws(
    () => createOcrClient(providerConfig(fetchImpl, { baseUrl: 'not a url' })),
    (error: unknown) => error instanceof ConverterError && error.kind === 'CLIENT_INIT'
  )
  assert.throws(
    () => createOcrClient(providerConfig(fetchImpl, { baseUrl: 'ftp://ocr.test' })),
    (error: unknown) => error instanceof ConverterError && error.kind === 'CLIENT_INIT'
  )
})

test('an oversized deadline does not abort requests immediately', async () => {
  const slowFetch: typeof fetch = (_input, init) => new Promise<Response>((resolve, reject) => {
    const timer = setTimeout(() => resolve(new Response(JSON.stringify({ id: 'file-9' }))), 20)
    init?.signal?.addEventListener('abort', () => {
      clearTimeout(timer)
      const error = new Error('aborted')
      error.name = 'AbortError'
      reject(error)
    })
  })
  const client = createOcrClient(providerConfig(slowFetch, { requestTimeoutMs: 3000000000 }))

  assert.equal(await client.stage(Buffer.from('x'), 'x.pdf', 'ocr'), 'file-9')
})
