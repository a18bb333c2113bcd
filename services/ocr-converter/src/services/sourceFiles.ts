import path from 'path'
import type { Dirent } from 'node:fs'
import { readdir, stat } from 'node:fs/promises'
import { ConverterError, describeError } from '../errors.js'
import type { SourceFile } from '../types.js'

export const MARKDOWN_EXTENSION = '.md'

export function toSourceFile(filePath: string): SourceFile {
  const name = path.basename(filePath)
  const extension = path.extname(name).toLowerCase()
  return {
    path: filePath,
    name,
    extension,
    kind: extension === '.pdf' ? 'pdf' : 'image',
    outputPath: path.join(path.dirname(filePath), `${path.basename(name, path.extname(name))}${MARKDOWN_EXTENSION}`)
  }
}

export function isCandidateName(name: string, supportedExtensions: ReadonlySet<string>) {
  const extension = path.extname(name).toLowerCase()
  return extension !== MARKDOWN_EXTENSION && supportedExtensions.has(extension)
}

// Symlinks count when they resolve to a regular file; dangling links do not.
async function isRegularFile(directory: string, entry: Dirent) {
  if (entry.isFile()) return true
  if (!entry.isSymbolicLink()) return false
  return stat(path.join(directory, entry.name)).then((stats) => stats.isFile(), () => false)
}

export async function listSourceFiles(directory: string, supportedExtensions: ReadonlySet<string>): Promise<SourceFile[]> {
  const entries = await readdir(directory, { withFileTypes: true }).catch((error: unknown) => {
    throw new ConverterError(
      'DIRECTORY_LIST',
      `Error listing files in directory ${path.resolve(directory)}: ${describeError(error)}`,
      { cause: error }
    )
  })

  const names: string[] = []
  for (const entry of entries) {
    if (!isCandidateName(entry.name, supportedExtensions)) continue
    if (await isRegularFile(directory, entry)) names.push(entry.name)
  }

  return names
    .sort()
    .map((name) => toSourceFile(path.join(directory, name)))
}
