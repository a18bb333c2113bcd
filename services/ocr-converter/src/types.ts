export type Logger = Pick<Console, 'log' | 'warn' | 'error'>

export type SourceKind = 'pdf' | 'image'

export type SourceFile = {
  path: string
  name: string
  extension: string
  kind: SourceKind
  outputPath: string
}
