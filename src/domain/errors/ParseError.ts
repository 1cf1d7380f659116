/** Fatal problem with one diary entry. The entry is dropped from the run. */
export class ParseError extends Error {
  readonly source: string
  readonly field: string
  readonly rawValue: string | null

  constructor(source: string, field: string, rawValue: string | null, message: string) {
    super(`${source}: ${message}`)
    this.name = 'ParseError'
    this.source = source
    this.field = field
    this.rawValue = rawValue
  }
}
