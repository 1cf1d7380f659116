/** The reference nutrition database failed validation. */
export class InvalidReferenceDatabaseError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid reference database:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`)
    this.name = 'InvalidReferenceDatabaseError'
    this.issues = issues
  }
}
