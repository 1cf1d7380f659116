export interface EntryError {
  source: string
  field: string
  rawValue: string | null
  message: string
}

export type MentionWarningReason = 'missing_quantity' | 'negative_quantity' | 'unsupported_unit'

export interface MentionWarning {
  source: string
  line: number
  raw: string
  reason: MentionWarningReason
  message: string
}
