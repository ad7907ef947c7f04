export type ErrorKind =
  | 'not_found'
  | 'ownership'
  | 'state_conflict'
  | 'validation'
  | 'conflict'
  | 'quota_exhausted'
  | 'unavailable'

const CARD_ERRORS = {
  CARD_NOT_FOUND: { kind: 'not_found', message: 'card not found' },
  ITEM_NOT_FOUND: { kind: 'not_found', message: 'item not found' },
  NOT_CARD_OWNER: { kind: 'ownership', message: 'you do not own this card' },
  NOT_FRIENDS: { kind: 'ownership', message: 'you are not friends with this user' },
  CARD_FINALIZED: { kind: 'state_conflict', message: 'card is finalized and cannot be modified' },
  CARD_NOT_FINALIZED: { kind: 'state_conflict', message: 'card must be finalized first' },
  CARD_FULL: { kind: 'state_conflict', message: 'card is full' },
  POSITION_OCCUPIED: { kind: 'state_conflict', message: 'position is already occupied' },
  NO_SPACE_FOR_FREE: { kind: 'state_conflict', message: 'no space available for free space' },
  INCOMPLETE_GRID: { kind: 'state_conflict', message: 'card is not full yet' },
  INVALID_POSITION: { kind: 'validation', message: 'invalid position' },
  INVALID_CATEGORY: { kind: 'validation', message: 'invalid category' },
  TITLE_TOO_LONG: { kind: 'validation', message: 'title must be 100 characters or less' },
  INVALID_GRID_SIZE: { kind: 'validation', message: 'invalid grid size' },
  INVALID_HEADER_TEXT: { kind: 'validation', message: 'invalid header text' },
  INVALID_YEAR: { kind: 'validation', message: 'year must be between 2020 and next year' },
  CONTENT_REQUIRED: { kind: 'validation', message: 'content is required' },
  CONTENT_TOO_LONG: { kind: 'validation', message: 'content must be 500 characters or less' },
  CARD_ALREADY_EXISTS: { kind: 'conflict', message: 'card already exists for this year' },
  CARD_TITLE_EXISTS: {
    kind: 'conflict',
    message: 'you already have a card with this title for this year',
  },
} as const satisfies Record<string, { kind: ErrorKind; message: string }>

export type CardErrorCode = keyof typeof CARD_ERRORS

export class CardServiceError extends Error {
  readonly code: CardErrorCode
  readonly kind: ErrorKind

  constructor(code: CardErrorCode, message: string = CARD_ERRORS[code].message) {
    super(message)
    this.name = 'CardServiceError'
    this.code = code
    this.kind = CARD_ERRORS[code].kind
  }
}

/**
 * Thrown when a card is finalized (or imported as finalized) before every
 * usable slot holds an item. The message stays human readable; the missing
 * positions are there for callers that want to highlight them.
 */
export class IncompleteGridError extends CardServiceError {
  readonly missingPositions: number[]

  constructor(capacity: number, itemCount: number, missingPositions: number[]) {
    super('INCOMPLETE_GRID', `card needs ${capacity} items, has ${itemCount}`)
    this.name = 'IncompleteGridError'
    this.missingPositions = missingPositions
  }
}

export interface CardSummary {
  id: string
  title: string | null
  year: number
  itemCount: number
  isFinalized: boolean
}

/**
 * Import conflict: the caller gets the card that is already there so the
 * client can decide what to do with it.
 */
export class CardExistsError extends CardServiceError {
  readonly existing: CardSummary

  constructor(existing: CardSummary) {
    super(existing.title ? 'CARD_TITLE_EXISTS' : 'CARD_ALREADY_EXISTS')
    this.name = 'CardExistsError'
    this.existing = existing
  }
}

export type QuotaErrorCode = 'QUOTA_EXHAUSTED' | 'USAGE_TRACKING_UNAVAILABLE'

export class QuotaError extends Error {
  readonly code: QuotaErrorCode
  readonly kind: ErrorKind

  constructor(code: QuotaErrorCode, options?: { cause?: unknown }) {
    super(
      code === 'QUOTA_EXHAUSTED'
        ? 'free generations used up; verify your email to continue'
        : 'usage tracking is temporarily unavailable',
      options,
    )
    this.name = 'QuotaError'
    this.code = code
    this.kind = code === 'QUOTA_EXHAUSTED' ? 'quota_exhausted' : 'unavailable'
  }
}
