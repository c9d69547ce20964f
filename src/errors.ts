export type ReviewErrorCode = 'INVALID_OUTCOME' | 'SESSION_COMPLETE' | 'CARD_NOT_FOUND' | 'INVALID_CARD' | 'INVALID_TIMESTAMP';

export class ReviewError extends Error {
  readonly code: ReviewErrorCode;

  constructor(code: ReviewErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidOutcomeError extends ReviewError {
  readonly received: unknown;

  constructor(received: unknown) {
    super('INVALID_OUTCOME', `Unknown grading outcome: ${String(received)}`);
    this.received = received;
  }
}

/** Raised when grading is attempted after the last queued card. Callers should check `currentCard` first. */
export class SessionCompleteError extends ReviewError {
  constructor() {
    super('SESSION_COMPLETE', 'Study session has no current card');
  }
}

export class CardNotFoundError extends ReviewError {
  readonly cardId: string;

  constructor(cardId: string) {
    super('CARD_NOT_FOUND', `Card ${cardId} is not in the card store`);
    this.cardId = cardId;
  }
}

export class InvalidCardError extends ReviewError {
  constructor(message: string) {
    super('INVALID_CARD', message);
  }
}

export class InvalidTimestampError extends ReviewError {
  constructor(field: string, received: unknown) {
    super('INVALID_TIMESTAMP', `${field} must be an ISO-8601 timestamp, got ${String(received)}`);
  }
}
