/**
 * Base class of every failure raised while parsing a hand. `handId` is filled
 * in by the assembler once the header has been read, so a batch caller can
 * log and skip the hand.
 */
export class HandHistoryError extends Error {
  handId: string | null;
  readonly text: string;

  constructor(message: string, text: string, handId: string | null = null) {
    super(handId ? `${message} (hand #${handId})` : message);
    this.name = new.target.name;
    this.text = text;
    this.handId = handId;
  }
}

/** The header line matches none of the known sub-grammars. */
export class HeaderFormatError extends HandHistoryError {}

/** The table line or seat layout cannot be read. */
export class HandFormatError extends HandHistoryError {}

export class InvalidCardError extends HandHistoryError {}

/** A card set with a duplicate card or an unsupported size. */
export class InvalidComboError extends HandHistoryError {}

/**
 * A body line that matched no classifier rule. Returned, never thrown: the
 * line is dropped and parsing goes on.
 */
export class UnrecognizedActionError extends HandHistoryError {
  constructor(line: string) {
    super(`Unknown action: ${line}`, line);
  }
}

export function attachHandId<T>(handId: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof HandHistoryError && error.handId === null) {
      error.handId = handId;
      error.message = `${error.message} (hand #${handId})`;
    }
    throw error;
  }
}
