export type BrainFileErrorCode =
  | 'NOT_A_BRAIN_FILE'
  | 'INVALID_BRAIN_FILE'
  | 'WRONG_CHAIN_LENGTH'
  | 'MALFORMED_CHAIN'

/** A snapshot could not be loaded. Nothing is constructed when this is thrown. */
export class BrainFileError extends Error {
  constructor(
    public code: BrainFileErrorCode,
    message: string,
  ) {
    super(message)
    this.name = 'BrainFileError'
  }
}

/**
 * The brain's indices disagree with each other. Learning is supposed to
 * make this impossible, so it is never caught inside the brain.
 */
export class BrainInvariantError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'BrainInvariantError'
  }
}
