// ─────────────────────────────────────────────
//  Engine Errors
//  Only INVALID_MOVE_KIND escapes the engine as an exception.
//  The other codes travel as values on results.
// ─────────────────────────────────────────────

export type EngineIssueCode =
  | 'INVALID_MOVE_KIND'
  | 'INSUFFICIENT_DATA'
  | 'UNDETERMINED_ORDER'
  | 'UNDETERMINED_OUTCOME'
  | 'EMPTY_CANDIDATE_SET';

export class EngineError extends Error {
  readonly code: EngineIssueCode;

  constructor(code: EngineIssueCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A status move was handed to the damage calculator */
export class InvalidMoveKindError extends EngineError {
  readonly moveId: string;

  constructor(moveId: string) {
    super('INVALID_MOVE_KIND', `Move "${moveId}" cannot deal damage`);
    this.moveId = moveId;
  }
}

/** A value depends on information the snapshot does not carry */
export class InsufficientDataError extends EngineError {
  /** What was missing, phrased for an assumptions list */
  readonly missing: string;

  constructor(missing: string) {
    super('INSUFFICIENT_DATA', `Insufficient data: ${missing}`);
    this.missing = missing;
  }
}
