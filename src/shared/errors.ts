export type SpvErrorCode =
  | "OutOfBounds"
  | "TooManyInputs"
  | "TooManyOutputs"
  | "VarSliceTooLong"
  | "BadHeader"
  | "ProofTooShort"
  | "InvalidProof";

/**
 * Raised by the decoders and the proof verifier. Every code is terminal for the
 * call that raised it: no partial structure is ever returned alongside one.
 */
export class SpvError extends Error {
  readonly code: SpvErrorCode;

  constructor(code: SpvErrorCode, message: string) {
    super( message );
    this.name = "SpvError";
    this.code = code;
  }
}

export function isSpvError(err: unknown, code?: SpvErrorCode): err is SpvError {
  if ( !(err instanceof SpvError) ) return false;
  return code === undefined || err.code === code;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String( err );
}
