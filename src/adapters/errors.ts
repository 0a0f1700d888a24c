/**
 * Collaborator error types.
 */

export type CollaboratorErrorCode = "INSUFFICIENT_BALANCE" | "INVALID_AMOUNT" | "CREDIT_MISMATCH";

export class CollaboratorError extends Error {
  public override readonly name = "CollaboratorError";

  constructor(
    message: string,
    public readonly code: CollaboratorErrorCode,
    public readonly collaborator: string,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}
