export const IDEMPOTENCY_PORT = Symbol('IDEMPOTENCY_PORT');

export interface IdempotencyClaimResult {
  claimed: boolean;
}

export interface IdempotencyPort {
  /** First caller for a message id gets `claimed: true` until the claim is deleted. */
  claim(messageId: string): Promise<IdempotencyClaimResult>;
  /** Deleting a claim that does not exist is not an error. */
  deleteClaim(messageId: string): Promise<void>;
}
