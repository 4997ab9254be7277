/**
 * Raised by stores when a read cannot be served right now (the backing store
 * is closing, a connection is being recycled). Callers running periodic
 * reconciliation skip the cycle instead of failing.
 */
export class TransientStoreError extends Error {
  readonly code = "E-STORE-TRANSIENT";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientStoreError";
  }
}

/** Raised when a record referenced by id does not exist. */
export class RecordNotFoundError extends Error {
  readonly code = "E-STORE-NOT-FOUND";

  constructor(readonly kind: string, readonly id: string) {
    super(`${kind} '${id}' not found`);
    this.name = "RecordNotFoundError";
  }
}
