export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A field failed one of its rules. Reported to the caller, never retried.
 */
export class ValidationError extends DomainError {
  constructor(
    public readonly field: string,
    message: string
  ) {
    super(message);
  }
}

/**
 * The entity exists but cannot take the requested change in its current state.
 */
export class InvalidStateError extends DomainError {}

export class InvalidQuantityError extends InvalidStateError {
  constructor(message = 'quantity must be a positive whole number') {
    super(message);
  }
}

export class InsufficientStockError extends InvalidStateError {
  constructor(
    public readonly available: number,
    public readonly requested: number
  ) {
    super('insufficient stock');
  }
}
