/**
 * Application-level errors raised while orchestrating stores.
 */
export class NotFoundError extends Error {
  constructor(message = 'Resource not found') {
    super(message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AlreadyExistsError extends Error {
  constructor(message = 'Resource already exists') {
    super(message);
    this.name = 'AlreadyExistsError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
