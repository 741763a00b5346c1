// Base class for domain errors - includes HTTP status for easy mapping
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends DomainError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

// persisted cart payload could not be decoded; the engine falls back to an empty cart
export class CartDeserializationError extends DomainError {
  constructor(reason: string, cause?: unknown) {
    super(`Persisted cart is malformed: ${reason}`, 'CART_DESERIALIZATION_ERROR', 422, { cause });
  }
}

// 503 - local key-value storage could not be read or written
export class StorageUnavailableError extends DomainError {
  constructor(operation: 'read' | 'write', key: string, cause?: unknown) {
    super(
      `Storage ${operation} failed for key '${key}'.`,
      'STORAGE_UNAVAILABLE',
      503,
      { cause }
    );
  }
}
