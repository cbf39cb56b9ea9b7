/**
 * Base class for all domain errors.
 */
export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error thrown when a DOM event name cannot be normalized.
 */
export class InvalidEventError extends DomainError {
  constructor(public readonly event: unknown) {
    super(`Invalid DOM event: ${String(event)}`);
  }
}

/**
 * Error thrown when the browser cannot resolve a stored element identifier.
 */
export class ElementNotFoundError extends DomainError {
  constructor(public readonly identifier: string) {
    super(`Element not found: ${identifier}`);
  }
}

/**
 * Error thrown when a replay log is deeper than the configured limit.
 */
export class ReplayDepthExceededError extends DomainError {
  constructor(
    public readonly depth: number,
    public readonly maxDepth: number
  ) {
    super(`Replay depth ${depth} exceeds the limit of ${maxDepth}`);
  }
}

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends DomainError {
  constructor(message: string) {
    super(`Configuration Error: ${message}`);
  }
}

/**
 * Error thrown when the browser fails to load a page.
 */
export class NavigationError extends DomainError {
  constructor(
    public readonly url: string,
    reason: string
  ) {
    super(`Failed to load ${url}: ${reason}`);
  }
}
