import { DomainError } from '../errors/AppErrors';

/**
 * Codes of the precondition violations a transition can report.
 */
export type TransitionErrorCode = 'AlreadyCompleted' | 'AlreadyRunning' | 'NotRunning' | 'InvalidElement';

/**
 * Base class for transition lifecycle errors.
 */
export abstract class TransitionError extends DomainError {
  abstract readonly code: TransitionErrorCode;
}

/**
 * Raised when an operation is attempted on a completed transition.
 */
export class TransitionCompletedError extends TransitionError {
  readonly code = 'AlreadyCompleted' as const;

  constructor() {
    super('Transition has completed.');
  }
}

/**
 * Raised when a running transition is started again.
 */
export class TransitionRunningError extends TransitionError {
  readonly code = 'AlreadyRunning' as const;

  constructor() {
    super('Transition is already running.');
  }
}

/**
 * Raised when a transition is completed without having been started.
 */
export class TransitionNotRunningError extends TransitionError {
  readonly code = 'NotRunning' as const;

  constructor() {
    super('Transition is not running.');
  }
}

/**
 * Raised when the target element is not a usable identifier.
 */
export class InvalidElementError extends TransitionError {
  readonly code = 'InvalidElement' as const;

  constructor(public readonly element: unknown) {
    super(`Invalid element: ${describe(element)}`);
  }
}

/**
 * Every error a transition operation can fail with, discriminated by `code`.
 */
export type TransitionFailure =
  | TransitionCompletedError
  | TransitionRunningError
  | TransitionNotRunningError
  | InvalidElementError;

/**
 * Raised when a transition that has not completed is added to a log.
 */
export class IncompleteTransitionError extends DomainError {
  constructor(public readonly transition: string) {
    super(`Only completed transitions can be logged: ${transition}`);
  }
}

/**
 * Raised when the work given to start a transition returns a promise.
 * The transition is left running.
 */
export class AsynchronousWorkError extends DomainError {
  constructor(public readonly transition: string) {
    super(`Transition work must be synchronous: ${transition}`);
  }
}

function describe(value: unknown): string {
  if (typeof value === 'string') {
    return value === '' ? '(empty string)' : value;
  }
  if (typeof value === 'symbol') {
    return value.toString();
  }
  return typeof value;
}
