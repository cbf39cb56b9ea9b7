import { BaseDomainEvent } from './DomainEvent';
import type { StructuredTransition } from '../dom/Transition';

/**
 * Raised when a recorded transition has been fired again.
 */
export class TransitionReplayedEvent extends BaseDomainEvent {
  static readonly TYPE = 'replay.transition_replayed';

  constructor(
    logId: string,
    public readonly index: number,
    public readonly recorded: StructuredTransition,
    public readonly replayed: StructuredTransition
  ) {
    super(TransitionReplayedEvent.TYPE, logId);
  }
}

/**
 * Raised when a recorded transition could not be fired again.
 */
export class TransitionReplayFailedEvent extends BaseDomainEvent {
  static readonly TYPE = 'replay.transition_failed';

  constructor(
    logId: string,
    public readonly index: number,
    public readonly recorded: StructuredTransition,
    public readonly error: string
  ) {
    super(TransitionReplayFailedEvent.TYPE, logId);
  }
}

/**
 * Raised when restoring a page state has finished, successfully or not.
 */
export class ReplayFinishedEvent extends BaseDomainEvent {
  static readonly TYPE = 'replay.finished';

  constructor(
    logId: string,
    public readonly url: string,
    public readonly success: boolean,
    public readonly replayed: number,
    public readonly skipped: number,
    public readonly failed: number,
    public readonly duration: number
  ) {
    super(ReplayFinishedEvent.TYPE, logId);
  }
}
