import { createHash } from 'crypto';
import type { DomEventBrowser } from '../../application/ports/ReplayBrowserPort';
import { canonicalKey } from '../shared/canonicalKey';
import { Result, err, ok } from '../shared/Result';
import {
  DomEventName,
  NON_REPLAYABLE_EVENTS,
  ZERO_DEPTH_EVENTS,
  normalizeElement,
  normalizeEvent,
} from './DomEvent';
import {
  AsynchronousWorkError,
  InvalidElementError,
  TransitionCompletedError,
  TransitionError,
  TransitionFailure,
  TransitionNotRunningError,
  TransitionRunningError,
} from './TransitionErrors';

/**
 * Extra parameters passed through to the browser on replay.
 */
export type TransitionOptions = Record<string, unknown>;

/**
 * Single-entry mapping of `element => event`.
 */
export type TransitionTarget =
  | Readonly<Record<string | symbol, DomEventName>>
  | ReadonlyMap<unknown, DomEventName>;

/**
 * Structured export of a transition.
 */
export interface StructuredTransition {
  element: string | undefined;
  event: DomEventName | undefined;
  options: TransitionOptions;
  /** Milliseconds it took to apply the event, once completed */
  elapsed: number | undefined;
}

/**
 * Structured record of a completed transition.
 */
export interface CompletedTransitionRecord {
  element: string;
  event: DomEventName;
  options?: TransitionOptions;
  elapsed: number;
}

export type TransitionStatus = 'unstarted' | 'running' | 'completed';

type TransitionState =
  | { status: 'unstarted' }
  | { status: 'running'; since: number }
  | { status: 'completed'; elapsed: number };

/**
 * Record of one DOM event applied to one element, with its timing.
 *
 * A transition is created unstarted, moves to running on {@link start} and
 * to completed on {@link complete}; completed is terminal. Equality ignores
 * timing, so replaying the same event yields an equal transition.
 */
export class Transition {
  private _element: string | undefined;
  private _event: DomEventName | undefined;
  private _options: TransitionOptions = {};
  private state: TransitionState = { status: 'unstarted' };

  private constructor() {}

  /**
   * Creates a transition. When a target is given it is started right away,
   * and completed too when `work` is given.
   */
  static create(
    target?: TransitionTarget,
    options: TransitionOptions = {},
    work?: () => void
  ): Transition {
    const transition = new Transition();
    if (target === undefined) {
      return transition;
    }
    return transition.start(target, options, work);
  }

  /**
   * Rebuilds a completed transition from its structured export.
   */
  static fromStructured(record: CompletedTransitionRecord): Transition {
    const transition = new Transition();
    transition._element = normalizeElement(record.element);
    transition._event = normalizeEvent(record.event);
    transition._options = structuredClone(record.options ?? {});
    transition.state = { status: 'completed', elapsed: Math.max(0, record.elapsed) };
    return transition;
  }

  get element(): string | undefined {
    return this._element;
  }

  get event(): DomEventName | undefined {
    return this._event;
  }

  get options(): TransitionOptions {
    return this._options;
  }

  /**
   * Milliseconds it took to apply the event; only set once completed.
   */
  get elapsed(): number | undefined {
    return this.state.status === 'completed' ? this.state.elapsed : undefined;
  }

  get status(): TransitionStatus {
    return this.state.status;
  }

  /**
   * Records the target and starts the timer.
   *
   * If `work` is given it is executed and the transition is completed before
   * returning. Should `work` throw, the transition stays running. `work` must
   * be synchronous; for asynchronous work call {@link complete} once it has
   * settled.
   *
   * @throws TransitionCompletedError when the transition has completed
   * @throws TransitionRunningError when the transition is already running
   * @throws InvalidElementError when the element key is not a usable identifier
   * @throws AsynchronousWorkError when `work` returns a promise
   */
  start(target: TransitionTarget, options: TransitionOptions = {}, work?: () => void): this {
    if (this.state.status === 'completed') {
      throw new TransitionCompletedError();
    }
    if (this.state.status === 'running') {
      throw new TransitionRunningError();
    }

    const entry = firstEntry(target);
    if (!entry) {
      throw new InvalidElementError(undefined);
    }

    const element = normalizeElement(entry[0]);
    const event = normalizeEvent(entry[1]);

    this._element = element;
    this._event = event;
    this._options = { ...options };
    this.state = { status: 'running', since: Date.now() };

    if (!work) {
      return this;
    }

    const result: unknown = work();
    if (isPromiseLike(result)) {
      throw new AsynchronousWorkError(this.toString());
    }
    return this.complete();
  }

  /**
   * Stops the timer and marks the transition as completed.
   *
   * @throws TransitionCompletedError when the transition has already completed
   * @throws TransitionNotRunningError when the transition was never started
   */
  complete(): this {
    if (this.state.status === 'completed') {
      throw new TransitionCompletedError();
    }
    if (this.state.status !== 'running') {
      throw new TransitionNotRunningError();
    }

    const since = this.state.since;
    this.state = { status: 'completed', elapsed: Math.max(0, Date.now() - since) };
    return this;
  }

  /**
   * {@link start} reporting lifecycle violations as a result instead of throwing.
   */
  tryStart(
    target: TransitionTarget,
    options: TransitionOptions = {},
    work?: () => void
  ): Result<this, TransitionFailure> {
    return attempt(() => this.start(target, options, work));
  }

  /**
   * {@link complete} reporting lifecycle violations as a result instead of throwing.
   */
  tryComplete(): Result<this, TransitionFailure> {
    return attempt(() => this.complete());
  }

  isRunning(): boolean {
    return this.state.status === 'running';
  }

  isCompleted(): boolean {
    return this.state.status === 'completed';
  }

  /**
   * 0 for events that only load a page, 1 for element interactions.
   */
  depth(): number {
    return this._event !== undefined && ZERO_DEPTH_EVENTS.has(this._event) ? 0 : 1;
  }

  /**
   * Whether the event can be fired again on its own. Unstarted transitions
   * have nothing to replay.
   */
  isReplayable(): boolean {
    return this._event !== undefined && !NON_REPLAYABLE_EVENTS.has(this._event);
  }

  /**
   * Fires the event again on the element through `browser`.
   *
   * Resolves whatever transition the browser produced, or `undefined`
   * without touching the browser when the transition is not replayable.
   */
  async replay<THandle>(browser: DomEventBrowser<THandle>): Promise<Transition | undefined> {
    if (!this.isReplayable() || this._element === undefined || this._event === undefined) {
      return undefined;
    }

    const handle = await browser.locateElement(this._element);
    return browser.fireEvent(handle, this._event, this._options);
  }

  /**
   * Canonical form of the fields equality is defined over. Option key order
   * does not matter; option value types do.
   */
  equalityKey(): string {
    return canonicalKey({
      element: this._element,
      event: this._event,
      options: this._options,
    });
  }

  hash(): string {
    return createHash('sha1').update(this.equalityKey()).digest('hex');
  }

  /**
   * Compares element, event and options; timing is ignored.
   */
  equals(other: Transition | null | undefined): boolean {
    if (other === null || other === undefined) {
      return false;
    }
    return this.equalityKey() === other.equalityKey();
  }

  /**
   * Deep copy sharing no mutable state with this transition.
   */
  duplicate(): Transition {
    const copy = new Transition();
    copy._element = this._element;
    copy._event = this._event;
    copy._options = structuredClone(this._options);
    copy.state = { ...this.state };
    return copy;
  }

  /**
   * Export with a copy of the options, so changing the record leaves the
   * transition as it is.
   */
  toStructured(): StructuredTransition {
    return {
      element: this._element,
      event: this._event,
      options: structuredClone(this._options),
      elapsed: this.elapsed,
    };
  }

  toJSON(): StructuredTransition {
    return this.toStructured();
  }

  toString(): string {
    return `'${this._event ?? ''}' on: ${this._element ?? ''}`;
  }
}

function isMap(target: TransitionTarget): target is ReadonlyMap<unknown, DomEventName> {
  return target instanceof Map;
}

function firstEntry(target: TransitionTarget): [unknown, unknown] | undefined {
  if (isMap(target)) {
    for (const entry of target) {
      return entry;
    }
    return undefined;
  }

  const keys = Reflect.ownKeys(target);
  if (keys.length === 0) {
    return undefined;
  }
  return [keys[0], target[keys[0]]];
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'then') === 'function'
  );
}

function isTransitionFailure(error: unknown): error is TransitionFailure {
  return error instanceof TransitionError;
}

function attempt<T>(operation: () => T): Result<T, TransitionFailure> {
  try {
    return ok(operation());
  } catch (error) {
    if (isTransitionFailure(error)) {
      return err(error);
    }
    throw error;
  }
}
