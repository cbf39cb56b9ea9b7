import { InvalidEventError } from '../errors/AppErrors';
import { InvalidElementError } from './TransitionErrors';

/**
 * Events a crawler commonly records. Any other DOM event name is accepted too.
 */
export type KnownDomEvent =
  | 'request'
  | 'load'
  | 'click'
  | 'dblclick'
  | 'mouseover'
  | 'mouseout'
  | 'focus'
  | 'blur'
  | 'input'
  | 'change'
  | 'submit'
  | 'keydown'
  | 'keyup';

export type DomEventName = KnownDomEvent | (string & {});

/**
 * Events that are reached as a side effect of navigation and cannot be
 * re-fired on their own.
 */
export const NON_REPLAYABLE_EVENTS: ReadonlySet<DomEventName> = new Set<DomEventName>([
  'request',
  'load',
]);

/**
 * Events without a DOM depth.
 */
export const ZERO_DEPTH_EVENTS: ReadonlySet<DomEventName> = new Set<DomEventName>(['request']);

/**
 * Brings an event name to its canonical form. Surrounding whitespace is
 * trimmed; case is kept, DOM event types are case-sensitive.
 */
export function normalizeEvent(event: unknown): DomEventName {
  if (typeof event !== 'string' && typeof event !== 'symbol') {
    throw new InvalidEventError(event);
  }

  const name = (typeof event === 'symbol' ? event.description ?? '' : event).trim();
  if (name === '') {
    throw new InvalidEventError(event);
  }
  return name;
}

/**
 * Turns an element key into the identifier stored on a transition.
 * Symbols are identified by their description.
 */
export function normalizeElement(element: unknown): string {
  if (typeof element === 'string' && element !== '') {
    return element;
  }
  if (typeof element === 'symbol' && element.description) {
    return element.description;
  }
  throw new InvalidElementError(element);
}
