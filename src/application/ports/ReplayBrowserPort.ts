import type { DomEventName } from '../../domain/dom/DomEvent';
import type { Transition, TransitionOptions } from '../../domain/dom/Transition';

/**
 * What a transition needs from a browser to replay itself.
 *
 * `THandle` is whatever live element reference the implementation resolves
 * identifiers to.
 */
export interface DomEventBrowser<THandle = unknown> {
  /**
   * Resolves a stored element identifier to a live element in the current page.
   * Rejects when the element no longer exists.
   */
  locateElement(identifier: string): Promise<THandle>;

  /**
   * Fires `event` on the element and resolves the transition it produced,
   * or `undefined` when the dispatch produced none.
   */
  fireEvent(
    element: THandle,
    event: DomEventName,
    options: TransitionOptions
  ): Promise<Transition | undefined>;
}

/**
 * Browser used to restore a whole page state.
 */
export interface ReplayBrowserPort<THandle = unknown> extends DomEventBrowser<THandle> {
  /**
   * Loads `url` in the current page and resolves the completed `request`
   * transition that represents the navigation.
   */
  navigate(url: string): Promise<Transition>;
}
