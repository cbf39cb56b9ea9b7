/**
 * DOM transition replay
 * Records DOM events as transitions and replays them to restore page states.
 */

// Domain
export { Transition } from './domain/dom/Transition';
export type {
  TransitionOptions,
  TransitionTarget,
  TransitionStatus,
  StructuredTransition,
  CompletedTransitionRecord,
} from './domain/dom/Transition';
export { TransitionLog } from './domain/dom/TransitionLog';
export type { TransitionLogProps, TransitionLogRecord } from './domain/dom/TransitionLog';
export {
  NON_REPLAYABLE_EVENTS,
  ZERO_DEPTH_EVENTS,
  normalizeElement,
  normalizeEvent,
} from './domain/dom/DomEvent';
export type { DomEventName, KnownDomEvent } from './domain/dom/DomEvent';
export {
  TransitionError,
  TransitionCompletedError,
  TransitionRunningError,
  TransitionNotRunningError,
  InvalidElementError,
  IncompleteTransitionError,
  AsynchronousWorkError,
} from './domain/dom/TransitionErrors';
export type { TransitionErrorCode, TransitionFailure } from './domain/dom/TransitionErrors';
export {
  DomainError,
  InvalidEventError,
  ElementNotFoundError,
  NavigationError,
  ReplayDepthExceededError,
  ConfigurationError,
} from './domain/errors/AppErrors';
export type { Result } from './domain/shared/Result';
export {
  TransitionReplayedEvent,
  TransitionReplayFailedEvent,
  ReplayFinishedEvent,
} from './domain/events/ReplayEvents';
export type { DomainEvent, EventBus, EventHandler } from './domain/events/DomainEvent';

// Application
export type { DomEventBrowser, ReplayBrowserPort } from './application/ports/ReplayBrowserPort';
export { ReplayService } from './application/services/ReplayService';
export type { ReplayOutcome, ReplayFailure, ReplayServiceDeps } from './application/services/ReplayService';

// Infrastructure
export { PlaywrightBrowserAdapter } from './infrastructure/browser/PlaywrightBrowserAdapter';
export type { LocatedElement, PlaywrightBrowserConfig } from './infrastructure/browser/PlaywrightBrowserAdapter';
export { InMemoryEventBus } from './infrastructure/events/InMemoryEventBus';
export { ConfigFactory } from './infrastructure/config/ConfigFactory';
export type { ConfigOverrides } from './infrastructure/config/ConfigFactory';
export { AppConfigSchema } from './infrastructure/config/ConfigSchema';
export type { AppConfig, BrowserConfig, ReplayConfig, LoggingConfig } from './infrastructure/config/ConfigSchema';
export { Logger, getLogger, setGlobalLoggerConfig, loggers } from './infrastructure/logging';
