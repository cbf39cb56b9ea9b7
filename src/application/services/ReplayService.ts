/**
 * ReplayService
 *
 * Restores a recorded page state: loads the log's URL in the browser, then
 * fires every replayable transition again, in order, collecting the
 * transitions the browser produces into a new log.
 */

import { ReplayBrowserPort } from '../ports/ReplayBrowserPort';
import { Transition } from '../../domain/dom/Transition';
import { TransitionLog } from '../../domain/dom/TransitionLog';
import { ReplayDepthExceededError } from '../../domain/errors/AppErrors';
import { EventBus } from '../../domain/events/DomainEvent';
import {
  ReplayFinishedEvent,
  TransitionReplayFailedEvent,
  TransitionReplayedEvent,
} from '../../domain/events/ReplayEvents';
import { ReplayConfig } from '../../infrastructure/config/ConfigSchema';
import { Logger, getLogger } from '../../infrastructure/logging';

const DEFAULT_REPLAY_CONFIG: ReplayConfig = {
  maxDepth: 10,
  stopOnFailure: true,
};

export interface ReplayServiceDeps<THandle> {
  browser: ReplayBrowserPort<THandle>;
  eventBus?: EventBus;
  config?: Partial<ReplayConfig>;
}

export interface ReplayFailure {
  /** Position of the transition in the recorded log */
  index: number;
  transition: Transition;
  error: string;
}

export interface ReplayOutcome {
  /** Whether every replayable transition was fired again */
  success: boolean;
  /** Transitions produced by the replay, starting with the page request */
  log: TransitionLog;
  replayed: number;
  skipped: number;
  failures: ReplayFailure[];
  /** Milliseconds the whole restore took */
  duration: number;
}

export class ReplayService<THandle = unknown> {
  private logger: Logger;
  private browser: ReplayBrowserPort<THandle>;
  private eventBus: EventBus | null;
  private config: ReplayConfig;

  constructor(deps: ReplayServiceDeps<THandle>) {
    this.logger = getLogger('Replay');
    this.browser = deps.browser;
    this.eventBus = deps.eventBus ?? null;
    this.config = { ...DEFAULT_REPLAY_CONFIG, ...deps.config };
  }

  /**
   * Restores the page state `recorded` leads to.
   *
   * @throws ReplayDepthExceededError when the log is deeper than `maxDepth`
   * @throws NavigationError when the page itself cannot be loaded
   */
  async restore(recorded: TransitionLog): Promise<ReplayOutcome> {
    const depth = recorded.depth();
    if (depth > this.config.maxDepth) {
      throw new ReplayDepthExceededError(depth, this.config.maxDepth);
    }

    const startTime = Date.now();
    this.logger.info(`Restoring ${recorded.url}`, { depth, transitions: recorded.length });

    const restored = TransitionLog.create(recorded.url, [await this.browser.navigate(recorded.url)]);
    const failures: ReplayFailure[] = [];
    let replayed = 0;
    let skipped = 0;

    const transitions = recorded.transitions;
    for (let index = 0; index < transitions.length; index++) {
      const transition = transitions[index];

      if (!transition.isReplayable()) {
        skipped++;
        this.logger.debug(`Skipping ${transition.toString()}`);
        continue;
      }

      let error: string;
      try {
        const result = await transition.replay(this.browser);
        if (result) {
          restored.push(result);
          replayed++;
          await this.publish(
            new TransitionReplayedEvent(recorded.id, index, transition.toStructured(), result.toStructured())
          );
          continue;
        }
        error = 'Browser produced no transition';
      } catch (caught) {
        error = caught instanceof Error ? caught.message : String(caught);
      }

      failures.push({ index, transition, error });
      this.logger.warn(`Failed to replay ${transition.toString()}`, { index, error });
      await this.publish(
        new TransitionReplayFailedEvent(recorded.id, index, transition.toStructured(), error)
      );

      if (this.config.stopOnFailure) {
        break;
      }
    }

    const outcome: ReplayOutcome = {
      success: failures.length === 0,
      log: restored,
      replayed,
      skipped,
      failures,
      duration: Date.now() - startTime,
    };

    this.logger.info(`Restore of ${recorded.url} ${outcome.success ? 'succeeded' : 'failed'}`, {
      replayed,
      skipped,
      failed: failures.length,
    });
    await this.publish(
      new ReplayFinishedEvent(
        recorded.id,
        recorded.url,
        outcome.success,
        replayed,
        skipped,
        failures.length,
        outcome.duration
      )
    );

    return outcome;
  }

  private async publish(event: TransitionReplayedEvent | TransitionReplayFailedEvent | ReplayFinishedEvent): Promise<void> {
    if (this.eventBus) {
      await this.eventBus.publish(event);
    }
  }
}
