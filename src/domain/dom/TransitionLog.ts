import { Entity } from '../shared/Entity';
import { CompletedTransitionRecord, StructuredTransition, Transition } from './Transition';
import { IncompleteTransitionError } from './TransitionErrors';

/**
 * Properties for a TransitionLog.
 */
export interface TransitionLogProps {
  /** Page the transitions were recorded on */
  url: string;
  /** Completed transitions, in the order they were applied */
  transitions: Transition[];
}

/**
 * Structured record a TransitionLog can be rebuilt from.
 */
export interface TransitionLogRecord {
  id: string;
  url: string;
  transitions: CompletedTransitionRecord[];
}

/**
 * Ordered transitions that lead from loading `url` to one page state.
 * Replaying them in order against a fresh page restores that state.
 */
export class TransitionLog extends Entity<TransitionLogProps> {
  private constructor(props: TransitionLogProps, id?: string) {
    super(props, id);
  }

  static create(url: string, transitions: Transition[] = [], id?: string): TransitionLog {
    const log = new TransitionLog({ url, transitions: [] }, id);
    for (const transition of transitions) {
      log.push(transition);
    }
    return log;
  }

  static fromJSON(data: TransitionLogRecord): TransitionLog {
    return TransitionLog.create(
      data.url,
      data.transitions.map(record => Transition.fromStructured(record)),
      data.id
    );
  }

  get url(): string {
    return this.props.url;
  }

  get transitions(): Transition[] {
    return [...this.props.transitions];
  }

  get length(): number {
    return this.props.transitions.length;
  }

  /**
   * Appends a completed transition.
   */
  push(transition: Transition): this {
    if (!transition.isCompleted()) {
      throw new IncompleteTransitionError(transition.toString());
    }
    this.props.transitions.push(transition);
    return this;
  }

  last(): Transition | undefined {
    return this.props.transitions[this.props.transitions.length - 1];
  }

  /**
   * Sum of the depths of all transitions.
   */
  depth(): number {
    return this.props.transitions.reduce((sum, transition) => sum + transition.depth(), 0);
  }

  replayableTransitions(): Transition[] {
    return this.props.transitions.filter(transition => transition.isReplayable());
  }

  /**
   * Same URL and pairwise equal transitions, regardless of identity or timing.
   */
  isEquivalentTo(other: TransitionLog): boolean {
    if (this.url !== other.url || this.length !== other.length) {
      return false;
    }
    const theirs = other.props.transitions;
    return this.props.transitions.every((transition, index) => transition.equals(theirs[index]));
  }

  duplicate(): TransitionLog {
    return TransitionLog.create(
      this.url,
      this.props.transitions.map(transition => transition.duplicate()),
      this.id
    );
  }

  summarize(): string {
    const steps = this.props.transitions.map(transition => transition.toString());
    return `${this.url} [depth ${this.depth()}]${steps.length > 0 ? `: ${steps.join(' → ')}` : ''}`;
  }

  toJSON(): { id: string; url: string; transitions: StructuredTransition[] } {
    return {
      id: this.id,
      url: this.url,
      transitions: this.props.transitions.map(transition => transition.toStructured()),
    };
  }
}
