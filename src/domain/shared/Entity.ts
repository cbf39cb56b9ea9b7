import { randomUUID } from 'crypto';

/**
 * Base class for domain entities: objects with an identity that outlives
 * changes to their state.
 */
export abstract class Entity<T> {
  protected readonly _id: string;
  protected props: T;

  protected constructor(props: T, id?: string) {
    this._id = id ?? randomUUID();
    this.props = props;
  }

  public get id(): string {
    return this._id;
  }

  /**
   * Entities of the same kind are equal when their identifiers are.
   */
  public equals(other: Entity<T> | null | undefined): boolean {
    if (other === null || other === undefined) {
      return false;
    }
    return other.constructor === this.constructor && this._id === other._id;
  }
}
