import { randomUUID } from 'crypto';

/**
 * Base class for domain objects with identity and mutable state.
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
   * Entities are equal when their identities match.
   */
  public equals(other: Entity<T> | null | undefined): boolean {
    if (other === null || other === undefined) {
      return false;
    }
    return this._id === other._id;
  }
}
