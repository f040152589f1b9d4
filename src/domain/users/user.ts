import { ValidationError } from '../errors.js';

/**
 * User state snapshot. This is the shape stores hold and services hand out.
 */
export interface UserState {
  readonly id: string;
  readonly email: string;
  readonly name: string;
  readonly isActive: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/**
 * User entity. Its methods are the only sanctioned way to change a user;
 * each successful change re-stamps `updatedAt`.
 */
export class User {
  private constructor(private state: UserState) {}

  /**
   * Create a new, active user. Re-checks the invariants the validator
   * already covered so the entity never exists in a broken state.
   */
  static create(id: string, email: string, name: string): User {
    if (id.trim() === '') {
      throw new ValidationError('id', 'user ID cannot be empty');
    }
    if (email.trim() === '') {
      throw new ValidationError('email', 'user email cannot be empty');
    }
    if (name.trim() === '') {
      throw new ValidationError('name', 'user name cannot be empty');
    }

    const now = new Date();
    return new User({
      id,
      email,
      name,
      isActive: true,
      createdAt: now,
      updatedAt: now,
    });
  }

  /**
   * Rehydrate a user loaded from a store.
   */
  static fromState(state: UserState): User {
    return new User({ ...state });
  }

  get id(): string {
    return this.state.id;
  }

  getState(): UserState {
    return { ...this.state };
  }

  updateEmail(newEmail: string): void {
    if (newEmail.trim() === '') {
      throw new ValidationError('email', 'email cannot be empty');
    }
    this.touch({ email: newEmail });
  }

  updateName(newName: string): void {
    if (newName.trim() === '') {
      throw new ValidationError('name', 'name cannot be empty');
    }
    this.touch({ name: newName });
  }

  activate(): void {
    this.touch({ isActive: true });
  }

  deactivate(): void {
    this.touch({ isActive: false });
  }

  private touch(changes: Partial<Pick<UserState, 'email' | 'name' | 'isActive'>>): void {
    this.state = {
      ...this.state,
      ...changes,
      updatedAt: new Date(),
    };
  }
}
