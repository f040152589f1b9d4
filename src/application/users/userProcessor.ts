import { User, type UserState } from '../../domain/users/user.js';
import type { UserRepository } from '../../domain/users/userRepository.js';
import type { Page } from '../../domain/repository.js';
import { AlreadyExistsError, NotFoundError } from '../errors.js';
import { Mutex } from '../lock.js';
import type { UserChanges } from './userValidator.js';

/**
 * Applies user changes to the store. The processor is the only writer of
 * the user store; it does not validate input or publish events.
 *
 * Every check-then-save sequence runs under one lock, so two concurrent
 * creates of the same id cannot both pass the existence check.
 */
export class UserProcessor {
  private readonly writes = new Mutex();

  constructor(private readonly userRepo: UserRepository) {}

  createUser(id: string, email: string, name: string): Promise<UserState> {
    return this.writes.runExclusive(async () => {
      if (await this.userRepo.exists(id)) {
        throw new AlreadyExistsError('user already exists');
      }

      const owner = await this.userRepo.findByEmail(email);
      if (owner) {
        throw new AlreadyExistsError('email already in use');
      }

      const user = User.create(id, email, name);
      await this.userRepo.save(user.getState());
      return user.getState();
    });
  }

  /**
   * Apply every provided field through the entity. Nothing is saved unless
   * all of them succeed.
   */
  updateUser(id: string, changes: UserChanges): Promise<UserState> {
    return this.writes.runExclusive(async () => {
      const user = await this.load(id);

      if (changes.email !== undefined) {
        const owner = await this.userRepo.findByEmail(changes.email);
        if (owner && owner.id !== id) {
          throw new AlreadyExistsError('email already in use by another user');
        }
        user.updateEmail(changes.email);
      }

      if (changes.name !== undefined) {
        user.updateName(changes.name);
      }

      await this.userRepo.save(user.getState());
      return user.getState();
    });
  }

  activateUser(id: string): Promise<UserState> {
    return this.writes.runExclusive(async () => {
      const user = await this.load(id);
      user.activate();
      await this.userRepo.save(user.getState());
      return user.getState();
    });
  }

  deactivateUser(id: string): Promise<UserState> {
    return this.writes.runExclusive(async () => {
      const user = await this.load(id);
      user.deactivate();
      await this.userRepo.save(user.getState());
      return user.getState();
    });
  }

  /**
   * Remove the user entirely. Resolves to the last stored state.
   */
  deleteUser(id: string): Promise<UserState> {
    return this.writes.runExclusive(async () => {
      const user = await this.load(id);
      await this.userRepo.delete(id);
      return user.getState();
    });
  }

  async getUser(id: string): Promise<UserState> {
    const user = await this.userRepo.findById(id);
    if (!user) {
      throw new NotFoundError('user not found');
    }
    return user;
  }

  async getUserByEmail(email: string): Promise<UserState> {
    const user = await this.userRepo.findByEmail(email);
    if (!user) {
      throw new NotFoundError('user not found');
    }
    return user;
  }

  listUsers(page: Page): Promise<UserState[]> {
    return this.userRepo.scan(() => true, page);
  }

  listActiveUsers(page: Page): Promise<UserState[]> {
    return this.userRepo.scan((user) => user.isActive, page);
  }

  private async load(id: string): Promise<User> {
    return User.fromState(await this.getUser(id));
  }
}
