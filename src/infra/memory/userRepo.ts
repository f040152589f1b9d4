import type { UserState } from '../../domain/users/user.js';
import type { UserRepository } from '../../domain/users/userRepository.js';
import { InMemoryKeyedStore } from './keyedStore.js';

export class InMemoryUserRepo extends InMemoryKeyedStore<UserState> implements UserRepository {
  constructor() {
    super('user');
  }

  findByEmail(email: string): Promise<UserState | null> {
    return this.lock.read(() => {
      for (const user of this.entities.values()) {
        if (user.email === email) {
          return structuredClone(user);
        }
      }
      return null;
    });
  }
}
