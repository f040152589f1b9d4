import type { KeyedStore } from '../repository.js';
import type { UserState } from './user.js';

export interface UserRepository extends KeyedStore<UserState> {
  findByEmail(email: string): Promise<UserState | null>;
}
