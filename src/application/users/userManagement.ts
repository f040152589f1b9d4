import type { UserState } from '../../domain/users/user.js';
import type { UserRepository } from '../../domain/users/userRepository.js';
import { everything } from '../../domain/repository.js';
import { runBulk, type BulkResult } from '../bulk.js';
import type { UserService } from './userService.js';
import type { CreateUserInput } from './userValidator.js';

export interface UserStatistics {
  totalUsers: number;
  activeUsers: number;
  inactiveUsers: number;
}

export interface UserSearchCriteria {
  email?: string;
  limit?: number;
  offset?: number;
}

/**
 * Operations spanning several users, built on top of UserService.
 */
export class UserManagementService {
  constructor(
    private readonly userService: UserService,
    private readonly userRepo: UserRepository
  ) {}

  bulkCreateUsers(requests: readonly CreateUserInput[]): Promise<BulkResult<UserState>> {
    return runBulk(requests, (request) => this.userService.createUser(request));
  }

  bulkDeactivateUsers(userIds: readonly string[]): Promise<BulkResult<UserState>> {
    return runBulk(userIds, (id) => this.userService.deactivateUser(id));
  }

  /**
   * Counts come from a single scan, so they describe one consistent view of
   * the store.
   */
  async getUserStatistics(): Promise<UserStatistics> {
    const users = await this.userRepo.scan(() => true, everything);
    const totalUsers = users.length;
    const activeUsers = users.filter((user) => user.isActive).length;

    return {
      totalUsers,
      activeUsers,
      inactiveUsers: totalUsers - activeUsers,
    };
  }

  /**
   * An email narrows the search to that single user (NotFoundError when
   * nobody has it); otherwise this is a paged listing.
   */
  async searchUsers(criteria: UserSearchCriteria): Promise<UserState[]> {
    if (criteria.email) {
      return [await this.userService.getUserByEmail(criteria.email)];
    }
    return this.userService.listUsers({ limit: criteria.limit, offset: criteria.offset });
  }
}
