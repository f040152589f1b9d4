import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ServiceFactory } from '../../serviceFactory.js';
import type { UserManagementService } from '../userManagement.js';
import type { UserService } from '../userService.js';
import { InMemoryUserRepo } from '../../../infra/memory/userRepo.js';
import { InMemoryProductRepo } from '../../../infra/memory/productRepo.js';
import { InMemoryEventBus } from '../../../infra/events/inMemoryEventBus.js';
import type { DomainEventMap } from '../../../domain/events.js';
import { NotFoundError } from '../../errors.js';

describe('UserManagementService', () => {
  let userService: UserService;
  let management: UserManagementService;
  let userRepo: InMemoryUserRepo;

  beforeEach(() => {
    userRepo = new InMemoryUserRepo();
    const factory = new ServiceFactory(
      userRepo,
      new InMemoryProductRepo(),
      new InMemoryEventBus<DomainEventMap>(),
      { defaultPageSize: 10 }
    );
    userService = factory.createUserService();
    management = factory.createUserManagementService();
  });

  describe('bulkCreateUsers', () => {
    it('should create what it can and report the rest by index', async () => {
      const result = await management.bulkCreateUsers([
        { id: 'user-1', email: 'ada@example.com', name: 'Ada' },
        { id: 'u2', email: 'short@example.com', name: 'Short Id' },
        { id: 'user-3', email: 'ada@example.com', name: 'Same Email' },
        { id: 'user-4', email: 'grace@example.com', name: 'Grace' },
      ]);

      expect(result.items.map((user) => user.id)).toEqual(['user-1', 'user-4']);
      expect(result.errors).toEqual([
        { index: 1, message: 'user ID must be at least 3 characters long' },
        { index: 2, message: 'email already in use' },
      ]);
    });
  });

  describe('bulkDeactivateUsers', () => {
    it('should deactivate known users and report unknown ones', async () => {
      await userService.createUser({ id: 'user-1', email: 'ada@example.com', name: 'Ada' });
      await userService.createUser({ id: 'user-2', email: 'grace@example.com', name: 'Grace' });

      const result = await management.bulkDeactivateUsers(['user-1', 'ghost', 'user-2']);

      expect(result.items.map((user) => user.isActive)).toEqual([false, false]);
      expect(result.errors).toEqual([{ index: 1, message: 'user not found' }]);
    });
  });

  describe('getUserStatistics', () => {
    it('should count active and inactive users', async () => {
      await userService.createUser({ id: 'user-1', email: 'ada@example.com', name: 'Ada' });
      await userService.createUser({ id: 'user-2', email: 'grace@example.com', name: 'Grace' });
      await userService.createUser({ id: 'user-3', email: 'alan@example.com', name: 'Alan' });
      await userService.deactivateUser('user-2');

      await expect(management.getUserStatistics()).resolves.toEqual({
        totalUsers: 3,
        activeUsers: 2,
        inactiveUsers: 1,
      });
    });

    it('should read the store in a single pass', async () => {
      await userService.createUser({ id: 'user-1', email: 'ada@example.com', name: 'Ada' });
      const scan = vi.spyOn(userRepo, 'scan');
      const count = vi.spyOn(userRepo, 'count');
      const countWhere = vi.spyOn(userRepo, 'countWhere');

      const [statistics] = await Promise.all([
        management.getUserStatistics(),
        userService.deactivateUser('user-1'),
      ]);

      expect(statistics).toEqual({ totalUsers: 1, activeUsers: 1, inactiveUsers: 0 });
      expect(scan).toHaveBeenCalledTimes(1);
      expect(count).not.toHaveBeenCalled();
      expect(countWhere).not.toHaveBeenCalled();
    });

    it('should report zeros for an empty store', async () => {
      await expect(management.getUserStatistics()).resolves.toEqual({
        totalUsers: 0,
        activeUsers: 0,
        inactiveUsers: 0,
      });
    });
  });

  describe('searchUsers', () => {
    beforeEach(async () => {
      await userService.createUser({ id: 'user-1', email: 'ada@example.com', name: 'Ada' });
      await userService.createUser({ id: 'user-2', email: 'grace@example.com', name: 'Grace' });
      await userService.createUser({ id: 'user-3', email: 'alan@example.com', name: 'Alan' });
    });

    it('should look up a single user by email', async () => {
      const found = await management.searchUsers({ email: 'grace@example.com' });
      expect(found.map((user) => user.id)).toEqual(['user-2']);
    });

    it('should fail when no user has the email', async () => {
      await expect(management.searchUsers({ email: 'nobody@example.com' })).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it('should page through users without an email', async () => {
      const page = await management.searchUsers({ limit: 2, offset: 1 });
      expect(page.map((user) => user.id)).toEqual(['user-2', 'user-3']);
    });
  });
});
