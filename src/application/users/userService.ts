import type { UserState } from '../../domain/users/user.js';
import type { Page } from '../../domain/repository.js';
import { notifyCommitted } from '../notify.js';
import { resolvePage } from '../pagination.js';
import type { UserEventPublisher } from './userEventPublisher.js';
import type { UserProcessor } from './userProcessor.js';
import type { CreateUserInput, UserChanges, UserValidator } from './userValidator.js';

export interface UserServiceOptions {
  defaultPageSize: number;
}

/**
 * Entry point for user operations. Writes run validate, then process, then
 * notify; reads go straight to the processor.
 */
export class UserService {
  constructor(
    private readonly validator: UserValidator,
    private readonly processor: UserProcessor,
    private readonly publisher: UserEventPublisher,
    private readonly options: UserServiceOptions
  ) {}

  async createUser(input: CreateUserInput): Promise<UserState> {
    this.validator.validateCreate(input);

    const user = await this.processor.createUser(input.id, input.email, input.name);

    notifyCommitted('user.created', () => this.publisher.publishUserCreated(user));
    return user;
  }

  async updateUser(id: string, changes: UserChanges): Promise<UserState> {
    this.validator.validateUpdate(id, changes);

    const user = await this.processor.updateUser(id, changes);

    notifyCommitted('user.updated', () => this.publisher.publishUserUpdated(user));
    return user;
  }

  async activateUser(id: string): Promise<UserState> {
    const user = await this.processor.activateUser(id);
    notifyCommitted('user.activated', () => this.publisher.publishUserActivated(user));
    return user;
  }

  async deactivateUser(id: string): Promise<UserState> {
    const user = await this.processor.deactivateUser(id);
    notifyCommitted('user.deactivated', () => this.publisher.publishUserDeactivated(user));
    return user;
  }

  async deleteUser(id: string): Promise<UserState> {
    const user = await this.processor.deleteUser(id);
    const deletedAt = new Date();
    notifyCommitted('user.deleted', () => this.publisher.publishUserDeleted(user, deletedAt));
    return user;
  }

  getUser(id: string): Promise<UserState> {
    return this.processor.getUser(id);
  }

  getUserByEmail(email: string): Promise<UserState> {
    return this.processor.getUserByEmail(email);
  }

  listUsers(page?: Partial<Page>): Promise<UserState[]> {
    return this.processor.listUsers(resolvePage(page, this.options.defaultPageSize));
  }

  listActiveUsers(page?: Partial<Page>): Promise<UserState[]> {
    return this.processor.listActiveUsers(resolvePage(page, this.options.defaultPageSize));
  }
}
