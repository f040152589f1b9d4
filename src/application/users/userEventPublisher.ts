import type { UserState } from '../../domain/users/user.js';
import type {
  UserCreated,
  UserUpdated,
  UserActivated,
  UserDeactivated,
  UserDeleted,
} from '../../domain/users/events.js';
import type { DomainEventMap } from '../../domain/events.js';
import type { EventBus } from '../ports/eventBus.js';

/**
 * Turns stored user states into events on the bus. Each payload is a frozen
 * copy that shares no objects with the state it was built from.
 */
export class UserEventPublisher {
  constructor(private readonly eventBus: EventBus<DomainEventMap>) {}

  publishUserCreated(user: UserState): void {
    const event: UserCreated = {
      type: 'user.created',
      userId: user.id,
      email: user.email,
      name: user.name,
      createdAt: user.createdAt,
    };
    this.eventBus.publish(event.type, Object.freeze(structuredClone(event)));
  }

  publishUserUpdated(user: UserState): void {
    const event: UserUpdated = {
      type: 'user.updated',
      userId: user.id,
      email: user.email,
      name: user.name,
      updatedAt: user.updatedAt,
    };
    this.eventBus.publish(event.type, Object.freeze(structuredClone(event)));
  }

  publishUserActivated(user: UserState): void {
    const event: UserActivated = {
      type: 'user.activated',
      userId: user.id,
      email: user.email,
      activatedAt: user.updatedAt,
    };
    this.eventBus.publish(event.type, Object.freeze(structuredClone(event)));
  }

  publishUserDeactivated(user: UserState): void {
    const event: UserDeactivated = {
      type: 'user.deactivated',
      userId: user.id,
      email: user.email,
      deactivatedAt: user.updatedAt,
    };
    this.eventBus.publish(event.type, Object.freeze(structuredClone(event)));
  }

  publishUserDeleted(user: UserState, deletedAt: Date): void {
    const event: UserDeleted = {
      type: 'user.deleted',
      userId: user.id,
      email: user.email,
      deletedAt,
    };
    this.eventBus.publish(event.type, Object.freeze(structuredClone(event)));
  }
}
