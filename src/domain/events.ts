import type { UserEvent } from './users/events.js';
import type { ProductEvent } from './products/events.js';

export type DomainEvent = UserEvent | ProductEvent;

/**
 * Event payload by type tag, e.g. `DomainEventMap['user.created']`.
 */
export type DomainEventMap = {
  [E in DomainEvent as E['type']]: E;
};

export type DomainEventType = keyof DomainEventMap;

export const DOMAIN_EVENT_TYPES: readonly DomainEventType[] = [
  'user.created',
  'user.updated',
  'user.activated',
  'user.deactivated',
  'user.deleted',
  'product.created',
  'product.updated',
  'product.stock.updated',
  'product.activated',
  'product.deactivated',
  'product.deleted',
];
