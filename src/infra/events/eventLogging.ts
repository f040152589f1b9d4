import { DOMAIN_EVENT_TYPES, type DomainEvent, type DomainEventMap } from '../../domain/events.js';
import type { EventBus } from '../../application/ports/eventBus.js';

/**
 * One-line, human readable summary of an event.
 */
export function describeEvent(event: DomainEvent): string {
  switch (event.type) {
    case 'user.created':
      return `User created - ID: ${event.userId}, Email: ${event.email}, Name: ${event.name}`;
    case 'user.updated':
      return `User updated - ID: ${event.userId}, Email: ${event.email}, Name: ${event.name}`;
    case 'user.activated':
      return `User activated - ID: ${event.userId}`;
    case 'user.deactivated':
      return `User deactivated - ID: ${event.userId}`;
    case 'user.deleted':
      return `User deleted - ID: ${event.userId}`;
    case 'product.created':
      return `Product created - ID: ${event.productId}, Name: ${event.name}, Price: $${event.price.toFixed(2)}`;
    case 'product.updated':
      return `Product updated - ID: ${event.productId}, Name: ${event.name}, Price: $${event.price.toFixed(2)}`;
    case 'product.stock.updated':
      return `Stock updated - Product: ${event.name}, Previous: ${event.oldStock}, Current: ${event.newStock}`;
    case 'product.activated':
      return `Product activated - ID: ${event.productId}`;
    case 'product.deactivated':
      return `Product deactivated - ID: ${event.productId}`;
    case 'product.deleted':
      return `Product deleted - ID: ${event.productId}`;
  }
}

/**
 * Log every domain event to the console.
 */
export function subscribeEventLogging(eventBus: EventBus<DomainEventMap>): void {
  for (const type of DOMAIN_EVENT_TYPES) {
    eventBus.subscribe(type, (event) => {
      console.log(`[event] ${describeEvent(event)}`);
    });
  }
}
