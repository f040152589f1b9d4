export { createContainer, type Container } from './infra/container.js';
export { loadConfig, type AppConfig } from './infra/config/env.js';
export { ServiceFactory, type AllServices } from './application/serviceFactory.js';
export { InMemoryEventBus } from './infra/events/inMemoryEventBus.js';
export { InMemoryKeyedStore } from './infra/memory/keyedStore.js';
export { InMemoryUserRepo } from './infra/memory/userRepo.js';
export { InMemoryProductRepo } from './infra/memory/productRepo.js';
export { User, type UserState } from './domain/users/user.js';
export { Product, isAvailable, type ProductState } from './domain/products/product.js';
export type { DomainEvent, DomainEventMap, DomainEventType } from './domain/events.js';
export type { KeyedStore, Page, Predicate } from './domain/repository.js';
export type { UserRepository } from './domain/users/userRepository.js';
export type { ProductRepository } from './domain/products/productRepository.js';
export type { EventBus, EventHandler } from './application/ports/eventBus.js';
export type { BulkResult, BulkOperationError } from './application/bulk.js';
export {
  DomainError,
  ValidationError,
  InvalidStateError,
  InvalidQuantityError,
  InsufficientStockError,
} from './domain/errors.js';
export { NotFoundError, AlreadyExistsError } from './application/errors.js';
