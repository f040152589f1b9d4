import type { DomainEventMap } from '../domain/events.js';
import type { UserRepository } from '../domain/users/userRepository.js';
import type { ProductRepository } from '../domain/products/productRepository.js';
import { ServiceFactory, type AllServices } from '../application/serviceFactory.js';
import { InMemoryUserRepo } from './memory/userRepo.js';
import { InMemoryProductRepo } from './memory/productRepo.js';
import { InMemoryEventBus } from './events/inMemoryEventBus.js';
import { subscribeEventLogging } from './events/eventLogging.js';
import { loadConfig, type AppConfig } from './config/env.js';

export interface Container {
  config: AppConfig;
  userRepo: UserRepository;
  productRepo: ProductRepository;
  eventBus: InMemoryEventBus<DomainEventMap>;
  serviceFactory: ServiceFactory;
  services: AllServices;
}

/**
 * Composition root. Builds every adapter and service once and hands them
 * back; callers pass the pieces along explicitly.
 */
export function createContainer(config: AppConfig = loadConfig()): Container {
  const userRepo = new InMemoryUserRepo();
  const productRepo = new InMemoryProductRepo();

  const eventBus = new InMemoryEventBus<DomainEventMap>({
    onHandlerError: (error, eventType) => {
      console.error(`Handler for ${eventType} failed:`, error);
    },
  });
  if (config.logEvents) {
    subscribeEventLogging(eventBus);
  }

  const serviceFactory = new ServiceFactory(userRepo, productRepo, eventBus, {
    defaultPageSize: config.defaultPageSize,
  });

  return {
    config,
    userRepo,
    productRepo,
    eventBus,
    serviceFactory,
    services: serviceFactory.createAllServices(),
  };
}
