import type { UserRepository } from '../domain/users/userRepository.js';
import type { ProductRepository } from '../domain/products/productRepository.js';
import type { DomainEventMap } from '../domain/events.js';
import type { EventBus } from './ports/eventBus.js';
import { UserValidator } from './users/userValidator.js';
import { UserProcessor } from './users/userProcessor.js';
import { UserEventPublisher } from './users/userEventPublisher.js';
import { UserService } from './users/userService.js';
import { UserManagementService } from './users/userManagement.js';
import { ProductValidator } from './products/productValidator.js';
import { ProductProcessor } from './products/productProcessor.js';
import { ProductEventPublisher } from './products/productEventPublisher.js';
import { ProductService } from './products/productService.js';
import { ProductManagementService } from './products/productManagement.js';

export interface ServiceFactoryOptions {
  defaultPageSize: number;
}

export interface AllServices {
  userService: UserService;
  productService: ProductService;
  userManagementService: UserManagementService;
  productManagementService: ProductManagementService;
}

/**
 * Builds services with their validator, processor and publisher wired in.
 *
 * One processor per store is shared by every service the factory builds, so
 * all writes to a store go through the same processor and its lock.
 */
export class ServiceFactory {
  private readonly userProcessor: UserProcessor;
  private readonly productProcessor: ProductProcessor;

  constructor(
    private readonly userRepo: UserRepository,
    private readonly productRepo: ProductRepository,
    private readonly eventBus: EventBus<DomainEventMap>,
    private readonly options: ServiceFactoryOptions
  ) {
    this.userProcessor = new UserProcessor(userRepo);
    this.productProcessor = new ProductProcessor(productRepo);
  }

  createUserService(): UserService {
    return new UserService(
      new UserValidator(),
      this.userProcessor,
      new UserEventPublisher(this.eventBus),
      this.options
    );
  }

  createProductService(): ProductService {
    return new ProductService(
      new ProductValidator(),
      this.productProcessor,
      new ProductEventPublisher(this.eventBus),
      this.options
    );
  }

  createUserManagementService(): UserManagementService {
    return new UserManagementService(this.createUserService(), this.userRepo);
  }

  createProductManagementService(): ProductManagementService {
    return new ProductManagementService(this.createProductService(), this.productRepo);
  }

  createAllServices(): AllServices {
    return {
      userService: this.createUserService(),
      productService: this.createProductService(),
      userManagementService: this.createUserManagementService(),
      productManagementService: this.createProductManagementService(),
    };
  }
}
