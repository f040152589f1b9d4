import type { ProductState } from '../../domain/products/product.js';
import type {
  ProductCreated,
  ProductUpdated,
  StockUpdated,
  ProductActivated,
  ProductDeactivated,
  ProductDeleted,
} from '../../domain/products/events.js';
import type { DomainEventMap } from '../../domain/events.js';
import type { EventBus } from '../ports/eventBus.js';

export class ProductEventPublisher {
  constructor(private readonly eventBus: EventBus<DomainEventMap>) {}

  publishProductCreated(product: ProductState): void {
    const event: ProductCreated = {
      type: 'product.created',
      productId: product.id,
      name: product.name,
      category: product.category,
      price: product.price,
      stock: product.stock,
      createdAt: product.createdAt,
    };
    this.eventBus.publish(event.type, Object.freeze(structuredClone(event)));
  }

  publishProductUpdated(product: ProductState): void {
    const event: ProductUpdated = {
      type: 'product.updated',
      productId: product.id,
      name: product.name,
      category: product.category,
      price: product.price,
      stock: product.stock,
      updatedAt: product.updatedAt,
    };
    this.eventBus.publish(event.type, Object.freeze(structuredClone(event)));
  }

  publishStockUpdated(product: ProductState, oldStock: number): void {
    const event: StockUpdated = {
      type: 'product.stock.updated',
      productId: product.id,
      name: product.name,
      oldStock,
      newStock: product.stock,
      updatedAt: product.updatedAt,
    };
    this.eventBus.publish(event.type, Object.freeze(structuredClone(event)));
  }

  publishProductActivated(product: ProductState): void {
    const event: ProductActivated = {
      type: 'product.activated',
      productId: product.id,
      name: product.name,
      activatedAt: product.updatedAt,
    };
    this.eventBus.publish(event.type, Object.freeze(structuredClone(event)));
  }

  publishProductDeactivated(product: ProductState): void {
    const event: ProductDeactivated = {
      type: 'product.deactivated',
      productId: product.id,
      name: product.name,
      deactivatedAt: product.updatedAt,
    };
    this.eventBus.publish(event.type, Object.freeze(structuredClone(event)));
  }

  publishProductDeleted(product: ProductState, deletedAt: Date): void {
    const event: ProductDeleted = {
      type: 'product.deleted',
      productId: product.id,
      name: product.name,
      deletedAt,
    };
    this.eventBus.publish(event.type, Object.freeze(structuredClone(event)));
  }
}
