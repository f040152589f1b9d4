import type { ProductState } from '../../domain/products/product.js';
import type { Page } from '../../domain/repository.js';
import { notifyCommitted } from '../notify.js';
import { resolvePage } from '../pagination.js';
import type { ProductEventPublisher } from './productEventPublisher.js';
import type { ProductProcessor, StockChange } from './productProcessor.js';
import type {
  CreateProductInput,
  ProductChanges,
  ProductValidator,
} from './productValidator.js';

export interface ProductServiceOptions {
  defaultPageSize: number;
}

/**
 * Entry point for product operations: validate, process, notify.
 */
export class ProductService {
  constructor(
    private readonly validator: ProductValidator,
    private readonly processor: ProductProcessor,
    private readonly publisher: ProductEventPublisher,
    private readonly options: ProductServiceOptions
  ) {}

  async createProduct(input: CreateProductInput): Promise<ProductState> {
    this.validator.validateCreate(input);

    const product = await this.processor.createProduct(input);

    notifyCommitted('product.created', () => this.publisher.publishProductCreated(product));
    return product;
  }

  async updateProduct(id: string, changes: ProductChanges): Promise<ProductState> {
    this.validator.validateUpdate(id, changes);

    const product = await this.processor.updateProduct(id, changes);

    notifyCommitted('product.updated', () => this.publisher.publishProductUpdated(product));
    return product;
  }

  /**
   * Set stock to an absolute value.
   */
  async updateStock(id: string, newStock: number): Promise<ProductState> {
    this.validator.validateUpdate(id, { stock: newStock });
    return this.notifyStock(await this.processor.updateStock(id, newStock));
  }

  async addStock(id: string, quantity: number): Promise<ProductState> {
    return this.notifyStock(await this.processor.addStock(id, quantity));
  }

  /**
   * Rejects with InsufficientStockError when more is requested than held;
   * stock is then left untouched.
   */
  async removeStock(id: string, quantity: number): Promise<ProductState> {
    return this.notifyStock(await this.processor.removeStock(id, quantity));
  }

  async activateProduct(id: string): Promise<ProductState> {
    const product = await this.processor.activateProduct(id);
    notifyCommitted('product.activated', () => this.publisher.publishProductActivated(product));
    return product;
  }

  async deactivateProduct(id: string): Promise<ProductState> {
    const product = await this.processor.deactivateProduct(id);
    notifyCommitted('product.deactivated', () =>
      this.publisher.publishProductDeactivated(product)
    );
    return product;
  }

  async deleteProduct(id: string): Promise<ProductState> {
    const product = await this.processor.deleteProduct(id);
    const deletedAt = new Date();
    notifyCommitted('product.deleted', () =>
      this.publisher.publishProductDeleted(product, deletedAt)
    );
    return product;
  }

  getProduct(id: string): Promise<ProductState> {
    return this.processor.getProduct(id);
  }

  listProducts(page?: Partial<Page>): Promise<ProductState[]> {
    return this.processor.listProducts(this.page(page));
  }

  listAvailableProducts(page?: Partial<Page>): Promise<ProductState[]> {
    return this.processor.listAvailableProducts(this.page(page));
  }

  listProductsByCategory(category: string, page?: Partial<Page>): Promise<ProductState[]> {
    return this.processor.listProductsByCategory(category, this.page(page));
  }

  listProductsByPriceRange(
    minPrice: number,
    maxPrice: number,
    page?: Partial<Page>
  ): Promise<ProductState[]> {
    return this.processor.listProductsByPriceRange(minPrice, maxPrice, this.page(page));
  }

  private notifyStock(change: StockChange): ProductState {
    notifyCommitted('product.stock.updated', () =>
      this.publisher.publishStockUpdated(change.product, change.previousStock)
    );
    return change.product;
  }

  private page(page: Partial<Page> | undefined): Page {
    return resolvePage(page, this.options.defaultPageSize);
  }
}
