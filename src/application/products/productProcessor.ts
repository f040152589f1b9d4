import { Product, isAvailable, type ProductState } from '../../domain/products/product.js';
import type { ProductRepository } from '../../domain/products/productRepository.js';
import type { Page } from '../../domain/repository.js';
import { AlreadyExistsError, NotFoundError } from '../errors.js';
import { Mutex } from '../lock.js';
import type { CreateProductInput, ProductChanges } from './productValidator.js';

export interface StockChange {
  product: ProductState;
  previousStock: number;
}

/**
 * Applies product changes to the store; the only writer of the product store.
 */
export class ProductProcessor {
  private readonly writes = new Mutex();

  constructor(private readonly productRepo: ProductRepository) {}

  createProduct(input: CreateProductInput): Promise<ProductState> {
    return this.writes.runExclusive(async () => {
      if (await this.productRepo.exists(input.id)) {
        throw new AlreadyExistsError('product already exists');
      }

      const product = Product.create(
        input.id,
        input.name,
        input.description,
        input.category,
        input.price,
        input.stock
      );
      await this.productRepo.save(product.getState());
      return product.getState();
    });
  }

  /**
   * Apply every provided field through the entity; a failing field aborts
   * the whole update before anything is saved.
   */
  updateProduct(id: string, changes: ProductChanges): Promise<ProductState> {
    return this.writes.runExclusive(async () => {
      const product = await this.load(id);

      if (changes.name !== undefined) {
        product.updateName(changes.name);
      }
      if (changes.description !== undefined) {
        product.updateDescription(changes.description);
      }
      if (changes.category !== undefined) {
        product.updateCategory(changes.category);
      }
      if (changes.price !== undefined) {
        product.updatePrice(changes.price);
      }
      if (changes.stock !== undefined) {
        product.updateStock(changes.stock);
      }

      await this.productRepo.save(product.getState());
      return product.getState();
    });
  }

  updateStock(id: string, newStock: number): Promise<StockChange> {
    return this.changeStock(id, (product) => product.updateStock(newStock));
  }

  addStock(id: string, quantity: number): Promise<StockChange> {
    return this.changeStock(id, (product) => product.addStock(quantity));
  }

  removeStock(id: string, quantity: number): Promise<StockChange> {
    return this.changeStock(id, (product) => product.removeStock(quantity));
  }

  activateProduct(id: string): Promise<ProductState> {
    return this.writes.runExclusive(async () => {
      const product = await this.load(id);
      product.activate();
      await this.productRepo.save(product.getState());
      return product.getState();
    });
  }

  deactivateProduct(id: string): Promise<ProductState> {
    return this.writes.runExclusive(async () => {
      const product = await this.load(id);
      product.deactivate();
      await this.productRepo.save(product.getState());
      return product.getState();
    });
  }

  deleteProduct(id: string): Promise<ProductState> {
    return this.writes.runExclusive(async () => {
      const product = await this.load(id);
      await this.productRepo.delete(id);
      return product.getState();
    });
  }

  async getProduct(id: string): Promise<ProductState> {
    const product = await this.productRepo.findById(id);
    if (!product) {
      throw new NotFoundError('product not found');
    }
    return product;
  }

  listProducts(page: Page): Promise<ProductState[]> {
    return this.productRepo.scan(() => true, page);
  }

  listAvailableProducts(page: Page): Promise<ProductState[]> {
    return this.productRepo.scan(isAvailable, page);
  }

  listProductsByCategory(category: string, page: Page): Promise<ProductState[]> {
    return this.productRepo.scan((product) => product.category === category, page);
  }

  /**
   * Both bounds are inclusive.
   */
  listProductsByPriceRange(
    minPrice: number,
    maxPrice: number,
    page: Page
  ): Promise<ProductState[]> {
    return this.productRepo.scan(
      (product) => product.price >= minPrice && product.price <= maxPrice,
      page
    );
  }

  private changeStock(id: string, apply: (product: Product) => void): Promise<StockChange> {
    return this.writes.runExclusive(async () => {
      const product = await this.load(id);
      const previousStock = product.stock;
      apply(product);
      await this.productRepo.save(product.getState());
      return { product: product.getState(), previousStock };
    });
  }

  private async load(id: string): Promise<Product> {
    return Product.fromState(await this.getProduct(id));
  }
}
