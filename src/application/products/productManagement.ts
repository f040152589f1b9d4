import { isAvailable, type ProductState } from '../../domain/products/product.js';
import type { ProductRepository } from '../../domain/products/productRepository.js';
import { everything } from '../../domain/repository.js';
import { runBulk, type BulkResult } from '../bulk.js';
import type { ProductService } from './productService.js';
import { MAX_PRICE, type CreateProductInput } from './productValidator.js';

export interface StockUpdateRequest {
  productId: string;
  newStock: number;
}

export interface ProductStatistics {
  totalProducts: number;
  availableProducts: number;
  unavailableProducts: number;
}

export interface ProductSearchCriteria {
  category?: string;
  minPrice?: number;
  maxPrice?: number;
  limit?: number;
  offset?: number;
}

export class ProductManagementService {
  constructor(
    private readonly productService: ProductService,
    private readonly productRepo: ProductRepository
  ) {}

  bulkCreateProducts(
    requests: readonly CreateProductInput[]
  ): Promise<BulkResult<ProductState>> {
    return runBulk(requests, (request) => this.productService.createProduct(request));
  }

  bulkUpdateStock(
    requests: readonly StockUpdateRequest[]
  ): Promise<BulkResult<ProductState>> {
    return runBulk(requests, (request) =>
      this.productService.updateStock(request.productId, request.newStock)
    );
  }

  /**
   * Taken from one scan of the store.
   */
  async getProductStatistics(): Promise<ProductStatistics> {
    const products = await this.productRepo.scan(() => true, everything);
    const totalProducts = products.length;
    const availableProducts = products.filter(isAvailable).length;

    return {
      totalProducts,
      availableProducts,
      unavailableProducts: totalProducts - availableProducts,
    };
  }

  /**
   * Number of products per category.
   */
  async getCategoryStatistics(): Promise<Record<string, number>> {
    const products = await this.productRepo.scan(() => true, everything);
    const counts: Record<string, number> = {};
    for (const product of products) {
      counts[product.category] = (counts[product.category] ?? 0) + 1;
    }
    return counts;
  }

  /**
   * Category wins over price; a price search without an upper bound is
   * capped at the highest allowed price.
   */
  async searchProducts(criteria: ProductSearchCriteria): Promise<ProductState[]> {
    const page = { limit: criteria.limit, offset: criteria.offset };

    if (criteria.category) {
      return this.productService.listProductsByCategory(criteria.category, page);
    }

    const minPrice = criteria.minPrice ?? 0;
    const maxPrice = criteria.maxPrice ?? 0;
    if (minPrice > 0 || maxPrice > 0) {
      return this.productService.listProductsByPriceRange(
        minPrice,
        maxPrice === 0 ? MAX_PRICE : maxPrice,
        page
      );
    }

    return this.productService.listProducts(page);
  }
}
