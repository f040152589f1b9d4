import {
  ValidationError,
  InvalidQuantityError,
  InsufficientStockError,
} from '../errors.js';

export interface ProductState {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly category: string;
  readonly price: number;
  readonly stock: number;
  readonly isActive: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

type MutableFields = Pick<
  ProductState,
  'name' | 'description' | 'category' | 'price' | 'stock' | 'isActive'
>;

/**
 * A product is available for sale when it is active and has stock left.
 * Derived, never stored.
 */
export function isAvailable(state: ProductState): boolean {
  return state.isActive && state.stock > 0;
}

/** Stock moves in whole, positive units. */
function assertQuantity(quantity: number): void {
  if (!Number.isSafeInteger(quantity) || quantity <= 0) {
    throw new InvalidQuantityError();
  }
}

/**
 * Product entity. Stock and price can never go negative; a rejected change
 * leaves the product exactly as it was.
 */
export class Product {
  private constructor(private state: ProductState) {}

  static create(
    id: string,
    name: string,
    description: string,
    category: string,
    price: number,
    stock: number
  ): Product {
    if (id.trim() === '') {
      throw new ValidationError('id', 'product ID cannot be empty');
    }
    if (name.trim() === '') {
      throw new ValidationError('name', 'product name cannot be empty');
    }
    if (price < 0) {
      throw new ValidationError('price', 'product price cannot be negative');
    }
    if (stock < 0) {
      throw new ValidationError('stock', 'product stock cannot be negative');
    }

    const now = new Date();
    return new Product({
      id,
      name,
      description,
      category,
      price,
      stock,
      isActive: true,
      createdAt: now,
      updatedAt: now,
    });
  }

  static fromState(state: ProductState): Product {
    return new Product({ ...state });
  }

  get id(): string {
    return this.state.id;
  }

  get stock(): number {
    return this.state.stock;
  }

  getState(): ProductState {
    return { ...this.state };
  }

  isAvailable(): boolean {
    return isAvailable(this.state);
  }

  updateName(newName: string): void {
    if (newName.trim() === '') {
      throw new ValidationError('name', 'name cannot be empty');
    }
    this.touch({ name: newName });
  }

  updateDescription(newDescription: string): void {
    this.touch({ description: newDescription });
  }

  updateCategory(newCategory: string): void {
    if (newCategory.trim() === '') {
      throw new ValidationError('category', 'category cannot be empty');
    }
    this.touch({ category: newCategory });
  }

  updatePrice(newPrice: number): void {
    if (newPrice < 0) {
      throw new ValidationError('price', 'price cannot be negative');
    }
    this.touch({ price: newPrice });
  }

  updateStock(newStock: number): void {
    if (newStock < 0) {
      throw new ValidationError('stock', 'stock cannot be negative');
    }
    this.touch({ stock: newStock });
  }

  addStock(quantity: number): void {
    assertQuantity(quantity);
    this.touch({ stock: this.state.stock + quantity });
  }

  removeStock(quantity: number): void {
    assertQuantity(quantity);
    if (this.state.stock < quantity) {
      throw new InsufficientStockError(this.state.stock, quantity);
    }
    this.touch({ stock: this.state.stock - quantity });
  }

  activate(): void {
    this.touch({ isActive: true });
  }

  deactivate(): void {
    this.touch({ isActive: false });
  }

  private touch(changes: Partial<MutableFields>): void {
    this.state = {
      ...this.state,
      ...changes,
      updatedAt: new Date(),
    };
  }
}
