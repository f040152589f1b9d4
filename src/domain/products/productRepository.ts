import type { KeyedStore } from '../repository.js';
import type { ProductState } from './product.js';

export interface ProductRepository extends KeyedStore<ProductState> {
  /** Exact, case-sensitive match; several products may share a name. */
  findByName(name: string): Promise<ProductState[]>;
}
