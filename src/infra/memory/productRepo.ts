import type { ProductState } from '../../domain/products/product.js';
import type { ProductRepository } from '../../domain/products/productRepository.js';
import { everything } from '../../domain/repository.js';
import { InMemoryKeyedStore } from './keyedStore.js';

export class InMemoryProductRepo
  extends InMemoryKeyedStore<ProductState>
  implements ProductRepository
{
  constructor() {
    super('product');
  }

  findByName(name: string): Promise<ProductState[]> {
    return this.lock.read(() => this.collect((product) => product.name === name, everything));
  }
}
