import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Product, isAvailable } from '../product.js';
import {
  ValidationError,
  InvalidQuantityError,
  InsufficientStockError,
  InvalidStateError,
} from '../../errors.js';

function keyboard(stock = 10): Product {
  return Product.create('prod-1', 'Keyboard', 'Tenkeyless', 'peripherals', 89.9, stock);
}

describe('Product', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-01T10:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('create', () => {
    it('should create an active product', () => {
      const state = keyboard().getState();

      expect(state).toEqual({
        id: 'prod-1',
        name: 'Keyboard',
        description: 'Tenkeyless',
        category: 'peripherals',
        price: 89.9,
        stock: 10,
        isActive: true,
        createdAt: new Date('2024-03-01T10:00:00Z'),
        updatedAt: new Date('2024-03-01T10:00:00Z'),
      });
    });

    it('should reject negative price and stock', () => {
      expect(() => Product.create('prod-1', 'Keyboard', '', 'peripherals', -1, 1)).toThrow(
        'product price cannot be negative'
      );
      expect(() => Product.create('prod-1', 'Keyboard', '', 'peripherals', 1, -1)).toThrow(
        'product stock cannot be negative'
      );
    });

    it('should reject a blank id or name', () => {
      expect(() => Product.create('', 'Keyboard', '', 'peripherals', 1, 1)).toThrow(ValidationError);
      expect(() => Product.create('prod-1', ' ', '', 'peripherals', 1, 1)).toThrow(
        'product name cannot be empty'
      );
    });
  });

  describe('stock', () => {
    it('should accumulate added stock', () => {
      const product = keyboard();

      product.addStock(5);
      product.addStock(10);

      expect(product.stock).toBe(25);
    });

    it('should refuse to remove more than is held and keep the stock', () => {
      const product = keyboard(25);

      expect(() => product.removeStock(30)).toThrow(InsufficientStockError);
      expect(product.stock).toBe(25);
    });

    it('should report how much was available and requested', () => {
      const product = keyboard(2);

      try {
        product.removeStock(3);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InsufficientStockError);
        expect(error).toMatchObject({ available: 2, requested: 3, message: 'insufficient stock' });
      }
    });

    it('should reject non-positive quantities as a distinct error', () => {
      const product = keyboard();

      expect(() => product.addStock(0)).toThrow(InvalidQuantityError);
      expect(() => product.removeStock(-2)).toThrow('quantity must be a positive whole number');
      expect(() => product.removeStock(-2)).not.toThrow(InsufficientStockError);
      expect(product.stock).toBe(10);
    });

    it.each([2.5, Number.NaN, Number.POSITIVE_INFINITY])(
      'should reject a quantity of %s and keep the stock',
      (quantity) => {
        const product = keyboard();

        expect(() => product.addStock(quantity)).toThrow(InvalidQuantityError);
        expect(() => product.removeStock(quantity)).toThrow(InvalidQuantityError);
        expect(product.stock).toBe(10);
      }
    );

    it('should classify both stock errors as invalid state', () => {
      expect(new InvalidQuantityError()).toBeInstanceOf(InvalidStateError);
      expect(new InsufficientStockError(1, 2)).toBeInstanceOf(InvalidStateError);
      expect(new InsufficientStockError(1, 2).name).toBe('InsufficientStockError');
    });

    it('should remove stock down to zero', () => {
      const product = keyboard(4);

      product.removeStock(4);

      expect(product.stock).toBe(0);
    });
  });

  describe('updates', () => {
    it('should apply each field through its own rule', () => {
      const product = keyboard();

      vi.setSystemTime(new Date('2024-03-02T10:00:00Z'));
      product.updateName('Keyboard Pro');
      product.updateDescription('');
      product.updateCategory('input');
      product.updatePrice(120);
      product.updateStock(3);

      expect(product.getState()).toMatchObject({
        name: 'Keyboard Pro',
        description: '',
        category: 'input',
        price: 120,
        stock: 3,
        updatedAt: new Date('2024-03-02T10:00:00Z'),
      });
    });

    it('should reject a negative price or stock', () => {
      const product = keyboard();

      expect(() => product.updatePrice(-0.01)).toThrow('price cannot be negative');
      expect(() => product.updateStock(-1)).toThrow('stock cannot be negative');
      expect(product.getState().price).toBe(89.9);
      expect(product.stock).toBe(10);
    });
  });

  describe('availability', () => {
    it('should be available only when active with stock', () => {
      const product = keyboard(1);
      expect(product.isAvailable()).toBe(true);

      product.deactivate();
      expect(product.isAvailable()).toBe(false);

      product.activate();
      product.removeStock(1);
      expect(product.isAvailable()).toBe(false);
      expect(isAvailable(product.getState())).toBe(false);
    });
  });
});
