import { z } from 'zod';
import { assertFields, assertProvidedFields, NOT_BLANK } from '../validation.js';

export const MAX_PRICE = 1_000_000;
export const MAX_STOCK = 1_000_000;

const idSchema = z
  .string()
  .regex(NOT_BLANK, 'product ID cannot be empty')
  .min(3, 'product ID must be at least 3 characters long')
  .max(50, 'product ID cannot exceed 50 characters');

const nameSchema = z
  .string()
  .regex(NOT_BLANK, 'product name cannot be empty')
  .min(2, 'product name must be at least 2 characters long')
  .max(200, 'product name cannot exceed 200 characters');

const descriptionSchema = z
  .string()
  .max(1000, 'product description cannot exceed 1000 characters');

const categorySchema = z
  .string()
  .regex(NOT_BLANK, 'product category cannot be empty')
  .min(2, 'product category must be at least 2 characters long')
  .max(100, 'product category cannot exceed 100 characters');

const priceSchema = z
  .number()
  .min(0, 'product price cannot be negative')
  .max(MAX_PRICE, 'product price cannot exceed 1,000,000');

const stockSchema = z
  .number()
  .min(0, 'product stock cannot be negative')
  .max(MAX_STOCK, 'product stock cannot exceed 1,000,000')
  .int('product stock must be a whole number');

export interface CreateProductInput {
  id: string;
  name: string;
  description: string;
  category: string;
  price: number;
  stock: number;
}

export interface ProductChanges {
  name?: string;
  description?: string;
  category?: string;
  price?: number;
  stock?: number;
}

/**
 * Field-level checks for product input, in the order
 * id, name, description, category, price, stock.
 */
export class ProductValidator {
  validateCreate(input: CreateProductInput): void {
    assertFields([
      { field: 'id', schema: idSchema, value: input.id },
      { field: 'name', schema: nameSchema, value: input.name },
      { field: 'description', schema: descriptionSchema, value: input.description },
      { field: 'category', schema: categorySchema, value: input.category },
      { field: 'price', schema: priceSchema, value: input.price },
      { field: 'stock', schema: stockSchema, value: input.stock },
    ]);
  }

  validateUpdate(id: string, changes: ProductChanges): void {
    assertFields([{ field: 'id', schema: idSchema, value: id }]);
    assertProvidedFields([
      { field: 'name', schema: nameSchema, value: changes.name },
      { field: 'description', schema: descriptionSchema, value: changes.description },
      { field: 'category', schema: categorySchema, value: changes.category },
      { field: 'price', schema: priceSchema, value: changes.price },
      { field: 'stock', schema: stockSchema, value: changes.stock },
    ]);
  }
}
