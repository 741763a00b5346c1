import { CartLine } from '../src/domain/models.js';

export const makeLine = (productId: string, overrides: Partial<CartLine> = {}): CartLine => ({
  productId,
  displayName: `Product ${productId}`,
  categoryCode: 'other',
  subcategoryLabel: 'Misc',
  primaryCategoryLabel: 'General',
  unitPrice: 10,
  imageRef: `https://img.test/${productId}.jpg`,
  quantity: 1,
  ...overrides,
});

export const bulkA = (productId: string, quantity: number): CartLine =>
  makeLine(productId, { categoryCode: 'bulk-a', unitPrice: 35, quantity, subcategoryLabel: 'Frames' });

export const bulkB = (productId: string, quantity: number): CartLine =>
  makeLine(productId, { categoryCode: 'bulk-b', unitPrice: 35, quantity, subcategoryLabel: 'Signs' });
