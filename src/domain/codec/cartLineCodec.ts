import { CartLine } from '../models.js';
import { CartDeserializationError } from '../errors/index.js';

type StringField =
  | 'productId'
  | 'displayName'
  | 'categoryCode'
  | 'subcategoryLabel'
  | 'primaryCategoryLabel'
  | 'imageRef';

export function serializeCartLines(lines: readonly CartLine[]): string {
  return JSON.stringify(lines.map(pickCartLine));
}

export function deserializeCartLines(raw: string): CartLine[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new CartDeserializationError('payload is not valid JSON', err);
  }

  if (!Array.isArray(parsed)) {
    throw new CartDeserializationError('payload is not a list');
  }

  return parsed.map((record: unknown, index) => parseRecord(record, index));
}

// copies only the known fields; fixed field order keeps the stored payload stable
export function pickCartLine(line: CartLine): CartLine {
  const record: CartLine = {
    productId: line.productId,
    displayName: line.displayName,
    categoryCode: line.categoryCode,
    subcategoryLabel: line.subcategoryLabel,
    primaryCategoryLabel: line.primaryCategoryLabel,
    unitPrice: line.unitPrice,
    imageRef: line.imageRef,
    quantity: line.quantity,
  };
  if (line.warehouseLabel !== undefined) record.warehouseLabel = line.warehouseLabel;
  return record;
}

function parseRecord(record: unknown, index: number): CartLine {
  if (typeof record !== 'object' || record === null || Array.isArray(record)) {
    throw new CartDeserializationError(`entry ${index} is not an object`);
  }
  const fields = new Map<string, unknown>(Object.entries(record));

  const text = (field: StringField): string => {
    const value = fields.get(field);
    if (typeof value !== 'string') {
      throw new CartDeserializationError(`entry ${index} has no string '${field}'`);
    }
    return value;
  };

  const productId = text('productId');
  if (productId === '') {
    throw new CartDeserializationError(`entry ${index} has an empty 'productId'`);
  }

  const unitPrice = fields.get('unitPrice');
  if (typeof unitPrice !== 'number' || !Number.isFinite(unitPrice) || unitPrice < 0) {
    throw new CartDeserializationError(`entry ${index} has an invalid 'unitPrice'`);
  }

  const quantity = fields.get('quantity');
  if (typeof quantity !== 'number' || !Number.isInteger(quantity) || quantity < 1) {
    throw new CartDeserializationError(`entry ${index} has an invalid 'quantity'`);
  }

  const warehouseLabel = fields.get('warehouseLabel');
  if (warehouseLabel !== undefined && warehouseLabel !== null && typeof warehouseLabel !== 'string') {
    throw new CartDeserializationError(`entry ${index} has an invalid 'warehouseLabel'`);
  }

  const line: CartLine = {
    productId,
    displayName: text('displayName'),
    categoryCode: text('categoryCode'),
    subcategoryLabel: text('subcategoryLabel'),
    primaryCategoryLabel: text('primaryCategoryLabel'),
    unitPrice,
    imageRef: text('imageRef'),
    quantity,
  };
  if (typeof warehouseLabel === 'string') line.warehouseLabel = warehouseLabel;
  return line;
}
