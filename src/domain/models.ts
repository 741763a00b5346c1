export interface CartLine {
  productId: string;
  displayName: string;
  categoryCode: string;
  subcategoryLabel: string;
  primaryCategoryLabel: string;
  unitPrice: number; // catalog price at add-time
  imageRef: string;
  warehouseLabel?: string;
  quantity: number;
}

export interface PricedCartLine extends CartLine {
  effectiveUnitPrice: number;
  lineTotal: number;
}

export interface CartSnapshot {
  lines: PricedCartLine[];
  itemCount: number;
  bulkQuantity: number;
  total: number;
}

export type CartListener = (snapshot: CartSnapshot) => void;

export interface UpdateQuantityRequest {
  quantity: number;
}

export interface OrderSummary {
  orderId: string;
  message: string;
  total: number;
  link: string;
}

// round to cents to avoid floating point weirdness
export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}
