import { CartLine, CartListener, CartSnapshot, PricedCartLine, roundMoney } from '../models.js';
import { IKeyValueStore } from '../../infrastructure/storage/IKeyValueStore.js';
import { IPricingStrategy } from '../strategies/IPricingStrategy.js';
import { deserializeCartLines, pickCartLine, serializeCartLines } from '../codec/cartLineCodec.js';
import { ValidationError } from '../errors/index.js';
import { logger as rootLogger, type Logger } from '../../infrastructure/logger.js';

export const DEFAULT_CART_STORAGE_KEY = 'storefront.cart.v1';

// one line per product, in insertion order, mirrored to storage after every mutation.
// storage failures are logged, never thrown; listeners hear about a change after the write
export class CartEngine {
  private items = new Map<string, CartLine>();
  private listeners: CartListener[] = [];
  private pendingNotifications = 0;
  private notifying = false;
  private readonly storageKey: string;
  private readonly log: Logger;

  constructor(
    private readonly store: IKeyValueStore,
    private readonly pricing: IPricingStrategy,
    config?: {
      storageKey?: string;
      logger?: Logger;
    }
  ) {
    this.storageKey = config?.storageKey ?? DEFAULT_CART_STORAGE_KEY;
    this.log = config?.logger ?? rootLogger.child({ module: 'cart-engine' });
  }

  // replaces in-memory state with whatever storage holds; never throws
  load(): void {
    this.items = new Map();

    let raw: string | null;
    try {
      raw = this.store.getItem(this.storageKey);
    } catch (err) {
      this.log.warn({ err, key: this.storageKey }, 'cart storage read failed, starting with an empty cart');
      return;
    }
    if (raw === null || raw.trim() === '') return;

    let lines: CartLine[];
    try {
      lines = deserializeCartLines(raw);
    } catch (err) {
      this.log.warn({ err, key: this.storageKey }, 'persisted cart is malformed, starting with an empty cart');
      return;
    }

    for (const line of lines) this.merge(line);
    this.log.debug({ lines: this.items.size }, 'cart loaded');
  }

  // merges quantities if the product is already in the cart
  addItem(line: CartLine): void {
    this.validateLine(line);
    this.merge(line);
    this.commit();
  }

  updateQuantity(productId: string, quantity: number): void {
    if (!Number.isInteger(quantity)) {
      throw new ValidationError('Quantity must be an integer.');
    }

    const line = this.items.get(productId);
    if (line) {
      if (quantity <= 0) {
        this.items.delete(productId);
      } else {
        line.quantity = quantity;
      }
    }
    this.commit();
  }

  removeItem(productId: string): void {
    this.items.delete(productId);
    this.commit();
  }

  clear(): void {
    this.items.clear();
    this.commit();
  }

  isInCart(productId: string): boolean {
    return this.items.has(productId);
  }

  quantityOf(productId: string): number {
    return this.items.get(productId)?.quantity ?? 0;
  }

  lines(): CartLine[] {
    return Array.from(this.items.values(), line => ({ ...line }));
  }

  // recomputed on every call: a bulk line's price depends on the other lines
  effectiveUnitPrice(line: CartLine): number {
    return this.pricing.effectiveUnitPrice(line, Array.from(this.items.values()));
  }

  // sum of the rounded line totals, so printed lines always add up to it
  total(): number {
    return sumLineTotals(this.priceLines());
  }

  snapshot(): CartSnapshot {
    const lines = Array.from(this.items.values());
    const priced = this.priceLines();

    return {
      lines: priced,
      itemCount: lines.reduce((sum, line) => sum + line.quantity, 0),
      bulkQuantity: this.pricing.bulkQuantity?.(lines) ?? 0,
      total: sumLineTotals(priced),
    };
  }

  subscribe(listener: CartListener): () => void {
    this.listeners.push(listener);
    return () => this.unsubscribe(listener);
  }

  unsubscribe(listener: CartListener): void {
    this.listeners = this.listeners.filter(l => l !== listener);
  }

  private priceLines(): PricedCartLine[] {
    const lines = Array.from(this.items.values());
    return lines.map(line => {
      const effectiveUnitPrice = this.pricing.effectiveUnitPrice(line, lines);
      return {
        ...line,
        effectiveUnitPrice,
        lineTotal: roundMoney(effectiveUnitPrice * line.quantity),
      };
    });
  }

  private merge(line: CartLine): void {
    const existing = this.items.get(line.productId);
    if (existing) {
      existing.quantity += line.quantity;
    } else {
      this.items.set(line.productId, pickCartLine(line));
    }
  }

  private commit(): void {
    this.persist();
    this.notify();
  }

  private persist(): void {
    try {
      this.store.setItem(this.storageKey, serializeCartLines(Array.from(this.items.values())));
    } catch (err) {
      this.log.warn({ err, key: this.storageKey }, 'cart storage write failed, keeping changes in memory');
    }
  }

  // a mutation made inside a listener queues its notification until this round ends
  private notify(): void {
    this.pendingNotifications++;
    if (this.notifying) return;

    this.notifying = true;
    try {
      while (this.pendingNotifications > 0) {
        this.pendingNotifications--;
        const snapshot = this.snapshot();
        // copy so a listener can unsubscribe itself mid-round
        for (const listener of [...this.listeners]) {
          try {
            listener(snapshot);
          } catch (err) {
            this.log.error({ err }, 'cart listener failed');
          }
        }
      }
    } finally {
      this.notifying = false;
    }
  }

  private validateLine(line: CartLine): void {
    if (typeof line.productId !== 'string' || line.productId === '') {
      throw new ValidationError('Product ID is required.');
    }
    if (typeof line.unitPrice !== 'number' || !Number.isFinite(line.unitPrice) || line.unitPrice < 0) {
      throw new ValidationError('Unit price must be a non-negative number.');
    }
    if (!Number.isInteger(line.quantity) || line.quantity < 1) {
      throw new ValidationError('Quantity must be an integer of at least 1.');
    }
  }
}

function sumLineTotals(lines: readonly PricedCartLine[]): number {
  return roundMoney(lines.reduce((sum, line) => sum + line.lineTotal, 0));
}
