import { CartLine } from '../models.js';

export interface IPricingStrategy {
  // `lines` is the whole cart: a line's price may depend on its neighbours
  effectiveUnitPrice(line: CartLine, lines: readonly CartLine[]): number;
  bulkQuantity?(lines: readonly CartLine[]): number;
}

// catalog price, no discounts
export class StandardPricingStrategy implements IPricingStrategy {
  effectiveUnitPrice(line: CartLine): number {
    return line.unitPrice;
  }
}

export interface PriceTier {
  minQuantity: number;
  unitPrice: number;
}

export const DEFAULT_BULK_CATEGORIES = ['bulk-a', 'bulk-b'];

export const DEFAULT_PRICE_TIERS: PriceTier[] = [
  { minQuantity: 5, unitPrice: 25 },
  { minQuantity: 2, unitPrice: 30 },
  { minQuantity: 1, unitPrice: 35 },
];

// combined tier discount: the summed quantity of all bulk-category lines picks one price for all of them
export class BulkTierPricingStrategy implements IPricingStrategy {
  private readonly bulkCategories: ReadonlySet<string>;
  private readonly tiers: PriceTier[];

  constructor(config?: { bulkCategories?: string[]; tiers?: PriceTier[] }) {
    this.bulkCategories = new Set(config?.bulkCategories ?? DEFAULT_BULK_CATEGORIES);
    const tiers = config?.tiers ?? DEFAULT_PRICE_TIERS;
    if (tiers.length === 0) {
      throw new Error('BulkTierPricingStrategy needs at least one price tier');
    }
    // highest threshold first
    this.tiers = [...tiers].sort((a, b) => b.minQuantity - a.minQuantity);
  }

  isBulk(line: CartLine): boolean {
    return this.bulkCategories.has(line.categoryCode);
  }

  bulkQuantity(lines: readonly CartLine[]): number {
    return lines.reduce((sum, line) => (this.isBulk(line) ? sum + line.quantity : sum), 0);
  }

  tierPrice(bulkQuantity: number): number {
    const tier = this.tiers.find(t => bulkQuantity >= t.minQuantity);
    // below every threshold: the lowest tier is the floor
    return (tier ?? this.tiers[this.tiers.length - 1]).unitPrice;
  }

  effectiveUnitPrice(line: CartLine, lines: readonly CartLine[]): number {
    if (!this.isBulk(line)) return line.unitPrice;
    return this.tierPrice(this.bulkQuantity(lines));
  }
}
