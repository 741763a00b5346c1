import { v4 as uuidv4 } from 'uuid';
import { CartSnapshot, OrderSummary, PricedCartLine } from '../models.js';
import { ValidationError } from '../errors/index.js';

export const DEFAULT_ORDER_GREETING = 'Hello! I would like to place the following order:';

const WHATSAPP_BASE_URL = 'https://wa.me/';

// turns a priced cart into a chat message and a click-to-chat link
export class OrderMessageComposer {
  private readonly phone: string;
  private readonly greeting: string;
  private readonly currency: string;
  private readonly newOrderId: () => string;

  constructor(config?: {
    phone?: string;
    greeting?: string;
    currencySymbol?: string;
    idFactory?: () => string;
  }) {
    // wa.me takes the number in international format, digits only
    this.phone = (config?.phone ?? '').replace(/\D/g, '');
    this.greeting = config?.greeting ?? DEFAULT_ORDER_GREETING;
    this.currency = config?.currencySymbol ?? '$';
    this.newOrderId = config?.idFactory ?? (() => uuidv4());
  }

  compose(snapshot: CartSnapshot): OrderSummary {
    if (snapshot.lines.length === 0) {
      throw new ValidationError('Cart is empty.');
    }

    const orderId = this.newOrderId();
    const blocks = Array.from(groupLines(snapshot.lines), ([label, lines]) =>
      [`*${label}*`, ...lines.map(line => this.formatLine(line))].join('\n')
    );

    const message = [
      `${this.greeting}\nOrder ${orderId.slice(0, 8)}`,
      ...blocks,
      `Total: ${this.money(snapshot.total)}`,
    ].join('\n\n');

    return {
      orderId,
      message,
      total: snapshot.total,
      link: `${WHATSAPP_BASE_URL}${this.phone}?text=${encodeURIComponent(message)}`,
    };
  }

  private formatLine(line: PricedCartLine): string {
    const label = line.warehouseLabel || line.displayName;
    return `- ${label} x${line.quantity} @ ${this.money(line.effectiveUnitPrice)} = ${this.money(line.lineTotal)}`;
  }

  private money(amount: number): string {
    return `${this.currency}${amount.toFixed(2)}`;
  }
}

// groups keep the order in which their first line was added
function groupLines(lines: readonly PricedCartLine[]): Map<string, PricedCartLine[]> {
  const groups = new Map<string, PricedCartLine[]>();
  for (const line of lines) {
    const label = line.subcategoryLabel || line.primaryCategoryLabel || 'Other';
    const group = groups.get(label);
    if (group) {
      group.push(line);
    } else {
      groups.set(label, [line]);
    }
  }
  return groups;
}
