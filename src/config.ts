import { DEFAULT_BULK_CATEGORIES } from './domain/strategies/IPricingStrategy.js';
import { DEFAULT_CART_STORAGE_KEY } from './domain/services/CartEngine.js';
import { DEFAULT_ORDER_GREETING } from './domain/services/OrderMessageComposer.js';

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: string;
  corsOrigin: string[] | true;
  apiTitle: string;
  apiVersion: string;
  apiDescription: string;
  apiBaseUrl?: string;
  storageFile: string;
  storageKey: string;
  bulkCategoryCodes: string[];
  orderPhone: string;
  orderGreeting: string;
  currencySymbol: string;
}

function splitList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map(s => s.trim())
    .filter(s => s.length > 0);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const corsOrigins = splitList(env.CORS_ORIGIN);
  const bulkCategoryCodes = splitList(env.BULK_CATEGORY_CODES);

  return {
    port: parseInt(env.PORT || '3000', 10),
    host: env.HOST || '0.0.0.0',
    nodeEnv: env.NODE_ENV || 'development',
    logLevel: env.LOG_LEVEL || 'info',
    corsOrigin: corsOrigins.length > 0 ? corsOrigins : true,
    apiTitle: env.API_TITLE || 'Storefront Cart API',
    apiVersion: env.API_VERSION || '1.0.0',
    apiDescription:
      env.API_DESCRIPTION || 'Shopping cart with tiered bulk pricing and chat order hand-off',
    apiBaseUrl: env.API_BASE_URL,
    storageFile: env.CART_STORAGE_FILE || '.data/cart.json',
    storageKey: env.CART_STORAGE_KEY || DEFAULT_CART_STORAGE_KEY,
    bulkCategoryCodes: bulkCategoryCodes.length > 0 ? bulkCategoryCodes : DEFAULT_BULK_CATEGORIES,
    orderPhone: env.ORDER_PHONE || '',
    orderGreeting: env.ORDER_GREETING || DEFAULT_ORDER_GREETING,
    currencySymbol: env.CURRENCY_SYMBOL || '$',
  };
}
