import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { CartEngine } from './domain/services/CartEngine.js';
import { OrderMessageComposer } from './domain/services/OrderMessageComposer.js';
import { BulkTierPricingStrategy } from './domain/strategies/IPricingStrategy.js';
import { DomainError } from './domain/errors/index.js';
import { CartLine, UpdateQuantityRequest } from './domain/models.js';
import { IKeyValueStore } from './infrastructure/storage/IKeyValueStore.js';
import { FileKeyValueStore } from './infrastructure/storage/FileKeyValueStore.js';
import { logger } from './infrastructure/logger.js';
import { AppConfig, loadConfig } from './config.js';

export interface BuildAppOptions {
  config?: AppConfig;
  store?: IKeyValueStore; // defaults to the JSON file at config.storageFile
  orderIdFactory?: () => string;
}

const cartLineProperties = {
  productId: { type: 'string', minLength: 1 },
  displayName: { type: 'string' },
  categoryCode: { type: 'string' },
  subcategoryLabel: { type: 'string' },
  primaryCategoryLabel: { type: 'string' },
  unitPrice: { type: 'number', minimum: 0 },
  imageRef: { type: 'string' },
  warehouseLabel: { type: 'string' },
  quantity: { type: 'integer', minimum: 1 },
} as const;

const cartLineRequired = [
  'productId',
  'displayName',
  'categoryCode',
  'subcategoryLabel',
  'primaryCategoryLabel',
  'unitPrice',
  'imageRef',
  'quantity',
];

const productIdParams = {
  type: 'object',
  required: ['productId'],
  properties: {
    productId: { type: 'string', minLength: 1 },
  },
} as const;

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? loadConfig();

  const app = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  await app.register(swagger, {
    openapi: {
      openapi: '3.0.0',
      info: {
        title: config.apiTitle,
        description: config.apiDescription,
        version: config.apiVersion,
      },
      servers: [
        {
          url: config.apiBaseUrl || `http://${config.host}:${config.port}`,
          description: config.nodeEnv === 'production' ? 'Production server' : 'Development server',
        },
      ],
      tags: [
        { name: 'health', description: 'Health check endpoints' },
        { name: 'cart', description: 'Cart management operations' },
        { name: 'order', description: 'Order hand-off' },
      ],
      components: {
        schemas: {
          CartLine: {
            type: 'object',
            required: cartLineRequired,
            properties: cartLineProperties,
          },
          PricedCartLine: {
            allOf: [
              { $ref: '#/components/schemas/CartLine' },
              {
                type: 'object',
                properties: {
                  effectiveUnitPrice: { type: 'number' },
                  lineTotal: { type: 'number' },
                },
              },
            ],
          },
          CartSnapshot: {
            type: 'object',
            properties: {
              lines: {
                type: 'array',
                items: { $ref: '#/components/schemas/PricedCartLine' },
              },
              itemCount: { type: 'integer' },
              bulkQuantity: { type: 'integer' },
              total: { type: 'number' },
            },
          },
          OrderSummary: {
            type: 'object',
            properties: {
              orderId: { type: 'string', format: 'uuid' },
              message: { type: 'string' },
              total: { type: 'number' },
              link: { type: 'string', format: 'uri' },
            },
          },
          Error: {
            type: 'object',
            properties: {
              error: {
                type: 'object',
                properties: {
                  code: { type: 'string' },
                  message: { type: 'string' },
                  statusCode: { type: 'integer' },
                },
              },
              timestamp: { type: 'string', format: 'date-time' },
            },
          },
        },
      },
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
  });

  await app.register(cors, {
    origin: config.corsOrigin,
  });

  // composition root: one cart per process, owned here and handed to the routes
  const store =
    options.store ?? new FileKeyValueStore(config.storageFile, app.log.child({ module: 'file-store' }));
  const pricingStrategy = new BulkTierPricingStrategy({ bulkCategories: config.bulkCategoryCodes });
  const cart = new CartEngine(store, pricingStrategy, {
    storageKey: config.storageKey,
    logger: app.log.child({ module: 'cart-engine' }),
  });
  const composer = new OrderMessageComposer({
    phone: config.orderPhone,
    greeting: config.orderGreeting,
    currencySymbol: config.currencySymbol,
    idFactory: options.orderIdFactory,
  });

  cart.load();
  cart.subscribe(snapshot => {
    app.log.debug({ lines: snapshot.lines.length, total: snapshot.total }, 'cart changed');
  });

  app.get('/health', {
    schema: {
      tags: ['health'],
      description: 'Health check endpoint for load balancers and monitoring',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string', example: 'ok' },
            timestamp: { type: 'string', format: 'date-time' },
          },
        },
      },
    },
  }, async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // === Cart Routes ===

  app.get('/v1/cart', {
    schema: {
      tags: ['cart'],
      description: 'Current cart with tier-adjusted prices and total',
    },
  }, async (_request, reply) => {
    return reply.code(200).send({
      data: cart.snapshot(),
      timestamp: new Date().toISOString(),
    });
  });

  // Add item
  app.post<{
    Body: CartLine;
  }>('/v1/cart/items', {
    schema: {
      tags: ['cart'],
      description: 'Add a product line to the cart (or merge quantity if the product is already there)',
      body: {
        type: 'object',
        required: cartLineRequired,
        properties: cartLineProperties,
        additionalProperties: false,
      },
    },
  }, async (request, reply) => {
    cart.addItem(request.body);

    return reply.code(200).send({
      data: cart.snapshot(),
      timestamp: new Date().toISOString(),
    });
  });

  // Update quantity; zero or less removes the line
  app.patch<{
    Params: { productId: string };
    Body: UpdateQuantityRequest;
  }>('/v1/cart/items/:productId', {
    schema: {
      tags: ['cart'],
      description: 'Set the quantity of a cart line; a quantity of zero or less removes it',
      params: productIdParams,
      body: {
        type: 'object',
        required: ['quantity'],
        properties: {
          quantity: { type: 'integer' },
        },
      },
    },
  }, async (request, reply) => {
    cart.updateQuantity(request.params.productId, request.body.quantity);

    return reply.code(200).send({
      data: cart.snapshot(),
      timestamp: new Date().toISOString(),
    });
  });

  // Remove item
  app.delete<{
    Params: { productId: string };
  }>('/v1/cart/items/:productId', {
    schema: {
      tags: ['cart'],
      description: 'Remove a line from the cart; removing an absent product is a no-op',
      params: productIdParams,
    },
  }, async (request, reply) => {
    cart.removeItem(request.params.productId);

    return reply.code(200).send({
      data: cart.snapshot(),
      timestamp: new Date().toISOString(),
    });
  });

  // Clear cart
  app.delete('/v1/cart', {
    schema: {
      tags: ['cart'],
      description: 'Empty the cart',
    },
  }, async (_request, reply) => {
    cart.clear();

    return reply.code(204).send();
  });

  // === Order Routes ===

  app.post('/v1/cart/order', {
    schema: {
      tags: ['order'],
      description: 'Compose the order message and a chat link pre-filled with it',
    },
  }, async (request, reply) => {
    const order = composer.compose(cart.snapshot());
    request.log.info({ orderId: order.orderId, total: order.total }, 'order composed');

    return reply.code(200).send({
      data: order,
      timestamp: new Date().toISOString(),
    });
  });

  // ============================================================================
  // Error Handler
  // ============================================================================

  app.setErrorHandler((error, _request, reply) => {
    // Domain errors already have status codes
    if (error instanceof DomainError) {
      return reply.code(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          statusCode: error.statusCode,
        },
        timestamp: new Date().toISOString(),
      });
    }

    // Fastify validation errors
    if (typeof error === 'object' && error !== null && 'validation' in error) {
      return reply.code(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Request validation failed',
          details: error.validation,
          statusCode: 400,
        },
        timestamp: new Date().toISOString(),
      });
    }

    // Log unexpected stuff
    app.log.error(error);

    // Catch-all for other errors
    return reply.code(500).send({
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: 'An unexpected error occurred',
        statusCode: 500,
      },
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}

async function start(): Promise<void> {
  const config = loadConfig();
  const app = await buildApp({ config });

  await app.listen({ port: config.port, host: config.host });
  app.log.info(`Health check: http://${config.host}:${config.port}/health`);
  app.log.info(`API docs: http://${config.host}:${config.port}/docs`);

  // Handle shutdown gracefully
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  signals.forEach((signal) => {
    process.once(signal, () => {
      app.log.info(`${signal} received, shutting down...`);
      app.close().then(
        () => {
          app.log.info('Server closed successfully');
          process.exit(0);
        },
        (err: unknown) => {
          app.log.error({ err }, 'Error during shutdown');
          process.exit(1);
        }
      );
    });
  });
}

// Start if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  start().catch((err: unknown) => {
    logger.error({ err }, 'failed to start server');
    process.exit(1);
  });
}
