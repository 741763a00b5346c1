import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FastifyInstance } from 'fastify';
import { buildApp } from '../src/index.js';
import { loadConfig } from '../src/config.js';
import { InMemoryKeyValueStore } from '../src/infrastructure/storage/InMemoryKeyValueStore.js';
import { DEFAULT_CART_STORAGE_KEY } from '../src/domain/services/CartEngine.js';
import { serializeCartLines } from '../src/domain/codec/cartLineCodec.js';
import { bulkA, bulkB, makeLine } from './helpers.js';

const ORDER_ID = '0f0e0d0c-0b0a-4909-8807-060504030201';

describe('cart API', () => {
  let app: FastifyInstance;
  let store: InMemoryKeyValueStore;

  const start = async (env: NodeJS.ProcessEnv = {}) => {
    app = await buildApp({
      config: loadConfig({ LOG_LEVEL: 'silent', ORDER_PHONE: '15550100', ...env }),
      store,
      orderIdFactory: () => ORDER_ID,
    });
  };

  beforeEach(async () => {
    store = new InMemoryKeyValueStore();
    await start();
  });

  afterEach(async () => {
    await app.close();
  });

  it('GET /health', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json().status).toBe('ok');
  });

  it('GET /v1/cart returns an empty cart', async () => {
    const res = await app.inject({ method: 'GET', url: '/v1/cart' });

    expect(res.statusCode).toBe(200);
    expect(res.json().data).toEqual({ lines: [], itemCount: 0, bulkQuantity: 0, total: 0 });
  });

  it('POST /v1/cart/items adds and merges lines', async () => {
    await app.inject({ method: 'POST', url: '/v1/cart/items', payload: bulkA('a1', 2) });
    const res = await app.inject({ method: 'POST', url: '/v1/cart/items', payload: bulkA('a1', 1) });

    expect(res.statusCode).toBe(200);
    const data = res.json().data;
    expect(data.lines).toHaveLength(1);
    expect(data.lines[0].quantity).toBe(3);
    expect(data.lines[0].effectiveUnitPrice).toBe(30);
    expect(data.total).toBe(90);
  });

  it('POST /v1/cart/items rejects an invalid line', async () => {
    const { imageRef: _omit, ...line } = makeLine('p1');
    const res = await app.inject({ method: 'POST', url: '/v1/cart/items', payload: line });

    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('VALIDATION_ERROR');
  });

  it('POST /v1/cart/items drops unknown fields', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/v1/cart/items',
      payload: { ...makeLine('p1'), isAdmin: true, notes: 'hello' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json().data.lines[0]).toEqual({ ...makeLine('p1'), effectiveUnitPrice: 10, lineTotal: 10 });

    await app.close();
    await start();
    const reloaded = await app.inject({ method: 'GET', url: '/v1/cart' });
    expect(reloaded.json().data.lines[0]).toEqual({ ...makeLine('p1'), effectiveUnitPrice: 10, lineTotal: 10 });
  });

  it('POST /v1/cart/items rejects a zero quantity', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/v1/cart/items',
      payload: makeLine('p1', { quantity: 0 }),
    });

    expect(res.statusCode).toBe(400);
    expect(store.getItem(DEFAULT_CART_STORAGE_KEY)).toBeNull();
  });

  it('PATCH /v1/cart/items/:productId updates and removes', async () => {
    await app.inject({ method: 'POST', url: '/v1/cart/items', payload: makeLine('p1') });

    const updated = await app.inject({
      method: 'PATCH',
      url: '/v1/cart/items/p1',
      payload: { quantity: 4 },
    });
    expect(updated.json().data.lines[0].quantity).toBe(4);

    const removed = await app.inject({
      method: 'PATCH',
      url: '/v1/cart/items/p1',
      payload: { quantity: 0 },
    });
    expect(removed.statusCode).toBe(200);
    expect(removed.json().data.lines).toEqual([]);
  });

  it('DELETE /v1/cart/items/:productId is a no-op for a missing product', async () => {
    await app.inject({ method: 'POST', url: '/v1/cart/items', payload: makeLine('p1') });

    const res = await app.inject({ method: 'DELETE', url: '/v1/cart/items/missing' });

    expect(res.statusCode).toBe(200);
    expect(res.json().data.lines.map((l: { productId: string }) => l.productId)).toEqual(['p1']);
  });

  it('DELETE /v1/cart clears the cart and storage', async () => {
    await app.inject({ method: 'POST', url: '/v1/cart/items', payload: makeLine('p1') });

    const res = await app.inject({ method: 'DELETE', url: '/v1/cart' });

    expect(res.statusCode).toBe(204);
    expect(store.getItem(DEFAULT_CART_STORAGE_KEY)).toBe('[]');
  });

  it('POST /v1/cart/order composes the order link', async () => {
    await app.inject({ method: 'POST', url: '/v1/cart/items', payload: bulkA('a1', 4) });
    await app.inject({ method: 'POST', url: '/v1/cart/items', payload: bulkB('b1', 1) });

    const res = await app.inject({ method: 'POST', url: '/v1/cart/order' });

    expect(res.statusCode).toBe(200);
    const order = res.json().data;
    expect(order.orderId).toBe(ORDER_ID);
    expect(order.total).toBe(125);
    expect(order.message).toContain('- Product a1 x4 @ $25.00 = $100.00');
    expect(order.link).toBe(`https://wa.me/15550100?text=${encodeURIComponent(order.message)}`);
  });

  it('POST /v1/cart/order refuses an empty cart', async () => {
    const res = await app.inject({ method: 'POST', url: '/v1/cart/order' });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Cart is empty.',
      statusCode: 400,
    });
  });

  it('restores the persisted cart on startup', async () => {
    await app.close();
    store.setItem(DEFAULT_CART_STORAGE_KEY, serializeCartLines([makeLine('p1', { quantity: 3 })]));
    await start();

    const res = await app.inject({ method: 'GET', url: '/v1/cart' });

    expect(res.json().data.itemCount).toBe(3);
    expect(res.json().data.total).toBe(30);
  });

  it('starts with an empty cart when storage holds garbage', async () => {
    await app.close();
    store.setItem(DEFAULT_CART_STORAGE_KEY, 'garbage');
    await start();

    const res = await app.inject({ method: 'GET', url: '/v1/cart' });

    expect(res.statusCode).toBe(200);
    expect(res.json().data.lines).toEqual([]);
  });

  it('prices the configured bulk categories', async () => {
    await app.close();
    await start({ BULK_CATEGORY_CODES: 'posters' });

    await app.inject({
      method: 'POST',
      url: '/v1/cart/items',
      payload: makeLine('p1', { categoryCode: 'posters', unitPrice: 99, quantity: 2 }),
    });
    const res = await app.inject({ method: 'POST', url: '/v1/cart/items', payload: bulkA('a1', 1) });

    const data = res.json().data;
    expect(data.bulkQuantity).toBe(2);
    expect(data.lines.map((l: { effectiveUnitPrice: number }) => l.effectiveUnitPrice)).toEqual([30, 35]);
  });
});
