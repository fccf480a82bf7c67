/**
 * HTTP surface over an in-memory SQLite store, served on an ephemeral
 * loopback port inside the test process.
 */
import type { Server } from 'node:http';
import { createDatabase, migrateToLatest } from '@batchkeep/shared/database';
import type { KyselyDB } from '@batchkeep/shared/database';
import { createApp } from '../../app.js';

let db: KyselyDB;
let server: Server;
let baseUrl: string;

async function call(method: string, path: string, body?: unknown) {
    const response = await fetch(`${baseUrl}${path}`, {
        method,
        headers: body === undefined ? undefined : { 'content-type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
    });
    const text = await response.text();
    const json: unknown = text ? JSON.parse(text) : null;
    return { status: response.status, body: json };
}

async function seed() {
    await call('POST', '/api/materials', { name: 'Matcha', category: 'Tea', stockLevel: 1000, unit: 'g', reorderLevel: 100 });
    await call('POST', '/api/materials', { name: 'Milk', category: 'Dairy', stockLevel: 5000, unit: 'ml', reorderLevel: 200 });
    await call('POST', '/api/materials', { name: 'Sugar', category: 'Sweetener', stockLevel: 2000, unit: 'g', reorderLevel: 100 });
    await call('POST', '/api/recipes', {
        productName: 'Matcha Latte',
        lines: [
            { materialName: 'Matcha', quantityNeeded: 2 },
            { materialName: 'Milk', quantityNeeded: 30 },
            { materialName: 'Sugar', quantityNeeded: 5 },
        ],
    });
}

beforeEach(async () => {
    db = createDatabase({ dialect: 'sqlite', filename: ':memory:' });
    await migrateToLatest(db, 'sqlite');
    server = createApp(db).listen(0, '127.0.0.1');
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Expected a TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
    await seed();
});

afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await db.destroy();
});

describe('materials API', () => {
    it('reports health', async () => {
        const res = await call('GET', '/api/health');
        expect(res.status).toBe(200);
        expect(res.body).toMatchObject({ status: 'ok' });
    });

    it('adds, adjusts and reads a material', async () => {
        const created = await call('POST', '/api/materials', { name: 'Cups', stockLevel: '40', reorderLevel: 50 });
        expect(created.status).toBe(201);
        expect(created.body).toMatchObject({ name: 'Cups', stockLevel: 40, reorderLevel: 50, lotNumber: null });

        expect((await call('POST', '/api/materials/Cups/increase', { amount: 15 })).body)
            .toEqual({ name: 'Cups', lotNumber: null, stockLevel: 55 });
        expect((await call('GET', '/api/materials/Cups')).body).toMatchObject({ stockLevel: 55 });
    });

    it('answers 409 for a duplicate material', async () => {
        const res = await call('POST', '/api/materials', { name: 'Milk', stockLevel: 1 });
        expect(res.status).toBe(409);
        expect(res.body).toMatchObject({ type: 'ConflictError', code: 'INVENTORY_MATERIAL_EXISTS' });
    });

    it('answers 422 when a decrease exceeds stock', async () => {
        const res = await call('POST', '/api/materials/Sugar/decrease', { amount: 2500 });
        expect(res.status).toBe(422);
        expect(res.body).toMatchObject({
            code: 'INVENTORY_INSUFFICIENT_STOCK',
            details: { materialName: 'Sugar', required: 2500, available: 2000 },
        });
    });

    it('answers 400 for a zero adjustment', async () => {
        const res = await call('POST', '/api/materials/Sugar/increase', { amount: 0 });
        expect(res.status).toBe(400);
        expect(res.body).toMatchObject({ type: 'ValidationError' });
    });

    it('answers 404 for an unknown material', async () => {
        expect((await call('GET', '/api/materials/Saffron')).status).toBe(404);
        expect((await call('DELETE', '/api/materials/Saffron')).status).toBe(404);
    });
});

describe('recipes API', () => {
    it('saves a recipe with unstocked ingredients and lists them', async () => {
        const res = await call('POST', '/api/recipes', {
            productName: 'Vanilla Latte',
            lines: [{ materialName: 'Vanilla', quantityNeeded: 1 }],
        });
        expect(res.status).toBe(201);
        expect(res.body).toEqual({ productName: 'Vanilla Latte', recipeId: 2, unresolved: ['Vanilla'] });
    });

    it('answers 409 for a second recipe for the same product', async () => {
        const res = await call('POST', '/api/recipes', {
            productName: 'Matcha Latte',
            lines: [{ materialName: 'Matcha', quantityNeeded: 1 }],
        });
        expect(res.status).toBe(409);
        expect(res.body).toMatchObject({ code: 'INVENTORY_RECIPE_EXISTS' });
    });

    it('answers 404 when changing a missing recipe', async () => {
        const res = await call('PUT', '/api/recipes/Hojicha%20Latte', {
            lines: [{ materialName: 'Milk', quantityNeeded: 1 }],
        });
        expect(res.status).toBe(404);
        expect(res.body).toMatchObject({ code: 'INVENTORY_RECIPE_NOT_FOUND', resourceId: 'Hojicha Latte' });
    });
});

describe('batches API', () => {
    it('creates, ships and lists a batch', async () => {
        const created = await call('POST', '/api/batches', { productName: 'Matcha Latte', quantity: 10 });
        expect(created.status).toBe(201);
        expect(created.body).toMatchObject({ batchId: 1, quantity: 10 });
        expect((await call('GET', '/api/materials/Matcha')).body).toMatchObject({ stockLevel: 980 });

        const shipped = await call('POST', '/api/batches/1/ship');
        expect(shipped.status).toBe(200);
        expect(shipped.body).toMatchObject({ batchId: 1, status: 'Shipped' });

        const again = await call('POST', '/api/batches/1/ship');
        expect(again.status).toBe(409);

        expect((await call('GET', '/api/batches/ready')).body).toEqual([]);
        expect((await call('GET', '/api/batches/shipped')).body).toMatchObject([{ batchId: 1 }]);
    });

    it('answers 422 and changes nothing when stock is short', async () => {
        const res = await call('POST', '/api/batches', { productName: 'Matcha Latte', quantity: 10000 });
        expect(res.status).toBe(422);
        expect(res.body).toMatchObject({ code: 'INVENTORY_INSUFFICIENT_STOCK', details: { materialName: 'Matcha' } });
        expect((await call('GET', '/api/materials/Matcha')).body).toMatchObject({ stockLevel: 1000 });
        expect((await call('GET', '/api/batches/ready')).body).toEqual([]);
    });

    it('deletes with reallocation when asked', async () => {
        await call('POST', '/api/batches', { productName: 'Matcha Latte', quantity: 10, batchId: 67 });

        const res = await call('DELETE', '/api/batches/67?reallocate=true');
        expect(res.status).toBe(200);
        expect(res.body).toMatchObject({ batchId: 67, reallocated: [{ materialName: 'Matcha', stockLevel: 1000 }, {}, {}] });
        expect((await call('GET', '/api/batches/67')).status).toBe(404);
    });

    it('answers 400 for a malformed batch id', async () => {
        expect((await call('GET', '/api/batches/abc')).status).toBe(400);
    });
});
