import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type { BundleDetail, BundleView } from '@sharebox/shared';
import { resetDatabase } from '../test-utils/database.js';
import { createTestApp, registerUser, uploadFile } from '../test-utils/app.js';
import type { TestApp, TestUser } from '../test-utils/app.js';

let testApp: TestApp;
let app: FastifyInstance;
let alice: TestUser;
let bob: TestUser;

beforeAll(async () => {
  testApp = await createTestApp();
  app = testApp.app;
});

afterAll(async () => {
  await testApp.close();
});

beforeEach(async () => {
  await resetDatabase(testApp.db);
  alice = await registerUser(app, 'alice');
  bob = await registerUser(app, 'bob');
});

async function createBundle(fileIds: string[]): Promise<BundleDetail> {
  const response = await app.inject({
    method: 'POST',
    url: '/bundles',
    headers: { cookie: alice.cookie },
    payload: { name: 'Quarter', transactionNumber: 'TX-5', fileIds },
  });
  return response.json<{ data: BundleDetail }>().data;
}

describe('POST /bundles', () => {
  it('should create a private bundle by default', async () => {
    const file = await uploadFile(app, alice, 'a.txt');

    const response = await app.inject({
      method: 'POST',
      url: '/bundles',
      headers: { cookie: alice.cookie },
      payload: { name: 'Quarter', transactionNumber: 'TX-5', fileIds: [file.id] },
    });

    expect(response.statusCode).toBe(201);
    expect(response.json().data).toMatchObject({
      name: 'Quarter',
      transactionNumber: 'TX-5',
      ownerId: alice.id,
      visibility: 'private',
      downloadCount: 0,
      fileCount: 1,
    });
  });

  it('should return VALIDATION_ERROR for an empty selection', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/bundles',
      headers: { cookie: alice.cookie },
      payload: { name: 'Quarter', transactionNumber: 'TX-5', fileIds: [] },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().errors[0]).toEqual({
      code: 'VALIDATION_ERROR',
      field: 'fileIds',
      message: 'Select at least one file',
    });
  });

  it('should return FORBIDDEN when a selected file belongs to someone else', async () => {
    const theirs = await uploadFile(app, bob, 'b.txt');

    const response = await app.inject({
      method: 'POST',
      url: '/bundles',
      headers: { cookie: alice.cookie },
      payload: { name: 'Quarter', transactionNumber: 'TX-5', fileIds: [theirs.id] },
    });

    expect(response.statusCode).toBe(403);
  });
});

describe('GET /bundles', () => {
  it('should list the caller\'s bundles with file counts', async () => {
    const a = await uploadFile(app, alice, 'a.txt');
    const b = await uploadFile(app, alice, 'b.txt');
    await createBundle([a.id, b.id]);

    const response = await app.inject({
      method: 'GET',
      url: '/bundles',
      headers: { cookie: alice.cookie },
    });

    const body = response.json<{ data: BundleView[]; meta: { total: number } }>();
    expect(body.meta).toEqual({ total: 1 });
    expect(body.data[0]?.fileCount).toBe(2);

    const other = await app.inject({ method: 'GET', url: '/bundles', headers: { cookie: bob.cookie } });
    expect(other.json().data).toEqual([]);
  });
});

describe('GET /bundles/:id', () => {
  it('should return the bundle with its members to the owner only', async () => {
    const a = await uploadFile(app, alice, 'a.txt');
    const bundle = await createBundle([a.id]);

    const owner = await app.inject({
      method: 'GET',
      url: `/bundles/${bundle.id}`,
      headers: { cookie: alice.cookie },
    });
    expect(owner.statusCode).toBe(200);
    expect(owner.json().data.files.map((file: { id: string }) => file.id)).toEqual([a.id]);

    const other = await app.inject({
      method: 'GET',
      url: `/bundles/${bundle.id}`,
      headers: { cookie: bob.cookie },
    });
    expect(other.statusCode).toBe(403);
  });
});

describe('PUT /bundles/:id', () => {
  it('should replace the members', async () => {
    const a = await uploadFile(app, alice, 'a.txt');
    const b = await uploadFile(app, alice, 'b.txt');
    const c = await uploadFile(app, alice, 'c.txt');
    const d = await uploadFile(app, alice, 'd.txt');
    const bundle = await createBundle([a.id, b.id, c.id]);

    const response = await app.inject({
      method: 'PUT',
      url: `/bundles/${bundle.id}`,
      headers: { cookie: alice.cookie },
      payload: { name: 'Quarter v2', transactionNumber: 'TX-6', fileIds: [b.id, d.id] },
    });

    expect(response.statusCode).toBe(200);
    const data = response.json<{ data: BundleDetail }>().data;
    expect(data.name).toBe('Quarter v2');
    expect(data.fileCount).toBe(2);
    expect(data.files.map((file) => file.id).sort()).toEqual([b.id, d.id].sort());
  });
});

describe('POST /bundles/:id/visibility', () => {
  it('should toggle visibility', async () => {
    const a = await uploadFile(app, alice, 'a.txt');
    const bundle = await createBundle([a.id]);

    const response = await app.inject({
      method: 'POST',
      url: `/bundles/${bundle.id}/visibility`,
      headers: { cookie: alice.cookie },
    });

    expect(response.json().data).toEqual({ id: bundle.id, visibility: 'public' });
  });
});

describe('DELETE /bundles/:id', () => {
  it('should delete the bundle and leave its files in place', async () => {
    const a = await uploadFile(app, alice, 'a.txt');
    const bundle = await createBundle([a.id]);

    const response = await app.inject({
      method: 'DELETE',
      url: `/bundles/${bundle.id}`,
      headers: { cookie: alice.cookie },
    });
    expect(response.statusCode).toBe(200);

    const files = await app.inject({ method: 'GET', url: '/files', headers: { cookie: alice.cookie } });
    expect(files.json().meta).toEqual({ total: 1 });

    const shared = await app.inject({ method: 'GET', url: `/share/bundles/${bundle.shareToken}` });
    expect(shared.statusCode).toBe(404);
  });
});
