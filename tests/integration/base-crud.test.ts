import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Deta } from '../../src/client/deta.js';
import type { DetaBase } from '../../src/client/base.js';
import { update } from '../../src/update/builder.js';
import { item } from '../../src/record/codec.js';
import {
  AuthError,
  ConflictError,
  NetworkError,
  NotFoundError,
  ValidationError,
} from '../../src/errors.js';
import type { FakeBaseService } from './fake-base-service.js';
import { TEST_ENDPOINT, startService } from './helpers.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

let service: FakeBaseService;
let users: DetaBase;

beforeEach(async () => {
  const ctx = await startService();
  service = ctx.service;
  users = ctx.deta.base('users');
});

afterEach(async () => {
  await service.close();
});

describe('get / insert', () => {
  it('get returns what insert stored', async () => {
    const inserted = await users.insert({ key: 'ann', name: 'Ann', age: 31 });
    expect(inserted).toEqual({ key: 'ann', name: 'Ann', age: 31 });
    expect(await users.get('ann')).toEqual({ key: 'ann', name: 'Ann', age: 31 });
  });

  it('get of a missing key is NotFoundError carrying the key', async () => {
    const err = await users.get('missing').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toMatchObject({ key: 'missing', message: 'Item "missing" not found' });
  });

  it('insert without a key gets a generated one', async () => {
    const inserted = await users.insert({ name: 'Bo' });
    expect(inserted.key).toMatch(UUID_PATTERN);
    expect(await users.get(inserted.key)).toEqual({ key: inserted.key, name: 'Bo' });
  });

  it('insert on an existing key is ConflictError and leaves the item unchanged', async () => {
    await users.insert({ key: 'ann', name: 'Ann' });
    const err = await users.insert({ key: 'ann', name: 'Other' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConflictError);
    expect(err).toMatchObject({ key: 'ann', message: 'Key already exists' });
    expect(await users.get('ann')).toEqual({ key: 'ann', name: 'Ann' });
  });

  it('keys needing URL encoding round-trip', async () => {
    await users.insert({ key: 'ann smith', n: 1 });
    expect(await users.get('ann smith')).toEqual({ key: 'ann smith', n: 1 });
  });

  it('wrapped primitives are stored under "value"', async () => {
    await users.insert(item('hello', 'greeting'));
    expect(await users.get('greeting')).toEqual({ key: 'greeting', value: 'hello' });
  });

  it('bases are separate namespaces', async () => {
    const ctx = await startService();
    try {
      await ctx.deta.base('a').insert({ key: 'x', from: 'a' });
      await expect(ctx.deta.base('b').get('x')).rejects.toBeInstanceOf(NotFoundError);
    } finally {
      await ctx.service.close();
    }
  });
});

describe('put', () => {
  it('upserts a batch and reports every processed item', async () => {
    await users.insert({ key: 'ann', name: 'Ann' });
    const result = await users.put([{ key: 'ann', name: 'Ann B' }, { name: 'Cy' }]);

    expect(result.failed).toEqual([]);
    expect(result.processed).toHaveLength(2);
    expect(result.processed[0]).toEqual({ key: 'ann', name: 'Ann B' });
    expect(result.processed[1]?.key).toMatch(UUID_PATTERN);
    expect(await users.get('ann')).toEqual({ key: 'ann', name: 'Ann B' });
  });

  it('a single item needs no array', async () => {
    const result = await users.put({ key: 'solo', n: 1 });
    expect(result.processed).toEqual([{ key: 'solo', n: 1 }]);
  });

  it('26 items are rejected without any request', async () => {
    const batch = Array.from({ length: 26 }, (_, i) => ({ key: `k${i}` }));
    await expect(users.put(batch)).rejects.toBeInstanceOf(ValidationError);
    expect(service.requestCount()).toBe(0);
    expect(service.bases.get('users')).toBeUndefined();
  });

  it('25 items are accepted', async () => {
    const batch = Array.from({ length: 25 }, (_, i) => ({ key: `k${i}` }));
    const result = await users.put(batch);
    expect(result.processed).toHaveLength(25);
    expect(service.bases.get('users')?.size).toBe(25);
  });
});

describe('update', () => {
  it('applies every operation in one request', async () => {
    await users.insert({
      key: 'ann',
      profile: { age: 30, hometown: 'Oslo' },
      purchases: 1,
      likes: ['tea'],
    });

    await users.update(
      'ann',
      update
        .set('profile.age', 31)
        .increment('purchases', 2)
        .append('likes', 'ramen')
        .prepend('likes', 'coffee')
        .delete('profile.hometown'),
    );

    expect(await users.get('ann')).toEqual({
      key: 'ann',
      profile: { age: 31 },
      purchases: 3,
      likes: ['coffee', 'tea', 'ramen'],
    });
  });

  it('update of a missing key is NotFoundError', async () => {
    const err = await users.update('ghost', update.set('a', 1)).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toMatchObject({ key: 'ghost', message: 'Key not found' });
    expect(service.bases.get('users')?.has('ghost')).toBe(false);
  });

  it('a service-side rejection is ValidationError with the service message', async () => {
    await users.insert({ key: 'ann', name: 'Ann' });
    const err = await users.update('ann', update.increment('name')).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ status: 400, message: 'name is not a number' });
  });
});

describe('delete', () => {
  it('removes the item', async () => {
    await users.insert({ key: 'ann' });
    await users.delete('ann');
    await expect(users.get('ann')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('resolves for a key that never existed', async () => {
    await expect(users.delete('never')).resolves.toBeUndefined();
  });
});

describe('authentication', () => {
  it('a rejected project key is AuthError', async () => {
    const stranger = new Deta({
      projectKey: 'a0test_wrong-secret',
      endpoint: TEST_ENDPOINT,
      fetch: service.fetch,
    }).base('users');

    const err = await stranger.get('ann').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AuthError);
    expect(err).toMatchObject({ status: 401, serviceMessages: ['Unauthorized'] });
  });
});

describe('transport failures', () => {
  it('an idempotent read is retried and succeeds', async () => {
    const ctx = await startService({ onRetry: vi.fn() });
    try {
      const base = ctx.deta.base('users');
      await base.put({ key: 'ann', name: 'Ann' });
      ctx.service.dropNext(1);

      expect(await base.get('ann')).toEqual({ key: 'ann', name: 'Ann' });
    } finally {
      await ctx.service.close();
    }
  });

  it('reports the retry through onRetry', async () => {
    const onRetry = vi.fn();
    const ctx = await startService({ onRetry });
    try {
      ctx.service.dropNext(1);
      await ctx.deta.base('users').delete('ann');
      expect(onRetry).toHaveBeenCalledTimes(1);
      expect(onRetry).toHaveBeenCalledWith(1, expect.any(TypeError), 0, {
        method: 'DELETE',
        path: 'items/ann',
      });
    } finally {
      await ctx.service.close();
    }
  });

  it('gives up after maxRetries with NetworkError', async () => {
    service.dropNext(3);
    const err = await users.get('ann').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NetworkError);
    expect(err).toMatchObject({
      attempts: 3,
      message: 'GET items/ann failed after 3 attempt(s): fetch failed',
    });
  });

  it('insert is never retried', async () => {
    service.dropNext(1);
    const err = await users.insert({ key: 'ann' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NetworkError);
    expect(err).toMatchObject({ attempts: 1 });
    expect(service.requestCount()).toBe(0);
  });
});
