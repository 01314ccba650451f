import { describe, it, expect } from 'vitest';
import {
  setupTestContext,
  registerUser,
  loginUser,
  jsonRequest,
  bearer,
} from './test-setup.js';

describe('Admin endpoints', () => {
  it('should delete every user with their chirps and sessions on dev', async () => {
    const ctx = setupTestContext({ platform: 'dev' });
    await registerUser(ctx, 'hank@example.com', 'minerals');
    await registerUser(ctx, 'marie@example.com', 'purple');
    const { token, refresh_token } = await loginUser(ctx, 'hank@example.com', 'minerals');
    await ctx.app.request('/api/chirps', jsonRequest('POST', { body: 'they are minerals' }, bearer(token)));

    const res = await ctx.app.request('/admin/reset', { method: 'POST' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ deleted: 2 });
    expect(await ctx.storage.users.findByEmail('hank@example.com')).toBeNull();
    expect(await ctx.storage.refreshTokens.findByValue(refresh_token)).toBeNull();
    expect(await ctx.storage.chirps.list()).toEqual([]);
  });

  it('should refuse to reset outside dev', async () => {
    const ctx = setupTestContext({ platform: 'prod' });
    await registerUser(ctx, 'hank@example.com', 'minerals');

    const res = await ctx.app.request('/admin/reset', { method: 'POST' });

    expect(res.status).toBe(403);
    expect(await ctx.storage.users.findByEmail('hank@example.com')).not.toBeNull();
  });
});

describe('Health and rate limiting', () => {
  it('should report healthy', async () => {
    const ctx = setupTestContext();

    const res = await ctx.app.request('/api/healthz');

    expect(res.status).toBe(200);
    expect(await res.text()).toBe('OK');
    expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff');
  });

  it('should answer 429 once the window is used up', async () => {
    const ctx = setupTestContext({ rateLimit: { windowMs: 60000, maxRequests: 2 } });

    expect((await ctx.app.request('/api/healthz')).status).toBe(200);
    expect((await ctx.app.request('/api/healthz')).status).toBe(200);

    const res = await ctx.app.request('/api/healthz');
    expect(res.status).toBe(429);
    expect(res.headers.get('Retry-After')).toBe('60');
    expect(await res.json()).toEqual({
      error: 'rate_limited',
      error_description: 'Rate limit exceeded. Try again in 60 seconds.',
    });
  });
});
