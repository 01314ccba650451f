import { describe, it, expect, beforeEach } from 'vitest';
import {
  setupTestContext,
  registerUser,
  jsonRequest,
  TEST_POLKA_KEY,
  type TestContext,
  type ErrorResponse,
} from './test-setup.js';

const apiKey = (key: string) => ({ Authorization: `ApiKey ${key}` });

describe('Polka webhook', () => {
  let ctx: TestContext;
  let userId: string;

  beforeEach(async () => {
    ctx = setupTestContext();
    userId = (await registerUser(ctx, 'mike@example.com', 'half-measures')).id;
  });

  it('should upgrade a user to Chirpy Red', async () => {
    const res = await ctx.app.request(
      '/api/polka/webhooks',
      jsonRequest('POST', { event: 'user.upgraded', data: { user_id: userId } }, apiKey(TEST_POLKA_KEY))
    );

    expect(res.status).toBe(204);
    const user = await ctx.storage.users.findById(userId);
    expect(user?.isChirpyRed).toBe(true);
  });

  it('should acknowledge other events without changing the user', async () => {
    const res = await ctx.app.request(
      '/api/polka/webhooks',
      jsonRequest('POST', { event: 'user.payment_failed', data: { user_id: userId } }, apiKey(TEST_POLKA_KEY))
    );

    expect(res.status).toBe(204);
    const user = await ctx.storage.users.findById(userId);
    expect(user?.isChirpyRed).toBe(false);
  });

  it('should return 404 for an unknown user', async () => {
    const res = await ctx.app.request(
      '/api/polka/webhooks',
      jsonRequest(
        'POST',
        { event: 'user.upgraded', data: { user_id: '00000000-0000-4000-8000-000000000000' } },
        apiKey(TEST_POLKA_KEY)
      )
    );

    expect(res.status).toBe(404);
  });

  it('should return 400 when the user ID is missing', async () => {
    const res = await ctx.app.request(
      '/api/polka/webhooks',
      jsonRequest('POST', { event: 'user.upgraded', data: {} }, apiKey(TEST_POLKA_KEY))
    );

    expect(res.status).toBe(400);
  });

  it('should reject a wrong API key', async () => {
    const res = await ctx.app.request(
      '/api/polka/webhooks',
      jsonRequest('POST', { event: 'user.upgraded', data: { user_id: userId } }, apiKey('wrong-key'))
    );

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorResponse;
    expect(body.error).toBe('unauthorized');

    const user = await ctx.storage.users.findById(userId);
    expect(user?.isChirpyRed).toBe(false);
  });

  it('should reject a Bearer credential', async () => {
    const res = await ctx.app.request(
      '/api/polka/webhooks',
      jsonRequest(
        'POST',
        { event: 'user.upgraded', data: { user_id: userId } },
        { Authorization: `Bearer ${TEST_POLKA_KEY}` }
      )
    );

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorResponse;
    expect(body.error).toBe('malformed_header');
  });

  it('should reject every call when no key is configured', async () => {
    const unconfigured = setupTestContext({ polkaKey: undefined });
    const id = (await registerUser(unconfigured, 'gus@example.com', 'los-pollos')).id;

    const res = await unconfigured.app.request(
      '/api/polka/webhooks',
      jsonRequest('POST', { event: 'user.upgraded', data: { user_id: id } }, apiKey(TEST_POLKA_KEY))
    );

    expect(res.status).toBe(401);
  });
});
