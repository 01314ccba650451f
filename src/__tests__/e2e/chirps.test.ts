import { describe, it, expect, beforeEach } from 'vitest';
import {
  setupTestContext,
  registerUser,
  loginUser,
  jsonRequest,
  bearer,
  type TestContext,
  type ChirpResponse,
  type ErrorResponse,
} from './test-setup.js';

describe('Chirp endpoints', () => {
  let ctx: TestContext;
  let authorId: string;
  let authorToken: string;
  let otherId: string;
  let otherToken: string;

  async function postChirp(token: string, body: string): Promise<Response> {
    return ctx.app.request('/api/chirps', jsonRequest('POST', { body }, bearer(token)));
  }

  beforeEach(async () => {
    ctx = setupTestContext();

    authorId = (await registerUser(ctx, 'jesse@example.com', 'yo-science')).id;
    authorToken = (await loginUser(ctx, 'jesse@example.com', 'yo-science')).token;

    otherId = (await registerUser(ctx, 'skyler@example.com', 'car-wash')).id;
    otherToken = (await loginUser(ctx, 'skyler@example.com', 'car-wash')).token;
  });

  describe('POST /api/chirps', () => {
    it('should accept a chirp of exactly 140 characters', async () => {
      const res = await postChirp(authorToken, 'a'.repeat(140));

      expect(res.status).toBe(201);
      const body = (await res.json()) as ChirpResponse;
      expect(body.user_id).toBe(authorId);
      expect(body.body).toHaveLength(140);
    });

    it('should reject a chirp of 141 characters', async () => {
      const res = await postChirp(authorToken, 'a'.repeat(141));

      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorResponse;
      expect(body).toEqual({ error: 'invalid_request', error_description: 'body: Chirp is too long' });
    });

    it('should measure the limit in UTF-8 bytes', async () => {
      const fits = await postChirp(authorToken, 'é'.repeat(70));
      expect(fits.status).toBe(201);

      const tooLong = await postChirp(authorToken, 'é'.repeat(71));
      expect(tooLong.status).toBe(400);
      const body = (await tooLong.json()) as ErrorResponse;
      expect(body.error_description).toBe('body: Chirp is too long');
    });

    it('should reject a chirp once its author is gone', async () => {
      await ctx.storage.users.deleteAll();

      const res = await postChirp(authorToken, 'still here?');

      expect(res.status).toBe(404);
      const body = (await res.json()) as ErrorResponse;
      expect(body).toEqual({ error: 'not_found', error_description: 'User not found' });
      expect(await ctx.storage.chirps.list()).toEqual([]);
    });

    it('should require an access token', async () => {
      const res = await ctx.app.request('/api/chirps', jsonRequest('POST', { body: 'hello' }));
      expect(res.status).toBe(401);
    });
  });

  describe('GET /api/chirps', () => {
    beforeEach(async () => {
      await postChirp(authorToken, 'first');
      await postChirp(otherToken, 'second');
      await postChirp(authorToken, 'third');
    });

    it('should list chirps oldest first by default', async () => {
      const res = await ctx.app.request('/api/chirps');

      expect(res.status).toBe(200);
      const body = (await res.json()) as ChirpResponse[];
      expect(body.map((chirp) => chirp.body)).toEqual(['first', 'second', 'third']);
    });

    it('should list chirps newest first with sort=desc', async () => {
      const res = await ctx.app.request('/api/chirps?sort=desc');

      const body = (await res.json()) as ChirpResponse[];
      expect(body.map((chirp) => chirp.body)).toEqual(['third', 'second', 'first']);
    });

    it('should filter by author_id', async () => {
      const res = await ctx.app.request(`/api/chirps?author_id=${otherId}`);

      const body = (await res.json()) as ChirpResponse[];
      expect(body).toHaveLength(1);
      expect(body[0]?.body).toBe('second');
      expect(body[0]?.user_id).toBe(otherId);
    });

    it('should reject an unknown sort order', async () => {
      const res = await ctx.app.request('/api/chirps?sort=sideways');
      expect(res.status).toBe(400);
    });

    it('should reject a non-UUID author_id', async () => {
      const res = await ctx.app.request('/api/chirps?author_id=42');
      expect(res.status).toBe(400);
    });
  });

  describe('GET /api/chirps/:chirpID', () => {
    it('should return a single chirp', async () => {
      const created = (await (await postChirp(authorToken, 'hello')).json()) as ChirpResponse;

      const res = await ctx.app.request(`/api/chirps/${created.id}`);

      expect(res.status).toBe(200);
      expect((await res.json()) as ChirpResponse).toEqual(created);
    });

    it('should return 404 for an unknown chirp', async () => {
      const res = await ctx.app.request('/api/chirps/00000000-0000-4000-8000-000000000000');

      expect(res.status).toBe(404);
      const body = (await res.json()) as ErrorResponse;
      expect(body.error).toBe('not_found');
    });

    it('should return 400 for a malformed chirp ID', async () => {
      const res = await ctx.app.request('/api/chirps/not-a-uuid');
      expect(res.status).toBe(400);
    });
  });

  describe('DELETE /api/chirps/:chirpID', () => {
    it('should forbid deleting another user\'s chirp', async () => {
      const created = (await (await postChirp(authorToken, 'mine')).json()) as ChirpResponse;

      const res = await ctx.app.request(`/api/chirps/${created.id}`, {
        method: 'DELETE',
        headers: bearer(otherToken),
      });

      expect(res.status).toBe(403);
      expect(await ctx.storage.chirps.findById(created.id)).not.toBeNull();
    });

    it('should let the author delete their chirp', async () => {
      const created = (await (await postChirp(authorToken, 'mine')).json()) as ChirpResponse;

      const res = await ctx.app.request(`/api/chirps/${created.id}`, {
        method: 'DELETE',
        headers: bearer(authorToken),
      });

      expect(res.status).toBe(204);
      expect(await ctx.storage.chirps.findById(created.id)).toBeNull();
    });

    it('should return 404 for an unknown chirp', async () => {
      const res = await ctx.app.request('/api/chirps/00000000-0000-4000-8000-000000000000', {
        method: 'DELETE',
        headers: bearer(authorToken),
      });

      expect(res.status).toBe(404);
    });
  });
});
