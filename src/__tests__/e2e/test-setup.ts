import { createChirpyServer, type ChirpyServerOptions } from '../../app.js';
import { createMemoryStorage } from '../../storage/memory/index.js';
import type { IStorage } from '../../storage/interfaces/index.js';

/**
 * Test fixtures and helpers
 */

export const TEST_JWT_SECRET = 'test-secret';
export const TEST_POLKA_KEY = 'test-polka-key';

// Type helpers for test responses
export interface UserResponse {
  id: string;
  created_at: string;
  updated_at: string;
  email: string;
  is_chirpy_red: boolean;
}

export interface LoginResponse extends UserResponse {
  token: string;
  refresh_token: string;
}

export interface ChirpResponse {
  id: string;
  created_at: string;
  updated_at: string;
  body: string;
  user_id: string;
}

export interface ErrorResponse {
  error: string;
  error_description?: string;
}

// Shared test context
export interface TestContext {
  storage: IStorage;
  app: ReturnType<typeof createChirpyServer>;
}

// Setup function for tests
export function setupTestContext(overrides: Partial<ChirpyServerOptions> = {}): TestContext {
  const storage = createMemoryStorage();

  const app = createChirpyServer({
    storage,
    jwtSecret: TEST_JWT_SECRET,
    polkaKey: TEST_POLKA_KEY,
    platform: 'dev',
    enableLogging: false,
    rateLimit: {
      windowMs: 60000,
      maxRequests: 1000, // High limit for tests
    },
    ...overrides,
  });

  return { storage, app };
}

export function jsonRequest(method: string, body: unknown, headers: Record<string, string> = {}): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}

export function bearer(token: string): Record<string, string> {
  return { Authorization: `Bearer ${token}` };
}

export async function registerUser(
  ctx: TestContext,
  email: string,
  password: string
): Promise<UserResponse> {
  const res = await ctx.app.request('/api/users', jsonRequest('POST', { email, password }));
  if (res.status !== 201) {
    throw new Error(`Registration failed with status ${res.status}`);
  }
  return (await res.json()) as UserResponse;
}

export async function loginUser(
  ctx: TestContext,
  email: string,
  password: string
): Promise<LoginResponse> {
  const res = await ctx.app.request('/api/login', jsonRequest('POST', { email, password }));
  if (res.status !== 200) {
    throw new Error(`Login failed with status ${res.status}`);
  }
  return (await res.json()) as LoginResponse;
}
