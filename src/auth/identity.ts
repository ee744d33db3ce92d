/**
 * HTTP identity service
 *
 * Signup, login and token resolution against the Volvox auth endpoints.
 * Tokens are opaque here: whatever /auth/me accepts is valid.
 */

import { z } from 'zod';
import { BackendError, type BackendClient } from '../backends/http.js';
import type { JsonValue } from '../tools/types.js';
import {
  AuthenticationError,
  type AuthSession,
  type IdentityService,
  type LoginRequest,
  type Principal,
  type SignupRequest,
} from './types.js';

const userSchema = z
  .object({
    _id: z.string().optional(),
    id: z.string().optional(),
    email: z.string(),
    fullName: z.string().default(''),
    created_at: z.string().default(''),
  })
  .refine((user) => Boolean(user._id || user.id), { message: 'user id missing' });

const sessionSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default('bearer'),
  expires_in: z.number().optional(),
  user: userSchema,
});

export function stripBearer(token: string | undefined): string {
  if (!token) {
    return '';
  }
  return token.replace(/^Bearer\s+/i, '').trim();
}

export class HttpIdentityService implements IdentityService {
  constructor(private readonly client: BackendClient) {}

  async signup(request: SignupRequest): Promise<AuthSession> {
    const data = await this.client.json('/auth/signup', {
      method: 'POST',
      body: { email: request.email, password: request.password, fullName: request.fullName },
    });
    return this.toSession(data);
  }

  async login(request: LoginRequest): Promise<AuthSession> {
    const data = await this.client.json('/auth/login', {
      method: 'POST',
      body: { email: request.email, password: request.password },
    });
    return this.toSession(data);
  }

  async resolve(token: string | undefined): Promise<Principal> {
    const bare = stripBearer(token);
    if (!bare) {
      throw new AuthenticationError('Token missing');
    }

    let data: JsonValue;
    try {
      data = await this.client.json('/auth/me', {
        headers: { Authorization: `Bearer ${bare}` },
      });
    } catch (error) {
      if (error instanceof BackendError && (error.status === 401 || error.status === 403)) {
        throw new AuthenticationError(detailOf(error.message) || 'Could not validate credentials', error.status);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new AuthenticationError(`Identity service unavailable: ${message}`, 503);
    }

    const parsed = userSchema.safeParse(data);
    if (!parsed.success) {
      throw new AuthenticationError('Could not validate credentials');
    }
    const user = parsed.data;
    return {
      id: user._id || user.id || '',
      email: user.email,
      fullName: user.fullName,
      createdAt: user.created_at,
    };
  }

  private toSession(data: JsonValue): AuthSession {
    const parsed = sessionSchema.safeParse(data);
    if (!parsed.success) {
      throw new BackendError(this.client.service, `${this.client.service} returned an unexpected auth response`);
    }
    const { user, ...session } = parsed.data;
    return {
      ...session,
      user: {
        _id: user._id || user.id || '',
        email: user.email,
        fullName: user.fullName,
        created_at: user.created_at,
      },
    };
  }
}

// FastAPI-style error bodies carry the reason under "detail"
function detailOf(message: string): string | undefined {
  const start = message.indexOf('{');
  if (start < 0) {
    return undefined;
  }
  try {
    const body: unknown = JSON.parse(message.slice(start));
    if (body && typeof body === 'object' && 'detail' in body && typeof body.detail === 'string') {
      return body.detail;
    }
  } catch {
    return undefined;
  }
  return undefined;
}
