import { z } from 'zod';
import type { AuthSession, IdentityService } from '../../auth/types.js';
import { definePublicTool, defineTool, type RegisteredTool } from '../define.js';
import { jsonPayload, type JsonValue } from '../types.js';

function sessionJson(session: AuthSession): JsonValue {
  const json: { [key: string]: JsonValue } = {
    access_token: session.access_token,
    token_type: session.token_type,
    user: { ...session.user },
  };
  if (session.expires_in !== undefined) {
    json.expires_in = session.expires_in;
  }
  return json;
}

export function authTools(identity: IdentityService): RegisteredTool[] {
  return [
    definePublicTool({
      name: 'volvox_auth_signup',
      description: 'Sign up to Volvox, creating a user account. Returns an access token.',
      parameters: z.object({
        email: z.email(),
        password: z.string().min(1),
        fullName: z.string().min(1),
      }),
      handler: async (args) => jsonPayload(sessionJson(await identity.signup(args))),
    }),

    definePublicTool({
      name: 'volvox_auth_login',
      description: 'Log in to Volvox with email and password. Returns an access token.',
      parameters: z.object({
        email: z.string().min(1),
        password: z.string().min(1),
      }),
      handler: async (args) => jsonPayload(sessionJson(await identity.login(args))),
    }),

    defineTool({
      name: 'volvox_auth_get_user',
      description: 'Get the account of the user the token belongs to',
      parameters: z.object({}),
      handler: async (_args, principal) =>
        jsonPayload({
          _id: principal.id,
          email: principal.email,
          fullName: principal.fullName,
          created_at: principal.createdAt,
        }),
    }),
  ];
}
