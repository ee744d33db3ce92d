/**
 * Identity boundary types
 *
 * The gateway never validates tokens itself; it hands them to an
 * IdentityService and trusts the principal that comes back.
 */

// Authenticated identity resolved from a bearer token
export interface Principal {
  id: string;
  email: string;
  fullName: string;
  createdAt: string;
}

export interface SignupRequest {
  email: string;
  password: string;
  fullName: string;
}

export interface LoginRequest {
  email: string;
  password: string;
}

// Token issued by signup/login
export interface AuthSession {
  access_token: string;
  token_type: string;
  expires_in?: number;
  user: {
    _id: string;
    email: string;
    fullName: string;
    created_at: string;
  };
}

export interface IdentityService {
  signup(request: SignupRequest): Promise<AuthSession>;
  login(request: LoginRequest): Promise<AuthSession>;
  resolve(token: string | undefined): Promise<Principal>;
}

export class AuthenticationError extends Error {
  readonly status: number;

  constructor(message: string, status: number = 401) {
    super(message);
    this.name = 'AuthenticationError';
    this.status = status;
  }
}
