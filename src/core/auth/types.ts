// src/core/auth/types.ts

export interface OAuthClientConfig {
  tenantId: string;
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  scopes: string[];
  authorizationEndpoint?: string; // Defaults to the tenant's v2.0 authorize endpoint
  tokenEndpoint?: string;
}

export interface AuthorizationRequest {
  authorizationUrl: string;
  state: string;
  signature: string;
}

export interface AuthorizationCallback {
  state?: string;
  cookieState?: string;
  signature?: string;
  code?: string;
}

export interface UserProfile {
  id: string;
  email?: string;
}
