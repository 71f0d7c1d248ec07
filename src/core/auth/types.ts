// src/core/auth/types.ts

/**
 * Per-account app credentials, as kept by the credential store.
 * The client id doubles as the account's credential identity.
 */
export interface AppCredentials {
  clientId: string;
  clientSecret: string;
}

/**
 * Interactive half of a login. Collected by the caller, never by the core.
 */
export interface AccountLogin {
  username: string;
  password: string;
}

export interface PasswordGrantConfig extends AppCredentials, AccountLogin {
  userAgent: string;
  tokenEndpoint?: string;
  scopes?: string[];
}

export interface AccessToken {
  accessToken: string;
  expiresAt?: Date;
  scope?: string;
}
