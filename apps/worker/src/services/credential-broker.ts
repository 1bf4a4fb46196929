import { google } from 'googleapis';
import { z } from 'zod';
import { AuthError, classifyAuthError } from '../lib/errors';
import { createModuleLogger } from '../lib/logger';
import type { Logger } from '../lib/logger';
import { withRetry, withTimeout } from '../lib/retry';
import type { RetryPolicy } from '../lib/retry';
import type { CredentialAcquirer, DelegatedCredential } from '../types';

// ============ CONSTANTS ============
export const DELEGATION_SCOPES = [
  'https://www.googleapis.com/auth/admin.directory.user.readonly',
  'https://www.googleapis.com/auth/drive.readonly',
  'https://www.googleapis.com/auth/script.projects.readonly',
] as const;

export const TOKEN_URI = 'https://oauth2.googleapis.com/token';
const JWT_BEARER_GRANT = 'urn:ietf:params:oauth:grant-type:jwt-bearer';
const ASSERTION_LIFETIME_SECONDS = 3600;

const moduleLogger = createModuleLogger('credential-broker');

// OAuth error codes that mean the delegation grant does not cover the request
const UNAUTHORIZED_OAUTH_ERRORS = new Set(['unauthorized_client', 'access_denied', 'invalid_grant', 'invalid_scope']);

// ============ TYPES ============
export interface DelegationClaims {
  iss: string;
  sub: string;
  scope: string;
  aud: string;
  iat: number;
  exp: number;
}

export interface ExchangedToken {
  accessToken: string;
  expiresInSeconds: number;
}

export type JwtSigner = (claims: DelegationClaims) => Promise<string>;
export type TokenExchanger = (assertion: string) => Promise<ExchangedToken>;

export interface CredentialBrokerOptions {
  serviceAccountEmail: string;
  signJwt: JwtSigner;
  exchangeToken: TokenExchanger;
  retry: RetryPolicy;
  callTimeoutMs: number;
  /** Lower-cased domains the broker may impersonate; empty means any. */
  allowedDomains?: string[];
  scopes?: readonly string[];
  now?: () => Date;
  logger?: Logger;
}

// ============ IAM SIGNER ============
/**
 * Signs delegation assertions with the IAM Credentials API, so the service
 * account needs no private key: the runtime's own identity holds
 * `iam.serviceAccountTokenCreator` on it.
 */
export function createIamJwtSigner(serviceAccountEmail: string): JwtSigner {
  const auth = new google.auth.GoogleAuth({
    scopes: ['https://www.googleapis.com/auth/cloud-platform'],
  });
  const iam = google.iamcredentials({ version: 'v1', auth });

  return async (claims) => {
    const res = await iam.projects.serviceAccounts.signJwt({
      name: `projects/-/serviceAccounts/${serviceAccountEmail}`,
      requestBody: { payload: JSON.stringify(claims) },
    });
    const signedJwt = res.data.signedJwt;
    if (!signedJwt) {
      throw new AuthError('transient', 'IAM signJwt returned no signature');
    }
    return signedJwt;
  };
}

// ============ TOKEN EXCHANGE ============
const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive(),
});

const tokenErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

export function createOAuthTokenExchanger(tokenUri: string = TOKEN_URI): TokenExchanger {
  return async (assertion) => {
    const res = await fetch(tokenUri, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({ grant_type: JWT_BEARER_GRANT, assertion }),
    });

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      const parsedError = tokenErrorSchema.safeParse(safeJson(text));
      const oauthError = parsedError.success ? parsedError.data.error : undefined;
      const detail = parsedError.success
        ? `${parsedError.data.error}${parsedError.data.error_description ? `: ${parsedError.data.error_description}` : ''}`
        : text.slice(0, 200);
      const message = `Token exchange failed (HTTP ${res.status}) ${detail}`.trim();

      if (res.status === 429 || res.status >= 500) {
        throw new AuthError('transient', message);
      }
      if (oauthError && !UNAUTHORIZED_OAUTH_ERRORS.has(oauthError)) {
        moduleLogger.warn({ oauthError, status: res.status }, 'Unrecognised OAuth error, treating as unauthorized');
      }
      throw new AuthError('unauthorized', message);
    }

    const parsed = tokenResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new AuthError('transient', 'Token endpoint returned an unexpected body');
    }
    return { accessToken: parsed.data.access_token, expiresInSeconds: parsed.data.expires_in };
  };
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

// ============ BROKER ============
export class CredentialBroker implements CredentialAcquirer {
  private readonly log: Logger;
  private readonly scopes: readonly string[];
  private readonly now: () => Date;

  constructor(private readonly options: CredentialBrokerOptions) {
    this.log = options.logger ?? moduleLogger;
    this.scopes = options.scopes ?? DELEGATION_SCOPES;
    this.now = options.now ?? (() => new Date());
  }

  /** Exchanges the service identity for a token acting as `targetUser`. */
  async acquire(targetUser: string): Promise<DelegatedCredential> {
    if (!this.isAuthorizedDomain(targetUser)) {
      throw new AuthError('unauthorized', `${targetUser} is outside the authorized domains`);
    }

    const { serviceAccountEmail, signJwt, exchangeToken, callTimeoutMs } = this.options;
    const token = await withRetry(
      async () => {
        const issuedAt = Math.floor(this.now().getTime() / 1000);
        const claims: DelegationClaims = {
          iss: serviceAccountEmail,
          sub: targetUser,
          scope: this.scopes.join(' '),
          aud: TOKEN_URI,
          iat: issuedAt,
          exp: issuedAt + ASSERTION_LIFETIME_SECONDS,
        };
        const assertion = await withTimeout(signJwt(claims), callTimeoutMs, 'iamcredentials.signJwt');
        return withTimeout(exchangeToken(assertion), callTimeoutMs, 'oauth2.token');
      },
      {
        label: `acquire credential for ${targetUser}`,
        policy: this.options.retry,
        classify: classifyAuthError,
        logger: this.log,
      }
    );

    const expiresAt = new Date(this.now().getTime() + token.expiresInSeconds * 1000);
    const auth = new google.auth.OAuth2();
    auth.setCredentials({
      access_token: token.accessToken,
      token_type: 'Bearer',
      expiry_date: expiresAt.getTime(),
    });

    this.log.debug({ subject: targetUser, expiresAt: expiresAt.toISOString() }, 'Delegated credential acquired');
    return { subject: targetUser, auth, expiresAt };
  }

  private isAuthorizedDomain(email: string): boolean {
    const allowed = this.options.allowedDomains ?? [];
    if (allowed.length === 0) return true;
    const domain = email.split('@').pop()?.toLowerCase();
    return domain !== undefined && allowed.includes(domain);
  }
}
