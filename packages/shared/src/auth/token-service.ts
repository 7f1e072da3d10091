import { SignJWT, compactVerify, errors } from 'jose';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  TokenError,
  isCredentialExpired,
  type Credential,
  type RevocationStore,
  type TokenKind,
  type TokenService,
} from '@giftpair/domain';

export type JwtAlgorithm = 'HS256' | 'HS384' | 'HS512';

export interface TokenServiceConfig {
  secret: string;
  algorithm?: JwtAlgorithm;
  issuer?: string;
  /** Seconds. */
  accessTokenTtl?: number;
  /** Seconds. */
  refreshTokenTtl?: number;
  /** Current time in Unix epoch seconds. */
  now?: () => number;
}

const DEFAULT_ACCESS_TOKEN_TTL = 60 * 60;
const DEFAULT_REFRESH_TOKEN_TTL = 7 * 24 * 60 * 60;

const ClaimsSchema = z
  .object({
    sub: z.string().min(1),
    username: z.string().optional(),
    kind: z.enum(['access', 'refresh']),
    jti: z.string().uuid(),
    iss: z.string(),
    iat: z.number().int(),
    exp: z.number().int(),
  })
  .refine((claims) => claims.exp > claims.iat, { message: 'exp must be after iat' });

function wallClockSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export class JoseTokenService implements TokenService {
  private readonly secret: Uint8Array;
  private readonly algorithm: JwtAlgorithm;
  private readonly issuer: string;
  private readonly accessTokenTtl: number;
  private readonly refreshTokenTtl: number;
  private readonly now: () => number;

  constructor(
    config: TokenServiceConfig,
    private readonly revocations: RevocationStore,
  ) {
    if (!config.secret) {
      throw new Error('JWT secret must not be empty');
    }
    this.secret = new TextEncoder().encode(config.secret);
    this.algorithm = config.algorithm ?? 'HS256';
    this.issuer = config.issuer ?? 'giftpair';
    this.accessTokenTtl = config.accessTokenTtl ?? DEFAULT_ACCESS_TOKEN_TTL;
    this.refreshTokenTtl = config.refreshTokenTtl ?? DEFAULT_REFRESH_TOKEN_TTL;
    this.now = config.now ?? wallClockSeconds;

    if (this.accessTokenTtl <= 0 || this.refreshTokenTtl <= 0) {
      throw new Error('Token lifetimes must be positive');
    }
  }

  async issueAccessToken(subjectId: string, username?: string): Promise<string> {
    return this.sign(subjectId, 'access', this.accessTokenTtl, username === undefined ? {} : { username });
  }

  async issueRefreshToken(subjectId: string): Promise<string> {
    return this.sign(subjectId, 'refresh', this.refreshTokenTtl, {});
  }

  /**
   * Checks signature and claims, then expiry, then kind, then the blocklist.
   * The first failing check decides the `TokenError` kind.
   */
  async verify(token: string, expectedKind: TokenKind): Promise<Credential> {
    const credential = await this.inspect(token);

    if (isCredentialExpired(credential, this.now())) {
      throw new TokenError('EXPIRED', 'Token has expired');
    }
    if (credential.kind !== expectedKind) {
      throw new TokenError('WRONG_KIND', `Expected ${expectedKind} token, got ${credential.kind} token`);
    }
    if (await this.revocations.contains(credential.jti)) {
      throw new TokenError('REVOKED', 'Token has been revoked');
    }
    return credential;
  }

  /** Expired tokens can still be revoked; revoking twice is a no-op. */
  async revoke(token: string): Promise<void> {
    const credential = await this.inspect(token);
    await this.revocations.insert({
      jti: credential.jti,
      kind: credential.kind,
      subjectId: credential.sub,
      revokedAt: new Date(this.now() * 1000),
      expiresAt: new Date(credential.exp * 1000),
    });
  }

  /** `resolveUsername` restores the claim a refresh token does not carry. */
  async refreshAccess(
    refreshToken: string,
    resolveUsername?: (subjectId: string) => Promise<string | undefined>,
  ): Promise<string> {
    const credential = await this.verify(refreshToken, 'refresh');
    const username = resolveUsername ? await resolveUsername(credential.sub) : undefined;
    return this.issueAccessToken(credential.sub, username);
  }

  private async sign(
    subjectId: string,
    kind: TokenKind,
    ttl: number,
    extra: { username?: string },
  ): Promise<string> {
    const issuedAt = this.now();
    return new SignJWT({ kind, ...extra })
      .setProtectedHeader({ alg: this.algorithm, typ: 'JWT' })
      .setSubject(subjectId)
      .setJti(randomUUID())
      .setIssuer(this.issuer)
      .setIssuedAt(issuedAt)
      .setExpirationTime(issuedAt + ttl)
      .sign(this.secret);
  }

  /** Signature and claim validation only; expiry is left to the caller. */
  async inspect(token: string): Promise<Credential> {
    let payload: Uint8Array;
    try {
      ({ payload } = await compactVerify(token, this.secret, { algorithms: [this.algorithm] }));
    } catch (err) {
      const detail = err instanceof errors.JOSEError ? err.code : 'ERR_UNKNOWN';
      throw new TokenError('MALFORMED', `Token is malformed or its signature is invalid (${detail})`);
    }

    let claims: unknown;
    try {
      claims = JSON.parse(new TextDecoder().decode(payload));
    } catch {
      throw new TokenError('MALFORMED', 'Token payload is not JSON');
    }

    const parsed = ClaimsSchema.safeParse(claims);
    if (!parsed.success) {
      throw new TokenError('MALFORMED', 'Token claims are missing or invalid');
    }

    const { iss, ...credential } = parsed.data;
    if (iss !== this.issuer) {
      throw new TokenError('MALFORMED', 'Token issuer is not accepted');
    }
    return credential;
  }
}
