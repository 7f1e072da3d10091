export type TokenKind = 'access' | 'refresh';

/** Decoded claims of an access or refresh token. Times are Unix epoch seconds. */
export interface Credential {
  sub: string;
  username?: string;
  kind: TokenKind;
  jti: string;
  iat: number;
  exp: number;
}

export interface RevocationRecord {
  jti: string;
  kind: TokenKind;
  subjectId: string;
  revokedAt: Date;
  /** Natural expiry of the revoked token; rows past it can be dropped. */
  expiresAt: Date;
}

export type TokenErrorKind =
  | 'MALFORMED'
  | 'EXPIRED'
  | 'WRONG_KIND'
  | 'REVOKED'
  | 'MISSING_CREDENTIAL';

export class TokenError extends Error {
  constructor(
    public readonly kind: TokenErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'TokenError';
  }
}

export function isCredentialExpired(credential: Pick<Credential, 'exp'>, nowSeconds: number): boolean {
  return nowSeconds > credential.exp;
}
