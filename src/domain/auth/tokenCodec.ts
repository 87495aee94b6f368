import jwt, { type JwtPayload } from 'jsonwebtoken';
import jws from 'jws';

export type TokenAlgorithm = 'HS256' | 'HS384' | 'HS512';

export type TokenRejectionReason = 'MALFORMED' | 'BAD_SIGNATURE' | 'EXPIRED' | 'MISSING_SUBJECT';

export interface IdentityClaim {
  /** Account email. */
  sub: string;
  /** Expiry, seconds since epoch. */
  exp: number;
  iat?: number;
}

export type TokenVerification =
  | { ok: true; claim: IdentityClaim }
  | { ok: false; reason: TokenRejectionReason };

export interface TokenCodecOptions {
  secret: string;
  algorithm: TokenAlgorithm;
  /** Milliseconds since epoch; defaults to Date.now. */
  clock?: () => number;
}

const SIGNATURE_FAILURES = new Set([
  'invalid signature',
  'jwt signature is required',
  'invalid algorithm',
]);

/**
 * Signs and verifies bearer tokens carrying `{ sub, exp }`.
 * Holds only the key and algorithm; verification depends on nothing else but the clock.
 */
export class TokenCodec {
  private readonly clock: () => number;

  constructor(private readonly options: TokenCodecOptions) {
    if (!options.secret) {
      throw new Error('Token signing secret must not be empty');
    }
    this.clock = options.clock ?? Date.now;
  }

  issue(subject: string, ttlSeconds: number): string {
    const now = this.nowSeconds();
    return jwt.sign({ sub: subject, iat: now, exp: now + ttlSeconds }, this.options.secret, {
      algorithm: this.options.algorithm,
    });
  }

  verify(token: string): TokenVerification {
    // Anything with the header.payload.signature shape is checked against the key
    // before any segment is decoded
    const segments = token.split('.');
    if (segments.length !== 3 || !segments[0] || !segments[1]) {
      return { ok: false, reason: 'MALFORMED' };
    }
    if (!jws.verify(token, this.options.algorithm, this.options.secret)) {
      return { ok: false, reason: 'BAD_SIGNATURE' };
    }

    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.options.secret, {
        algorithms: [this.options.algorithm],
        clockTimestamp: this.nowSeconds(),
      });
    } catch (error) {
      return { ok: false, reason: classifyFailure(error) };
    }

    if (typeof payload === 'string' || typeof payload.exp !== 'number') {
      return { ok: false, reason: 'MALFORMED' };
    }
    if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
      return { ok: false, reason: 'MISSING_SUBJECT' };
    }

    return {
      ok: true,
      claim: { sub: payload.sub, exp: payload.exp, iat: payload.iat },
    };
  }

  private nowSeconds(): number {
    return Math.floor(this.clock() / 1000);
  }
}

function classifyFailure(error: unknown): TokenRejectionReason {
  if (error instanceof jwt.TokenExpiredError) {
    return 'EXPIRED';
  }
  if (error instanceof jwt.JsonWebTokenError && SIGNATURE_FAILURES.has(error.message)) {
    return 'BAD_SIGNATURE';
  }
  return 'MALFORMED';
}
