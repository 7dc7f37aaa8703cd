import { SignJWT, jwtVerify, errors } from 'jose';
import { type AccessTokenClaims, type TokenService } from '@tasknest/domain';
import { createLogger } from '../logger';

const logger = createLogger({ name: 'auth:token' });

const ALGORITHM = 'HS256';

interface JwtKey {
  kid: string;
  secret: Uint8Array;
}

export interface TokenServiceConfig {
  activeKid: string;
  keys: Array<{ kid: string; secret: string }>;
  accessTokenTtlSeconds: number;
  issuer?: string;
  now?: () => Date;
}

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * HMAC-signed access tokens. Older keys stay in the ring so tokens minted
 * before a rotation keep verifying until they expire.
 */
export class JoseTokenService implements TokenService {
  private readonly keys: Map<string, JwtKey>;
  private readonly activeKey: JwtKey;
  private readonly accessTokenTtlSeconds: number;
  private readonly issuer: string;
  private readonly now: () => Date;

  constructor(config: TokenServiceConfig) {
    this.keys = new Map();
    for (const key of config.keys) {
      this.keys.set(key.kid, {
        kid: key.kid,
        secret: new TextEncoder().encode(key.secret),
      });
    }

    const active = this.keys.get(config.activeKid);
    if (!active) {
      throw new Error(`Active JWT key '${config.activeKid}' not found in keys`);
    }
    if (!Number.isInteger(config.accessTokenTtlSeconds) || config.accessTokenTtlSeconds <= 0) {
      throw new Error('accessTokenTtlSeconds must be a positive integer');
    }
    this.activeKey = active;
    this.accessTokenTtlSeconds = config.accessTokenTtlSeconds;
    this.issuer = config.issuer ?? 'tasknest';
    this.now = config.now ?? (() => new Date());
  }

  async signAccessToken(subject: string, ttlSeconds: number = this.accessTokenTtlSeconds): Promise<string> {
    const issuedAt = toEpochSeconds(this.now());
    return new SignJWT({ sub: subject })
      .setProtectedHeader({ alg: ALGORITHM, kid: this.activeKey.kid })
      .setIssuedAt(issuedAt)
      .setIssuer(this.issuer)
      .setExpirationTime(issuedAt + ttlSeconds)
      .sign(this.activeKey.secret);
  }

  async verifyAccessToken(token: string): Promise<AccessTokenClaims | null> {
    try {
      const { payload } = await jwtVerify(
        token,
        async (header) => {
          const key = header.kid ? this.keys.get(header.kid) : undefined;
          if (!key) {
            throw new errors.JWKSNoMatchingKey();
          }
          return key.secret;
        },
        {
          issuer: this.issuer,
          algorithms: [ALGORITHM],
          requiredClaims: ['exp', 'sub'],
          currentDate: this.now(),
        },
      );

      if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
        return null;
      }
      return { subject: payload.sub };
    } catch (err) {
      const reason = err instanceof errors.JOSEError ? err.code : 'ERR_MALFORMED';
      logger.debug({ reason }, 'Access token rejected');
      return null;
    }
  }
}
