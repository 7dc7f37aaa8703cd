import { type User } from './user';
import {
  type UserRepository,
  type PasswordHasher,
  type TokenService,
  type WithTransaction,
} from './ports';

export interface AuthServiceDeps<Tx = unknown> {
  userRepo: UserRepository<Tx>;
  passwordHasher: PasswordHasher;
  tokenService: TokenService;
  withTransaction: WithTransaction<Tx>;
  accessTokenTtlSeconds: number;
}

export interface AuthResult {
  accessToken: string;
  tokenType: 'bearer';
  expiresIn: number;
}

// Verified against when the email is unknown, so a failed login costs the same either way.
const TIMING_PLACEHOLDER_PASSWORD = 'placeholder-password-for-unknown-users';

export class AuthService<Tx = unknown> {
  private placeholderHash: Promise<string> | null = null;

  constructor(private readonly deps: AuthServiceDeps<Tx>) {}

  async register(input: { email: string; password: string }): Promise<User> {
    const { userRepo, passwordHasher } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const existing = await userRepo.findByEmail(tx, input.email);
      if (existing) {
        throw new AuthError('DUPLICATE_EMAIL', 'Email already registered');
      }

      const passwordHash = await passwordHasher.hash(input.password);
      const user = await userRepo.create(tx, { email: input.email, passwordHash });
      if (!user) {
        throw new AuthError('DUPLICATE_EMAIL', 'Email already registered');
      }
      return user;
    });
  }

  async login(input: { email: string; password: string }): Promise<AuthResult> {
    const { userRepo, passwordHasher, tokenService, accessTokenTtlSeconds } = this.deps;

    const user = await this.deps.withTransaction((tx) => userRepo.findByEmail(tx, input.email));
    if (!user) {
      await passwordHasher.verify(input.password, await this.timingPlaceholderHash());
      throw new AuthError('UNAUTHORIZED', 'Incorrect username or password');
    }

    const valid = await passwordHasher.verify(input.password, user.passwordHash);
    if (!valid) {
      throw new AuthError('UNAUTHORIZED', 'Incorrect username or password');
    }

    const accessToken = await tokenService.signAccessToken(user.email, accessTokenTtlSeconds);
    return { accessToken, tokenType: 'bearer', expiresIn: accessTokenTtlSeconds };
  }

  /**
   * Maps a bearer token to its user. A bad token and a token whose user no
   * longer exists fail with the same error.
   */
  async resolveIdentity(token: string): Promise<User> {
    const claims = await this.deps.tokenService.verifyAccessToken(token);
    if (!claims) {
      throw new AuthError('UNAUTHORIZED', 'Could not validate credentials');
    }

    const user = await this.deps.withTransaction((tx) =>
      this.deps.userRepo.findByEmail(tx, claims.subject),
    );
    if (!user) {
      throw new AuthError('UNAUTHORIZED', 'Could not validate credentials');
    }
    return user;
  }

  private timingPlaceholderHash(): Promise<string> {
    if (!this.placeholderHash) {
      this.placeholderHash = this.deps.passwordHasher.hash(TIMING_PLACEHOLDER_PASSWORD);
      void this.placeholderHash.catch(() => {
        this.placeholderHash = null;
      });
    }
    return this.placeholderHash;
  }
}

export class AuthError extends Error {
  constructor(
    public readonly kind: 'UNAUTHORIZED' | 'DUPLICATE_EMAIL',
    message: string,
  ) {
    super(message);
    this.name = 'AuthError';
  }
}
