import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode } from '@tasknest/shared';
import { AuthError, type AuthService } from '@tasknest/domain';
import { RegisterRequestSchema, TokenRequestSchema, type TokenResponse } from '@tasknest/proto';
import { type createRateLimiter } from '../plugins/rate-limit';
import { parseRequest } from '../plugins/validation';
import { toUserResponse } from './users';

interface AuthRouteDeps<Tx> {
  authService: AuthService<Tx>;
  registerRateLimit: ReturnType<typeof createRateLimiter>;
  tokenRateLimit: ReturnType<typeof createRateLimiter>;
}

function mapAuthError(err: unknown): never {
  if (err instanceof AuthError) {
    const codeMap: Record<AuthError['kind'], ErrorCode> = {
      UNAUTHORIZED: ErrorCode.UNAUTHORIZED,
      DUPLICATE_EMAIL: ErrorCode.BAD_REQUEST,
    };
    throw new AppError(codeMap[err.kind], err.message);
  }
  throw err;
}

export function registerAuthRoutes<Tx>(app: FastifyInstance, deps: AuthRouteDeps<Tx>): void {
  const { authService, registerRateLimit, tokenRateLimit } = deps;

  app.post('/register', { preHandler: [registerRateLimit] }, async (request, reply) => {
    const input = parseRequest(RegisterRequestSchema, request.body, 'Invalid registration data');

    try {
      const user = await authService.register(input);
      return reply.status(200).send(toUserResponse(user));
    } catch (err) {
      return mapAuthError(err);
    }
  });

  // Password grant: form-encoded or JSON `{ username, password }`, where username is the email.
  app.post('/token', { preHandler: [tokenRateLimit] }, async (request, reply) => {
    const { username, password } = parseRequest(TokenRequestSchema, request.body, 'Invalid login data');

    try {
      const result = await authService.login({ email: username, password });
      const body: TokenResponse = { access_token: result.accessToken, token_type: result.tokenType };
      return reply.status(200).send(body);
    } catch (err) {
      return mapAuthError(err);
    }
  });
}
