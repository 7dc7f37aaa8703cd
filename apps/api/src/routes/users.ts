import { type FastifyInstance } from 'fastify';
import { type User } from '@tasknest/domain';
import { type UserResponse } from '@tasknest/proto';
import { currentUser, type createAuthMiddleware } from '../plugins/auth';

interface UserRouteDeps {
  authenticate: ReturnType<typeof createAuthMiddleware>;
}

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    email: user.email,
    created_at: user.createdAt.toISOString(),
  };
}

export function registerUserRoutes(app: FastifyInstance, deps: UserRouteDeps): void {
  const { authenticate } = deps;

  app.get('/users/me', { preHandler: [authenticate] }, async (request, reply) => {
    return reply.status(200).send(toUserResponse(currentUser(request)));
  });
}
