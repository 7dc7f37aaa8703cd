import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@tasknest/shared';

const logger = createLogger({ name: 'api:error' });

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      logger.warn(
        { code: error.code, requestId: request.id, ...error.safeMeta },
        error.message,
      );
      return reply.status(error.httpStatus).headers(error.headers).send(error.toJSON());
    }

    // Malformed JSON, unsupported content types and the like.
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      logger.warn({ requestId: request.id, statusCode: error.statusCode }, error.message);
      return reply.status(error.statusCode).send({
        code: ErrorCode.BAD_REQUEST,
        message: error.message,
      });
    }

    logger.error({ err: error.message, requestId: request.id }, 'Unhandled error');

    return reply.status(500).send({
      code: ErrorCode.INTERNAL,
      message: 'Internal server error',
    });
  });
}
