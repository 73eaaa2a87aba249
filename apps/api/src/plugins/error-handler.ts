import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@contactbook/shared';

const logger = createLogger({ name: 'api:error' });

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      logger.warn({ code: error.code, requestId: request.id, ...error.safeMeta }, error.message);
      if (error.httpStatus === 401) {
        reply.header('WWW-Authenticate', 'Bearer');
      }
      return reply.status(error.httpStatus).send(error.toJSON());
    }

    // Framework rejections: malformed JSON, unsupported media type, oversized body.
    const status = error.statusCode;
    if (status !== undefined && status >= 400 && status < 500) {
      logger.warn({ requestId: request.id, statusCode: status, fastifyCode: error.code }, error.message);
      return reply.status(status).send({ code: ErrorCode.BAD_REQUEST, message: error.message });
    }

    logger.error({ err: error.message, requestId: request.id }, 'Unhandled error');

    return reply.status(500).send({
      code: ErrorCode.INTERNAL,
      message: 'Internal server error',
    });
  });
}
