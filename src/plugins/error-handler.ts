import { FastifyError, FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import { ZodError } from "zod";
import { AppError, ValidationError } from "../utils/errors";
import { logger } from "../utils/logger";

interface ErrorReply {
  statusCode: number;
  body: { error: string; code?: string; details?: unknown };
}

function hasStatusCode(error: Error): error is Error & { statusCode: number } {
  return "statusCode" in error && typeof error.statusCode === "number";
}

/*
 * toErrorReply
 *
 * - Zod failures from route parsing are reported exactly like a
 *   `ValidationError` raised deeper down, so every 400 has one shape.
 * - Errors Fastify raises itself (bad JSON, wrong content type) keep their status.
 */
export function toErrorReply(error: Error): ErrorReply {
  const appError =
    error instanceof ZodError ? new ValidationError(error.issues) : error;

  if (appError instanceof AppError) {
    return {
      statusCode: appError.statusCode,
      body: {
        error: appError.message,
        code: appError.code,
        ...(appError.details === undefined ? {} : { details: appError.details }),
      },
    };
  }

  if (hasStatusCode(appError)) {
    return { statusCode: appError.statusCode, body: { error: appError.message } };
  }

  return { statusCode: 500, body: { error: "Internal Server Error" } };
}

const errorHandlerPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.setErrorHandler((error: FastifyError | Error, request, reply) => {
    const { statusCode, body } = toErrorReply(error);
    const context = { err: error, url: request.url, method: request.method };

    if (statusCode >= 500) {
      logger.error(context, "Request failed");
    } else {
      logger.warn(context, "Request rejected");
    }

    return reply.code(statusCode).send(body);
  });
};

export default fp(errorHandlerPlugin, {
  name: "error-handler",
});
