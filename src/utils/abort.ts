import type { FastifyReply } from "fastify";

/*
 * replyAbortSignal
 *
 * - Aborts when the client goes away before the reply has been written, so
 *   portal calls and backoff waits made on its behalf stop early.
 */
export function replyAbortSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once("close", () => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}
