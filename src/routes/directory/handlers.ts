/*
 * Directory route handlers
 *
 * - `getStatesHandler` lists active states (circuit benches excluded).
 * - `getDistrictCommissionsHandler` lists the active district commissions of
 *   one state; an unknown state id yields 404 via `NotFoundError`.
 */

import { FastifyReply, FastifyRequest } from "fastify";
import { replyAbortSignal } from "../../utils/abort";
import { commissionsParamsSchema, type CommissionsParams } from "./schemas";

export async function getStatesHandler(
  request: FastifyRequest,
  reply: FastifyReply
) {
  const listing = await request.server.portal.directory.listStates({
    signal: replyAbortSignal(reply),
  });
  request.log.info({ totalCount: listing.totalCount }, "Listed states");

  return reply.send(listing);
}

export async function getDistrictCommissionsHandler(
  request: FastifyRequest,
  reply: FastifyReply
) {
  const { stateId }: CommissionsParams = commissionsParamsSchema.parse(
    request.params
  );

  const listing = await request.server.portal.directory.listDistrictCommissions(
    stateId,
    { signal: replyAbortSignal(reply) }
  );
  request.log.info(
    { stateId, stateName: listing.stateName, totalCount: listing.totalCount },
    "Listed district commissions"
  );

  return reply.send(listing);
}
