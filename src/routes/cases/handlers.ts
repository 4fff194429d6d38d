/*
 * Case search route handlers
 *
 * - One handler factory serves all seven search kinds; the kind is fixed when
 *   the route is registered.
 * - The body is parsed with Zod here (400 on failure) and handed to
 *   `CaseSearchService`, which resolves names and calls the portal.
 */

import { FastifyReply, FastifyRequest } from "fastify";
import { SEARCH_KINDS, type SearchKind } from "../../config/portal";
import { replyAbortSignal } from "../../utils/abort";
import { caseSearchBodySchema, type CaseSearchBody } from "./schemas";

export function createSearchHandler(kind: SearchKind) {
  return async function searchCasesHandler(
    request: FastifyRequest,
    reply: FastifyReply
  ) {
    const criteria: CaseSearchBody = caseSearchBodySchema.parse(request.body);
    const signal = replyAbortSignal(reply);

    request.log.info(
      { kind, searchValue: criteria.searchValue },
      `Searching cases by ${SEARCH_KINDS[kind].label.toLowerCase()}`
    );
    const result = await request.server.portal.caseSearch.search(
      kind,
      criteria,
      { signal }
    );
    request.log.info({ kind, totalCount: result.totalCount }, "Cases found");

    return reply.send(result);
  };
}
