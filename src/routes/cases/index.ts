/*
 * Cases routes plugin
 *
 * - Registers the search endpoints under the `/cases` prefix (when mounted in `app.ts`):
 *   `POST /by-case-number`, `/by-complainant`, `/by-respondent`,
 *   `/by-complainant-advocate`, `/by-respondent-advocate`, `/by-industry-type`
 *   and `/by-judge`, plus `GET /health` for the module.
 */

import { FastifyPluginAsync } from "fastify";
import { SEARCH_KINDS, SEARCH_KIND_NAMES } from "../../config/portal";
import { createSearchHandler } from "./handlers";

export const CASE_SEARCH_PATHS = SEARCH_KIND_NAMES.map(
  (kind) => `/cases/${SEARCH_KINDS[kind].slug}`
);

const casesRoutes: FastifyPluginAsync = async (fastify) => {
  for (const kind of SEARCH_KIND_NAMES) {
    const { slug, label } = SEARCH_KINDS[kind];

    fastify.post(
      `/${slug}`,
      {
        schema: {
          description: `Search district commission cases by ${label.toLowerCase()}`,
          tags: ["cases"],
        },
      },
      createSearchHandler(kind)
    );
  }

  // GET /cases/health
  fastify.get(
    "/health",
    {
      schema: {
        description: "Health check for the case search endpoints",
        tags: ["cases"],
      },
    },
    async () => ({
      status: "healthy",
      module: "case-search",
      endpoints: CASE_SEARCH_PATHS,
    })
  );
};

export default casesRoutes;
