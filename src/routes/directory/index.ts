/*
 * Directory routes plugin
 *
 * - `GET /states`: active, non-circuit-bench states sorted by name.
 * - `GET /commissions/:stateId`: active district commissions of a state, sorted
 *   by name, together with the state's name.
 */

import { FastifyPluginAsync } from "fastify";
import { getDistrictCommissionsHandler, getStatesHandler } from "./handlers";

const directoryRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.get(
    "/states",
    {
      schema: {
        description: "List active states with their commission ids",
        tags: ["directory"],
      },
    },
    getStatesHandler
  );

  fastify.get(
    "/commissions/:stateId",
    {
      schema: {
        description: "List active district commissions for a state commission id",
        tags: ["directory"],
      },
    },
    getDistrictCommissionsHandler
  );
};

export default directoryRoutes;
