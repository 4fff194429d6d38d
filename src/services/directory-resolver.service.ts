/*
 * DirectoryResolverService
 *
 * - Maps human-entered state and commission names to the numeric ids the portal
 *   expects, by fetching the relevant directory and scanning it in order.
 * - Matching is a full-string, case-insensitive compare. When the portal lists
 *   the same name twice, the first entry wins.
 * - Nothing is cached: each call re-fetches its directory so that one request
 *   never sees ids from a stale list.
 * - Also serves the filtered, sorted listings behind `/states` and
 *   `/commissions/:stateId`.
 */

import type { CommissionEntry } from "../schemas/portal";
import { NotFoundError } from "../utils/errors";
import { logger } from "../utils/logger";
import type {
  PortalGatewayService,
  PortalRequestOptions,
} from "./portal-gateway.service";

export type DirectoryGateway = Pick<
  PortalGatewayService,
  "fetchStateDirectory" | "fetchDistrictDirectory"
>;

export interface StateListing {
  states: CommissionEntry[];
  totalCount: number;
}

export interface CommissionListing {
  stateId: number;
  stateName: string;
  commissions: CommissionEntry[];
  totalCount: number;
}

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function byDisplayName(a: CommissionEntry, b: CommissionEntry): number {
  if (a.displayName < b.displayName) return -1;
  if (a.displayName > b.displayName) return 1;
  return 0;
}

export class DirectoryResolverService {
  constructor(private readonly gateway: DirectoryGateway) {}

  async resolveState(
    name: string,
    options: PortalRequestOptions = {}
  ): Promise<number | null> {
    const states = await this.gateway.fetchStateDirectory(options);
    const match = states.find((entry) => sameName(entry.displayName, name));

    if (!match) {
      logger.warn({ state: name }, "State not found in portal directory");
      return null;
    }

    logger.info({ state: name, commissionId: match.id }, "Resolved state");
    return match.id;
  }

  async resolveDistrict(
    stateCommissionId: number,
    name: string,
    options: PortalRequestOptions = {}
  ): Promise<number | null> {
    const districts = await this.gateway.fetchDistrictDirectory(
      stateCommissionId,
      options
    );
    const match = districts.find((entry) => sameName(entry.displayName, name));

    if (!match) {
      logger.warn(
        { commission: name, stateCommissionId },
        "Commission not found in state directory"
      );
      return null;
    }

    logger.info(
      { commission: name, commissionId: match.id },
      "Resolved district commission"
    );
    return match.id;
  }

  async resolveStateName(
    stateCommissionId: number,
    options: PortalRequestOptions = {}
  ): Promise<string | null> {
    const states = await this.gateway.fetchStateDirectory(options);
    const match = states.find((entry) => entry.id === stateCommissionId);
    return match ? match.displayName : null;
  }

  /*
   * listStates
   *
   * - Active states only; circuit and additional benches are left out.
   */
  async listStates(options: PortalRequestOptions = {}): Promise<StateListing> {
    const states = (await this.gateway.fetchStateDirectory(options))
      .filter((entry) => entry.isActive && !entry.isCircuitBench)
      .sort(byDisplayName);

    return { states, totalCount: states.length };
  }

  /*
   * listDistrictCommissions
   *
   * - Confirms the state id exists before listing its active district commissions.
   * - Throws `NotFoundError` when the id is not in the state directory.
   */
  async listDistrictCommissions(
    stateCommissionId: number,
    options: PortalRequestOptions = {}
  ): Promise<CommissionListing> {
    const stateName = await this.resolveStateName(stateCommissionId, options);
    if (stateName === null) {
      throw new NotFoundError(
        "State",
        `State with commission ID ${stateCommissionId} not found`
      );
    }

    const commissions = (
      await this.gateway.fetchDistrictDirectory(stateCommissionId, options)
    )
      .filter((entry) => entry.isActive)
      .sort(byDisplayName);

    return {
      stateId: stateCommissionId,
      stateName,
      commissions,
      totalCount: commissions.length,
    };
  }
}
