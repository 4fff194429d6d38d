/*
 * CaseSearchService
 *
 * - Runs one case search end to end for any of the seven search kinds:
 *   validate and default the criteria, resolve the state and district
 *   commission ids, build the portal payload, execute it and reshape the rows.
 * - Stops at the first failing step. Errors that are already classified
 *   (`AppError` subclasses) pass through; anything else becomes a
 *   `SearchFailedError`, so callers never see a raw fault or partial results.
 */

import { env } from "../config/env";
import {
  DATE_REQUEST_TYPE,
  JUDGE_ID,
  ORDER_TYPE,
  SEARCH_KINDS,
  type SearchKind,
} from "../config/portal";
import type { CaseSearchPayload, PortalCase } from "../schemas/portal";
import {
  isDateRangeOrdered,
  searchCriteriaSchema,
  type SearchCriteriaInput,
} from "../schemas/search-criteria";
import {
  AppError,
  NotFoundError,
  SearchFailedError,
  ValidationError,
} from "../utils/errors";
import { logger } from "../utils/logger";
import type { DirectoryResolverService } from "./directory-resolver.service";
import type {
  PortalGatewayService,
  PortalRequestOptions,
} from "./portal-gateway.service";

export type SearchGateway = Pick<PortalGatewayService, "executeSearch">;
export type SearchResolver = Pick<
  DirectoryResolverService,
  "resolveState" | "resolveDistrict"
>;

export interface ResolvedQuery {
  stateCommissionId: number;
  districtCommissionId: number;
  searchKind: SearchKind;
  searchValue: string;
  fromDate: string;
  toDate: string;
}

export interface CaseRecord {
  caseNumber: string;
  caseStage: string;
  filingDate: string;
  complainant: string;
  complainantAdvocate?: string;
  respondent: string;
  respondentAdvocate?: string;
  documentLink?: string;
}

export interface CriteriaEcho {
  state: string;
  commission: string;
  searchValue: string;
  searchKind: SearchKind;
  searchKindLabel: string;
  searchType: number;
  fromDate: string;
  toDate: string;
  stateCommissionId: number;
  districtCommissionId: number;
}

export interface SearchResult {
  records: CaseRecord[];
  totalCount: number;
  criteriaEcho: CriteriaEcho;
}

export interface DateDefaults {
  fromDate: string;
  toDate: string;
}

export function buildSearchPayload(query: ResolvedQuery): CaseSearchPayload {
  return {
    commissionId: query.districtCommissionId,
    dateRequestType: DATE_REQUEST_TYPE,
    fromDate: query.fromDate,
    toDate: query.toDate,
    judgeId: JUDGE_ID,
    orderType: ORDER_TYPE,
    serchType: SEARCH_KINDS[query.searchKind].type,
    serchTypeValue: query.searchValue,
  };
}

export function toCaseRecord(raw: PortalCase, baseUrl: string): CaseRecord {
  const record: CaseRecord = {
    caseNumber: raw.caseNumber,
    caseStage: raw.caseStageName,
    filingDate: raw.caseFilingDate,
    complainant: raw.complainantName,
    respondent: raw.respondentName,
  };

  if (raw.complainantAdvocateName) {
    record.complainantAdvocate = raw.complainantAdvocateName;
  }
  if (raw.respondentAdvocateName) {
    record.respondentAdvocate = raw.respondentAdvocateName;
  }
  if (raw.orderDocumentPath) {
    record.documentLink = `${baseUrl}${raw.orderDocumentPath}`;
  }
  return record;
}

export class CaseSearchService {
  constructor(
    private readonly resolver: SearchResolver,
    private readonly gateway: SearchGateway,
    private readonly documentBaseUrl: string,
    private readonly dateDefaults: DateDefaults = {
      fromDate: env.DEFAULT_FROM_DATE,
      toDate: env.DEFAULT_TO_DATE,
    }
  ) {}

  async search(
    kind: SearchKind,
    input: SearchCriteriaInput,
    options: PortalRequestOptions = {}
  ): Promise<SearchResult> {
    const parsed = searchCriteriaSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues);
    }

    const criteria = parsed.data;
    const fromDate = criteria.fromDate ?? this.dateDefaults.fromDate;
    const toDate = criteria.toDate ?? this.dateDefaults.toDate;
    if (!isDateRangeOrdered(fromDate, toDate)) {
      throw new ValidationError([
        {
          code: "custom",
          path: ["toDate"],
          message: `toDate ${toDate} is before fromDate ${fromDate}`,
        },
      ]);
    }

    try {
      const stateCommissionId = await this.resolver.resolveState(
        criteria.state,
        options
      );
      if (stateCommissionId === null) {
        throw new NotFoundError("State", `State '${criteria.state}' not found`);
      }

      const districtCommissionId = await this.resolver.resolveDistrict(
        stateCommissionId,
        criteria.commission,
        options
      );
      if (districtCommissionId === null) {
        throw new NotFoundError(
          "Commission",
          `Commission '${criteria.commission}' not found in state '${criteria.state}'`
        );
      }

      const query: ResolvedQuery = {
        stateCommissionId,
        districtCommissionId,
        searchKind: kind,
        searchValue: criteria.searchValue,
        fromDate,
        toDate,
      };
      const rows = await this.gateway.executeSearch(
        buildSearchPayload(query),
        options
      );
      const records = rows.map((row) => toCaseRecord(row, this.documentBaseUrl));

      logger.info(
        { kind, totalCount: records.length, districtCommissionId },
        "Case search completed"
      );

      return {
        records,
        totalCount: records.length,
        criteriaEcho: {
          state: criteria.state,
          commission: criteria.commission,
          searchValue: criteria.searchValue,
          searchKind: kind,
          searchKindLabel: SEARCH_KINDS[kind].label,
          searchType: SEARCH_KINDS[kind].type,
          fromDate,
          toDate,
          stateCommissionId,
          districtCommissionId,
        },
      };
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      logger.error({ err: error, kind }, "Unexpected error in case search");
      throw new SearchFailedError(
        error instanceof Error ? error.message : String(error),
        { cause: error }
      );
    }
  }
}
