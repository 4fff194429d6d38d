/*
 * Portal constants
 *
 * - Endpoint paths, request headers and the search-kind table for the consumer
 *   commission portal. The wire names (including the portal's `serchType`
 *   spelling) are fixed by the portal and must not be changed.
 */

export const PORTAL_ENDPOINTS = {
  stateCommissions: "/services/report/report/getStateCommissionAndCircuitBench",
  districtCommissions:
    "/services/report/report/getDistrictCommissionByCommissionId",
  caseSearch: "/services/case/caseFilingService/v2/getCaseDetailsBySearchType",
} as const;

// 1 = filter on case filing date
export const DATE_REQUEST_TYPE = 1;
// 1 = daily orders only
export const ORDER_TYPE = 1;
// Judge-name searches go through `serchTypeValue`; this filter stays empty.
export const JUDGE_ID = "";

const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/139.0.0.0 Safari/537.36";

/*
 * buildPortalHeaders
 *
 * - The portal rejects requests that do not look like they come from its own
 *   web client, so every call carries the same browser header set.
 */
export function buildPortalHeaders(baseUrl: string): Record<string, string> {
  return {
    Accept: "application/json",
    "Accept-Language": "en-GB,en-US;q=0.9,en;q=0.8",
    "Content-Type": "application/json",
    DNT: "1",
    Origin: baseUrl,
    Referer: `${baseUrl}/`,
    "Sec-Fetch-Dest": "empty",
    "Sec-Fetch-Mode": "cors",
    "Sec-Fetch-Site": "same-origin",
    "User-Agent": USER_AGENT,
    "sec-ch-ua":
      '"Not;A=Brand";v="99", "Google Chrome";v="139", "Chromium";v="139"',
    "sec-ch-ua-mobile": "?0",
    "sec-ch-ua-platform": '"macOS"',
  };
}

export const SEARCH_KINDS = {
  caseNumber: { type: 1, label: "Case Number", slug: "by-case-number" },
  complainant: { type: 2, label: "Complainant", slug: "by-complainant" },
  respondent: { type: 3, label: "Respondent", slug: "by-respondent" },
  complainantAdvocate: {
    type: 4,
    label: "Complainant Advocate",
    slug: "by-complainant-advocate",
  },
  respondentAdvocate: {
    type: 5,
    label: "Respondent Advocate",
    slug: "by-respondent-advocate",
  },
  industryType: { type: 6, label: "Industry Type", slug: "by-industry-type" },
  judge: { type: 7, label: "Judge", slug: "by-judge" },
} as const;

export type SearchKind = keyof typeof SEARCH_KINDS;

export const SEARCH_KIND_NAMES: readonly SearchKind[] = [
  "caseNumber",
  "complainant",
  "respondent",
  "complainantAdvocate",
  "respondentAdvocate",
  "industryType",
  "judge",
];
