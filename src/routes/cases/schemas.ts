/*
 * Case search route schemas
 *
 * - Every `/cases/by-*` endpoint takes the same body, validated by
 *   `searchCriteriaSchema`: state (uppercased), commission, searchValue and an
 *   optional `fromDate`/`toDate` range in YYYY-MM-DD form.
 */

export {
  searchCriteriaSchema as caseSearchBodySchema,
  type SearchCriteria as CaseSearchBody,
} from "../../schemas/search-criteria";

