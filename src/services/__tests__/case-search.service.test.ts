import { describe, expect, it, jest } from "@jest/globals";
import {
  CaseSearchService,
  buildSearchPayload,
  toCaseRecord,
  type SearchResolver,
} from "../case-search.service";
import { DirectoryResolverService } from "../directory-resolver.service";
import { PortalGatewayService } from "../portal-gateway.service";
import { SEARCH_KIND_NAMES, type SearchKind } from "../../config/portal";
import {
  NotFoundError,
  SearchFailedError,
  UpstreamHttpError,
  UpstreamTimeoutError,
  ValidationError,
} from "../../utils/errors";
import {
  TEST_BASE_URL,
  createFakePortal,
  jsonResponse,
  portalSnapshot,
  timeoutError,
} from "../../__tests__/fake-portal";

const dateDefaults = { fromDate: "2025-01-01", toDate: "2025-09-03" };

function buildService(fetchImpl: typeof fetch, sleep = createFakePortal().sleep) {
  const gateway = new PortalGatewayService({
    baseUrl: TEST_BASE_URL,
    timeoutMs: 1000,
    maxRetries: 3,
    backoffBaseMs: 1000,
    fetchImpl,
    sleep,
  });
  const resolver = new DirectoryResolverService(gateway);
  return new CaseSearchService(resolver, gateway, TEST_BASE_URL, dateDefaults);
}

const karnatakaCriteria = {
  state: "KARNATAKA",
  commission: "Bangalore 1st & Rural Additional",
  searchValue: "REDDY",
};

describe("buildSearchPayload", () => {
  const expectedTypes: Record<SearchKind, number> = {
    caseNumber: 1,
    complainant: 2,
    respondent: 3,
    complainantAdvocate: 4,
    respondentAdvocate: 5,
    industryType: 6,
    judge: 7,
  };

  it.each(SEARCH_KIND_NAMES.map((kind) => [kind]))(
    "uses the fixed discriminant and constants for %s",
    (kind) => {
      const payload = buildSearchPayload({
        stateCommissionId: 11290000,
        districtCommissionId: 15290525,
        searchKind: kind,
        searchValue: "X",
        fromDate: "2025-01-01",
        toDate: "2025-02-01",
      });

      expect(payload).toEqual({
        commissionId: 15290525,
        dateRequestType: 1,
        fromDate: "2025-01-01",
        toDate: "2025-02-01",
        judgeId: "",
        orderType: 1,
        serchType: expectedTypes[kind],
        serchTypeValue: "X",
      });
    }
  );
});

describe("toCaseRecord", () => {
  it("renames fields and builds the document link from the order path", () => {
    expect(toCaseRecord(portalSnapshot.cases[0], TEST_BASE_URL)).toEqual({
      caseNumber: "DC/AB4/525/CC/72/2025",
      caseStage: "ADMIT",
      filingDate: "2025-05-23",
      complainant: "MANJUNATHA REDDY",
      complainantAdvocate: "D Narase Gowda",
      respondent: "SAMPLE AIRLINES LIMITED",
      documentLink: "https://portal.test/docs/x.pdf",
    });
  });

  it("leaves optional fields absent when the portal has no value", () => {
    const record = toCaseRecord(portalSnapshot.cases[1], TEST_BASE_URL);

    expect(record).not.toHaveProperty("documentLink");
    expect(record).not.toHaveProperty("complainantAdvocate");
    expect(record.respondentAdvocate).toBe("K Rao");
  });
});

describe("CaseSearchService", () => {
  it("resolves names and sends the expected payload for a complainant search", async () => {
    const portal = createFakePortal();
    const service = buildService(portal.fetchImpl);

    const result = await service.search(
      "complainant",
      {
        ...karnatakaCriteria,
        fromDate: "2025-01-01",
        toDate: "2025-09-03",
      }
    );

    expect(portal.searchPayloads).toEqual([
      {
        commissionId: 15290525,
        dateRequestType: 1,
        fromDate: "2025-01-01",
        toDate: "2025-09-03",
        judgeId: "",
        orderType: 1,
        serchType: 2,
        serchTypeValue: "REDDY",
      },
    ]);
    expect(result.criteriaEcho).toEqual({
      state: "KARNATAKA",
      commission: "Bangalore 1st & Rural Additional",
      searchValue: "REDDY",
      searchKind: "complainant",
      searchKindLabel: "Complainant",
      searchType: 2,
      fromDate: "2025-01-01",
      toDate: "2025-09-03",
      stateCommissionId: 11290000,
      districtCommissionId: 15290525,
    });
  });

  it("keeps portal order and counts the records", async () => {
    const service = buildService(createFakePortal().fetchImpl);

    const result = await service.search("respondent", karnatakaCriteria);

    expect(result.records.map((record) => record.caseNumber)).toEqual([
      "DC/AB4/525/CC/72/2025",
      "DC/AB4/525/CC/15/2025",
    ]);
    expect(result.totalCount).toBe(result.records.length);
  });

  it("returns identical results for identical criteria", async () => {
    const service = buildService(createFakePortal().fetchImpl);

    const first = await service.search("judge", karnatakaCriteria);
    const second = await service.search("judge", karnatakaCriteria);

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it("uppercases the state and applies default dates", async () => {
    const portal = createFakePortal();
    const service = buildService(portal.fetchImpl);

    const result = await service.search("caseNumber", {
      state: "karnataka",
      commission: "bangalore urban",
      searchValue: "DC/AB4/525/CC/72/2025",
    });

    expect(result.criteriaEcho.state).toBe("KARNATAKA");
    expect(result.criteriaEcho.districtCommissionId).toBe(11290525);
    expect(portal.searchPayloads[0]).toMatchObject({
      fromDate: "2025-01-01",
      toDate: "2025-09-03",
      serchType: 1,
    });
  });

  it("rejects a reversed date range before calling the portal", async () => {
    const portal = createFakePortal();
    const service = buildService(portal.fetchImpl);

    const error = await service
      .search("complainant", {
        ...karnatakaCriteria,
        fromDate: "2025-05-01",
        toDate: "2025-01-01",
      })
      .catch((err) => err);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.details[0].message).toBe("toDate must not be before fromDate");
    expect(portal.fetchImpl).not.toHaveBeenCalled();
  });

  it("accepts a range that starts and ends on the same day", async () => {
    const portal = createFakePortal();
    const service = buildService(portal.fetchImpl);

    const result = await service.search("complainant", {
      ...karnatakaCriteria,
      fromDate: "2025-03-15",
      toDate: "2025-03-15",
    });

    expect(result.criteriaEcho.fromDate).toBe("2025-03-15");
    expect(result.criteriaEcho.toDate).toBe("2025-03-15");
  });

  it.each(["2025/01/01", "2025-13-01", "2025-02-30"])(
    "rejects the malformed date %s",
    async (fromDate) => {
      const portal = createFakePortal();
      const service = buildService(portal.fetchImpl);

      await expect(
        service.search("complainant", { ...karnatakaCriteria, fromDate })
      ).rejects.toBeInstanceOf(ValidationError);
      expect(portal.fetchImpl).not.toHaveBeenCalled();
    }
  );

  it("rejects a fromDate that falls after the default toDate", async () => {
    const portal = createFakePortal();
    const service = buildService(portal.fetchImpl);

    const error = await service
      .search("complainant", { ...karnatakaCriteria, fromDate: "2025-10-01" })
      .catch((err) => err);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toBe("Validation Error");
    expect(error.details).toEqual([
      {
        code: "custom",
        path: ["toDate"],
        message: "toDate 2025-09-03 is before fromDate 2025-10-01",
      },
    ]);
    expect(portal.fetchImpl).not.toHaveBeenCalled();
  });

  it("fails with NotFoundError when the state is unknown", async () => {
    const portal = createFakePortal();
    const service = buildService(portal.fetchImpl);

    const error = await service
      .search("complainant", { ...karnatakaCriteria, state: "Atlantis" })
      .catch((err) => err);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.resource).toBe("State");
    expect(error.message).toBe("State 'ATLANTIS' not found");
    expect(portal.fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("fails with NotFoundError when the commission is not in the state", async () => {
    const portal = createFakePortal();
    const service = buildService(portal.fetchImpl);

    const error = await service
      .search("complainant", { ...karnatakaCriteria, commission: "Pune" })
      .catch((err) => err);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.resource).toBe("Commission");
    expect(error.message).toBe(
      "Commission 'Pune' not found in state 'KARNATAKA'"
    );
    expect(portal.searchPayloads).toHaveLength(0);
  });

  it("surfaces a portal HTTP error from the search call unchanged", async () => {
    const portal = createFakePortal();
    const fetchImpl = jest.fn<typeof fetch>(async (input, init) => {
      if (String(input).endsWith("getCaseDetailsBySearchType")) {
        return jsonResponse({ message: "down" }, 503);
      }
      return portal.fetchImpl(input, init);
    });
    const service = buildService(fetchImpl);

    const error = await service
      .search("complainant", karnatakaCriteria)
      .catch((err) => err);

    expect(error).toBeInstanceOf(UpstreamHttpError);
    expect(error.upstreamStatus).toBe(503);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it("fails with a timeout after the directory lookup times out on every attempt", async () => {
    const fetchImpl = jest.fn<typeof fetch>(async () => {
      throw timeoutError();
    });
    const sleep = jest.fn(async (_ms: number, _signal?: AbortSignal) => {});
    const service = buildService(fetchImpl, sleep);

    await expect(
      service.search("complainant", karnatakaCriteria)
    ).rejects.toBeInstanceOf(UpstreamTimeoutError);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
  });

  it("wraps unexpected failures in SearchFailedError", async () => {
    const boom = new Error("boom");
    const resolver: SearchResolver = {
      resolveState: jest.fn<SearchResolver["resolveState"]>(async () => {
        throw boom;
      }),
      resolveDistrict: jest.fn<SearchResolver["resolveDistrict"]>(),
    };
    const executeSearch = jest.fn<PortalGatewayService["executeSearch"]>();
    const service = new CaseSearchService(
      resolver,
      { executeSearch },
      TEST_BASE_URL,
      dateDefaults
    );

    const error = await service
      .search("complainant", karnatakaCriteria)
      .catch((err) => err);

    expect(error).toBeInstanceOf(SearchFailedError);
    expect(error.message).toBe("Case search failed: boom");
    expect(error.cause).toBe(boom);
    expect(executeSearch).not.toHaveBeenCalled();
  });
});
