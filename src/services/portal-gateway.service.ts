import { setTimeout as delay } from "timers/promises";
import type { ZodType, ZodTypeDef } from "zod";
import { env } from "../config/env";
import { PORTAL_ENDPOINTS, buildPortalHeaders } from "../config/portal";
import {
  caseSearchResponseSchema,
  commissionDirectoryResponseSchema,
  type CaseSearchPayload,
  type CommissionEntry,
  type PortalCase,
  type PortalCommission,
} from "../schemas/portal";
import {
  MalformedUpstreamResponseError,
  UpstreamHttpError,
  UpstreamTimeoutError,
  UpstreamUnreachableError,
} from "../utils/errors";
import { logger } from "../utils/logger";

export interface PortalGatewayOptions {
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  backoffBaseMs: number;
  fetchImpl: typeof fetch;
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface PortalRequestOptions {
  signal?: AbortSignal;
}

interface PortalCall<T> {
  method: "GET" | "POST";
  path: string;
  query?: Record<string, string | number>;
  body?: unknown;
  schema: ZodType<T, ZodTypeDef, unknown>;
  signal?: AbortSignal;
}

type TransportFailure =
  | { kind: "timeout" }
  | { kind: "unreachable"; reason: string };

export async function abortableSleep(
  ms: number,
  signal?: AbortSignal
): Promise<void> {
  await delay(ms, undefined, { signal });
}

export function defaultPortalGatewayOptions(): PortalGatewayOptions {
  return {
    baseUrl: env.PORTAL_BASE_URL,
    timeoutMs: env.PORTAL_TIMEOUT_MS,
    maxRetries: env.PORTAL_MAX_RETRIES,
    backoffBaseMs: env.PORTAL_BACKOFF_BASE_MS,
    fetchImpl: fetch,
    sleep: abortableSleep,
  };
}

function toCommissionEntry(raw: PortalCommission): CommissionEntry {
  return {
    id: raw.commissionId,
    displayName: raw.commissionNameEn,
    isActive: raw.activeStatus,
    isCircuitBench: raw.circuitAdditionBenchStatus,
  };
}

function hasErrorName(error: unknown, name: string): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    error.name === name
  );
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : "";
    return `${error.message}${cause}`;
  }
  return String(error);
}

/**
 * PortalGatewayService
 *
 * - Performs one logical round trip to a portal endpoint and returns parsed data.
 * - Timeouts and transport failures are retried with exponential backoff
 *   (`backoffBaseMs * 2^attempt` between attempts). HTTP error statuses and
 *   bodies that fail schema validation are raised on the first occurrence.
 * - Holds no state between calls; every request builds its own signal.
 */
export class PortalGatewayService {
  private readonly options: PortalGatewayOptions;
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;

  constructor(overrides: Partial<PortalGatewayOptions> = {}) {
    this.options = { ...defaultPortalGatewayOptions(), ...overrides };
    this.baseUrl = this.options.baseUrl.replace(/\/+$/, "");
    this.headers = buildPortalHeaders(this.baseUrl);
  }

  get portalBaseUrl(): string {
    return this.baseUrl;
  }

  async fetchStateDirectory(
    options: PortalRequestOptions = {}
  ): Promise<CommissionEntry[]> {
    const response = await this.request({
      method: "GET",
      path: PORTAL_ENDPOINTS.stateCommissions,
      schema: commissionDirectoryResponseSchema,
      signal: options.signal,
    });
    return response.data.map(toCommissionEntry);
  }

  async fetchDistrictDirectory(
    stateCommissionId: number,
    options: PortalRequestOptions = {}
  ): Promise<CommissionEntry[]> {
    const response = await this.request({
      method: "GET",
      path: PORTAL_ENDPOINTS.districtCommissions,
      query: { commissionId: stateCommissionId },
      schema: commissionDirectoryResponseSchema,
      signal: options.signal,
    });
    return response.data.map(toCommissionEntry);
  }

  async executeSearch(
    payload: CaseSearchPayload,
    options: PortalRequestOptions = {}
  ): Promise<PortalCase[]> {
    logger.info({ payload }, "Searching portal cases");
    const response = await this.request({
      method: "POST",
      path: PORTAL_ENDPOINTS.caseSearch,
      body: payload,
      schema: caseSearchResponseSchema,
      signal: options.signal,
    });
    return response.data;
  }

  private buildUrl(path: string, query?: Record<string, string | number>) {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private async request<T>(call: PortalCall<T>): Promise<T> {
    const url = this.buildUrl(call.path, call.query);
    const { maxRetries, backoffBaseMs, timeoutMs } = this.options;
    let lastFailure: TransportFailure = {
      kind: "unreachable",
      reason: "no attempt made",
    };

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      call.signal?.throwIfAborted();
      const timeoutSignal = AbortSignal.timeout(timeoutMs);
      const signal = call.signal
        ? AbortSignal.any([call.signal, timeoutSignal])
        : timeoutSignal;

      let status: number;
      let text: string;
      try {
        logger.debug(
          { method: call.method, url, attempt: attempt + 1 },
          "Calling portal"
        );
        const response = await this.options.fetchImpl(url, {
          method: call.method,
          headers: this.headers,
          body: call.body === undefined ? undefined : JSON.stringify(call.body),
          signal,
        });
        status = response.status;
        text = await response.text();
      } catch (error) {
        if (call.signal?.aborted) {
          throw error;
        }

        lastFailure =
          timeoutSignal.aborted || hasErrorName(error, "TimeoutError")
            ? { kind: "timeout" }
            : { kind: "unreachable", reason: describeError(error) };
        logger.warn(
          { err: error, url, attempt: attempt + 1, failure: lastFailure.kind },
          "Portal request failed"
        );

        if (attempt < maxRetries - 1) {
          await this.options.sleep(backoffBaseMs * 2 ** attempt, call.signal);
        }
        continue;
      }

      if (status < 200 || status >= 300) {
        logger.error({ url, status, body: text }, "Portal returned HTTP error");
        throw new UpstreamHttpError(url, status, text);
      }

      return this.parseBody(url, text, call.schema);
    }

    if (lastFailure.kind === "timeout") {
      throw new UpstreamTimeoutError(url, maxRetries);
    }
    throw new UpstreamUnreachableError(url, maxRetries, lastFailure.reason);
  }

  private parseBody<T>(
    url: string,
    text: string,
    schema: ZodType<T, ZodTypeDef, unknown>
  ): T {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      logger.error({ err: error, url }, "Portal response is not JSON");
      throw new MalformedUpstreamResponseError(url, "body is not valid JSON");
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      logger.error(
        { url, issues: parsed.error.issues },
        "Portal response does not match expected shape"
      );
      throw new MalformedUpstreamResponseError(
        url,
        "body does not match the expected schema",
        parsed.error.issues
      );
    }
    return parsed.data;
  }
}
