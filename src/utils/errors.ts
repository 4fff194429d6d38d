/*
 * Application errors
 *
 * - `AppError` carries the HTTP status and a stable `code`; the error-handler
 *   plugin turns any subclass into a `{ error, code, details? }` response.
 * - Upstream failures are split by cause so callers can tell a timeout from an
 *   HTTP rejection or an unexpected body, but they all reach clients as 500s.
 */

import type { ZodIssue } from "zod";

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = "INTERNAL_ERROR",
    public readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(
    public readonly issues: ZodIssue[],
    message: string = "Validation Error"
  ) {
    super(message, 400, "VALIDATION_ERROR", issues);
  }
}

export type NotFoundResource = "State" | "Commission";

export class NotFoundError extends AppError {
  constructor(
    public readonly resource: NotFoundResource,
    message: string = `${resource} not found`
  ) {
    super(message, 404, "NOT_FOUND");
  }
}

export abstract class UpstreamError extends AppError {
  constructor(message: string, code: string, details?: unknown) {
    super(message, 500, code, details);
  }
}

export class UpstreamTimeoutError extends UpstreamError {
  constructor(
    public readonly url: string,
    public readonly attempts: number
  ) {
    super(
      `Portal request timed out after ${attempts} attempts`,
      "UPSTREAM_TIMEOUT"
    );
  }
}

export class UpstreamUnreachableError extends UpstreamError {
  constructor(
    public readonly url: string,
    public readonly attempts: number,
    reason: string
  ) {
    super(
      `Portal unreachable after ${attempts} attempts: ${reason}`,
      "UPSTREAM_UNREACHABLE"
    );
  }
}

export class UpstreamHttpError extends UpstreamError {
  constructor(
    public readonly url: string,
    public readonly upstreamStatus: number,
    public readonly body: string
  ) {
    super(`Portal responded with HTTP ${upstreamStatus}`, "UPSTREAM_HTTP_ERROR", {
      upstreamStatus,
    });
  }
}

export class MalformedUpstreamResponseError extends UpstreamError {
  constructor(
    public readonly url: string,
    reason: string,
    issues?: ZodIssue[]
  ) {
    super(
      `Portal returned an unexpected response: ${reason}`,
      "UPSTREAM_MALFORMED_RESPONSE",
      issues
    );
  }
}

export class SearchFailedError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Case search failed: ${message}`, 500, "SEARCH_FAILED");
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}
