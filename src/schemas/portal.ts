/*
 * Portal wire schemas
 *
 * - Zod schemas for the three portal responses. Only the fields this service
 *   reads are declared; anything else the portal sends is stripped on parse.
 */

import { z } from "zod";

export const portalCommissionSchema = z.object({
  commissionId: z.number().int(),
  commissionNameEn: z.string(),
  circuitAdditionBenchStatus: z.boolean(),
  activeStatus: z.boolean(),
});

export const portalCaseSchema = z.object({
  caseNumber: z.string(),
  complainantName: z.string(),
  complainantAdvocateName: z.string().nullish(),
  respondentName: z.string(),
  respondentAdvocateName: z.string().nullish(),
  caseFilingDate: z.string(),
  orderDocumentPath: z.string().nullish(),
  caseStageName: z.string(),
});

function envelope<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    data: z.array(item),
    message: z.string().nullish(),
    error: z.union([z.string(), z.boolean()]).nullish(),
    status: z.number().int().nullish(),
  });
}

export const commissionDirectoryResponseSchema = envelope(portalCommissionSchema);
export const caseSearchResponseSchema = envelope(portalCaseSchema);

export type PortalCommission = z.infer<typeof portalCommissionSchema>;
export type PortalCase = z.infer<typeof portalCaseSchema>;

export interface CaseSearchPayload {
  commissionId: number;
  dateRequestType: number;
  fromDate: string;
  toDate: string;
  judgeId: string;
  orderType: number;
  serchType: number;
  serchTypeValue: string;
}

export interface CommissionEntry {
  id: number;
  displayName: string;
  isActive: boolean;
  isCircuitBench: boolean;
}
