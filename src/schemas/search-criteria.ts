import { z } from "zod";

function isCalendarDate(value: string): boolean {
  const parsed = new Date(`${value}T00:00:00Z`);
  return (
    !Number.isNaN(parsed.getTime()) &&
    parsed.toISOString().slice(0, 10) === value
  );
}

export const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be in YYYY-MM-DD format")
  .refine(isCalendarDate, "Date must be a valid calendar date");

// ISO dates compare correctly as strings.
export function isDateRangeOrdered(fromDate: string, toDate: string): boolean {
  return toDate >= fromDate;
}

export const searchCriteriaSchema = z
  .object({
    state: z
      .string()
      .min(1)
      .transform((value) => value.toUpperCase()),
    commission: z.string().min(1),
    searchValue: z.string().min(1),
    fromDate: isoDateSchema.nullish().transform((value) => value ?? undefined),
    toDate: isoDateSchema.nullish().transform((value) => value ?? undefined),
  })
  .superRefine((criteria, ctx) => {
    if (
      criteria.fromDate &&
      criteria.toDate &&
      !isDateRangeOrdered(criteria.fromDate, criteria.toDate)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["toDate"],
        message: "toDate must not be before fromDate",
      });
    }
  });

export type SearchCriteriaInput = z.input<typeof searchCriteriaSchema>;
export type SearchCriteria = z.output<typeof searchCriteriaSchema>;
