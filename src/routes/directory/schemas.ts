import { z } from "zod";

export const commissionsParamsSchema = z.object({
  stateId: z.coerce.number().int().positive(),
});

export type CommissionsParams = z.infer<typeof commissionsParamsSchema>;
