// backend/services/shared/contracts/tool.contract.ts
import { z } from "zod";

/**
 * Tool contract (wire + domain shape).
 * - id is assigned by the repository and never taken from a caller.
 * - description may be empty; name is non-blank once persisted.
 */
export const toolContract = z.object({
  id: z.number().int().positive(),
  name: z.string(),
  description: z.string(),
});

export type Tool = z.infer<typeof toolContract>;

export const zToolList = z.array(toolContract);
