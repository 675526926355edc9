// backend/services/tool/src/validators/tool.dto.ts
import { z } from "zod";
import { zIntId } from "@shared/contracts/common";

/**
 * BODY (add/update): shape only. Blank or missing names pass here and are
 * rejected by ToolService, which owns that rule.
 * - `id` is tolerated (clients echo whole records back) and dropped.
 */
export const toolBodyDto = z
  .object({
    id: z.number().nullish(),
    name: z.string().nullish(),
    description: z.string().nullish(),
  })
  .transform(({ name, description }) => ({
    name: name ?? null,
    description: description ?? "",
  }));

/** PARAMS: /:id */
export const findByIdDto = z.object({ id: zIntId });
