// backend/services/tool/src/repo/createToolRepo.ts
import type { ToolRepo, ToolRepoMode } from "./toolRepo";
import { InMemoryToolRepo } from "./memoryToolRepo";
import { MongoToolRepo } from "./mongoToolRepo";

/** Pick the ToolRepo variant for TOOL_DB_MODE. Handlers never see the choice. */
export function createToolRepo(mode: ToolRepoMode): ToolRepo {
  switch (mode) {
    case "mongo":
      return new MongoToolRepo();
    case "memory":
      return new InMemoryToolRepo();
  }
}
