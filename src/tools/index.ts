// src/tools/index.ts
import type { ServiceRegistry } from "../registry/serviceRegistry";
import type { ServiceAdapter } from "../types/mcp";
import { createGithubService } from "./githubTools";
import { createLinearService } from "./linearTools";

// registration order is the order /services and /tools report
export function defaultAdapters(): ServiceAdapter[] {
  return [createGithubService(), createLinearService()];
}

export function registerServices(
  registry: ServiceRegistry,
  adapters: ServiceAdapter[] = defaultAdapters()
): void {
  for (const adapter of adapters) {
    registry.registerAdapter(adapter);
  }
}
