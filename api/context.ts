import type { Request } from "express";
import type { AppConfig } from "../config.js";
import type { InventoryStore } from "../services/inventoryStore.js";

export interface AppContext {
  store: InventoryStore;
  config: AppConfig;
}

/**
 * Absolute origin for links handed to KiCad. A configured SITE_URL
 * wins over the request's own host.
 */
export function siteUrl(req: Request, config: AppConfig): string {
  return config.siteUrl ?? `${req.protocol}://${req.get("host") ?? "localhost"}`;
}
