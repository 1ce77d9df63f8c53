// services/importSupport.ts
import { z } from "zod";
import { ApiError } from "../errors.js";
import type { ImportSummary, Part } from "../types.js";
import type { InventoryStore } from "./inventoryStore.js";
import type { PluginSettings } from "./settingsService.js";

/* -----------------------------
   Progress
----------------------------- */

/**
 * Per-user progress record of an import. Each user has their own
 * row, so two users importing at once never overwrite each other.
 */
export class ImportProgressTracker {
  constructor(
    private readonly store: InventoryStore,
    private readonly username: string,
    private readonly fileName: string
  ) {}

  start() {
    return this.save(0);
  }

  report(index: number, total: number) {
    return this.save(total > 0 ? Math.floor((index / total) * 100) : 0);
  }

  finish() {
    return this.save(100);
  }

  private save(currentProgress: number) {
    return this.store.saveProgress({
      username: this.username,
      currentProgress,
      fileName: this.fileName
    });
  }
}

/* -----------------------------
   Run bookkeeping
----------------------------- */

export class ImportRun {
  private readonly seenIdentifiers = new Set<string>();
  private readonly seenParts = new Set<number>();
  readonly summary: ImportSummary;

  constructor(fileName: string, total: number) {
    this.summary = {
      fileName,
      total,
      updated: [],
      parametersWritten: 0,
      duplicates: [],
      errors: []
    };
  }

  /** True when the identifier was already handled in this run. */
  isDuplicate(identifier: string): boolean {
    if (this.seenIdentifiers.has(identifier)) {
      this.summary.duplicates.push(identifier);
      return true;
    }
    this.seenIdentifiers.add(identifier);
    return false;
  }

  /** True when another identifier already resolved to this part. */
  isDuplicatePart(partId: number, identifier: string): boolean {
    if (this.seenParts.has(partId)) {
      this.summary.duplicates.push(identifier);
      return true;
    }
    this.seenParts.add(partId);
    return false;
  }

  fail(ref: string | null, identifier: string | null, reason: string) {
    console.debug(`[IMPORT] ${this.summary.fileName}: ${reason}, skipping`, { ref, identifier });
    this.summary.errors.push({ ref, identifier, reason });
  }

  updated(partId: number, written: number) {
    this.summary.updated.push(partId);
    this.summary.parametersWritten += written;
  }
}

/* -----------------------------
   Helpers
----------------------------- */

export interface ImportTemplates {
  reference: number;
  footprint: number;
  symbol: number;
}

export function requireImportTemplates(settings: PluginSettings): ImportTemplates {
  const reference = settings.KICAD_REFERENCE_PARAMETER;
  const footprint = settings.KICAD_FOOTPRINT_PARAMETER;
  const symbol = settings.KICAD_SYMBOL_PARAMETER;

  if (reference === null || footprint === null || symbol === null) {
    throw new ApiError(
      422,
      "Missing parameters. Please make sure you have selected appropriate parameters in the settings before attempting to import anything."
    );
  }
  return { reference, footprint, symbol };
}

/** "R12" -> "R", "CAV3" -> "CAV" */
export function stripDesignatorNumber(ref: string): string {
  return ref.trim().replace(/\d+$/, "");
}

/**
 * Find the part an imported row points at: by id first, then,
 * when enabled, by exact part name.
 */
export async function findTargetPart(
  store: InventoryStore,
  settings: PluginSettings,
  identifier: string
): Promise<Part | null> {
  const trimmed = identifier.trim();

  if (/^\d+$/.test(trimmed)) {
    const part = await store.getPart(Number(trimmed));
    if (part) return part;
  }

  if (settings.IMPORT_INVENTREE_ID_FALLBACK) {
    return store.findPartByName(trimmed);
  }
  return null;
}

/**
 * Upsert parameter values. A parameter created here is always
 * filled; an existing one only with `override`.
 * Returns the number of parameters written.
 */
export async function writeParameters(
  store: InventoryStore,
  partId: number,
  values: Array<{ templateId: number; data: string }>,
  override: boolean
): Promise<number> {
  let written = 0;
  for (const { templateId, data } of values) {
    const { created } = await store.getOrCreateParameter(partId, templateId);
    if (created || override) {
      await store.setParameter(partId, templateId, data);
      written++;
    }
  }
  return written;
}

const datasheetUrlSchema = z
  .string()
  .url()
  .refine(url => /^https?:\/\//i.test(url), "Only http and https links are accepted");

export function isValidDatasheetUrl(url: string): boolean {
  return datasheetUrlSchema.safeParse(url).success;
}

/**
 * Attach a datasheet link unless the part already has an
 * attachment called out as its datasheet.
 */
export async function attachDatasheet(
  store: InventoryStore,
  part: Part,
  link: string
): Promise<boolean> {
  if (part.attachments.some(a => a.comment.toLowerCase() === "datasheet")) {
    return false;
  }
  await store.addAttachment(part.id, { comment: "Datasheet", link });
  return true;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
