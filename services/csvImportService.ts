// services/csvImportService.ts
import * as XLSX from "xlsx";
import { z } from "zod";
import { ApiError } from "../errors.js";
import type { ImportSummary } from "../types.js";
import {
  ImportProgressTracker,
  ImportRun,
  errorMessage,
  findTargetPart,
  stripDesignatorNumber,
  writeParameters
} from "./importSupport.js";
import type { InventoryStore } from "./inventoryStore.js";
import type { PluginSettings } from "./settingsService.js";

/* -----------------------------
   Types
----------------------------- */

export interface CsvUpload {
  content: string | Buffer;
  fileName: string;
  username: string;
  /** Column header -> parameter template id, as an object or its JSON text. */
  mapping: unknown;
  idColumn?: string;
}

export interface CsvTable {
  headers: string[];
  rows: Array<Record<string, string>>;
}

export const csvMappingSchema = z
  .record(z.string().min(1), z.coerce.number().int().positive())
  .refine(m => Object.keys(m).length > 0, "At least one column must be mapped");

/* -----------------------------
   Parsing
----------------------------- */

export function parseCsv(content: string | Buffer): CsvTable {
  const text = typeof content === "string" ? content : content.toString("utf8");

  let sheet: XLSX.WorkSheet | undefined;
  try {
    // raw keeps every cell as text, so "0603" stays "0603"
    const workbook = XLSX.read(text, { type: "string", raw: true });
    sheet = workbook.Sheets[workbook.SheetNames[0]];
  } catch (err) {
    throw new ApiError(422, `Could not parse CSV file: ${errorMessage(err)}`);
  }
  if (!sheet) {
    throw new ApiError(422, "CSV file contains no data");
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: "",
    raw: false,
    blankrows: false
  });
  const [headerRow, ...body] = matrix;
  if (!headerRow) {
    throw new ApiError(422, "CSV file contains no data");
  }

  const headers = headerRow.map(h => String(h ?? "").trim());
  const rows = body.map(cells => {
    const row: Record<string, string> = {};
    headers.forEach((header, i) => {
      if (header) row[header] = String(cells[i] ?? "").trim();
    });
    return row;
  });

  return { headers, rows };
}

function parseMapping(mapping: unknown): Record<string, number> {
  let raw = mapping;
  if (typeof raw === "string") {
    try {
      raw = JSON.parse(raw);
    } catch {
      throw new ApiError(422, "Column mapping must be a JSON object");
    }
  }

  const parsed = csvMappingSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ApiError(422, "Invalid column mapping", parsed.error.issues);
  }
  return parsed.data;
}

/** "R1, R2" -> "R" */
function firstDesignator(cell: string): string {
  const [first = ""] = cell.split(/[,;\s]+/).filter(Boolean);
  return stripDesignatorNumber(first);
}

/* -----------------------------
   Public API
----------------------------- */

export async function importCsv(
  store: InventoryStore,
  settings: PluginSettings,
  upload: CsvUpload
): Promise<ImportSummary> {
  const mapping = parseMapping(upload.mapping);
  const idColumn = upload.idColumn?.trim() || settings.IMPORT_INVENTREE_ID_IDENTIFIER;

  for (const templateId of Object.values(mapping)) {
    if (!(await store.getParameterTemplate(templateId))) {
      throw new ApiError(422, `Parameter template ${templateId} does not exist`);
    }
  }

  const table = parseCsv(upload.content);
  if (table.rows.length === 0) {
    throw new ApiError(422, "CSV file contains no rows");
  }
  if (!table.headers.includes(idColumn)) {
    throw new ApiError(422, `Column "${idColumn}" not found in CSV file`);
  }
  const missing = Object.keys(mapping).filter(column => !table.headers.includes(column));
  if (missing.length > 0) {
    throw new ApiError(422, `Mapped columns not found in CSV file: ${missing.join(", ")}`);
  }

  const progress = new ImportProgressTracker(store, upload.username, upload.fileName);
  await progress.start();

  const run = new ImportRun(upload.fileName, table.rows.length);
  const referenceTemplate = settings.KICAD_REFERENCE_PARAMETER;

  console.log("[IMPORT] csv", {
    user: upload.username,
    file: upload.fileName,
    rows: table.rows.length,
    columns: Object.keys(mapping)
  });

  try {
    for (const [index, row] of table.rows.entries()) {
      await progress.report(index, table.rows.length);

      const identifier = row[idColumn] || null;
      try {
        if (!identifier) {
          run.fail(null, null, `Missing ${idColumn}`);
          continue;
        }
        if (run.isDuplicate(identifier)) continue;

        const values = Object.entries(mapping)
          .map(([column, templateId]) => {
            const cell = row[column] ?? "";
            const data = templateId === referenceTemplate ? firstDesignator(cell) : cell;
            return { templateId, data };
          })
          .filter(v => v.data !== "");

        if (values.length === 0) {
          run.fail(null, identifier, "No mapped values");
          continue;
        }

        const part = await findTargetPart(store, settings, identifier);
        if (!part) {
          run.fail(null, identifier, `Part ID ${identifier} does not belong to an existing part`);
          continue;
        }
        if (run.isDuplicatePart(part.id, identifier)) continue;

        const written = await writeParameters(
          store,
          part.id,
          values,
          settings.IMPORT_INVENTREE_OVERRIDE_PARAS
        );
        run.updated(part.id, written);
      } catch (err) {
        run.fail(null, identifier, `Unexpected error: ${errorMessage(err)}`);
      }
    }
  } finally {
    await progress.finish();
  }
  return run.summary;
}
