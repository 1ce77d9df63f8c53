// services/metadataImportService.ts
import * as cheerio from "cheerio";
import { XMLValidator } from "fast-xml-parser";
import { ApiError } from "../errors.js";
import type { ImportSummary } from "../types.js";
import {
  ImportProgressTracker,
  ImportRun,
  attachDatasheet,
  errorMessage,
  findTargetPart,
  isValidDatasheetUrl,
  requireImportTemplates,
  stripDesignatorNumber,
  writeParameters
} from "./importSupport.js";
import type { InventoryStore } from "./inventoryStore.js";
import type { PluginSettings } from "./settingsService.js";

/**
 * Netlist metadata import.
 *
 * Reads a KiCad XML netlist export and writes the reference,
 * footprint and symbol of every component back to the part named by
 * its identifier field. Rows that cannot be used are skipped and
 * reported; only a bad request or a malformed file aborts, and both
 * do so before anything is written.
 */

/* -----------------------------
   Types
----------------------------- */

export interface NetlistUpload {
  content: string | Buffer;
  contentType: string;
  fileName: string;
  username: string;
}

export interface NetlistComponent {
  ref: string | null;
  footprint: string | null;
  datasheet: string | null;
  lib: string | null;
  part: string | null;
  fields: Array<{ name: string; value: string }>;
}

/* -----------------------------
   Parsing
----------------------------- */

function textOrNull(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function isXmlUpload(contentType: string, fileName: string): boolean {
  return contentType.toLowerCase().includes("xml") || /\.xml$/i.test(fileName);
}

export function parseNetlist(xml: string): NetlistComponent[] {
  // cheerio repairs broken markup, so well-formedness is checked first
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new ApiError(422, `Malformed XML file: ${msg} (line ${line})`);
  }

  const $ = cheerio.load(xml, { xml: true });

  // only a direct child of the document element counts
  const components = $.root().children().first().children("components").first();
  if (components.length === 0) {
    throw new ApiError(422, "Malformed netlist: no components list found");
  }

  return components
    .children("comp")
    .toArray()
    .map(el => {
      const $comp = $(el);
      const footprint = $comp.children("footprint").first();
      const datasheet = $comp.children("datasheet").first();
      const libsource = $comp.children("libsource").first();

      return {
        ref: textOrNull($comp.attr("ref")),
        footprint: footprint.length ? textOrNull(footprint.text()) : null,
        datasheet: datasheet.length ? textOrNull(datasheet.text()) : null,
        lib: textOrNull(libsource.attr("lib")),
        part: textOrNull(libsource.attr("part")),
        fields: $comp
          .children("fields")
          .children("field")
          .toArray()
          .map(field => ({
            name: $(field).attr("name") ?? "",
            value: $(field).text().trim()
          }))
      };
    });
}

export function findIdentifier(component: NetlistComponent, identifierName: string): string | null {
  const prefix = identifierName.toLowerCase();
  const field = component.fields.find(f => f.name.toLowerCase().startsWith(prefix));
  return field && field.value ? field.value : null;
}

/* -----------------------------
   Public API
----------------------------- */

export async function importNetlist(
  store: InventoryStore,
  settings: PluginSettings,
  upload: NetlistUpload
): Promise<ImportSummary> {
  const templates = requireImportTemplates(settings);

  if (!isXmlUpload(upload.contentType, upload.fileName)) {
    throw new ApiError(422, "XML file expected!");
  }

  const xml = typeof upload.content === "string" ? upload.content : upload.content.toString("utf8");
  const components = parseNetlist(xml);

  const progress = new ImportProgressTracker(store, upload.username, upload.fileName);
  await progress.start();

  const run = new ImportRun(upload.fileName, components.length);
  const override = settings.IMPORT_INVENTREE_OVERRIDE_PARAS;
  const addDatasheet = settings.KICAD_META_DATA_IMPORT_ADD_DATASHEET;

  console.log("[IMPORT] netlist", {
    user: upload.username,
    file: upload.fileName,
    components: components.length
  });

  try {
    for (const [index, comp] of components.entries()) {
      await progress.report(index, components.length);

      let identifier: string | null = null;
      try {
        if (!comp.ref) {
          run.fail(null, null, "Missing ref");
          continue;
        }
        if (!comp.footprint) {
          run.fail(comp.ref, null, "Missing footprint");
          continue;
        }
        if (!comp.lib || !comp.part) {
          run.fail(comp.ref, null, "Missing lib_name or lib_part");
          continue;
        }
        if (comp.fields.length === 0) {
          run.fail(comp.ref, null, "Missing fields");
          continue;
        }

        identifier = findIdentifier(comp, settings.IMPORT_INVENTREE_ID_IDENTIFIER);
        if (!identifier) {
          run.fail(comp.ref, null, "Missing part id");
          continue;
        }

        if (run.isDuplicate(identifier)) continue;

        const part = await findTargetPart(store, settings, identifier);
        if (!part) {
          run.fail(comp.ref, identifier, `Part ID ${identifier} does not belong to an existing part`);
          continue;
        }

        if (run.isDuplicatePart(part.id, identifier)) continue;

        const written = await writeParameters(
          store,
          part.id,
          [
            { templateId: templates.reference, data: stripDesignatorNumber(comp.ref) },
            { templateId: templates.footprint, data: comp.footprint },
            { templateId: templates.symbol, data: `${comp.lib}:${comp.part}` }
          ],
          override
        );
        run.updated(part.id, written);

        // KiCad writes "~" for an empty datasheet
        if (addDatasheet && comp.datasheet && comp.datasheet !== "~") {
          if (!isValidDatasheetUrl(comp.datasheet)) {
            run.fail(comp.ref, identifier, `URL is invalid: ${comp.datasheet}`);
            continue;
          }
          await attachDatasheet(store, part, comp.datasheet);
        }
      } catch (err) {
        run.fail(comp.ref, identifier, `Unexpected error: ${errorMessage(err)}`);
      }
    }
  } finally {
    await progress.finish();
  }

  console.log("[IMPORT] done", {
    file: upload.fileName,
    updated: run.summary.updated.length,
    duplicates: run.summary.duplicates.length,
    errors: run.summary.errors.length
  });
  return run.summary;
}
