// services/fieldResolver.ts
import type { FootprintMapping, KicadCategory, Part } from "../types.js";
import type { PluginSettings } from "./settingsService.js";

/**
 * Field resolution for the KiCad documents.
 *
 * Every resolver walks the same ladder and stops at the first rung
 * that yields a value:
 *   part parameter -> KiCad category default -> global setting -> fixed fallback
 *
 * The functions here never touch the store; the caller gathers the
 * context up front (see kicadSerializer.ts).
 */

/* -----------------------------
   Types
----------------------------- */

export interface ResolutionContext {
  part: Part;
  settings: PluginSettings;
  /** KiCad category of the deepest ancestor of the part's category, if any. */
  kicadCategory: KicadCategory | null;
  /** Footprint mappings of that KiCad category. */
  footprintMappings: FootprintMapping[];
}

export type ExclusionField = "bom" | "board" | "sim";

/* -----------------------------
   Lookups
----------------------------- */

export function getParameterValue(
  part: Part,
  templateId: number | null | undefined,
  backup = ""
): string {
  if (templateId === null || templateId === undefined) {
    return backup;
  }
  const parameter = part.parameters.find(p => p.templateId === templateId);
  return parameter ? parameter.data : backup;
}

/**
 * Pick the KiCad category of the deepest ancestor.
 * `ancestors` is ordered root first, as the store returns it.
 */
export function pickKicadCategory(
  ancestors: Array<{ id: number }>,
  kicadCategories: KicadCategory[]
): KicadCategory | null {
  for (let i = ancestors.length - 1; i >= 0; i--) {
    const match = kicadCategories.find(k => k.categoryId === ancestors[i].id);
    if (match) return match;
  }
  return null;
}

export function partFullName(part: Part): string {
  return [part.IPN, part.name, part.revision].filter(s => s && s.trim()).join(" | ");
}

function categoryDefault(value: string | undefined, fallback: string): string {
  return value ? value : fallback;
}

/* -----------------------------
   Symbol
----------------------------- */

/**
 * KiCad reads the first colon as the library/name separator.
 * Any later colon becomes an underscore: "Lib:Sub:Part" -> "Lib:Sub_Part".
 */
export function normalizeSymbolName(symbol: string): string {
  const first = symbol.indexOf(":");
  if (first === -1 || symbol.indexOf(":", first + 1) === -1) {
    return symbol;
  }
  return symbol.slice(0, first + 1) + symbol.slice(first + 1).replace(/:/g, "_");
}

export function resolveSymbol(ctx: ResolutionContext): string {
  const { part, settings, kicadCategory } = ctx;

  let symbol = categoryDefault(kicadCategory?.defaultSymbol, "");
  symbol = getParameterValue(part, settings.KICAD_SYMBOL_PARAMETER, symbol);

  if (!symbol) {
    symbol = settings.DEFAULT_FOR_MISSING_SYMBOL;
  }

  return normalizeSymbolName(symbol);
}

/* -----------------------------
   Footprint
----------------------------- */

export function resolveFootprint(ctx: ResolutionContext): string {
  const { part, settings, kicadCategory, footprintMappings } = ctx;

  const footprint = categoryDefault(kicadCategory?.defaultFootprint, "");
  const templateId =
    kicadCategory?.footprintParameterTemplateId ?? settings.KICAD_FOOTPRINT_PARAMETER;

  const raw = getParameterValue(part, templateId, footprint);

  const mapping = footprintMappings.find(m => m.parameterValue === raw);
  return mapping ? mapping.kicadFootprint : raw;
}

/* -----------------------------
   Reference / value
----------------------------- */

export function resolveReference(ctx: ResolutionContext): string {
  const { part, settings, kicadCategory } = ctx;

  const reference = categoryDefault(kicadCategory?.defaultReference, "X");
  return getParameterValue(part, settings.KICAD_REFERENCE_PARAMETER, reference);
}

export function resolveValue(ctx: ResolutionContext): string {
  const { part, settings, kicadCategory } = ctx;
  const fullName = partFullName(part);

  const value = getParameterValue(part, settings.KICAD_VALUE_PARAMETER, fullName);
  if (value !== fullName) {
    return value;
  }

  return getParameterValue(part, kicadCategory?.defaultValueParameterTemplateId, fullName);
}

/* -----------------------------
   Exclusion flags
----------------------------- */

const EXCLUSION_SETTINGS = {
  bom: "KICAD_EXCLUDE_FROM_BOM_PARAMETER",
  board: "KICAD_EXCLUDE_FROM_BOARD_PARAMETER",
  sim: "KICAD_EXCLUDE_FROM_SIM_PARAMETER"
} as const satisfies Record<ExclusionField, keyof PluginSettings>;

export function resolveExclusion(ctx: ResolutionContext, field: ExclusionField): string {
  return getParameterValue(ctx.part, ctx.settings[EXCLUSION_SETTINGS[field]], "False");
}

/* -----------------------------
   Visibility
----------------------------- */

/**
 * Names of the fields to show in the schematic, lower-cased.
 * An empty list leaves every field at its built-in visibility.
 */
export function resolveVisibleFields(ctx: ResolutionContext): string[] {
  const { part, settings, kicadCategory } = ctx;

  let list = settings.KICAD_FIELD_VISIBILITY_PARAMETER_GLOBAL;
  list = categoryDefault(kicadCategory?.defaultVisibleFields, list);
  list = getParameterValue(part, settings.KICAD_FIELD_VISIBILITY_PARAMETER, list);

  return list
    .split(",")
    .map(name => name.trim().toLowerCase())
    .filter(Boolean);
}
