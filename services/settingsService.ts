// services/settingsService.ts
import { z } from "zod";
import { str2bool } from "../config.js";
import { ApiError } from "../errors.js";
import type { ParameterTemplate } from "../types.js";
import type { InventoryStore } from "./inventoryStore.js";

/* -----------------------------
   Schema
----------------------------- */

const flag = (fallback: boolean) =>
  z.preprocess(
    v => (v === undefined || v === null || v === "" ? undefined : str2bool(v)),
    z.boolean().default(fallback)
  );

const templateRef = () =>
  z.preprocess(
    v => {
      if (v === undefined || v === null || v === "") return null;
      return typeof v === "string" ? Number(v) : v;
    },
    z.number().int().positive().nullable()
  );

export const pluginSettingsSchema = z.object({
  KICAD_ENABLE_SUBCATEGORY: flag(true),
  KICAD_ENABLE_STOCK_COUNT: flag(false),
  KICAD_ENABLE_STOCK_COUNT_FORMAT: z.string().default("[Stock: {1}] {0}"),
  DEFAULT_FOR_MISSING_SYMBOL: z.string().default(""),
  KICAD_INCLUDE_IPN: z.enum(["0", "False", "True"]).default("0"),
  KICAD_SYMBOL_PARAMETER: templateRef(),
  KICAD_FOOTPRINT_PARAMETER: templateRef(),
  KICAD_REFERENCE_PARAMETER: templateRef(),
  KICAD_VALUE_PARAMETER: templateRef(),
  KICAD_FIELD_VISIBILITY_PARAMETER: templateRef(),
  KICAD_FIELD_VISIBILITY_PARAMETER_GLOBAL: z.string().default(""),
  KICAD_EXCLUDE_FROM_BOM_PARAMETER: templateRef(),
  KICAD_EXCLUDE_FROM_BOARD_PARAMETER: templateRef(),
  KICAD_EXCLUDE_FROM_SIM_PARAMETER: templateRef(),
  KICAD_META_DATA_IMPORT_ADD_DATASHEET: flag(false),
  KICAD_USE_IPN_AS_NAME: flag(false),
  IMPORT_INVENTREE_ID_FALLBACK: flag(false),
  IMPORT_INVENTREE_OVERRIDE_PARAS: flag(false),
  IMPORT_INVENTREE_ID_IDENTIFIER: z.string().min(1).default("InvenTree"),
  KICAD_ENABLE_MANUFACTURER_DATA: flag(false),
  KICAD_INCLUDE_UNITS_IN_PARAMETERS: flag(true),
  KICAD_HIDE_INACTIVE_PARTS: flag(true)
});

export type PluginSettings = z.infer<typeof pluginSettingsSchema>;
export type SettingKey = keyof PluginSettings;

export const SETTING_KEYS = pluginSettingsSchema.keyof().options;

export const settingsUpdateSchema = pluginSettingsSchema.partial().strict();

/* -----------------------------
   Registry
----------------------------- */

export interface SettingDefinition {
  name: string;
  description: string;
  kind: "boolean" | "string" | "template" | "choice";
  choices?: Array<[string, string]>;
}

export const SETTINGS: Record<SettingKey, SettingDefinition> = {
  KICAD_ENABLE_SUBCATEGORY: {
    name: "Enable Sub-Category Parts",
    description:
      "Provide all parts of a category, including those located within sub-categories",
    kind: "boolean"
  },
  KICAD_ENABLE_STOCK_COUNT: {
    name: "Display Available Stock",
    description: "Show stock information as part of the description in KiCad",
    kind: "boolean"
  },
  KICAD_ENABLE_STOCK_COUNT_FORMAT: {
    name: "Stock Count Display Format",
    description: "{0} is replaced by the part description, {1} by the stock count",
    kind: "string"
  },
  DEFAULT_FOR_MISSING_SYMBOL: {
    name: "Backup KiCad Symbol",
    description: "Symbol used when neither the part nor its category defines one",
    kind: "string"
  },
  KICAD_INCLUDE_IPN: {
    name: "Include IPN",
    description: "Include the IPN in the KiCad fields of a part",
    kind: "choice",
    choices: [
      ["0", "Do not Include"],
      ["False", "Include but Hide in Schematic"],
      ["True", "Include and Show in Schematic"]
    ]
  },
  KICAD_SYMBOL_PARAMETER: {
    name: "Symbol Parameter",
    description: "The part parameter to use for the symbol name",
    kind: "template"
  },
  KICAD_FOOTPRINT_PARAMETER: {
    name: "Footprint Parameter",
    description: "The part parameter to use for the footprint name",
    kind: "template"
  },
  KICAD_REFERENCE_PARAMETER: {
    name: "Reference Parameter",
    description: "The part parameter to use for the reference designator",
    kind: "template"
  },
  KICAD_VALUE_PARAMETER: {
    name: "Value Parameter",
    description: "The part parameter to use for the value",
    kind: "template"
  },
  KICAD_FIELD_VISIBILITY_PARAMETER: {
    name: "Field Visibility Parameter",
    description: "Parameter holding comma separated field names to show per part",
    kind: "template"
  },
  KICAD_FIELD_VISIBILITY_PARAMETER_GLOBAL: {
    name: "Global Field Visibility",
    description:
      "Comma separated field names shown for every part; overridden by the category and the part",
    kind: "string"
  },
  KICAD_EXCLUDE_FROM_BOM_PARAMETER: {
    name: "BOM Exclusion Parameter",
    description: "The part parameter used to exclude it from the BOM",
    kind: "template"
  },
  KICAD_EXCLUDE_FROM_BOARD_PARAMETER: {
    name: "Board Exclusion Parameter",
    description: "The part parameter used to exclude it from the netlist passed to the board",
    kind: "template"
  },
  KICAD_EXCLUDE_FROM_SIM_PARAMETER: {
    name: "Simulation Exclusion Parameter",
    description: "The part parameter used to exclude it from the simulation",
    kind: "template"
  },
  KICAD_META_DATA_IMPORT_ADD_DATASHEET: {
    name: "[Metadata Import] Add Datasheet if URL is Valid",
    description: "Attach the datasheet URL of imported components to the part",
    kind: "boolean"
  },
  KICAD_USE_IPN_AS_NAME: {
    name: "Use IPN Instead of Name",
    description: "Publish the IPN as the part name when one is set",
    kind: "boolean"
  },
  IMPORT_INVENTREE_ID_FALLBACK: {
    name: "[Metadata Import] Match Against Part Name",
    description: "Fall back to the part name when the ID does not match an existing part",
    kind: "boolean"
  },
  IMPORT_INVENTREE_OVERRIDE_PARAS: {
    name: "[Metadata Import] Override Parameters",
    description: "Overwrite existing KiCad parameters during import",
    kind: "boolean"
  },
  IMPORT_INVENTREE_ID_IDENTIFIER: {
    name: "[Metadata Import] Part ID Identifier",
    description: "Field name carrying the part ID in KiCad and in imported files",
    kind: "string"
  },
  KICAD_ENABLE_MANUFACTURER_DATA: {
    name: "Add Manufacturer Data to KiCad Parts",
    description: "Add the supplier and manufacturer data to the KiCad fields",
    kind: "boolean"
  },
  KICAD_INCLUDE_UNITS_IN_PARAMETERS: {
    name: "Include Units in Parameters",
    description: "Append the template units to parameter values",
    kind: "boolean"
  },
  KICAD_HIDE_INACTIVE_PARTS: {
    name: "Hide Inactive Parts",
    description: "Hide inactive parts from the KiCad parts preview list",
    kind: "boolean"
  }
};

/**
 * Template-bound settings. Parameters of these templates feed the
 * default KiCad fields and never appear as custom fields.
 */
export const TEMPLATE_SETTING_KEYS = [
  "KICAD_SYMBOL_PARAMETER",
  "KICAD_FOOTPRINT_PARAMETER",
  "KICAD_REFERENCE_PARAMETER",
  "KICAD_VALUE_PARAMETER",
  "KICAD_FIELD_VISIBILITY_PARAMETER",
  "KICAD_EXCLUDE_FROM_BOM_PARAMETER",
  "KICAD_EXCLUDE_FROM_BOARD_PARAMETER",
  "KICAD_EXCLUDE_FROM_SIM_PARAMETER"
] as const satisfies readonly SettingKey[];

/* -----------------------------
   Public API
----------------------------- */

/**
 * Stored values win over same-named environment variables,
 * which win over the schema defaults.
 */
export function resolveSettings(
  stored: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): PluginSettings {
  const raw: Record<string, unknown> = {};
  for (const key of SETTING_KEYS) {
    raw[key] = key in stored ? stored[key] : env[key];
  }

  const parsed = pluginSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid plugin settings: ${issues}`);
  }
  return parsed.data;
}

export async function getSettings(store: InventoryStore): Promise<PluginSettings> {
  return resolveSettings(await store.getStoredSettings());
}

export async function updateSettings(
  store: InventoryStore,
  body: unknown
): Promise<PluginSettings> {
  const patch = settingsUpdateSchema.parse(body);

  for (const key of TEMPLATE_SETTING_KEYS) {
    const templateId = patch[key];
    if (templateId && !(await store.getParameterTemplate(templateId))) {
      throw new ApiError(422, `${key}: parameter template ${templateId} does not exist`);
    }
  }

  const stored = await store.getStoredSettings();
  await store.saveStoredSettings({ ...stored, ...patch });

  console.log("[SETTINGS] updated:", Object.keys(patch).join(", ") || "(nothing)");
  return getSettings(store);
}

export function describeSettings(settings: PluginSettings) {
  return SETTING_KEYS.map(key => ({
    key,
    ...SETTINGS[key],
    value: settings[key]
  }));
}

/**
 * Which KiCad fields are shown by default ("1") or hidden ("0").
 * Every parameter template starts hidden; names in the global
 * visibility list are shown.
 */
export function buildShowFieldMap(
  settings: PluginSettings,
  templates: ParameterTemplate[]
): Record<string, "0" | "1"> {
  const show: Record<string, "0" | "1"> = {
    value: "1",
    footprint: "0",
    datasheet: "0",
    symbol: "0",
    reference: "1",
    description: "0",
    keywords: "0"
  };

  for (const template of templates) {
    const key = template.name.toLowerCase();
    if (!(key in show)) show[key] = "0";
  }

  for (const name of settings.KICAD_FIELD_VISIBILITY_PARAMETER_GLOBAL.split(",")) {
    const key = name.trim().toLowerCase();
    if (key) show[key] = "1";
  }
  return show;
}
