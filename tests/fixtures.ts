import { MemoryInventoryStore } from "../services/inventoryStore.js";
import { resolveSettings, type PluginSettings } from "../services/settingsService.js";

export const TEMPLATE = {
  symbol: 1,
  footprint: 2,
  reference: 3,
  value: 4,
  resistance: 5,
  package: 6,
  visibleFields: 7,
  excludeBom: 8,
  tolerance: 9
} as const;

export const FIXTURE_SETTINGS = {
  KICAD_SYMBOL_PARAMETER: TEMPLATE.symbol,
  KICAD_FOOTPRINT_PARAMETER: TEMPLATE.footprint,
  KICAD_REFERENCE_PARAMETER: TEMPLATE.reference,
  KICAD_VALUE_PARAMETER: TEMPLATE.value,
  KICAD_FIELD_VISIBILITY_PARAMETER: TEMPLATE.visibleFields,
  KICAD_EXCLUDE_FROM_BOM_PARAMETER: TEMPLATE.excludeBom
};

/**
 * Electronics (1)
 *   Passives (2)        published, defaults "Device:Passive" / "P"
 *     Resistors (3)     published, defaults "Device:R" / "R", footprint from Package
 *     Capacitors (4)
 * Mechanical (5)
 */
export function fixtureData() {
  return {
    users: [
      { username: "alice", token: "alice-token" },
      { username: "bob", token: "bob-token" }
    ],
    categories: [
      { id: 1, name: "Electronics", description: "All electronics", parentId: null },
      { id: 2, name: "Passives", description: "Passive parts", parentId: 1 },
      { id: 3, name: "Resistors", description: "Fixed resistors", parentId: 2 },
      { id: 4, name: "Capacitors", description: "Capacitors", parentId: 2 },
      { id: 5, name: "Mechanical", description: "Brackets and screws", parentId: null }
    ],
    parameterTemplates: [
      { id: 1, name: "KiCad Symbol", units: "" },
      { id: 2, name: "KiCad Footprint", units: "" },
      { id: 3, name: "KiCad Reference", units: "" },
      { id: 4, name: "KiCad Value", units: "" },
      { id: 5, name: "Resistance", units: "Ohm" },
      { id: 6, name: "Package", units: "" },
      { id: 7, name: "KiCad Visible Fields", units: "" },
      { id: 8, name: "Exclude From BOM", units: "" },
      { id: 9, name: "Tolerance", units: "%" }
    ],
    parts: [
      {
        id: 1,
        name: "R_10k_0603",
        IPN: "RES-1",
        description: "10k resistor",
        keywords: "res smd",
        categoryId: 3,
        inStock: 100,
        parameters: [
          { templateId: 5, data: "10k" },
          { templateId: 6, data: "0603" },
          { templateId: 9, data: "1" }
        ],
        attachments: [{ comment: "Datasheet", link: "https://example.com/r.pdf" }],
        manufacturerParts: [
          {
            manufacturer: "Acme",
            mpn: "ACME-10K",
            suppliers: [{ supplier: "Distri", sku: "D-10K" }]
          }
        ]
      },
      {
        id: 2,
        name: "R_1k",
        description: "1k resistor",
        categoryId: 3,
        parameters: [
          { templateId: 1, data: "Custom:Lib:R:Alt" },
          { templateId: 3, data: "RN" },
          { templateId: 4, data: "1k 1%" },
          { templateId: 8, data: "True" }
        ]
      },
      {
        id: 3,
        name: "C_100n",
        IPN: "CAP-1",
        revision: "B",
        description: "100n capacitor",
        categoryId: 4,
        active: false,
        inStock: 50
      },
      { id: 4, name: "Bracket", description: "Steel bracket", categoryId: 5 },
      { id: 5, name: "Loose part", description: "No category" }
    ],
    kicadCategories: [
      {
        id: 1,
        categoryId: 2,
        defaultSymbol: "Device:Passive",
        defaultReference: "P"
      },
      {
        id: 2,
        categoryId: 3,
        defaultSymbol: "Device:R",
        defaultFootprint: "Resistor_SMD:R_0805_2012Metric",
        defaultReference: "R",
        defaultValueParameterTemplateId: 5,
        footprintParameterTemplateId: 6
      }
    ],
    footprintMappings: [
      {
        id: 1,
        kicadCategoryId: 2,
        parameterValue: "0603",
        kicadFootprint: "Resistor_SMD:R_0603_1608Metric"
      }
    ],
    settings: { ...FIXTURE_SETTINGS }
  };
}

export function createFixtureStore() {
  return new MemoryInventoryStore(fixtureData());
}

export function testSettings(overrides: Record<string, unknown> = {}): PluginSettings {
  return resolveSettings({ ...FIXTURE_SETTINGS, ...overrides }, {});
}
