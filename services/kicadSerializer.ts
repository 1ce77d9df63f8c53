// services/kicadSerializer.ts
import type {
  KicadCategoryDocument,
  KicadField,
  KicadPartDetail,
  KicadPartPreview,
  ParameterTemplate,
  Part
} from "../types.js";
import {
  pickKicadCategory,
  resolveExclusion,
  resolveFootprint,
  resolveReference,
  resolveSymbol,
  resolveValue,
  resolveVisibleFields,
  type ResolutionContext
} from "./fieldResolver.js";
import type { InventoryStore } from "./inventoryStore.js";
import { TEMPLATE_SETTING_KEYS, type PluginSettings } from "./settingsService.js";

/* -----------------------------
   Context
----------------------------- */

export async function loadResolutionContext(
  store: InventoryStore,
  part: Part,
  settings: PluginSettings
): Promise<ResolutionContext> {
  if (part.categoryId === null) {
    return { part, settings, kicadCategory: null, footprintMappings: [] };
  }

  const [ancestors, kicadCategories] = await Promise.all([
    store.getCategoryAncestors(part.categoryId),
    store.listKicadCategories()
  ]);

  const kicadCategory = pickKicadCategory(ancestors, kicadCategories);
  const footprintMappings = kicadCategory
    ? await store.listFootprintMappings(kicadCategory.id)
    : [];

  return { part, settings, kicadCategory, footprintMappings };
}

/* -----------------------------
   Categories
----------------------------- */

export async function serializeCategories(
  store: InventoryStore
): Promise<KicadCategoryDocument[]> {
  const kicadCategories = await store.listKicadCategories();

  const docs = await Promise.all(
    kicadCategories.map(async kc => {
      const ancestors = await store.getCategoryAncestors(kc.categoryId);
      const category = ancestors[ancestors.length - 1];
      if (!category) return null;

      return {
        id: String(category.id),
        name: ancestors.map(c => c.name).join("/"),
        description: category.description
      };
    })
  );

  return docs
    .filter((doc): doc is KicadCategoryDocument => doc !== null)
    .sort((a, b) => a.name.localeCompare(b.name));
}

/* -----------------------------
   Parts
----------------------------- */

export function displayName(part: Part, settings: PluginSettings): string {
  return settings.KICAD_USE_IPN_AS_NAME && part.IPN ? part.IPN : part.name;
}

export function formatStockDescription(format: string, description: string, stock: number) {
  return format.replace(/\{0\}/g, description).replace(/\{1\}/g, String(stock));
}

export function serializePartPreview(part: Part, settings: PluginSettings): KicadPartPreview {
  const description = settings.KICAD_ENABLE_STOCK_COUNT
    ? formatStockDescription(settings.KICAD_ENABLE_STOCK_COUNT_FORMAT, part.description, part.inStock)
    : part.description;

  return {
    id: String(part.id),
    name: displayName(part, settings),
    description
  };
}

/**
 * Parts offered for a category. An unknown (or absent) category
 * lists every part.
 */
export async function listPreviewParts(
  store: InventoryStore,
  settings: PluginSettings,
  categoryId: number | null
): Promise<KicadPartPreview[]> {
  const activeOnly = settings.KICAD_HIDE_INACTIVE_PARTS;

  let parts: Part[];
  const category = categoryId === null ? null : await store.getCategory(categoryId);

  if (!category) {
    parts = await store.listParts({ activeOnly });
  } else {
    const categoryIds = settings.KICAD_ENABLE_SUBCATEGORY
      ? await store.getCategoryDescendantIds(category.id)
      : [category.id];
    parts = await store.listParts({ categoryIds, activeOnly });
  }

  return parts.map(part => serializePartPreview(part, settings));
}

export function datasheetUrl(part: Part, siteUrl: string): string {
  const attachment = part.attachments.find(a => a.comment.toLowerCase() === "datasheet");
  if (!attachment) return "";

  if (attachment.link) return attachment.link;
  if (attachment.file) return `${siteUrl}/media/${attachment.file.replace(/^\/+/, "")}`;
  return "";
}

const hidden = (value: string): KicadField => ({ value, visible: "False" });

/**
 * The KiCad `fields` block: the default fields, the identifier and
 * link fields, optional IPN and manufacturer data, then every
 * parameter not already consumed by a default field.
 */
export function buildKicadFields(
  ctx: ResolutionContext,
  templates: ParameterTemplate[],
  siteUrl: string
): Record<string, KicadField> {
  const { part, settings, kicadCategory } = ctx;

  const fields: Record<string, KicadField> = {
    value: { value: resolveValue(ctx) },
    footprint: hidden(resolveFootprint(ctx)),
    datasheet: hidden(datasheetUrl(part, siteUrl)),
    reference: { value: resolveReference(ctx), visible: "True" },
    description: hidden(part.description),
    keywords: hidden(part.keywords)
  };
  const defaultNames = Object.keys(fields);

  fields[settings.IMPORT_INVENTREE_ID_IDENTIFIER] = hidden(String(part.id));
  fields["Part URL"] = hidden(`${siteUrl}/part/${part.id}/`);

  const includeIpn = settings.KICAD_INCLUDE_IPN;
  if (includeIpn !== "0") {
    fields.IPN = { value: part.IPN, visible: includeIpn };
  }

  if (settings.KICAD_ENABLE_MANUFACTURER_DATA) {
    const mp = part.manufacturerParts[0];
    if (mp) {
      fields.Manufacturer = hidden(mp.manufacturer);
      fields.MPN = hidden(mp.mpn);

      const supplier = mp.suppliers[0];
      if (supplier) {
        fields.Supplier = hidden(supplier.supplier);
        fields.SPN = hidden(supplier.sku);
      }
    }
  }

  const consumed = new Set<number>();
  for (const key of TEMPLATE_SETTING_KEYS) {
    const templateId = settings[key];
    if (templateId !== null) consumed.add(templateId);
  }
  if (kicadCategory?.defaultValueParameterTemplateId) {
    consumed.add(kicadCategory.defaultValueParameterTemplateId);
  }
  if (kicadCategory?.footprintParameterTemplateId) {
    consumed.add(kicadCategory.footprintParameterTemplateId);
  }

  for (const parameter of part.parameters) {
    if (consumed.has(parameter.templateId)) continue;

    const template = templates.find(t => t.id === parameter.templateId);
    if (!template) continue;
    if (defaultNames.includes(template.name.toLowerCase())) continue;

    const withUnits =
      settings.KICAD_INCLUDE_UNITS_IN_PARAMETERS && template.units && parameter.data
        ? `${parameter.data} ${template.units}`
        : parameter.data;
    fields[template.name] = hidden(withUnits);
  }

  applyVisibility(fields, resolveVisibleFields(ctx));
  return fields;
}

function applyVisibility(fields: Record<string, KicadField>, visible: string[]) {
  if (visible.length === 0) return;

  for (const [name, field] of Object.entries(fields)) {
    if (visible.includes(name.toLowerCase())) {
      field.visible = "True";
    }
  }
}

export async function serializePartDetail(
  store: InventoryStore,
  part: Part,
  settings: PluginSettings,
  siteUrl: string
): Promise<KicadPartDetail> {
  const [ctx, templates] = await Promise.all([
    loadResolutionContext(store, part, settings),
    store.listParameterTemplates()
  ]);

  return {
    id: String(part.id),
    name: displayName(part, settings),
    symbolIdStr: resolveSymbol(ctx),
    exclude_from_bom: resolveExclusion(ctx, "bom"),
    exclude_from_board: resolveExclusion(ctx, "board"),
    exclude_from_sim: resolveExclusion(ctx, "sim"),
    fields: buildKicadFields(ctx, templates, siteUrl)
  };
}
