import { Router } from "express";
import { z } from "zod";
import { ApiError, notFound, sendError } from "../errors.js";
import type { InventoryStore } from "../services/inventoryStore.js";
import {
  buildShowFieldMap,
  describeSettings,
  getSettings,
  updateSettings
} from "../services/settingsService.js";
import type { KicadCategory } from "../types.js";
import type { AppContext } from "./context.js";

/* -----------------------------
   Request bodies
----------------------------- */

const templateId = z.number().int().positive().nullable();

const kicadCategoryBody = z
  .object({
    categoryId: z.number().int().positive(),
    defaultSymbol: z.string().default(""),
    defaultFootprint: z.string().default(""),
    defaultReference: z.string().default(""),
    defaultValueParameterTemplateId: templateId.default(null),
    footprintParameterTemplateId: templateId.default(null),
    defaultVisibleFields: z.string().default("")
  })
  .strict();

const kicadCategoryPatch = kicadCategoryBody.partial();

const footprintMappingBody = z
  .object({
    parameterValue: z.string().min(1),
    kicadFootprint: z.string().min(1)
  })
  .strict();

const idParam = (raw: string | undefined, what: string) => {
  const parsed = z.coerce.number().int().positive().safeParse(raw);
  if (!parsed.success) throw notFound(what);
  return parsed.data;
};

async function assertTemplatesExist(
  store: InventoryStore,
  ids: Array<number | null | undefined>
) {
  for (const id of ids) {
    if (id && !(await store.getParameterTemplate(id))) {
      throw new ApiError(422, `Parameter template ${id} does not exist`);
    }
  }
}

async function describeKicadCategory(store: InventoryStore, kc: KicadCategory) {
  const [ancestors, footprintMappings] = await Promise.all([
    store.getCategoryAncestors(kc.categoryId),
    store.listFootprintMappings(kc.id)
  ]);
  return {
    ...kc,
    pathstring: ancestors.map(c => c.name).join("/"),
    footprintMappings
  };
}

/* -----------------------------
   Router
----------------------------- */

/**
 * Settings discovery plus the configuration API for KiCad
 * categories and their footprint mappings.
 */
export function createAdminRouter({ store }: AppContext) {
  const router = Router();

  router.get("/settings", async (_req, res) => {
    try {
      const [settings, templates] = await Promise.all([
        getSettings(store),
        store.listParameterTemplates()
      ]);
      return res.json({
        show_field: buildShowFieldMap(settings, templates),
        settings: describeSettings(settings)
      });
    } catch (err) {
      return sendError(res, err, "SETTINGS");
    }
  });

  router.patch("/api/settings", async (req, res) => {
    try {
      const settings = await updateSettings(store, req.body);
      return res.json({ settings: describeSettings(settings) });
    } catch (err) {
      return sendError(res, err, "SETTINGS");
    }
  });

  // ------------------
  // KiCad categories
  // ------------------

  router.get("/api/category", async (_req, res) => {
    try {
      const rows = await store.listKicadCategories();
      return res.json(await Promise.all(rows.map(kc => describeKicadCategory(store, kc))));
    } catch (err) {
      return sendError(res, err, "ADMIN");
    }
  });

  router.post("/api/category", async (req, res) => {
    try {
      const body = kicadCategoryBody.parse(req.body);
      await assertTemplatesExist(store, [
        body.defaultValueParameterTemplateId,
        body.footprintParameterTemplateId
      ]);

      const created = await store.createKicadCategory(body);
      console.log("[ADMIN] published category", created.categoryId);
      return res.status(201).json(await describeKicadCategory(store, created));
    } catch (err) {
      return sendError(res, err, "ADMIN");
    }
  });

  router.get("/api/category/:id", async (req, res) => {
    try {
      const kc = await store.getKicadCategory(idParam(req.params.id, "KiCad category"));
      if (!kc) throw notFound("KiCad category");
      return res.json(await describeKicadCategory(store, kc));
    } catch (err) {
      return sendError(res, err, "ADMIN");
    }
  });

  router.patch("/api/category/:id", async (req, res) => {
    try {
      const id = idParam(req.params.id, "KiCad category");
      const patch = kicadCategoryPatch.parse(req.body);
      await assertTemplatesExist(store, [
        patch.defaultValueParameterTemplateId,
        patch.footprintParameterTemplateId
      ]);

      const updated = await store.updateKicadCategory(id, patch);
      return res.json(await describeKicadCategory(store, updated));
    } catch (err) {
      return sendError(res, err, "ADMIN");
    }
  });

  router.delete("/api/category/:id", async (req, res) => {
    try {
      await store.deleteKicadCategory(idParam(req.params.id, "KiCad category"));
      return res.status(204).end();
    } catch (err) {
      return sendError(res, err, "ADMIN");
    }
  });

  // ------------------
  // Footprint mappings
  // ------------------

  router.get("/api/category/:id/footprint-mappings", async (req, res) => {
    try {
      const id = idParam(req.params.id, "KiCad category");
      if (!(await store.getKicadCategory(id))) throw notFound("KiCad category");
      return res.json(await store.listFootprintMappings(id));
    } catch (err) {
      return sendError(res, err, "ADMIN");
    }
  });

  router.post("/api/category/:id/footprint-mappings", async (req, res) => {
    try {
      const kicadCategoryId = idParam(req.params.id, "KiCad category");
      const body = footprintMappingBody.parse(req.body);

      const mapping = await store.createFootprintMapping({ kicadCategoryId, ...body });
      return res.status(201).json(mapping);
    } catch (err) {
      return sendError(res, err, "ADMIN");
    }
  });

  router.delete("/api/category/:id/footprint-mappings/:mappingId", async (req, res) => {
    try {
      const kicadCategoryId = idParam(req.params.id, "KiCad category");
      const mappingId = idParam(req.params.mappingId, "Footprint mapping");

      const mappings = await store.listFootprintMappings(kicadCategoryId);
      if (!mappings.some(m => m.id === mappingId)) throw notFound("Footprint mapping");

      await store.deleteFootprintMapping(mappingId);
      return res.status(204).end();
    } catch (err) {
      return sendError(res, err, "ADMIN");
    }
  });

  return router;
}
