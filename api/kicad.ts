import { Router } from "express";
import { notFound, sendError } from "../errors.js";
import {
  listPreviewParts,
  serializeCategories,
  serializePartDetail
} from "../services/kicadSerializer.js";
import { getSettings } from "../services/settingsService.js";
import { siteUrl, type AppContext } from "./context.js";
import { paginate } from "./pagination.js";

/**
 * KiCad HTTP library endpoints, mounted under /v1.
 */
export function createKicadRouter({ store, config }: AppContext) {
  const router = Router();

  // categories, categories.json, categories/
  router.get(/^\/categories(?:\.json)?\/?$/, async (req, res) => {
    try {
      const categories = await serializeCategories(store);
      return res.json(paginate(req, siteUrl(req, config), categories));
    } catch (err) {
      return sendError(res, err, "KICAD");
    }
  });

  router.get(/^\/parts\/category\/([^/]+?)(?:\.json)?\/?$/, async (req, res) => {
    try {
      const settings = await getSettings(store);
      const raw = req.params[0];
      const categoryId = /^\d+$/.test(raw) ? Number(raw) : null;

      const parts = await listPreviewParts(store, settings, categoryId);
      return res.json(paginate(req, siteUrl(req, config), parts));
    } catch (err) {
      return sendError(res, err, "KICAD");
    }
  });

  router.get(/^\/parts\/([^/]+?)\.json$/, async (req, res) => {
    try {
      const raw = req.params[0];
      const part = /^\d+$/.test(raw) ? await store.getPart(Number(raw)) : null;
      if (!part) {
        throw notFound("Part");
      }

      const settings = await getSettings(store);
      return res.json(await serializePartDetail(store, part, settings, siteUrl(req, config)));
    } catch (err) {
      return sendError(res, err, "KICAD");
    }
  });

  // anything else below parts/ is the full part list
  router.get(/^\/parts(?:\/.*)?$/, async (req, res) => {
    try {
      const settings = await getSettings(store);
      const parts = await listPreviewParts(store, settings, null);
      return res.json(paginate(req, siteUrl(req, config), parts));
    } catch (err) {
      return sendError(res, err, "KICAD");
    }
  });

  // everything else gets the index
  router.get(/.*/, (req, res) => {
    const base = `${siteUrl(req, config)}${req.baseUrl}/`;
    return res.json({
      categories: `${base}categories/`,
      parts: `${base}parts/`
    });
  });

  return router;
}
