import { Router } from "express";
import multer from "multer";
import { sendError } from "../errors.js";
import { importCsv } from "../services/csvImportService.js";
import { importNetlist } from "../services/metadataImportService.js";
import { getSettings } from "../services/settingsService.js";
import { requestUser } from "./auth.js";
import type { AppContext } from "./context.js";

const MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: MAX_UPLOAD_BYTES, files: 1 }
});

/**
 * Metadata import and its progress polling.
 */
export function createUploadRouter({ store }: AppContext) {
  const router = Router();

  router.post(/^\/upload\.csv$/, upload.single("file"), async (req, res) => {
    try {
      if (!req.file) {
        return res.status(400).json({ error: "No file uploaded!" });
      }

      const settings = await getSettings(store);
      const body: Record<string, unknown> = req.body ?? {};
      const summary = await importCsv(store, settings, {
        content: req.file.buffer,
        fileName: req.file.originalname,
        username: requestUser(req),
        mapping: body.mapping,
        idColumn: typeof body.idColumn === "string" ? body.idColumn : undefined
      });
      return res.json(summary);
    } catch (err) {
      return sendError(res, err, "IMPORT");
    }
  });

  router.post(/^\/upload(?:\.json)?$/, upload.single("file"), async (req, res) => {
    try {
      if (!req.file) {
        return res.status(400).json({ error: "No file uploaded!" });
      }

      const settings = await getSettings(store);
      const summary = await importNetlist(store, settings, {
        content: req.file.buffer,
        contentType: req.file.mimetype,
        fileName: req.file.originalname,
        username: requestUser(req)
      });
      return res.json(summary);
    } catch (err) {
      return sendError(res, err, "IMPORT");
    }
  });

  router.get("/progress_bar_status", async (req, res) => {
    try {
      const progress = await store.getProgress(requestUser(req));
      return res.json({
        value: progress.currentProgress,
        file_name: progress.fileName
      });
    } catch (err) {
      return sendError(res, err, "IMPORT");
    }
  });

  return router;
}
