import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import multer from "multer";
import { sendError } from "../errors.js";
import { createAdminRouter } from "./admin.js";
import { authenticate } from "./auth.js";
import type { AppContext } from "./context.js";
import { createKicadRouter } from "./kicad.js";
import { createUploadRouter } from "./upload.js";

export function createApp(ctx: AppContext) {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use(authenticate(ctx.store, ctx.config.allowAnonymous));

  app.use("/v1", createKicadRouter(ctx));
  app.use(createUploadRouter(ctx));
  app.use(createAdminRouter(ctx));

  app.get("/", (_req, res) => {
    res.redirect("/v1/");
  });

  // errors raised outside the route handlers (body parsing, multer)
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      return res.status(400).json({ error: err.message });
    }
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: "Malformed JSON body" });
    }
    return sendError(res, err);
  });

  return app;
}
