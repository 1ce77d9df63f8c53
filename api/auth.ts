import type { NextFunction, Request, Response } from "express";
import type { InventoryStore } from "../services/inventoryStore.js";

declare global {
  namespace Express {
    interface Request {
      username?: string;
    }
  }
}

export const ANONYMOUS_USER = "anonymous";

function readToken(req: Request): string | null {
  const header = req.get("authorization");
  if (!header) return null;

  const match = header.match(/^(?:Token|Bearer)\s+(.+)$/i);
  return match ? match[1].trim() : null;
}

/**
 * Token authentication. KiCad sends `Authorization: Token <token>`.
 */
export function authenticate(store: InventoryStore, allowAnonymous: boolean) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const token = readToken(req);
      const user = token ? await store.findUserByToken(token) : null;

      if (user) {
        req.username = user.username;
        return next();
      }
      if (!token && allowAnonymous) {
        req.username = ANONYMOUS_USER;
        return next();
      }

      return res.status(401).json({
        error: "Authentication credentials were not provided or are invalid"
      });
    } catch (err) {
      return next(err);
    }
  };
}

export function requestUser(req: Request): string {
  return req.username ?? ANONYMOUS_USER;
}
