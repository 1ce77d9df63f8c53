import type { Request } from "express";
import { z } from "zod";

const pageQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).optional(),
  offset: z.coerce.number().int().min(0).default(0)
});

export interface Page<T> {
  count: number;
  next: string | null;
  previous: string | null;
  results: T[];
}

/**
 * Limit/offset pagination. Without `limit` the list is returned as a
 * plain array, which is what KiCad expects.
 */
export function paginate<T>(req: Request, origin: string, items: T[]): T[] | Page<T> {
  const { limit, offset } = pageQuerySchema.parse(req.query);
  if (limit === undefined) {
    return items;
  }

  const pageUrl = (start: number) => {
    const url = new URL(req.originalUrl, origin);
    url.searchParams.set("limit", String(limit));
    url.searchParams.set("offset", String(start));
    return url.toString();
  };

  return {
    count: items.length,
    next: offset + limit < items.length ? pageUrl(offset + limit) : null,
    previous: offset > 0 ? pageUrl(Math.max(0, offset - limit)) : null,
    results: items.slice(offset, offset + limit)
  };
}
