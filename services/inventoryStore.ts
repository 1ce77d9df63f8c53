// services/inventoryStore.ts
import fs from "fs";
import path from "path";
import { z } from "zod";
import type {
  Attachment,
  Category,
  FootprintMapping,
  ImportProgress,
  KicadCategory,
  ParameterTemplate,
  Part,
  PartParameter,
  User
} from "../types.js";

/* -----------------------------
   Store contract
----------------------------- */

export interface PartFilter {
  categoryIds?: number[];
  activeOnly?: boolean;
}

export type KicadCategoryInput = Omit<KicadCategory, "id">;
export type FootprintMappingInput = Omit<FootprintMapping, "id">;

/**
 * Persistence seam for the inventory. Everything the KiCad endpoints
 * and the importers read or write goes through here.
 */
export interface InventoryStore {
  findUserByToken(token: string): Promise<User | null>;

  listCategories(): Promise<Category[]>;
  getCategory(id: number): Promise<Category | null>;
  /** Root first, the category itself last. */
  getCategoryAncestors(id: number): Promise<Category[]>;
  /** The category and every category below it. */
  getCategoryDescendantIds(id: number): Promise<number[]>;

  listParts(filter?: PartFilter): Promise<Part[]>;
  getPart(id: number): Promise<Part | null>;
  findPartByName(name: string): Promise<Part | null>;

  listParameterTemplates(): Promise<ParameterTemplate[]>;
  getParameterTemplate(id: number): Promise<ParameterTemplate | null>;
  getOrCreateParameter(
    partId: number,
    templateId: number
  ): Promise<{ parameter: PartParameter; created: boolean }>;
  setParameter(partId: number, templateId: number, data: string): Promise<void>;

  addAttachment(partId: number, attachment: Attachment): Promise<void>;

  listKicadCategories(): Promise<KicadCategory[]>;
  getKicadCategory(id: number): Promise<KicadCategory | null>;
  createKicadCategory(input: KicadCategoryInput): Promise<KicadCategory>;
  updateKicadCategory(id: number, patch: Partial<KicadCategoryInput>): Promise<KicadCategory>;
  deleteKicadCategory(id: number): Promise<void>;

  listFootprintMappings(kicadCategoryId: number): Promise<FootprintMapping[]>;
  createFootprintMapping(input: FootprintMappingInput): Promise<FootprintMapping>;
  deleteFootprintMapping(id: number): Promise<void>;

  getStoredSettings(): Promise<Record<string, unknown>>;
  saveStoredSettings(values: Record<string, unknown>): Promise<void>;

  getProgress(username: string): Promise<ImportProgress>;
  saveProgress(progress: ImportProgress): Promise<void>;
}

export class StoreConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StoreConflictError";
  }
}

export class StoreNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StoreNotFoundError";
  }
}

/* -----------------------------
   Data file schema
----------------------------- */

const id = z.number().int().positive();

export const inventoryDataSchema = z.object({
  users: z.array(z.object({ username: z.string().min(1), token: z.string().min(1) })).default([]),
  categories: z
    .array(
      z.object({
        id,
        name: z.string(),
        description: z.string().default(""),
        parentId: id.nullable().default(null)
      })
    )
    .default([]),
  parameterTemplates: z
    .array(z.object({ id, name: z.string(), units: z.string().default("") }))
    .default([]),
  parts: z
    .array(
      z.object({
        id,
        name: z.string(),
        IPN: z.string().default(""),
        revision: z.string().default(""),
        description: z.string().default(""),
        keywords: z.string().default(""),
        categoryId: id.nullable().default(null),
        active: z.boolean().default(true),
        inStock: z.number().default(0),
        parameters: z.array(z.object({ templateId: id, data: z.string() })).default([]),
        attachments: z
          .array(
            z.object({
              comment: z.string().default(""),
              link: z.string().optional(),
              file: z.string().optional()
            })
          )
          .default([]),
        manufacturerParts: z
          .array(
            z.object({
              manufacturer: z.string(),
              mpn: z.string(),
              suppliers: z
                .array(z.object({ supplier: z.string(), sku: z.string() }))
                .default([])
            })
          )
          .default([])
      })
    )
    .default([]),
  kicadCategories: z
    .array(
      z.object({
        id,
        categoryId: id,
        defaultSymbol: z.string().default(""),
        defaultFootprint: z.string().default(""),
        defaultReference: z.string().default(""),
        defaultValueParameterTemplateId: id.nullable().default(null),
        footprintParameterTemplateId: id.nullable().default(null),
        defaultVisibleFields: z.string().default("")
      })
    )
    .default([]),
  footprintMappings: z
    .array(
      z.object({
        id,
        kicadCategoryId: id,
        parameterValue: z.string(),
        kicadFootprint: z.string()
      })
    )
    .default([]),
  settings: z.record(z.unknown()).default({}),
  progress: z
    .array(
      z.object({
        username: z.string(),
        currentProgress: z.number(),
        fileName: z.string()
      })
    )
    .default([])
});

export type InventoryData = z.infer<typeof inventoryDataSchema>;

export function emptyInventory(): InventoryData {
  return inventoryDataSchema.parse({});
}

/* -----------------------------
   In-memory store
----------------------------- */

const nextId = (rows: Array<{ id: number }>) =>
  rows.reduce((max, row) => Math.max(max, row.id), 0) + 1;

const clone = <T>(value: T): T => structuredClone(value);

export class MemoryInventoryStore implements InventoryStore {
  protected data: InventoryData;

  constructor(data: unknown = {}) {
    this.data = inventoryDataSchema.parse(data);
  }

  /** Snapshot of everything held, for persistence and tests. */
  snapshot(): InventoryData {
    return clone(this.data);
  }

  /** Called after every write. */
  protected async persist(): Promise<void> {}

  async findUserByToken(token: string) {
    const user = this.data.users.find(u => u.token === token);
    return user ? clone(user) : null;
  }

  // ------------------
  // Categories
  // ------------------

  async listCategories() {
    return clone(this.data.categories);
  }

  async getCategory(categoryId: number) {
    const category = this.data.categories.find(c => c.id === categoryId);
    return category ? clone(category) : null;
  }

  async getCategoryAncestors(categoryId: number) {
    const chain: Category[] = [];
    const seen = new Set<number>();
    let current = this.data.categories.find(c => c.id === categoryId);

    while (current && !seen.has(current.id)) {
      seen.add(current.id);
      chain.unshift(clone(current));
      const parentId = current.parentId;
      current = parentId === null ? undefined : this.data.categories.find(c => c.id === parentId);
    }
    return chain;
  }

  async getCategoryDescendantIds(categoryId: number) {
    const out: number[] = [];
    const queue = [categoryId];

    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || out.includes(next)) continue;
      out.push(next);
      for (const child of this.data.categories) {
        if (child.parentId === next) queue.push(child.id);
      }
    }
    return out;
  }

  // ------------------
  // Parts
  // ------------------

  async listParts(filter: PartFilter = {}) {
    return clone(
      this.data.parts.filter(part => {
        if (filter.activeOnly && !part.active) return false;
        if (filter.categoryIds) {
          return part.categoryId !== null && filter.categoryIds.includes(part.categoryId);
        }
        return true;
      })
    );
  }

  async getPart(partId: number) {
    const part = this.data.parts.find(p => p.id === partId);
    return part ? clone(part) : null;
  }

  async findPartByName(name: string) {
    const part = this.data.parts.find(p => p.name === name);
    return part ? clone(part) : null;
  }

  private requirePart(partId: number): Part {
    const part = this.data.parts.find(p => p.id === partId);
    if (!part) throw new StoreNotFoundError(`Part ${partId} not found`);
    return part;
  }

  // ------------------
  // Parameters
  // ------------------

  async listParameterTemplates() {
    return clone(this.data.parameterTemplates);
  }

  async getParameterTemplate(templateId: number) {
    const template = this.data.parameterTemplates.find(t => t.id === templateId);
    return template ? clone(template) : null;
  }

  async getOrCreateParameter(partId: number, templateId: number) {
    const part = this.requirePart(partId);
    if (!this.data.parameterTemplates.some(t => t.id === templateId)) {
      throw new StoreNotFoundError(`Parameter template ${templateId} not found`);
    }

    const existing = part.parameters.find(p => p.templateId === templateId);
    if (existing) {
      return { parameter: clone(existing), created: false };
    }

    const parameter: PartParameter = { templateId, data: "" };
    part.parameters.push(parameter);
    await this.persist();
    return { parameter: clone(parameter), created: true };
  }

  async setParameter(partId: number, templateId: number, data: string) {
    const part = this.requirePart(partId);
    const existing = part.parameters.find(p => p.templateId === templateId);

    if (existing) {
      existing.data = data;
    } else {
      part.parameters.push({ templateId, data });
    }
    await this.persist();
  }

  async addAttachment(partId: number, attachment: Attachment) {
    this.requirePart(partId).attachments.push(clone(attachment));
    await this.persist();
  }

  // ------------------
  // KiCad categories
  // ------------------

  async listKicadCategories() {
    return clone(this.data.kicadCategories);
  }

  async getKicadCategory(kicadCategoryId: number) {
    const row = this.data.kicadCategories.find(k => k.id === kicadCategoryId);
    return row ? clone(row) : null;
  }

  async createKicadCategory(input: KicadCategoryInput) {
    this.assertCategoryFree(input.categoryId);

    const row: KicadCategory = { ...input, id: nextId(this.data.kicadCategories) };
    this.data.kicadCategories.push(row);
    await this.persist();
    return clone(row);
  }

  async updateKicadCategory(kicadCategoryId: number, patch: Partial<KicadCategoryInput>) {
    const row = this.data.kicadCategories.find(k => k.id === kicadCategoryId);
    if (!row) throw new StoreNotFoundError(`KiCad category ${kicadCategoryId} not found`);

    if (patch.categoryId !== undefined && patch.categoryId !== row.categoryId) {
      this.assertCategoryFree(patch.categoryId);
    }

    Object.assign(row, patch);
    await this.persist();
    return clone(row);
  }

  async deleteKicadCategory(kicadCategoryId: number) {
    const before = this.data.kicadCategories.length;
    this.data.kicadCategories = this.data.kicadCategories.filter(k => k.id !== kicadCategoryId);
    if (this.data.kicadCategories.length === before) {
      throw new StoreNotFoundError(`KiCad category ${kicadCategoryId} not found`);
    }

    this.data.footprintMappings = this.data.footprintMappings.filter(
      m => m.kicadCategoryId !== kicadCategoryId
    );
    await this.persist();
  }

  private assertCategoryFree(categoryId: number) {
    if (!this.data.categories.some(c => c.id === categoryId)) {
      throw new StoreNotFoundError(`Category ${categoryId} not found`);
    }
    if (this.data.kicadCategories.some(k => k.categoryId === categoryId)) {
      throw new StoreConflictError(`Category ${categoryId} is already published to KiCad`);
    }
  }

  // ------------------
  // Footprint mappings
  // ------------------

  async listFootprintMappings(kicadCategoryId: number) {
    return clone(this.data.footprintMappings.filter(m => m.kicadCategoryId === kicadCategoryId));
  }

  async createFootprintMapping(input: FootprintMappingInput) {
    if (!this.data.kicadCategories.some(k => k.id === input.kicadCategoryId)) {
      throw new StoreNotFoundError(`KiCad category ${input.kicadCategoryId} not found`);
    }
    const duplicate = this.data.footprintMappings.some(
      m => m.kicadCategoryId === input.kicadCategoryId && m.parameterValue === input.parameterValue
    );
    if (duplicate) {
      throw new StoreConflictError(
        `A mapping for "${input.parameterValue}" already exists in this category`
      );
    }

    const row: FootprintMapping = { ...input, id: nextId(this.data.footprintMappings) };
    this.data.footprintMappings.push(row);
    await this.persist();
    return clone(row);
  }

  async deleteFootprintMapping(mappingId: number) {
    const before = this.data.footprintMappings.length;
    this.data.footprintMappings = this.data.footprintMappings.filter(m => m.id !== mappingId);
    if (this.data.footprintMappings.length === before) {
      throw new StoreNotFoundError(`Footprint mapping ${mappingId} not found`);
    }
    await this.persist();
  }

  // ------------------
  // Settings & progress
  // ------------------

  async getStoredSettings() {
    return clone(this.data.settings);
  }

  async saveStoredSettings(values: Record<string, unknown>) {
    this.data.settings = clone(values);
    await this.persist();
  }

  async getProgress(username: string) {
    const row = this.data.progress.find(p => p.username === username);
    return row ? clone(row) : { username, currentProgress: 0, fileName: "" };
  }

  async saveProgress(progress: ImportProgress) {
    const row = this.data.progress.find(p => p.username === progress.username);
    if (row) {
      row.currentProgress = progress.currentProgress;
      row.fileName = progress.fileName;
    } else {
      this.data.progress.push(clone(progress));
    }
    await this.persist();
  }
}

/* -----------------------------
   JSON file store
----------------------------- */

/**
 * Memory store backed by a JSON file. The file is read once and
 * rewritten after every change.
 */
export class JsonFileInventoryStore extends MemoryInventoryStore {
  private constructor(
    private readonly filePath: string,
    data: unknown
  ) {
    super(data);
  }

  static open(filePath: string): JsonFileInventoryStore {
    if (!fs.existsSync(filePath)) {
      console.warn(`[STORE] ${filePath} does not exist, starting with an empty inventory`);
      return new JsonFileInventoryStore(filePath, {});
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch (err) {
      throw new Error(`Failed to read inventory data from ${filePath}: ${String(err)}`);
    }

    const parsed = inventoryDataSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .slice(0, 5)
        .map(i => `${i.path.join(".")}: ${i.message}`)
        .join("; ");
      throw new Error(`Invalid inventory data in ${filePath}: ${issues}`);
    }

    console.log("[STORE] loaded", {
      file: filePath,
      categories: parsed.data.categories.length,
      parts: parsed.data.parts.length
    });
    return new JsonFileInventoryStore(filePath, parsed.data);
  }

  protected async persist(): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.promises.writeFile(this.filePath, JSON.stringify(this.data, null, 2), "utf8");
  }
}
