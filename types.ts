/* -----------------------------
   Inventory records
----------------------------- */

export interface Category {
  id: number;
  name: string;
  description: string;
  parentId: number | null;
}

export interface ParameterTemplate {
  id: number;
  name: string;
  units: string;
}

export interface PartParameter {
  templateId: number;
  data: string;
}

export interface Attachment {
  comment: string;
  link?: string;
  // path relative to the media root
  file?: string;
}

export interface ManufacturerPart {
  manufacturer: string;
  mpn: string;
  suppliers: Array<{ supplier: string; sku: string }>;
}

export interface Part {
  id: number;
  name: string;
  IPN: string;
  revision: string;
  description: string;
  keywords: string;
  categoryId: number | null;
  active: boolean;
  inStock: number;
  parameters: PartParameter[];
  attachments: Attachment[];
  manufacturerParts: ManufacturerPart[];
}

export interface User {
  username: string;
  token: string;
}

/* -----------------------------
   KiCad configuration records
----------------------------- */

export interface KicadCategory {
  id: number;
  categoryId: number;
  defaultSymbol: string;
  defaultFootprint: string;
  defaultReference: string;
  defaultValueParameterTemplateId: number | null;
  footprintParameterTemplateId: number | null;
  // comma separated field names shown in the schematic
  defaultVisibleFields: string;
}

export interface FootprintMapping {
  id: number;
  kicadCategoryId: number;
  parameterValue: string;
  kicadFootprint: string;
}

export interface ImportProgress {
  username: string;
  currentProgress: number;
  fileName: string;
}

/* -----------------------------
   KiCad HTTP library documents
----------------------------- */

export type KicadBool = "True" | "False";

export interface KicadField {
  value: string;
  visible?: KicadBool;
}

export interface KicadCategoryDocument {
  id: string;
  name: string;
  description: string;
}

export interface KicadPartPreview {
  id: string;
  name: string;
  description: string;
}

export interface KicadPartDetail {
  id: string;
  name: string;
  symbolIdStr: string;
  exclude_from_bom: string;
  exclude_from_board: string;
  exclude_from_sim: string;
  fields: Record<string, KicadField>;
}

/* -----------------------------
   Import results
----------------------------- */

export interface ImportIssue {
  ref: string | null;
  identifier: string | null;
  reason: string;
}

export interface ImportSummary {
  fileName: string;
  total: number;
  updated: number[];
  parametersWritten: number;
  duplicates: string[];
  errors: ImportIssue[];
}
