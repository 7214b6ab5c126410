import {
  CustomizationGroup,
  DIETARY_TAGS,
  DietaryTag,
  MenuImportRow,
  MenuImportRowStatus,
} from "@tapau/types";
import { parse } from "csv-parse/sync";
import { groupErrors, idFor } from "../catalog/menu.rules";

export const IMPORT_COLUMNS = [
  "section",
  "name",
  "description",
  "price",
  "available",
  "min_quantity",
  "max_quantity",
  "dietary_tags",
  "customizations",
] as const;

export type ImportColumn = typeof IMPORT_COLUMNS[number];

const REQUIRED_COLUMNS: readonly ImportColumn[] = ["name", "price"];

export const UNCATEGORIZED = "Uncategorized";

export type ImportRecord = Partial<Record<ImportColumn, string>>;

export type ParsedImportFile =
  | { ok: true; rows: MenuImportRow[] }
  | { ok: false; error: string };

const TRUE_VALUES = ["true", "yes", "1"];
const FALSE_VALUES = ["false", "no", "0"];
const DECIMAL = /^-?\d+(\.\d+)?$/;

function isImportColumn(value: string): value is ImportColumn {
  return IMPORT_COLUMNS.some((column) => column === value);
}

function isDietaryTag(value: string): value is DietaryTag {
  return DIETARY_TAGS.some((tag) => tag === value);
}

function toTable(value: unknown): string[][] {
  if (!Array.isArray(value)) return [];
  return value.map((record: unknown) =>
    Array.isArray(record) ? record.map((field: unknown) => (typeof field === "string" ? field : String(field))) : [],
  );
}

function decimalPlaces(raw: string): number {
  const dot = raw.indexOf(".");
  return dot < 0 ? 0 : raw.length - dot - 1;
}

/** Reads a whole upload; header and row-count problems reject the file. */
export function parseImportFile(content: string, maxRows: number): ParsedImportFile {
  let table: string[][];
  try {
    table = toTable(parse(content, { bom: true, trim: true, relax_column_count: true, skip_empty_lines: false }));
  } catch (error) {
    return { ok: false, error: `File is not valid CSV: ${error instanceof Error ? error.message : String(error)}` };
  }

  const [header, ...records] = table;
  if (!header) return { ok: false, error: "File is empty" };

  const columns = header.map((name) => name.trim().toLowerCase().replace(/\s+/g, "_"));
  const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    return { ok: false, error: `Missing required columns: ${missing.join(", ")}` };
  }

  const rows: MenuImportRow[] = [];
  records.forEach((fields, index) => {
    if (fields.every((field) => field.trim() === "")) return;

    const record: ImportRecord = {};
    columns.forEach((column, position) => {
      if (isImportColumn(column)) record[column] = fields[position] ?? "";
    });
    rows.push(validateImportRow(index + 2, record));
  });

  if (rows.length === 0) return { ok: false, error: "File has no menu rows" };
  if (rows.length > maxRows) return { ok: false, error: `Import files are limited to ${maxRows} rows` };
  return { ok: true, rows };
}

export function validateImportRow(rowNumber: number, record: ImportRecord): MenuImportRow {
  const errors: string[] = [];
  const warnings: string[] = [];
  const field = (column: ImportColumn): string => (record[column] ?? "").trim();

  let sectionTitle = field("section");
  if (!sectionTitle) {
    sectionTitle = UNCATEGORIZED;
    warnings.push(`No section given; item goes to ${UNCATEGORIZED}`);
  }

  const name = field("name");
  if (!name) errors.push("Name is required");
  else if (name.length < 2 || name.length > 100) errors.push("Name must be 2-100 characters");

  const description = field("description");
  if (description.length > 500) errors.push("Description must be at most 500 characters");
  else if (!description) warnings.push("Description is empty");

  const priceCents = readPrice(field("price"), errors, warnings);
  const isAvailable = readAvailability(field("available"), errors);
  const minQuantity = readQuantity(field("min_quantity"), "Minimum quantity", errors) ?? 1;
  const maxQuantity = readQuantity(field("max_quantity"), "Maximum quantity", errors);
  if (maxQuantity !== null && maxQuantity < minQuantity) {
    errors.push("Maximum quantity must not be below the minimum quantity");
  }

  const dietaryTags = readDietaryTags(field("dietary_tags"), errors, warnings);
  const customizations = readCustomizations(field("customizations"), errors);
  const groupIds = new Set<string>();
  for (const group of customizations) {
    if (groupIds.has(group.groupId)) errors.push(`Customization group ${group.name} appears more than once`);
    groupIds.add(group.groupId);
    errors.push(...groupErrors(name || `Row ${rowNumber}`, group));
  }

  const status: MenuImportRowStatus = errors.length > 0 ? "ERROR" : warnings.length > 0 ? "WARNING" : "VALID";
  return {
    rowNumber,
    status,
    sectionTitle,
    item: status === "ERROR" || priceCents === null
      ? null
      : {
        name,
        description,
        priceCents,
        isAvailable,
        minQuantity,
        maxQuantity,
        dietaryTags,
        customizations,
      },
    errors,
    warnings,
  };
}

function readPrice(raw: string, errors: string[], warnings: string[]): number | null {
  const value = raw.replace(/^rm\s*/i, "");
  if (!value) {
    errors.push("Price is required");
    return null;
  }
  if (!DECIMAL.test(value)) {
    errors.push("Price must be a number");
    return null;
  }

  const amount = Number(value);
  if (amount <= 0) {
    errors.push("Price must be greater than 0");
    return null;
  }
  if (amount > 9999.99) {
    errors.push("Price must be at most RM9999.99");
    return null;
  }
  if (decimalPlaces(value) > 2) {
    errors.push("Price must have at most 2 decimal places");
    return null;
  }

  const cents = Math.round(amount * 100);
  if (cents < 50) warnings.push("Price is under RM0.50");
  return cents;
}

function readAvailability(raw: string, errors: string[]): boolean {
  const value = raw.toLowerCase();
  if (!value || TRUE_VALUES.includes(value)) return true;
  if (FALSE_VALUES.includes(value)) return false;
  errors.push("Available must be one of true, false, yes, no, 1, 0");
  return true;
}

function readQuantity(raw: string, label: string, errors: string[]): number | null {
  if (!raw) return null;
  const value = Number(raw);
  if (!/^\d+$/.test(raw) || value < 1) {
    errors.push(`${label} must be a whole number of at least 1`);
    return null;
  }
  return value;
}

function readDietaryTags(raw: string, errors: string[], warnings: string[]): DietaryTag[] {
  const tags: DietaryTag[] = [];
  for (const part of raw.split(/[,|]/)) {
    const tag = part.trim().toLowerCase().replace(/[\s-]+/g, "_");
    if (!tag) continue;
    if (!isDietaryTag(tag)) {
      errors.push(`Unknown dietary tag: ${part.trim()}`);
      continue;
    }
    if (!tags.includes(tag)) tags.push(tag);
  }

  if (!raw) warnings.push("No dietary tags");
  return tags;
}

/**
 * Groups are separated by `;`, options by `|`.
 * `Size*:Regular=0|Large=1.50` is a required single choice; `+` after the
 * group name allows several options.
 */
export function readCustomizations(raw: string, errors: string[]): CustomizationGroup[] {
  const groups: CustomizationGroup[] = [];

  for (const chunk of raw.split(";").map((part) => part.trim()).filter(Boolean)) {
    const colon = chunk.indexOf(":");
    if (colon < 1) {
      errors.push(`Customization "${chunk}" must look like Group:Option=1.50|Option=0`);
      continue;
    }

    let header = chunk.slice(0, colon).trim();
    let required = false;
    let multiple = false;
    while (header.endsWith("*") || header.endsWith("+")) {
      if (header.endsWith("*")) required = true;
      else multiple = true;
      header = header.slice(0, -1).trim();
    }
    if (!header) {
      errors.push(`Customization "${chunk}" has no group name`);
      continue;
    }

    const options: CustomizationGroup["options"] = [];
    for (const entry of chunk.slice(colon + 1).split("|").map((part) => part.trim()).filter(Boolean)) {
      const [optionName, surcharge = "0"] = entry.split("=").map((part) => part.trim());
      if (!optionName) {
        errors.push(`${header}: option "${entry}" has no name`);
        continue;
      }
      if (!DECIMAL.test(surcharge) || Number(surcharge) < 0 || Number(surcharge) > 999.99 || decimalPlaces(surcharge) > 2) {
        errors.push(`${header}: surcharge for ${optionName} must be between 0 and 999.99`);
        continue;
      }
      options.push({
        optionId: idFor("opt", optionName),
        name: optionName,
        surchargeCents: Math.round(Number(surcharge) * 100),
        isDefault: false,
        isAvailable: true,
      });
    }

    groups.push({
      groupId: idFor("grp", header),
      name: header,
      required,
      selectionMode: multiple ? "MULTIPLE" : "SINGLE",
      maxSelections: multiple ? null : 1,
      options,
    });
  }

  return groups;
}
