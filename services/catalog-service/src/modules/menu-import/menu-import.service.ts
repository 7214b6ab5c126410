import { UnifiedPersistence } from "@tapau/persistence";
import {
  CatalogSection,
  MenuImportCommitRequest,
  MenuImportCommitResult,
  MenuImportCounts,
  MenuImportFilter,
  MenuImportPreview,
  MenuImportPreviewRequest,
  MenuImportRow,
} from "@tapau/types";
import { BadRequestException, Injectable, Logger, NotFoundException } from "@nestjs/common";
import { randomUUID } from "crypto";
import { getCatalogEnv } from "../../config/env";
import { CatalogService } from "../catalog/catalog.service";
import { idFor } from "../catalog/menu.rules";
import { parseImportFile } from "./menu-import.parser";

export const MENU_IMPORT_FILTERS: readonly MenuImportFilter[] = ["ALL", "VALID", "WARNINGS", "ERRORS"];

export function isMenuImportFilter(value: unknown): value is MenuImportFilter {
  return typeof value === "string" && MENU_IMPORT_FILTERS.some((filter) => filter === value);
}

export function countRows(rows: MenuImportRow[]): MenuImportCounts {
  return {
    total: rows.length,
    valid: rows.filter((row) => row.status === "VALID").length,
    warnings: rows.filter((row) => row.status === "WARNING").length,
    errors: rows.filter((row) => row.status === "ERROR").length,
  };
}

/** VALID keeps every importable row, warnings included. */
export function filterRows(rows: MenuImportRow[], filter: MenuImportFilter): MenuImportRow[] {
  switch (filter) {
    case "ALL":
      return rows;
    case "VALID":
      return rows.filter((row) => row.status !== "ERROR");
    case "WARNINGS":
      return rows.filter((row) => row.status === "WARNING");
    case "ERRORS":
      return rows.filter((row) => row.status === "ERROR");
  }
}

@Injectable()
export class MenuImportService {
  private readonly logger = new Logger(MenuImportService.name);
  private readonly env = getCatalogEnv();
  private readonly persistence = new UnifiedPersistence({
    namespace: "catalog-service:imports",
    postgresUrl: this.env.databaseUrl,
    redisUrl: this.env.redisUrl,
    log: (message: string) => this.logger.log(message),
  });

  constructor(private readonly catalogService: CatalogService) {}

  async preview(vendorId: string, input: MenuImportPreviewRequest): Promise<MenuImportPreview> {
    this.catalogService.getVendor(vendorId);
    if (!input.fileName.toLowerCase().endsWith(".csv")) {
      throw new BadRequestException("Only .csv files can be imported");
    }

    const parsed = parseImportFile(input.content, this.env.importMaxRows);
    if (!parsed.ok) throw new BadRequestException(parsed.error);

    const counts = countRows(parsed.rows);
    const now = Date.now();
    const preview: MenuImportPreview = {
      previewId: `imp_${randomUUID().slice(0, 12)}`,
      vendorId,
      fileName: input.fileName,
      rows: parsed.rows,
      counts,
      canProceed: counts.valid + counts.warnings > 0,
      createdAtIso: new Date(now).toISOString(),
      expiresAtIso: new Date(now + this.env.importPreviewTtlSeconds * 1000).toISOString(),
    };

    await this.persistence.setCache(
      this.previewKey(vendorId, preview.previewId),
      JSON.stringify(preview),
      this.env.importPreviewTtlSeconds,
    );
    this.logger.log(
      `Import preview ${preview.previewId} for ${vendorId}: ${counts.valid} valid, ${counts.warnings} warnings, ${counts.errors} errors`,
    );
    return preview;
  }

  async getPreview(vendorId: string, previewId: string, filter: MenuImportFilter = "ALL"): Promise<MenuImportPreview> {
    const preview = await this.loadPreview(vendorId, previewId);
    return { ...preview, rows: filterRows(preview.rows, filter) };
  }

  async commit(vendorId: string, input: MenuImportCommitRequest): Promise<MenuImportCommitResult> {
    const preview = await this.loadPreview(vendorId, input.previewId);
    const includeWarnings = input.includeWarnings ?? true;
    const accepted = preview.rows.filter((row) =>
      row.status === "VALID" || (includeWarnings && row.status === "WARNING"),
    );
    if (accepted.length === 0) throw new BadRequestException("No rows to import");

    const menu = await this.catalogService.getVendorMenu(vendorId);
    const sections: CatalogSection[] = menu.sections.map((section) => ({ ...section, items: [...section.items] }));
    let replacedCount = 0;

    for (const row of accepted) {
      const imported = row.item;
      if (!imported) continue;
      const section = this.sectionFor(sections, row.sectionTitle);
      const existing = section.items.findIndex((item) => item.name.toLowerCase() === imported.name.toLowerCase());
      if (existing >= 0) {
        section.items[existing] = { ...imported, itemId: section.items[existing].itemId };
        replacedCount += 1;
      } else {
        section.items.push({ ...imported, itemId: `itm_${randomUUID().slice(0, 10)}` });
      }
    }

    const saved = await this.catalogService.replaceMenu(vendorId, sections);
    await this.persistence.deleteCache(this.previewKey(vendorId, preview.previewId));

    const acceptedRows = new Set(accepted.map((row) => row.rowNumber));
    const result: MenuImportCommitResult = {
      vendorId,
      previewId: preview.previewId,
      importedCount: accepted.length,
      replacedCount,
      skippedRows: preview.rows.filter((row) => !acceptedRows.has(row.rowNumber)).map((row) => row.rowNumber),
      menu: saved,
    };
    this.logger.log(`Import ${preview.previewId} committed for ${vendorId}: ${result.importedCount} rows`);
    return result;
  }

  private async loadPreview(vendorId: string, previewId: string): Promise<MenuImportPreview> {
    const cached = await this.persistence.getCache(this.previewKey(vendorId, previewId));
    if (!cached) throw new NotFoundException("Import preview not found or expired");
    return JSON.parse(cached) as MenuImportPreview;
  }

  // matched by title, ignoring case; new sections go to the end of the menu
  private sectionFor(sections: CatalogSection[], title: string): CatalogSection {
    const found = sections.find((section) => section.title.toLowerCase() === title.toLowerCase());
    if (found) return found;

    const base = idFor("sec", title);
    let sectionId = base;
    for (let suffix = 2; sections.some((section) => section.sectionId === sectionId); suffix += 1) {
      sectionId = `${base}_${suffix}`;
    }

    const section: CatalogSection = { sectionId, title, items: [] };
    sections.push(section);
    return section;
  }

  private previewKey(vendorId: string, previewId: string): string {
    return `previews:${vendorId}:${previewId}`;
  }
}
