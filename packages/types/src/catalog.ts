export type DietaryTag =
  | "halal"
  | "vegetarian"
  | "vegan"
  | "gluten_free"
  | "dairy_free"
  | "nut_free"
  | "spicy";

export const DIETARY_TAGS: readonly DietaryTag[] = [
  "halal",
  "vegetarian",
  "vegan",
  "gluten_free",
  "dairy_free",
  "nut_free",
  "spicy",
];

export type SelectionMode = "SINGLE" | "MULTIPLE";

export interface VendorProfile {
  vendorId: string;
  ownerUserId: string;
  name: string;
  description: string;
  isOpen: boolean;
  prepTimeMinutes: number;
  cuisineTags: string[];
  latitude?: number;
  longitude?: number;
}

export interface VendorOnboardingRequest {
  ownerUserId: string;
  name: string;
  description: string;
  cuisineTags: string[];
  latitude?: number;
  longitude?: number;
}

export interface VendorOnboardingResponse {
  vendor: VendorProfile;
}

export interface CustomizationOption {
  optionId: string;
  name: string;
  surchargeCents: number;
  isDefault: boolean;
  isAvailable: boolean;
}

/** A per-product option group such as size or add-ons. */
export interface CustomizationGroup {
  groupId: string;
  name: string;
  required: boolean;
  selectionMode: SelectionMode;
  /** Upper bound for MULTIPLE groups; null means every option may be picked. */
  maxSelections: number | null;
  options: CustomizationOption[];
}

export interface CatalogItem {
  itemId: string;
  name: string;
  description: string;
  priceCents: number;
  isAvailable: boolean;
  minQuantity: number;
  maxQuantity: number | null;
  dietaryTags: DietaryTag[];
  customizations: CustomizationGroup[];
}

export interface CatalogSection {
  sectionId: string;
  title: string;
  items: CatalogItem[];
}

export interface VendorMenu {
  vendorId: string;
  sections: CatalogSection[];
  updatedAtIso: string;
}

export interface CustomizationOptionInput {
  optionId: string;
  name: string;
  surchargeCents: number;
  isDefault?: boolean;
  isAvailable?: boolean;
}

export interface CustomizationGroupInput {
  groupId: string;
  name: string;
  required: boolean;
  selectionMode: SelectionMode;
  maxSelections?: number | null;
  options: CustomizationOptionInput[];
}

export interface CatalogItemInput {
  itemId: string;
  name: string;
  description: string;
  priceCents: number;
  isAvailable: boolean;
  minQuantity?: number;
  maxQuantity?: number | null;
  dietaryTags?: DietaryTag[];
  customizations?: CustomizationGroupInput[];
}

export interface CatalogSectionInput {
  sectionId: string;
  title: string;
  items: CatalogItemInput[];
}

export interface UpsertVendorMenuRequest {
  vendorId: string;
  sections: CatalogSectionInput[];
}

export interface CatalogVendorSearchItem {
  vendor: VendorProfile;
  distanceKm: number | null;
  rankScore: number;
  matchedTerms: string[];
}

export interface CatalogVendorSearchResponse {
  query: string;
  origin?: { latitude: number; longitude: number };
  radiusKm: number;
  limit: number;
  total: number;
  items: CatalogVendorSearchItem[];
}

export type MenuImportRowStatus = "VALID" | "WARNING" | "ERROR";

export type MenuImportFilter = "ALL" | "VALID" | "WARNINGS" | "ERRORS";

/** Item ids are assigned when the row is committed. */
export type MenuImportItem = Omit<CatalogItem, "itemId">;

export interface MenuImportRow {
  /** 1-based record number in the uploaded file; the header is record 1. */
  rowNumber: number;
  status: MenuImportRowStatus;
  sectionTitle: string;
  item: MenuImportItem | null;
  errors: string[];
  warnings: string[];
}

export interface MenuImportCounts {
  total: number;
  valid: number;
  warnings: number;
  errors: number;
}

export interface MenuImportPreview {
  previewId: string;
  vendorId: string;
  fileName: string;
  rows: MenuImportRow[];
  counts: MenuImportCounts;
  canProceed: boolean;
  createdAtIso: string;
  expiresAtIso: string;
}

export interface MenuImportPreviewRequest {
  fileName: string;
  content: string;
}

export interface MenuImportCommitRequest {
  previewId: string;
  includeWarnings?: boolean;
}

export interface MenuImportCommitResult {
  vendorId: string;
  previewId: string;
  importedCount: number;
  replacedCount: number;
  skippedRows: number[];
  menu: VendorMenu;
}
