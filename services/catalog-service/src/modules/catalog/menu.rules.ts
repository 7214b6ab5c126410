import {
  CatalogItem,
  CatalogItemInput,
  CatalogSection,
  CatalogSectionInput,
  CustomizationGroup,
  CustomizationGroupInput,
} from "@tapau/types";
import { createHash } from "crypto";

export function normalizeGroup(input: CustomizationGroupInput): CustomizationGroup {
  return {
    groupId: input.groupId,
    name: input.name.trim(),
    required: input.required,
    selectionMode: input.selectionMode,
    maxSelections: input.selectionMode === "SINGLE" ? 1 : input.maxSelections ?? null,
    options: input.options.map((option) => ({
      optionId: option.optionId,
      name: option.name.trim(),
      surchargeCents: option.surchargeCents,
      isDefault: option.isDefault ?? false,
      isAvailable: option.isAvailable ?? true,
    })),
  };
}

export function normalizeItem(input: CatalogItemInput): CatalogItem {
  return {
    itemId: input.itemId,
    name: input.name.trim(),
    description: input.description.trim(),
    priceCents: input.priceCents,
    isAvailable: input.isAvailable,
    minQuantity: input.minQuantity ?? 1,
    maxQuantity: input.maxQuantity ?? null,
    dietaryTags: Array.from(new Set(input.dietaryTags ?? [])),
    customizations: (input.customizations ?? []).map(normalizeGroup),
  };
}

export function normalizeSections(input: CatalogSectionInput[]): CatalogSection[] {
  return input.map((section) => ({
    sectionId: section.sectionId,
    title: section.title.trim(),
    items: section.items.map(normalizeItem),
  }));
}

/** Problems with one customization group, prefixed with the owning item's name. */
export function groupErrors(itemName: string, group: CustomizationGroup): string[] {
  const label = `${itemName}: ${group.name}`;
  const errors: string[] = [];

  if (group.options.length === 0) {
    return [`${label} has no options`];
  }

  const seenIds = new Set<string>();
  const seenNames = new Set<string>();
  for (const option of group.options) {
    const nameKey = option.name.toLowerCase();
    if (seenNames.has(nameKey)) errors.push(`${label} repeats option ${option.name}`);
    else if (seenIds.has(option.optionId)) errors.push(`${label} repeats option id ${option.optionId}`);
    seenIds.add(option.optionId);
    seenNames.add(nameKey);
  }

  if (group.maxSelections !== null && group.maxSelections < 1) {
    errors.push(`${label} must allow at least one selection`);
  }

  const defaults = group.options.filter((option) => option.isDefault).length;
  if (group.maxSelections !== null && defaults > group.maxSelections) {
    errors.push(`${label} has more defaults than selections allowed`);
  }

  if (group.required && !group.options.some((option) => option.isAvailable)) {
    errors.push(`${label} is required but has no available option`);
  }

  return errors;
}

export function itemErrors(item: CatalogItem): string[] {
  const errors: string[] = [];
  if (item.maxQuantity !== null && item.maxQuantity < item.minQuantity) {
    errors.push(`${item.name}: maximum quantity is below the minimum`);
  }

  const groupIds = new Set<string>();
  for (const group of item.customizations) {
    if (groupIds.has(group.groupId)) errors.push(`${item.name}: repeats group ${group.groupId}`);
    groupIds.add(group.groupId);
    errors.push(...groupErrors(item.name, group));
  }
  return errors;
}

export function menuErrors(sections: CatalogSection[]): string[] {
  const errors: string[] = [];
  const sectionIds = new Set<string>();
  const itemIds = new Set<string>();

  for (const section of sections) {
    if (sectionIds.has(section.sectionId)) errors.push(`Duplicate section id ${section.sectionId}`);
    sectionIds.add(section.sectionId);

    for (const item of section.items) {
      if (itemIds.has(item.itemId)) errors.push(`Duplicate item id ${item.itemId}`);
      itemIds.add(item.itemId);
      errors.push(...itemErrors(item));
    }
  }
  return errors;
}

/**
 * Stable id for a display name, e.g. `opt_extra_egg`. A name with characters
 * outside printable ASCII also carries a short hash of the name, so "小" and
 * "大" get different ids.
 */
export function idFor(prefix: string, name: string): string {
  const slug = slugify(name);
  if (slug && /^[\x20-\x7e]*$/.test(name)) return `${prefix}_${slug}`;

  const hash = createHash("sha1").update(name.trim().toLowerCase()).digest("hex").slice(0, 8);
  return slug ? `${prefix}_${slug}_${hash}` : `${prefix}_${hash}`;
}

function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}
