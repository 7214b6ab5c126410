import {
  CartLine,
  CartSelection,
  CartTotals,
  CatalogItem,
  CustomizationOption,
  LineCustomization,
  VendorMenu,
} from "@tapau/types";
import { createHash } from "crypto";

export interface SelectionResult {
  customizations: LineCustomization[];
  errors: string[];
}

export interface TotalsInput {
  deliveryFeeCents: number;
  promoDiscountCents: number;
  loyaltyDiscountCents: number;
  taxRateBps: number;
}

export function formatRinggit(cents: number): string {
  return `RM${(cents / 100).toFixed(2)}`;
}

export function findMenuItem(menu: VendorMenu, itemId: string): CatalogItem | null {
  for (const section of menu.sections) {
    const item = section.items.find((candidate) => candidate.itemId === itemId);
    if (item) return item;
  }
  return null;
}

/**
 * Maps requested option ids onto the item's customization groups.
 *
 * Groups the request does not mention fall back to their default options.
 * Unknown groups, unknown or unavailable options and too many picks are
 * reported as errors. A required group left empty is not an error here;
 * checkout validation reports it.
 */
export function resolveSelections(item: CatalogItem, selections: CartSelection[]): SelectionResult {
  const errors: string[] = [];
  const requested = new Map<string, string[]>();

  for (const selection of selections) {
    const group = item.customizations.find((candidate) => candidate.groupId === selection.groupId);
    if (!group) {
      errors.push(`Unknown customization group ${selection.groupId} for ${item.name}`);
      continue;
    }
    requested.set(group.groupId, Array.from(new Set(selection.optionIds)));
  }

  const customizations = item.customizations.map((group): LineCustomization => {
    const optionIds = requested.get(group.groupId)
      ?? group.options.filter((option) => option.isDefault && option.isAvailable).map((option) => option.optionId);

    const chosen: CustomizationOption[] = [];
    for (const optionId of optionIds) {
      const option = group.options.find((candidate) => candidate.optionId === optionId);
      if (!option) {
        errors.push(`Unknown option ${optionId} in ${group.name}`);
        continue;
      }
      if (!option.isAvailable) {
        errors.push(`${option.name} is currently unavailable`);
        continue;
      }
      chosen.push(option);
    }

    const limit = group.selectionMode === "SINGLE" ? 1 : group.maxSelections;
    if (limit !== null && chosen.length > limit) {
      errors.push(`${group.name} allows at most ${limit} selection${limit === 1 ? "" : "s"}`);
    }

    return {
      groupId: group.groupId,
      groupName: group.name,
      required: group.required,
      optionIds: chosen.map((option) => option.optionId),
      optionNames: chosen.map((option) => option.name),
      surchargeCents: chosen.reduce((sum, option) => sum + option.surchargeCents, 0),
    };
  });

  return { customizations, errors };
}

export function selectionsOf(line: Pick<CartLine, "customizations">): CartSelection[] {
  return line.customizations.map((customization) => ({
    groupId: customization.groupId,
    optionIds: customization.optionIds,
  }));
}

/** Same item, options and note always produce the same line id. */
export function lineIdFor(itemId: string, customizations: LineCustomization[], note: string): string {
  const signature = [
    itemId,
    ...customizations
      .filter((customization) => customization.optionIds.length > 0)
      .map((customization) => `${customization.groupId}=${[...customization.optionIds].sort().join("+")}`)
      .sort(),
    note.trim().toLowerCase(),
  ].join("|");
  return `line_${createHash("sha1").update(signature).digest("hex").slice(0, 12)}`;
}

export function priceLine(
  unitPriceCents: number,
  customizations: LineCustomization[],
  quantity: number,
): { customizationSurchargeCents: number; lineTotalCents: number } {
  const customizationSurchargeCents = customizations.reduce((sum, customization) => sum + customization.surchargeCents, 0);
  return {
    customizationSurchargeCents,
    lineTotalCents: (unitPriceCents + customizationSurchargeCents) * quantity,
  };
}

export function buildCartLine(
  vendorId: string,
  item: CatalogItem,
  customizations: LineCustomization[],
  quantity: number,
  note: string,
): CartLine {
  const trimmedNote = note.trim();
  return {
    lineId: lineIdFor(item.itemId, customizations, trimmedNote),
    itemId: item.itemId,
    vendorId,
    name: item.name,
    unitPriceCents: item.priceCents,
    customizations,
    quantity,
    note: trimmedNote,
    minQuantity: item.minQuantity,
    maxQuantity: item.maxQuantity,
    isAvailable: item.isAvailable,
    ...priceLine(item.priceCents, customizations, quantity),
  };
}

export function withQuantity(line: CartLine, quantity: number): CartLine {
  return {
    ...line,
    quantity,
    ...priceLine(line.unitPriceCents, line.customizations, quantity),
  };
}

/** Merges lines that share an id, keeping the first one's place. */
export function foldLines(lines: CartLine[]): CartLine[] {
  const folded = new Map<string, CartLine>();
  for (const line of lines) {
    const twin = folded.get(line.lineId);
    folded.set(line.lineId, twin ? withQuantity(twin, twin.quantity + line.quantity) : line);
  }
  return Array.from(folded.values());
}

export function quantityError(line: Pick<CartLine, "name" | "minQuantity" | "maxQuantity">, quantity: number): string | null {
  if (quantity < line.minQuantity) return `Minimum quantity for ${line.name} is ${line.minQuantity}`;
  if (line.maxQuantity !== null && quantity > line.maxQuantity) {
    return `Maximum quantity for ${line.name} is ${line.maxQuantity}`;
  }
  return null;
}

export function computeTax(subtotalCents: number, taxRateBps: number): number {
  return Math.round((subtotalCents * taxRateBps) / 10000);
}

export function computeTotals(lines: CartLine[], input: TotalsInput): CartTotals {
  const subtotalCents = lines.reduce(
    (sum, line) => sum + ((line.unitPriceCents + line.customizationSurchargeCents) * line.quantity),
    0,
  );
  const taxCents = computeTax(subtotalCents, input.taxRateBps);
  const promoDiscountCents = clamp(input.promoDiscountCents, 0, subtotalCents);
  const loyaltyDiscountCents = clamp(input.loyaltyDiscountCents, 0, subtotalCents - promoDiscountCents);
  const discountCents = promoDiscountCents + loyaltyDiscountCents;

  return {
    subtotalCents,
    taxCents,
    deliveryFeeCents: input.deliveryFeeCents,
    promoDiscountCents,
    loyaltyDiscountCents,
    discountCents,
    totalCents: subtotalCents + taxCents + input.deliveryFeeCents - discountCents,
    itemCount: lines.reduce((sum, line) => sum + line.quantity, 0),
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, Math.floor(value)));
}
