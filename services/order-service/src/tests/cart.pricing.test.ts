import {
  buildCartLine,
  computeTax,
  computeTotals,
  findMenuItem,
  formatRinggit,
  quantityError,
  resolveSelections,
  withQuantity,
} from "../modules/cart/cart.pricing";
import { kopiMenu, nasiLemak, rotiCanai } from "./support/catalog.fixtures";

const NO_EXTRAS = { deliveryFeeCents: 0, promoDiscountCents: 0, loyaltyDiscountCents: 0, taxRateBps: 600 };

describe("resolveSelections", () => {
  it("falls back to default options for groups the request leaves out", () => {
    const { customizations, errors } = resolveSelections(nasiLemak(), []);

    expect(errors).toEqual([]);
    expect(customizations).toEqual([
      { groupId: "grp_size", groupName: "Size", required: true, optionIds: ["opt_regular"], optionNames: ["Regular"], surchargeCents: 0 },
      { groupId: "grp_addons", groupName: "Add-ons", required: false, optionIds: [], optionNames: [], surchargeCents: 0 },
    ]);
  });

  it("keeps an explicitly emptied group empty", () => {
    const { customizations, errors } = resolveSelections(nasiLemak(), [{ groupId: "grp_size", optionIds: [] }]);

    expect(errors).toEqual([]);
    expect(customizations[0].optionIds).toEqual([]);
  });

  it("sums surcharges of the chosen options", () => {
    const { customizations } = resolveSelections(nasiLemak(), [
      { groupId: "grp_size", optionIds: ["opt_large"] },
      { groupId: "grp_addons", optionIds: ["opt_egg", "opt_sambal"] },
    ]);

    expect(customizations.map((customization) => customization.surchargeCents)).toEqual([150, 250]);
  });

  it("reports unknown groups, unavailable options and too many picks", () => {
    expect(resolveSelections(nasiLemak(), [{ groupId: "grp_sauce", optionIds: ["opt_x"] }]).errors)
      .toEqual(["Unknown customization group grp_sauce for Nasi Lemak Ayam"]);
    expect(resolveSelections(nasiLemak(), [{ groupId: "grp_addons", optionIds: ["opt_rendang"] }]).errors)
      .toEqual(["Rendang is currently unavailable"]);
    expect(resolveSelections(nasiLemak(), [{ groupId: "grp_size", optionIds: ["opt_regular", "opt_large"] }]).errors)
      .toEqual(["Size allows at most 1 selection"]);
    expect(resolveSelections(nasiLemak(), [{ groupId: "grp_addons", optionIds: ["opt_egg", "opt_sambal", "opt_ikan"] }]).errors)
      .toEqual(["Add-ons allows at most 2 selections"]);
  });
});

describe("buildCartLine", () => {
  it("prices unit plus surcharge times quantity", () => {
    const item = nasiLemak();
    const { customizations } = resolveSelections(item, [{ groupId: "grp_size", optionIds: ["opt_large"] }]);
    const line = buildCartLine("vnd_kopi", item, customizations, 2, "");

    expect(line.customizationSurchargeCents).toBe(150);
    expect(line.lineTotalCents).toBe(2300);
    expect(withQuantity(line, 3).lineTotalCents).toBe(3450);
  });

  it("gives the same line id regardless of option order and note case", () => {
    const item = nasiLemak();
    const a = resolveSelections(item, [{ groupId: "grp_addons", optionIds: ["opt_sambal", "opt_egg"] }]).customizations;
    const b = resolveSelections(item, [{ groupId: "grp_addons", optionIds: ["opt_egg", "opt_sambal"] }]).customizations;

    const first = buildCartLine("vnd_kopi", item, a, 1, "  No Cucumber ");
    const second = buildCartLine("vnd_kopi", item, b, 1, "no cucumber");
    const third = buildCartLine("vnd_kopi", item, b, 1, "extra crispy");

    expect(first.note).toBe("No Cucumber");
    expect(first.lineId).toBe(second.lineId);
    expect(first.lineId).not.toBe(third.lineId);
    expect(first.lineId).toMatch(/^line_[0-9a-f]{12}$/);
  });
});

describe("computeTotals", () => {
  it("adds tax and delivery to the subtotal", () => {
    const item = nasiLemak();
    const { customizations } = resolveSelections(item, [{ groupId: "grp_size", optionIds: ["opt_large"] }]);
    const line = buildCartLine("vnd_kopi", item, customizations, 2, "");

    expect(computeTotals([line], { ...NO_EXTRAS, deliveryFeeCents: 500 })).toEqual({
      subtotalCents: 2300,
      taxCents: 138,
      deliveryFeeCents: 500,
      promoDiscountCents: 0,
      loyaltyDiscountCents: 0,
      discountCents: 0,
      totalCents: 2938,
      itemCount: 2,
    });
  });

  it("rounds tax half up to the sen", () => {
    expect(computeTax(1025, 600)).toBe(62);
    expect(computeTax(1024, 600)).toBe(61);
  });

  it("never discounts more than the subtotal", () => {
    const line = buildCartLine("vnd_kopi", nasiLemak(), [], 2, "");

    const promoHeavy = computeTotals([line], { ...NO_EXTRAS, deliveryFeeCents: 500, promoDiscountCents: 3000, loyaltyDiscountCents: 500 });
    expect(promoHeavy.promoDiscountCents).toBe(2000);
    expect(promoHeavy.loyaltyDiscountCents).toBe(0);
    expect(promoHeavy.totalCents).toBe(2000 + 120 + 500 - 2000);

    const loyaltyHeavy = computeTotals([line], { ...NO_EXTRAS, promoDiscountCents: 300, loyaltyDiscountCents: 5000 });
    expect(loyaltyHeavy.loyaltyDiscountCents).toBe(1700);
    expect(loyaltyHeavy.discountCents).toBe(2000);
  });

  it("is all zeros for an empty cart", () => {
    expect(computeTotals([], NO_EXTRAS).totalCents).toBe(0);
  });
});

describe("helpers", () => {
  it("checks quantity bounds", () => {
    const roti = buildCartLine("vnd_roti", rotiCanai(), [], 2, "");
    expect(quantityError(roti, 1)).toBe("Minimum quantity for Roti Canai is 2");
    expect(quantityError(roti, 7)).toBe("Maximum quantity for Roti Canai is 6");
    expect(quantityError(roti, 6)).toBeNull();
  });

  it("finds items across sections and formats ringgit", () => {
    expect(findMenuItem(kopiMenu(), "itm_teh")?.name).toBe("Teh Tarik");
    expect(findMenuItem(kopiMenu(), "itm_missing")).toBeNull();
    expect(formatRinggit(505)).toBe("RM5.05");
  });
});
