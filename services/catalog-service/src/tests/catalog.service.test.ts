import { BadRequestException } from "@nestjs/common";
import { CatalogItem, CustomizationGroup } from "@tapau/types";
import { CatalogService } from "../modules/catalog/catalog.service";
import { groupErrors, idFor, menuErrors } from "../modules/catalog/menu.rules";

function group(overrides: Partial<CustomizationGroup>): CustomizationGroup {
  return {
    groupId: "grp_size",
    name: "Size",
    required: true,
    selectionMode: "SINGLE",
    maxSelections: 1,
    options: [
      { optionId: "opt_regular", name: "Regular", surchargeCents: 0, isDefault: true, isAvailable: true },
      { optionId: "opt_large", name: "Large", surchargeCents: 200, isDefault: false, isAvailable: true },
    ],
    ...overrides,
  };
}

function item(itemId: string): CatalogItem {
  return {
    itemId,
    name: "Mee Goreng",
    description: "",
    priceCents: 900,
    isAvailable: true,
    minQuantity: 1,
    maxQuantity: null,
    dietaryTags: [],
    customizations: [],
  };
}

describe("menu rules", () => {
  it("derives ids from names and hashes names outside ASCII", () => {
    expect(idFor("opt", "Extra Egg")).toBe("opt_extra_egg");
    expect(idFor("grp", "Add-ons")).toBe("grp_add_ons");
    expect(idFor("opt", "Ais 少")).toMatch(/^opt_ais_[0-9a-f]{8}$/);
    expect(idFor("opt", "Ais 少")).not.toBe(idFor("opt", "Ais 多"));
    expect(idFor("sec", "飲料")).toMatch(/^sec_[0-9a-f]{8}$/);
  });

  it("accepts a well-formed group", () => {
    expect(groupErrors("Nasi Lemak", group({}))).toEqual([]);
  });

  it("reports empty, unselectable and over-defaulted groups", () => {
    expect(groupErrors("Nasi Lemak", group({ options: [] }))).toEqual(["Nasi Lemak: Size has no options"]);

    const allDefault = group({
      options: group({}).options.map((option) => ({ ...option, isDefault: true })),
    });
    expect(groupErrors("Nasi Lemak", allDefault)).toEqual(["Nasi Lemak: Size has more defaults than selections allowed"]);

    const soldOut = group({
      options: group({}).options.map((option) => ({ ...option, isDefault: false, isAvailable: false })),
    });
    expect(groupErrors("Nasi Lemak", soldOut)).toEqual(["Nasi Lemak: Size is required but has no available option"]);

    expect(groupErrors("Nasi Lemak", group({ selectionMode: "MULTIPLE", maxSelections: 0, required: false, options: [
      { optionId: "opt_egg", name: "Egg", surchargeCents: 150, isDefault: false, isAvailable: true },
    ] }))).toEqual(["Nasi Lemak: Size must allow at least one selection"]);
  });

  it("reports duplicate ids across the menu", () => {
    const sections = [
      { sectionId: "sec_a", title: "Noodles", items: [item("itm_1")] },
      { sectionId: "sec_a", title: "More noodles", items: [item("itm_1")] },
    ];

    expect(menuErrors(sections)).toEqual(["Duplicate section id sec_a", "Duplicate item id itm_1"]);
  });
});

describe("CatalogService", () => {
  let catalog: CatalogService;

  beforeEach(() => {
    catalog = new CatalogService();
  });

  async function onboard(name: string, cuisineTags: string[], latitude?: number, longitude?: number): Promise<string> {
    const { vendor } = await catalog.onboardVendor({
      ownerUserId: "usr_1",
      name,
      description: "Family kitchen",
      cuisineTags,
      latitude,
      longitude,
    });
    return vendor.vendorId;
  }

  it("fills menu defaults on upsert", async () => {
    const vendorId = await onboard("Warung Pak Ali", ["malay"]);
    const menu = await catalog.upsertVendorMenu({
      vendorId,
      sections: [{
        sectionId: "sec_mains",
        title: " Mains ",
        items: [{
          itemId: "itm_nasi",
          name: "Nasi Lemak",
          description: "Coconut rice",
          priceCents: 1000,
          isAvailable: true,
          customizations: [{
            groupId: "grp_size",
            name: "Size",
            required: true,
            selectionMode: "SINGLE",
            maxSelections: 3,
            options: [{ optionId: "opt_regular", name: "Regular", surchargeCents: 0 }],
          }],
        }],
      }],
    });

    expect(menu.sections[0].title).toBe("Mains");
    expect(menu.sections[0].items[0]).toEqual({
      itemId: "itm_nasi",
      name: "Nasi Lemak",
      description: "Coconut rice",
      priceCents: 1000,
      isAvailable: true,
      minQuantity: 1,
      maxQuantity: null,
      dietaryTags: [],
      customizations: [{
        groupId: "grp_size",
        name: "Size",
        required: true,
        selectionMode: "SINGLE",
        maxSelections: 1,
        options: [{ optionId: "opt_regular", name: "Regular", surchargeCents: 0, isDefault: false, isAvailable: true }],
      }],
    });
  });

  it("rejects a menu with invalid customization groups", async () => {
    const vendorId = await onboard("Warung Pak Ali", ["malay"]);
    const error = await catalog.upsertVendorMenu({
      vendorId,
      sections: [{
        sectionId: "sec_mains",
        title: "Mains",
        items: [{
          itemId: "itm_nasi",
          name: "Nasi Lemak",
          description: "",
          priceCents: 1000,
          isAvailable: true,
          customizations: [{ groupId: "grp_size", name: "Size", required: true, selectionMode: "SINGLE", options: [] }],
        }],
      }],
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(BadRequestException);
    if (error instanceof BadRequestException) {
      expect(error.getResponse()).toEqual({ message: "Invalid menu", errors: ["Nasi Lemak: Size has no options"] });
    }
  });

  it("looks up vendors by id", async () => {
    const vendorId = await onboard("Warung Pak Ali", ["malay"]);

    expect(catalog.getVendor(vendorId).name).toBe("Warung Pak Ali");
    expect(() => catalog.getVendor("vnd_missing")).toThrow("Vendor not found");
    await expect(catalog.upsertVendorMenu({ vendorId: "vnd_missing", sections: [] })).rejects.toThrow("Vendor not found");
  });

  it("matches search terms against menu items and dietary tags", async () => {
    const ali = await onboard("Warung Pak Ali", ["malay"]);
    const leaf = await onboard("Green Leaf", ["cafe"]);

    await catalog.upsertVendorMenu({
      vendorId: ali,
      sections: [{
        sectionId: "sec_mains",
        title: "Mains",
        items: [{ itemId: "itm_rendang", name: "Beef Rendang", description: "", priceCents: 1500, isAvailable: true }],
      }],
    });
    await catalog.upsertVendorMenu({
      vendorId: leaf,
      sections: [{
        sectionId: "sec_bowls",
        title: "Bowls",
        items: [{
          itemId: "itm_bowl",
          name: "Tofu Bowl",
          description: "",
          priceCents: 1400,
          isAvailable: true,
          dietaryTags: ["vegan"],
        }],
      }],
    });

    const rendang = await catalog.searchVendors({ q: "rendang" });
    expect(rendang.items.map((hit) => [hit.vendor.vendorId, hit.matchedTerms])).toEqual([[ali, ["rendang"]]]);

    const vegan = await catalog.searchVendors({ q: "Vegan" });
    expect(vegan.items.map((hit) => hit.vendor.vendorId)).toEqual([leaf]);

    expect((await catalog.searchVendors({ q: "laksa" })).total).toBe(0);
  });

  it("limits nearby search to the radius", async () => {
    const near = await onboard("Kedai Kopi", ["kopitiam"], 3.139, 101.6869);
    await onboard("Far Away Cafe", ["cafe"], 5.4141, 100.3288);

    const nearby = await catalog.nearbyVendors(3.14, 101.69, 5, 10);

    expect(nearby.items.map((hit) => hit.vendor.vendorId)).toEqual([near]);
    expect(nearby.items[0].distanceKm).toBeLessThan(1);
  });

  it("sees menu changes in searches made before them", async () => {
    const vendorId = await onboard("Warung Pak Ali", ["malay"]);
    expect((await catalog.searchVendors({ q: "laksa" })).total).toBe(0);

    await catalog.upsertVendorMenu({
      vendorId,
      sections: [{
        sectionId: "sec_noodles",
        title: "Noodles",
        items: [{ itemId: "itm_laksa", name: "Asam Laksa", description: "", priceCents: 1200, isAvailable: true }],
      }],
    });

    expect((await catalog.searchVendors({ q: "laksa" })).total).toBe(1);
  });
});
