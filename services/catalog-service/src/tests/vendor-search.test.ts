import { VendorProfile } from "@tapau/types";
import { clamp, distanceKm, searchVendors, toGeoPoint } from "../modules/catalog/vendor-search";

function vendor(vendorId: string, overrides: Partial<VendorProfile> = {}): VendorProfile {
  return {
    vendorId,
    ownerUserId: "usr_1",
    name: "Kedai",
    description: "",
    isOpen: true,
    prepTimeMinutes: 20,
    cuisineTags: [],
    ...overrides,
  };
}

describe("vendor search", () => {
  it("falls back when numbers are missing or out of range", () => {
    expect(clamp(undefined, 1, 100, 20)).toBe(20);
    expect(clamp(Number.NaN, 1, 100, 8)).toBe(8);
    expect(clamp(250, 1, 100, 8)).toBe(100);
    expect(clamp(0.2, 1, 100, 8)).toBe(1);
    expect(clamp(4.6, 1, 100, 8)).toBe(5);
  });

  it("only accepts coordinates on the globe", () => {
    expect(toGeoPoint(3.1, 101.7)).toEqual({ latitude: 3.1, longitude: 101.7 });
    expect(toGeoPoint(3.1)).toBeNull();
    expect(toGeoPoint(91, 0)).toBeNull();
    expect(toGeoPoint(0, -181)).toBeNull();
  });

  it("measures a degree of longitude at the equator", () => {
    expect(distanceKm({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 1 })).toBeCloseTo(111.19, 1);
  });

  it("ranks open vendors and fuller matches first", () => {
    const entries = [
      { vendor: vendor("vnd_closed", { name: "Nasi Kandar", isOpen: false, cuisineTags: ["indian"] }), menu: undefined },
      { vendor: vendor("vnd_open", { name: "Nasi Kandar Line Clear", cuisineTags: ["indian"] }), menu: undefined },
      { vendor: vendor("vnd_other", { name: "Pizza Place" }), menu: undefined },
    ];

    const result = searchVendors(entries, { text: "nasi indian", origin: null, radiusKm: 8, limit: 20 });

    // 0.6 * 1 + 0.25 * 0.2 (+ 0.15 when open)
    expect(result.items.map((item) => [item.vendor.vendorId, item.rankScore])).toEqual([
      ["vnd_open", 0.8],
      ["vnd_closed", 0.65],
    ]);
    expect(result.total).toBe(2);
  });

  it("drops vendors outside the radius and applies the limit", () => {
    const entries = [
      { vendor: vendor("vnd_near", { latitude: 0, longitude: 0.01 }), menu: undefined },
      { vendor: vendor("vnd_far", { latitude: 0, longitude: 1 }), menu: undefined },
      { vendor: vendor("vnd_unknown"), menu: undefined },
    ];

    const result = searchVendors(entries, { text: "", origin: { latitude: 0, longitude: 0 }, radiusKm: 5, limit: 1 });

    expect(result.items.map((item) => item.vendor.vendorId)).toEqual(["vnd_near"]);
    expect(result.items[0].distanceKm).toBe(1.11);
  });
});
