import { DeliveryFeeService } from "../modules/delivery-fee/delivery-fee.service";
import { computeDeliveryFee, haversineKm, toCoordinates } from "../modules/delivery-fee/delivery-fee.rules";
import { KOPI_VENDOR } from "./support/catalog.fixtures";

describe("computeDeliveryFee", () => {
  it("charges nothing for pickup", () => {
    expect(computeDeliveryFee("CUSTOMER_PICKUP", 5000, 8)).toBe(0);
    expect(computeDeliveryFee("SALES_AGENT_PICKUP", 5000, 8)).toBe(0);
  });

  it("uses the own-fleet table for own fleet and scheduled delivery", () => {
    expect(computeDeliveryFee("OWN_FLEET", 5000, 5)).toBe(2000);
    expect(computeDeliveryFee("SCHEDULED", 12000, 3)).toBe(1100);
    expect(computeDeliveryFee("OWN_FLEET", 5000, 2.345)).toBe(1469);
  });

  it("uses the third-party table and caps the fee", () => {
    expect(computeDeliveryFee("THIRD_PARTY", 5000, 2)).toBe(2600);
    expect(computeDeliveryFee("THIRD_PARTY", 5000, 12)).toBe(5000);
  });

  it("raises small fees to the minimum and keeps free delivery free", () => {
    expect(computeDeliveryFee("OWN_FLEET", 15000, 0)).toBe(500);
    expect(computeDeliveryFee("OWN_FLEET", 25000, 1)).toBe(500);
    expect(computeDeliveryFee("OWN_FLEET", 25000, 0)).toBe(0);
  });
});

describe("haversineKm", () => {
  it("measures great-circle distance", () => {
    expect(haversineKm({ latitude: 3.1, longitude: 101.6 }, { latitude: 3.1, longitude: 101.6 })).toBe(0);
    expect(haversineKm({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 1 })).toBeCloseTo(111.19, 1);
  });

  it("needs both coordinates", () => {
    expect(toCoordinates({ latitude: 3.1 })).toBeNull();
    expect(toCoordinates(null)).toBeNull();
  });
});

describe("DeliveryFeeService", () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it("assumes the default distance when the address has no coordinates", async () => {
    const quote = await new DeliveryFeeService().quote({
      deliveryMethod: "OWN_FLEET",
      subtotalCents: 5000,
      vendor: KOPI_VENDOR,
      address: { line1: "1 Jalan Ampang", city: "Kuala Lumpur", postcode: "50450" },
    });

    expect(quote).toMatchObject({ deliveryMethod: "OWN_FLEET", feeCents: 2000, distanceKm: 5, estimatedDistance: true });
  });

  it("quotes zero distance for pickup", async () => {
    const quote = await new DeliveryFeeService().quote({
      deliveryMethod: "CUSTOMER_PICKUP",
      subtotalCents: 5000,
      vendor: KOPI_VENDOR,
      address: null,
    });

    expect(quote).toMatchObject({ feeCents: 0, distanceKm: 0, estimatedDistance: false });
  });

  it("serves repeat quotes from cache until the ttl passes", async () => {
    jest.useFakeTimers({ now: new Date("2026-03-02T02:00:00.000Z"), doNotFake: ["nextTick", "queueMicrotask"] });
    const service = new DeliveryFeeService();
    const input = {
      deliveryMethod: "THIRD_PARTY" as const,
      subtotalCents: 4000,
      vendor: KOPI_VENDOR,
      address: { line1: "Pavilion", city: "Kuala Lumpur", postcode: "55100", latitude: 3.139, longitude: 101.6869 },
    };

    const first = await service.quote(input);
    expect(first).toMatchObject({ feeCents: 2000, distanceKm: 0, estimatedDistance: false });

    jest.setSystemTime(new Date("2026-03-02T02:04:00.000Z"));
    expect((await service.quote(input)).quotedAtIso).toBe("2026-03-02T02:00:00.000Z");

    jest.setSystemTime(new Date("2026-03-02T02:06:00.000Z"));
    expect((await service.quote(input)).quotedAtIso).toBe("2026-03-02T02:06:00.000Z");
  });
});
