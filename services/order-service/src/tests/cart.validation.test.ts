import { CartLine, DeliveryAddress } from "@tapau/types";
import { buildCartLine, resolveSelections } from "../modules/cart/cart.pricing";
import { CheckoutRules, CheckoutSubject, checkSchedule, evaluateCheckout } from "../modules/cart/cart.validation";
import { nasiLemak, tehTarik } from "./support/catalog.fixtures";

const RULES: CheckoutRules = {
  minSubtotalCents: 500,
  scheduleLeadMinutes: 120,
  businessOpenHour: 8,
  businessCloseHour: 22,
  timezoneOffsetMinutes: 480,
};

// 10:00 local time
const NOW = new Date("2026-03-02T02:00:00.000Z");

const ADDRESS: DeliveryAddress = { line1: "12 Jalan Telawi", city: "Kuala Lumpur", postcode: "59100" };

function nasiLine(quantity = 1): CartLine {
  const item = nasiLemak();
  return buildCartLine("vnd_kopi", item, resolveSelections(item, []).customizations, quantity, "");
}

function subject(overrides: Partial<CheckoutSubject>): CheckoutSubject {
  const lines = overrides.lines ?? [nasiLine()];
  return {
    lines,
    deliveryMethod: "OWN_FLEET",
    address: ADDRESS,
    scheduledForIso: null,
    subtotalCents: lines.reduce((sum, line) => sum + line.lineTotalCents, 0),
    ...overrides,
  };
}

describe("evaluateCheckout", () => {
  it("allows a complete delivery cart", () => {
    expect(evaluateCheckout(subject({}), RULES, NOW)).toEqual({ allowed: true, issues: [] });
  });

  it("reports an empty cart and a missing address without a minimum-order issue", () => {
    const result = evaluateCheckout(subject({ lines: [], address: null }), RULES, NOW);

    expect(result.allowed).toBe(false);
    expect(result.issues.map((issue) => issue.code)).toEqual(["CART_EMPTY", "ADDRESS_REQUIRED"]);
  });

  it("does not need an address for pickup", () => {
    for (const deliveryMethod of ["CUSTOMER_PICKUP", "SALES_AGENT_PICKUP"] as const) {
      expect(evaluateCheckout(subject({ deliveryMethod, address: null }), RULES, NOW).allowed).toBe(true);
    }
  });

  it("needs a time for scheduled delivery", () => {
    const result = evaluateCheckout(subject({ deliveryMethod: "SCHEDULED" }), RULES, NOW);
    expect(result.issues).toEqual([{ code: "SCHEDULE_REQUIRED", message: "Select a delivery time" }]);
  });

  it("rejects a scheduled time outside the lead time or business hours", () => {
    const tooSoon = evaluateCheckout(
      subject({ deliveryMethod: "SCHEDULED", scheduledForIso: "2026-03-02T03:00:00.000Z" }),
      RULES,
      NOW,
    );
    expect(tooSoon.issues).toEqual([{ code: "SCHEDULE_INVALID", message: "Schedule at least 120 minutes ahead" }]);

    const late = evaluateCheckout(
      subject({ deliveryMethod: "SCHEDULED", scheduledForIso: "2026-03-02T14:30:00.000Z" }),
      RULES,
      NOW,
    );
    expect(late.issues).toEqual([{ code: "SCHEDULE_INVALID", message: "Scheduled deliveries run from 08:00 to 22:00" }]);
  });

  it("flags each line missing a required choice and each unavailable line", () => {
    const teh = buildCartLine("vnd_kopi", tehTarik(), resolveSelections(tehTarik(), []).customizations, 2, "");
    const gone = { ...nasiLine(), isAvailable: false };
    const result = evaluateCheckout(subject({ lines: [teh, gone] }), RULES, NOW);

    expect(result.issues).toEqual([
      { code: "CUSTOMIZATION_REQUIRED", message: "Teh Tarik: choose Temperature", lineId: teh.lineId },
      { code: "ITEM_UNAVAILABLE", message: "Nasi Lemak Ayam is no longer available", lineId: gone.lineId },
    ]);
  });

  it("enforces the minimum order", () => {
    const item = tehTarik();
    const teh = buildCartLine("vnd_kopi", item, resolveSelections(item, [{ groupId: "grp_temp", optionIds: ["opt_hot"] }]).customizations, 1, "");
    const result = evaluateCheckout(subject({ lines: [teh] }), RULES, NOW);

    expect(result.issues).toEqual([{ code: "BELOW_MINIMUM_ORDER", message: "Minimum order is RM5.00" }]);
  });
});

describe("checkSchedule", () => {
  it("accepts the last minute before closing and rejects closing time itself", () => {
    expect(checkSchedule("2026-03-02T13:59:00.000Z", RULES, NOW)).toBeNull();
    expect(checkSchedule("2026-03-02T14:00:00.000Z", RULES, NOW)).toBe("Scheduled deliveries run from 08:00 to 22:00");
  });

  it("accepts opening time the next morning", () => {
    // 08:00 local on 3 March
    expect(checkSchedule("2026-03-03T00:00:00.000Z", RULES, NOW)).toBeNull();
    expect(checkSchedule("2026-03-02T23:59:00.000Z", RULES, NOW)).toBe("Scheduled deliveries run from 08:00 to 22:00");
  });

  it("rejects values that are not dates", () => {
    expect(checkSchedule("tomorrow-ish", RULES, NOW)).toBe("Scheduled time is not a valid date");
  });
});
