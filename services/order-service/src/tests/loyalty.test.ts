import { BadRequestException } from "@nestjs/common";
import { CustomerService } from "../modules/customer/customer.service";
import { nextTierFor, pointsForOrder, tierFor } from "../modules/customer/loyalty.rules";
import { CustomerRepository } from "../modules/customer/repository/customer.repository";

describe("loyalty rules", () => {
  it("picks the tier by lifetime points", () => {
    expect(tierFor(0).tier).toBe("BRONZE");
    expect(tierFor(999).tier).toBe("BRONZE");
    expect(tierFor(1000).tier).toBe("SILVER");
    expect(tierFor(14999).tier).toBe("GOLD");
    expect(tierFor(50000).tier).toBe("DIAMOND");
  });

  it("tells how far the next tier is", () => {
    expect(nextTierFor(1200)).toEqual({ tier: "GOLD", pointsNeeded: 3800 });
    expect(nextTierFor(60000)).toBeNull();
  });

  it("earns one point per whole ringgit, scaled and rounded down", () => {
    expect(pointsForOrder(2938, 100)).toBe(29);
    expect(pointsForOrder(2938, 120)).toBe(34);
    expect(pointsForOrder(99, 300)).toBe(0);
  });
});

describe("CustomerService", () => {
  let customers: CustomerService;

  beforeEach(() => {
    customers = new CustomerService(new CustomerRepository());
  });

  it("starts from a default profile", () => {
    expect(customers.getProfile("cus_new")).toMatchObject({
      customerId: "cus_new",
      displayName: "cus_new",
      loyaltyPoints: 0,
      preferences: { dietary: [], notifications: { orderUpdates: true, promotions: false } },
    });
  });

  it("merges profile updates", () => {
    const updated = customers.updateProfile("cus_1", {
      displayName: "  Aisyah  ",
      preferences: { dietary: ["halal", "halal", "nut_free"], notifications: { promotions: true } },
    });

    expect(updated.displayName).toBe("Aisyah");
    expect(updated.preferences).toEqual({
      dietary: ["halal", "nut_free"],
      notifications: { orderUpdates: true, promotions: true },
    });
  });

  it("accrues points on delivery and tracks spend", () => {
    const earned = customers.recordDeliveredOrder("cus_1", "ord_1", 2938);

    expect(earned).toMatchObject({ type: "EARN", points: 29, orderId: "ord_1", balanceAfter: 29 });
    expect(customers.getProfile("cus_1")).toMatchObject({
      loyaltyPoints: 29,
      lifetimePointsEarned: 29,
      ordersCount: 1,
      totalSpentCents: 2938,
    });
  });

  it("redeems and refunds against the available balance", () => {
    customers.recordDeliveredOrder("cus_1", "ord_1", 2938);

    expect(() => customers.redeemPoints("cus_1", 30, "ord_2")).toThrow(BadRequestException);
    expect(() => customers.redeemPoints("cus_1", 30, "ord_2")).toThrow("Only 29 loyalty points available");

    expect(customers.redeemPoints("cus_1", 10, "ord_2")).toMatchObject({ type: "REDEEM", points: -10, balanceAfter: 19 });
    expect(customers.refundPoints("cus_1", 10, "ord_2")).toMatchObject({ type: "REFUND", points: 10, balanceAfter: 29 });
    expect(customers.refundPoints("cus_1", 0, "ord_3")).toBeNull();
    expect(customers.getProfile("cus_1").lifetimePointsEarned).toBe(29);
  });

  it("summarises tier progress with newest transactions first", () => {
    customers.recordDeliveredOrder("cus_1", "ord_1", 2938);
    customers.redeemPoints("cus_1", 9, "ord_2");

    const summary = customers.getLoyaltySummary("cus_1");
    expect(summary).toMatchObject({
      availablePoints: 20,
      lifetimePointsEarned: 29,
      tier: "BRONZE",
      multiplier: 1,
      nextTier: "SILVER",
      pointsToNextTier: 971,
    });
    expect(summary.recentTransactions.map((transaction) => transaction.type)).toEqual(["REDEEM", "EARN"]);
  });

  it("earns at the higher rate after reaching a tier", () => {
    customers.recordDeliveredOrder("cus_1", "ord_1", 100000);
    expect(customers.getLoyaltySummary("cus_1").tier).toBe("SILVER");

    expect(customers.recordDeliveredOrder("cus_1", "ord_2", 2938)?.points).toBe(34);
  });
});
