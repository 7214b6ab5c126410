import { OrderRecord } from "@tapau/types";
import { availableActions, canTransition, describeStatus, isTerminal } from "../modules/order/order-status";

type Presentable = Pick<OrderRecord, "status" | "deliveryMethod" | "driverId" | "rating">;

const delivery: Presentable = { status: "PENDING", deliveryMethod: "OWN_FLEET", driverId: null, rating: null };
const pickup: Presentable = { ...delivery, deliveryMethod: "CUSTOMER_PICKUP" };

describe("canTransition", () => {
  it("moves forward, including skipped steps", () => {
    expect(canTransition("PENDING", "CONFIRMED")).toBe(true);
    expect(canTransition("CONFIRMED", "READY")).toBe(true);
    expect(canTransition("OUT_FOR_DELIVERY", "DELIVERED")).toBe(true);
  });

  it("never moves backwards or stays put", () => {
    expect(canTransition("PREPARING", "CONFIRMED")).toBe(false);
    expect(canTransition("READY", "READY")).toBe(false);
  });

  it("cancels from any open status and nothing leaves a terminal status", () => {
    expect(canTransition("PENDING", "CANCELLED")).toBe(true);
    expect(canTransition("OUT_FOR_DELIVERY", "CANCELLED")).toBe(true);
    expect(canTransition("DELIVERED", "CANCELLED")).toBe(false);
    expect(canTransition("CANCELLED", "PENDING")).toBe(false);
    expect(isTerminal("DELIVERED")).toBe(true);
    expect(isTerminal("READY")).toBe(false);
  });
});

describe("describeStatus", () => {
  it("looks up label, color and description", () => {
    expect(describeStatus({ ...delivery, status: "PREPARING" })).toEqual({
      status: "PREPARING",
      label: "Preparing",
      color: "purple",
      description: "Your delicious food is being prepared",
      isTerminal: false,
      actions: ["TRACK"],
    });
    expect(describeStatus({ ...delivery, status: "CANCELLED" })).toMatchObject({
      label: "Cancelled",
      color: "red",
      description: "This order has been cancelled",
      isTerminal: true,
    });
  });
});

describe("availableActions", () => {
  it("lets a pending order be cancelled", () => {
    expect(availableActions(delivery)).toEqual(["CANCEL"]);
    expect(availableActions(pickup)).toEqual(["CANCEL"]);
  });

  it("tracks delivery orders and confirms pickup orders once ready", () => {
    expect(availableActions({ ...delivery, status: "CONFIRMED" })).toEqual(["TRACK"]);
    expect(availableActions({ ...pickup, status: "CONFIRMED" })).toEqual([]);
    expect(availableActions({ ...delivery, status: "READY" })).toEqual(["TRACK"]);
    expect(availableActions({ ...pickup, status: "READY" })).toEqual(["CONFIRM_PICKUP"]);
  });

  it("offers the driver contact only when a driver is assigned", () => {
    expect(availableActions({ ...delivery, status: "OUT_FOR_DELIVERY" })).toEqual(["TRACK"]);
    expect(availableActions({ ...delivery, status: "OUT_FOR_DELIVERY", driverId: "drv_7" })).toEqual(["TRACK", "CONTACT_DRIVER"]);
  });

  it("asks for a rating once and always offers reorder at the end", () => {
    expect(availableActions({ ...delivery, status: "DELIVERED" })).toEqual(["RATE", "REORDER"]);
    expect(availableActions({ ...delivery, status: "DELIVERED", rating: 4 })).toEqual(["REORDER"]);
    expect(availableActions({ ...delivery, status: "CANCELLED" })).toEqual(["REORDER"]);
  });
});
