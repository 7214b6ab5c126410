import { DeliveryMethod } from "@tapau/types";

export const DELIVERY_METHODS: readonly DeliveryMethod[] = [
  "CUSTOMER_PICKUP",
  "SALES_AGENT_PICKUP",
  "OWN_FLEET",
  "THIRD_PARTY",
  "SCHEDULED",
];

export function isDeliveryMethod(value: unknown): value is DeliveryMethod {
  return typeof value === "string" && DELIVERY_METHODS.some((method) => method === value);
}

export function isPickup(method: DeliveryMethod): boolean {
  return method === "CUSTOMER_PICKUP" || method === "SALES_AGENT_PICKUP";
}

export function requiresAddress(method: DeliveryMethod): boolean {
  return !isPickup(method);
}

export function requiresSchedule(method: DeliveryMethod): boolean {
  return method === "SCHEDULED";
}
