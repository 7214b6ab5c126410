import { OrderAction, OrderRecord, OrderStatus, OrderStatusView } from "@tapau/types";
import { isPickup } from "../cart/delivery-method";

export const ORDER_STATUS_FLOW: readonly OrderStatus[] = [
  "PENDING",
  "CONFIRMED",
  "PREPARING",
  "READY",
  "OUT_FOR_DELIVERY",
  "DELIVERED",
];

const ORDER_STATUSES: readonly OrderStatus[] = [...ORDER_STATUS_FLOW, "CANCELLED"];

const PRESENTATION: Record<OrderStatus, { label: string; color: string; description: string }> = {
  PENDING: { label: "Pending", color: "orange", description: "Waiting for vendor confirmation" },
  CONFIRMED: { label: "Confirmed", color: "blue", description: "Order confirmed and will be prepared soon" },
  PREPARING: { label: "Preparing", color: "purple", description: "Your delicious food is being prepared" },
  READY: { label: "Ready", color: "teal", description: "Order is ready and waiting for pickup" },
  OUT_FOR_DELIVERY: { label: "Out for delivery", color: "indigo", description: "Your order is on its way to you" },
  DELIVERED: { label: "Delivered", color: "green", description: "Order has been successfully delivered" },
  CANCELLED: { label: "Cancelled", color: "red", description: "This order has been cancelled" },
};

export function isOrderStatus(value: unknown): value is OrderStatus {
  return typeof value === "string" && ORDER_STATUSES.some((status) => status === value);
}

export function isTerminal(status: OrderStatus): boolean {
  return status === "DELIVERED" || status === "CANCELLED";
}

/** Forward moves may skip steps; CANCELLED is reachable from any open status. */
export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  if (isTerminal(from)) return false;
  if (to === "CANCELLED") return true;
  return ORDER_STATUS_FLOW.indexOf(to) > ORDER_STATUS_FLOW.indexOf(from);
}

export function availableActions(
  order: Pick<OrderRecord, "status" | "deliveryMethod" | "driverId" | "rating">,
): OrderAction[] {
  const pickup = isPickup(order.deliveryMethod);

  switch (order.status) {
    case "PENDING":
      return ["CANCEL"];
    case "CONFIRMED":
    case "PREPARING":
      return pickup ? [] : ["TRACK"];
    case "READY":
      return pickup ? ["CONFIRM_PICKUP"] : ["TRACK"];
    case "OUT_FOR_DELIVERY":
      return order.driverId ? ["TRACK", "CONTACT_DRIVER"] : ["TRACK"];
    case "DELIVERED":
      return order.rating === null ? ["RATE", "REORDER"] : ["REORDER"];
    case "CANCELLED":
      return ["REORDER"];
  }
}

export function describeStatus(
  order: Pick<OrderRecord, "status" | "deliveryMethod" | "driverId" | "rating">,
): OrderStatusView {
  return {
    status: order.status,
    ...PRESENTATION[order.status],
    isTerminal: isTerminal(order.status),
    actions: availableActions(order),
  };
}
