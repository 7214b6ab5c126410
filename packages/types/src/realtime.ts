import { OrderRecord, OrderStatusView } from "./order";

export type RealtimeEventType = "order.updated" | "order.created";

export interface RealtimeOrderEvent {
  type: RealtimeEventType;
  order: OrderRecord;
  view: OrderStatusView;
  emittedAtIso: string;
  targetActorKeys: string[];
}

export type RealtimeEvent = RealtimeOrderEvent;
