import {
  AuditAction,
  AuditMetadata,
  AuditOutcome,
  CheckoutRequest,
  CustomerOrdersResponse,
  OrderDetails,
  OrderRecord,
  OrderStatus,
  RealtimeOrderEvent,
  RecordPaymentRequest,
  ReorderResponse,
  UpdateOrderStatusRequest,
} from "@tapau/types";
import { IdempotencyStore } from "@tapau/persistence";
import { BadRequestException, Injectable, Logger, NotFoundException, OnModuleInit } from "@nestjs/common";
import { randomUUID } from "crypto";
import { getOrderEnv } from "../../config/env";
import { AuditService } from "../audit/audit.service";
import { CartService } from "../cart/cart.service";
import { isPickup } from "../cart/delivery-method";
import { CustomerService } from "../customer/customer.service";
import { RealtimeEventsService } from "../realtime/realtime-events.service";
import { canTransition, describeStatus, isTerminal } from "./order-status";
import { OrderRepository } from "./repository/order.repository";

@Injectable()
export class OrderService implements OnModuleInit {
  private readonly logger = new Logger(OrderService.name);
  private readonly env = getOrderEnv();
  private readonly idempotency = new IdempotencyStore({
    namespace: "order-service",
    ttlSeconds: this.env.idempotencyTtlSeconds,
    postgresUrl: this.env.databaseUrl,
    redisUrl: this.env.redisUrl,
    log: (message) => this.logger.log(message),
  });
  private readonly orders: OrderRecord[] = [];

  constructor(
    private readonly cartService: CartService,
    private readonly customers: CustomerService,
    private readonly realtime: RealtimeEventsService,
    private readonly auditService: AuditService,
    private readonly orderRepository: OrderRepository,
  ) {}

  async onModuleInit(): Promise<void> {
    const stored = await this.orderRepository.loadOrders();
    if (!stored) return;

    this.orders.splice(0, this.orders.length, ...stored);
    this.logger.log(`Hydrated ${stored.length} orders from repository`);
  }

  /** One checkout per customer at a time; a second one finds the cart already emptied. */
  checkout(input: CheckoutRequest): Promise<OrderDetails> {
    return this.cartService.withCartLock(input.customerId, () => this.placeOrder(input));
  }

  private async placeOrder(input: CheckoutRequest): Promise<OrderDetails> {
    const actorKey = `customer:${input.customerId}`;
    const cart = await this.cartService.prepareCheckout(input.customerId);
    if (!cart.checkout.allowed || !cart.vendorId) {
      this.auditService.record({
        actorKey,
        action: "order.checkout",
        outcome: "FAILURE",
        resourceType: "cart",
        resourceId: input.customerId,
        metadata: { issues: cart.checkout.issues.map((issue) => issue.code).join(",") },
      });
      throw new BadRequestException({ message: "Checkout is not allowed", issues: cart.checkout.issues });
    }

    const orderId = `ord_${randomUUID().slice(0, 12)}`;
    const pointsRedeemed = cart.totals.loyaltyDiscountCents;
    if (pointsRedeemed > 0) this.customers.redeemPoints(input.customerId, pointsRedeemed, orderId);

    const now = new Date().toISOString();
    const order: OrderRecord = {
      orderId,
      customerId: input.customerId,
      vendorId: cart.vendorId,
      driverId: null,
      lines: cart.lines,
      totals: cart.totals,
      deliveryMethod: cart.deliveryMethod,
      address: isPickup(cart.deliveryMethod) ? null : cart.address,
      scheduledForIso: cart.scheduledForIso,
      promoCode: cart.totals.promoDiscountCents > 0 ? cart.promoCode : null,
      loyaltyPointsRedeemed: pointsRedeemed,
      paymentMethod: input.paymentMethod,
      paymentStatus: "PENDING",
      status: "PENDING",
      statusHistory: [{ status: "PENDING", atIso: now }],
      rating: null,
      cancellationReason: null,
      createdAtIso: now,
      updatedAtIso: now,
    };

    this.orders.unshift(order);
    this.cartService.resetAfterCheckout(input.customerId);
    this.persistOrder(order);
    this.publishOrderEvent("order.created", order);
    this.audit(actorKey, "order.checkout", "SUCCESS", order.orderId, {
      totalCents: order.totals.totalCents,
      deliveryMethod: order.deliveryMethod,
    });

    return this.details(order);
  }

  async checkoutIdempotent(input: CheckoutRequest, idempotencyKey?: string): Promise<OrderDetails> {
    if (!idempotencyKey) return this.checkout(input);
    const scopedKey = `checkout:${input.customerId}:${idempotencyKey}`;
    return this.idempotency.execute(scopedKey, async () => this.checkout(input));
  }

  getOrder(orderId: string): OrderRecord {
    const order = this.orders.find((candidate) => candidate.orderId === orderId);
    if (!order) throw new NotFoundException("Order not found");
    return order;
  }

  getOrderDetails(orderId: string): OrderDetails {
    return this.details(this.getOrder(orderId));
  }

  async listCustomerOrders(customerId: string, limit: number, offset: number): Promise<CustomerOrdersResponse> {
    const stored = await this.orderRepository.getCustomerOrdersPaged(customerId, limit, offset);
    const orders = stored || this.orders
      .filter((order) => order.customerId === customerId)
      .slice(offset, offset + limit);
    return { customerId, orders: orders.map((order) => this.details(order)) };
  }

  /** Backend-driven transition (vendor, driver or operations). */
  updateStatus(orderId: string, input: UpdateOrderStatusRequest, actorKey = "system"): OrderDetails {
    const order = this.getOrder(orderId);
    if (!canTransition(order.status, input.status)) {
      this.audit(actorKey, "order.status", "FAILURE", orderId, { from: order.status, to: input.status });
      throw new BadRequestException(`Cannot move order from ${order.status} to ${input.status}`);
    }
    if (input.status === "OUT_FOR_DELIVERY" && isPickup(order.deliveryMethod)) {
      throw new BadRequestException("Pickup orders are never out for delivery");
    }

    const next = this.transition(order, input.status, input.reason, input.driverId);
    this.audit(actorKey, "order.status", "SUCCESS", orderId, { from: order.status, to: next.status });
    return this.details(next);
  }

  cancelOrder(orderId: string, customerId: string, reason?: string): OrderDetails {
    const order = this.getCustomerOrder(orderId, customerId);
    if (order.status !== "PENDING") {
      this.audit(`customer:${customerId}`, "order.cancel", "FAILURE", orderId, { status: order.status });
      throw new BadRequestException("Only pending orders can be cancelled");
    }

    const next = this.transition(order, "CANCELLED", reason?.trim() || "Cancelled by customer");
    this.audit(`customer:${customerId}`, "order.cancel", "SUCCESS", orderId);
    return this.details(next);
  }

  confirmPickup(orderId: string, customerId: string): OrderDetails {
    const order = this.getCustomerOrder(orderId, customerId);
    if (!isPickup(order.deliveryMethod)) throw new BadRequestException("Order is not a pickup order");
    if (order.status !== "READY") throw new BadRequestException("Order is not ready for pickup");

    const next = this.transition(order, "DELIVERED", "Picked up by customer");
    this.audit(`customer:${customerId}`, "order.confirm_pickup", "SUCCESS", orderId);
    return this.details(next);
  }

  rateOrder(orderId: string, customerId: string, rating: number): OrderDetails {
    const order = this.getCustomerOrder(orderId, customerId);
    if (order.status !== "DELIVERED") throw new BadRequestException("Only delivered orders can be rated");
    if (order.rating !== null) throw new BadRequestException("Order has already been rated");
    if (!Number.isInteger(rating) || rating < 1 || rating > 5) {
      throw new BadRequestException("Rating must be a whole number from 1 to 5");
    }

    const next = this.save({ ...order, rating, updatedAtIso: new Date().toISOString() });
    this.publishOrderEvent("order.updated", next);
    this.audit(`customer:${customerId}`, "order.rate", "SUCCESS", orderId, { rating });
    return this.details(next);
  }

  /** Result reported by the payment provider; a failed payment cancels an open order. */
  recordPayment(orderId: string, input: RecordPaymentRequest): OrderDetails {
    const order = this.getOrder(orderId);
    if (order.paymentStatus !== "PENDING") {
      throw new BadRequestException(`Payment is already ${order.paymentStatus}`);
    }

    const metadata = input.reference ? { reference: input.reference } : undefined;
    if (input.paymentStatus === "PAID") {
      const next = this.save({ ...order, paymentStatus: "PAID", updatedAtIso: new Date().toISOString() });
      this.publishOrderEvent("order.updated", next);
      this.audit("system", "order.payment", "SUCCESS", orderId, metadata);
      return this.details(next);
    }

    const failed: OrderRecord = { ...order, paymentStatus: "FAILED" };
    const next = isTerminal(order.status)
      ? this.save({ ...failed, updatedAtIso: new Date().toISOString() })
      : this.transition(failed, "CANCELLED", "Payment failed");
    this.audit("system", "order.payment", "FAILURE", orderId, metadata);
    return this.details(next);
  }

  async reorder(orderId: string, customerId: string, replaceCart: boolean): Promise<ReorderResponse> {
    const order = this.getCustomerOrder(orderId, customerId);
    if (!isTerminal(order.status)) {
      throw new BadRequestException("Only delivered or cancelled orders can be reordered");
    }

    const result = await this.cartService.addLinesFromOrder(customerId, order.vendorId, order.lines, replaceCart);
    this.audit(`customer:${customerId}`, "order.reorder", "SUCCESS", orderId, {
      skipped: result.skippedItems.length,
    });
    return result;
  }

  private transition(order: OrderRecord, status: OrderStatus, reason?: string, driverId?: string): OrderRecord {
    const now = new Date().toISOString();
    let next: OrderRecord = {
      ...order,
      status,
      driverId: driverId || order.driverId,
      statusHistory: [...order.statusHistory, reason ? { status, atIso: now, reason } : { status, atIso: now }],
      updatedAtIso: now,
    };

    if (status === "DELIVERED") {
      this.customers.recordDeliveredOrder(order.customerId, order.orderId, order.totals.totalCents);
      if (next.paymentMethod === "CASH" && next.paymentStatus === "PENDING") next = { ...next, paymentStatus: "PAID" };
    }

    if (status === "CANCELLED") {
      this.customers.refundPoints(order.customerId, order.loyaltyPointsRedeemed, order.orderId);
      next = {
        ...next,
        cancellationReason: reason || null,
        paymentStatus: next.paymentStatus === "PAID" ? "REFUNDED" : next.paymentStatus,
      };
    }

    this.save(next);
    this.publishOrderEvent("order.updated", next);
    return next;
  }

  private getCustomerOrder(orderId: string, customerId: string): OrderRecord {
    const order = this.getOrder(orderId);
    if (order.customerId !== customerId) throw new NotFoundException("Order not found");
    return order;
  }

  private save(order: OrderRecord): OrderRecord {
    const index = this.orders.findIndex((candidate) => candidate.orderId === order.orderId);
    if (index >= 0) this.orders[index] = order;
    else this.orders.unshift(order);
    this.persistOrder(order);
    return order;
  }

  private details(order: OrderRecord): OrderDetails {
    return { order, view: describeStatus(order) };
  }

  private persistOrder(order: OrderRecord): void {
    void this.orderRepository.upsertOrder(order)
      .catch((error: unknown) => this.logger.warn(`Persist order failed: ${String(error)}`));
  }

  private audit(
    actorKey: string,
    action: AuditAction,
    outcome: AuditOutcome,
    orderId: string,
    metadata?: AuditMetadata,
  ): void {
    this.auditService.recordAction(actorKey, action, outcome, orderId, metadata);
  }

  private actorKeys(order: OrderRecord): string[] {
    const keys = [
      `customer:${order.customerId}`,
      `vendor:${order.vendorId}`,
      "admin:ops",
    ];

    if (order.driverId) keys.push(`driver:${order.driverId}`);
    return keys;
  }

  private publishOrderEvent(type: RealtimeOrderEvent["type"], order: OrderRecord): void {
    this.realtime.publish({
      type,
      order,
      view: describeStatus(order),
      emittedAtIso: new Date().toISOString(),
      targetActorKeys: this.actorKeys(order),
    });
  }
}
