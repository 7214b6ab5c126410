import { CoreDatabase, DbRow } from "@tapau/database";
import {
  CartLine,
  DeliveryAddress,
  LineCustomization,
  OrderRecord,
  OrderStatusChange,
  PaymentMethod,
  PaymentStatus,
} from "@tapau/types";
import { Injectable, Logger } from "@nestjs/common";
import { getOrderEnv } from "../../../config/env";
import { isDeliveryMethod } from "../../cart/delivery-method";
import { isOrderStatus } from "../order-status";

const PAYMENT_METHODS: readonly PaymentMethod[] = ["CARD", "WALLET", "CASH"];
const PAYMENT_STATUSES: readonly PaymentStatus[] = ["PENDING", "PAID", "FAILED", "REFUNDED"];

function isPaymentMethod(value: unknown): value is PaymentMethod {
  return typeof value === "string" && PAYMENT_METHODS.some((method) => method === value);
}

function isPaymentStatus(value: unknown): value is PaymentStatus {
  return typeof value === "string" && PAYMENT_STATUSES.some((status) => status === value);
}

@Injectable()
export class OrderRepository {
  private readonly logger = new Logger(OrderRepository.name);
  private readonly db = new CoreDatabase({
    connectionString: getOrderEnv().databaseUrl,
    log: (message: string) => this.logger.log(message),
  });

  async loadOrders(limit = 5000): Promise<OrderRecord[] | null> {
    await this.db.init();
    if (!this.db.isReady()) return null;

    const rows = await this.db.query("select * from orders order by created_at_iso desc limit $1", [limit]);
    return this.mapOrders(rows);
  }

  async getCustomerOrdersPaged(customerId: string, limit: number, offset: number): Promise<OrderRecord[] | null> {
    await this.db.init();
    if (!this.db.isReady()) return null;

    const rows = await this.db.query(
      "select * from orders where customer_id = $1 order by created_at_iso desc limit $2 offset $3",
      [customerId, limit, offset],
    );
    return this.mapOrders(rows);
  }

  async upsertOrder(order: OrderRecord): Promise<void> {
    await this.db.init();
    if (!this.db.isReady()) return;

    const totals = order.totals;
    await this.db.transaction([
      {
        sql: "insert into orders (order_id, customer_id, vendor_id, driver_id, delivery_method, status, payment_method, payment_status, subtotal_cents, tax_cents, delivery_fee_cents, promo_discount_cents, loyalty_discount_cents, discount_cents, total_cents, item_count, address_json, scheduled_for_iso, promo_code, loyalty_points_redeemed, rating, cancellation_reason, created_at_iso, updated_at_iso) values ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14,$15,$16,$17,$18,$19,$20,$21,$22,$23,$24) on conflict (order_id) do update set driver_id=excluded.driver_id, status=excluded.status, payment_status=excluded.payment_status, rating=excluded.rating, cancellation_reason=excluded.cancellation_reason, updated_at_iso=excluded.updated_at_iso",
        params: [
          order.orderId,
          order.customerId,
          order.vendorId,
          order.driverId,
          order.deliveryMethod,
          order.status,
          order.paymentMethod,
          order.paymentStatus,
          totals.subtotalCents,
          totals.taxCents,
          totals.deliveryFeeCents,
          totals.promoDiscountCents,
          totals.loyaltyDiscountCents,
          totals.discountCents,
          totals.totalCents,
          totals.itemCount,
          order.address ? JSON.stringify(order.address) : null,
          order.scheduledForIso,
          order.promoCode,
          order.loyaltyPointsRedeemed,
          order.rating,
          order.cancellationReason,
          order.createdAtIso,
          order.updatedAtIso,
        ],
      },
      // lines never change after checkout
      ...order.lines.map((line, position) => ({
        sql: "insert into order_lines (order_id, line_id, position, item_id, vendor_id, name, unit_price_cents, customization_surcharge_cents, customizations_json, quantity, note, min_quantity, max_quantity, line_total_cents) values ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14) on conflict (order_id, line_id) do nothing",
        params: [
          order.orderId,
          line.lineId,
          position,
          line.itemId,
          line.vendorId,
          line.name,
          line.unitPriceCents,
          line.customizationSurchargeCents,
          JSON.stringify(line.customizations),
          line.quantity,
          line.note,
          line.minQuantity,
          line.maxQuantity,
          line.lineTotalCents,
        ],
      })),
      ...order.statusHistory.map((change, position) => ({
        sql: "insert into order_status_history (order_id, position, status, at_iso, reason) values ($1,$2,$3,$4,$5) on conflict (order_id, position) do nothing",
        params: [order.orderId, position, change.status, change.atIso, change.reason || null],
      })),
    ]);
  }

  private async mapOrders(orderRows: DbRow[]): Promise<OrderRecord[]> {
    if (orderRows.length === 0) return [];

    const orderIds = orderRows.map((row) => String(row.order_id));
    const lineRows = await this.db.query(
      "select * from order_lines where order_id = any($1::text[]) order by position asc",
      [orderIds],
    );
    const historyRows = await this.db.query(
      "select * from order_status_history where order_id = any($1::text[]) order by position asc",
      [orderIds],
    );

    const linesByOrder = groupBy(lineRows, (row) => this.mapLine(row));
    const historyByOrder = new Map<string, OrderStatusChange[]>();
    for (const row of historyRows) {
      const status = row.status;
      if (!isOrderStatus(status)) continue;
      const orderId = String(row.order_id);
      const current = historyByOrder.get(orderId) || [];
      current.push({ status, atIso: String(row.at_iso), reason: row.reason ? String(row.reason) : undefined });
      historyByOrder.set(orderId, current);
    }

    const orders: OrderRecord[] = [];
    for (const row of orderRows) {
      const orderId = String(row.order_id);
      const { status, delivery_method: deliveryMethod, payment_method: paymentMethod, payment_status: paymentStatus } = row;
      if (!isOrderStatus(status) || !isDeliveryMethod(deliveryMethod) || !isPaymentMethod(paymentMethod) || !isPaymentStatus(paymentStatus)) {
        this.logger.warn(`Skipping order ${orderId} with unrecognised status or method`);
        continue;
      }

      orders.push({
        orderId,
        customerId: String(row.customer_id),
        vendorId: String(row.vendor_id),
        driverId: row.driver_id ? String(row.driver_id) : null,
        lines: linesByOrder.get(orderId) || [],
        totals: {
          subtotalCents: Number(row.subtotal_cents),
          taxCents: Number(row.tax_cents),
          deliveryFeeCents: Number(row.delivery_fee_cents),
          promoDiscountCents: Number(row.promo_discount_cents),
          loyaltyDiscountCents: Number(row.loyalty_discount_cents),
          discountCents: Number(row.discount_cents),
          totalCents: Number(row.total_cents),
          itemCount: Number(row.item_count),
        },
        deliveryMethod,
        address: row.address_json ? (JSON.parse(String(row.address_json)) as DeliveryAddress) : null,
        scheduledForIso: row.scheduled_for_iso ? String(row.scheduled_for_iso) : null,
        promoCode: row.promo_code ? String(row.promo_code) : null,
        loyaltyPointsRedeemed: Number(row.loyalty_points_redeemed),
        paymentMethod,
        paymentStatus,
        status,
        statusHistory: historyByOrder.get(orderId) || [],
        rating: row.rating === null || row.rating === undefined ? null : Number(row.rating),
        cancellationReason: row.cancellation_reason ? String(row.cancellation_reason) : null,
        createdAtIso: String(row.created_at_iso),
        updatedAtIso: String(row.updated_at_iso),
      });
    }
    return orders;
  }

  private mapLine(row: DbRow): CartLine {
    return {
      lineId: String(row.line_id),
      itemId: String(row.item_id),
      vendorId: String(row.vendor_id),
      name: String(row.name),
      unitPriceCents: Number(row.unit_price_cents),
      customizations: JSON.parse(String(row.customizations_json)) as LineCustomization[],
      customizationSurchargeCents: Number(row.customization_surcharge_cents),
      quantity: Number(row.quantity),
      note: String(row.note),
      minQuantity: Number(row.min_quantity),
      maxQuantity: row.max_quantity === null || row.max_quantity === undefined ? null : Number(row.max_quantity),
      isAvailable: true,
      lineTotalCents: Number(row.line_total_cents),
    };
  }
}

function groupBy<T>(rows: DbRow[], map: (row: DbRow) => T): Map<string, T[]> {
  const grouped = new Map<string, T[]>();
  for (const row of rows) {
    const orderId = String(row.order_id);
    const current = grouped.get(orderId) || [];
    current.push(map(row));
    grouped.set(orderId, current);
  }
  return grouped;
}
