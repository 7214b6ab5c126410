import { CoreDatabase, DbRow } from "@tapau/database";
import { CartLine, CartTotals, CustomerCart, DeliveryAddress } from "@tapau/types";
import { Injectable, Logger } from "@nestjs/common";
import { getOrderEnv } from "../../../config/env";
import { isDeliveryMethod } from "../delivery-method";

/** A stored cart; quote and checkout state are recomputed after loading. */
export type StoredCart = Omit<CustomerCart, "deliveryQuote" | "checkout">;

@Injectable()
export class CartRepository {
  private readonly logger = new Logger(CartRepository.name);
  private readonly db = new CoreDatabase({
    connectionString: getOrderEnv().databaseUrl,
    log: (message: string) => this.logger.log(message),
  });

  async loadCarts(): Promise<StoredCart[] | null> {
    await this.db.init();
    if (!this.db.isReady()) return null;
    const rows = await this.db.query("select * from carts");
    return rows.map((row) => this.mapCart(row));
  }

  async upsertCart(cart: CustomerCart): Promise<void> {
    await this.db.init();
    if (!this.db.isReady()) return;

    await this.db.query(
      "insert into carts (customer_id, vendor_id, delivery_method, address_json, scheduled_for_iso, promo_code, loyalty_points_to_redeem, lines_json, totals_json, updated_at_iso) values ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10) on conflict (customer_id) do update set vendor_id=excluded.vendor_id, delivery_method=excluded.delivery_method, address_json=excluded.address_json, scheduled_for_iso=excluded.scheduled_for_iso, promo_code=excluded.promo_code, loyalty_points_to_redeem=excluded.loyalty_points_to_redeem, lines_json=excluded.lines_json, totals_json=excluded.totals_json, updated_at_iso=excluded.updated_at_iso",
      [
        cart.customerId,
        cart.vendorId,
        cart.deliveryMethod,
        cart.address ? JSON.stringify(cart.address) : null,
        cart.scheduledForIso,
        cart.promoCode,
        cart.loyaltyPointsToRedeem,
        JSON.stringify(cart.lines),
        JSON.stringify(cart.totals),
        cart.updatedAtIso,
      ],
    );
  }

  private mapCart(row: DbRow): StoredCart {
    const deliveryMethod = row.delivery_method;
    return {
      customerId: String(row.customer_id),
      vendorId: row.vendor_id ? String(row.vendor_id) : null,
      lines: JSON.parse(String(row.lines_json)) as CartLine[],
      deliveryMethod: isDeliveryMethod(deliveryMethod) ? deliveryMethod : "OWN_FLEET",
      address: row.address_json ? (JSON.parse(String(row.address_json)) as DeliveryAddress) : null,
      scheduledForIso: row.scheduled_for_iso ? String(row.scheduled_for_iso) : null,
      promoCode: row.promo_code ? String(row.promo_code) : null,
      loyaltyPointsToRedeem: Number(row.loyalty_points_to_redeem),
      totals: JSON.parse(String(row.totals_json)) as CartTotals,
      updatedAtIso: String(row.updated_at_iso),
    };
  }
}
