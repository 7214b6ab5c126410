import { CoreDatabase, DbRow } from "@tapau/database";
import { CustomerPreferences, CustomerProfile, LoyaltyTransaction, LoyaltyTransactionType } from "@tapau/types";
import { Injectable, Logger } from "@nestjs/common";
import { getOrderEnv } from "../../../config/env";

export type CustomerState = {
  profiles: CustomerProfile[];
  transactions: LoyaltyTransaction[];
};

const TRANSACTION_TYPES: readonly LoyaltyTransactionType[] = ["EARN", "REDEEM", "REFUND"];

@Injectable()
export class CustomerRepository {
  private readonly logger = new Logger(CustomerRepository.name);
  private readonly db = new CoreDatabase({
    connectionString: getOrderEnv().databaseUrl,
    log: (message: string) => this.logger.log(message),
  });

  async loadState(transactionLimit = 5000): Promise<CustomerState | null> {
    await this.db.init();
    if (!this.db.isReady()) return null;

    const profiles = (await this.db.query("select * from customer_profiles")).map((row) => this.mapProfile(row));
    const transactions = (await this.db.query(
      "select * from loyalty_transactions order by created_at_iso desc limit $1",
      [transactionLimit],
    )).map((row) => this.mapTransaction(row));
    return { profiles, transactions };
  }

  async upsertProfile(profile: CustomerProfile): Promise<void> {
    await this.db.init();
    if (!this.db.isReady()) return;
    await this.db.query(
      "insert into customer_profiles (customer_id, display_name, loyalty_points, lifetime_points_earned, orders_count, total_spent_cents, preferences_json, updated_at_iso) values ($1,$2,$3,$4,$5,$6,$7,$8) on conflict (customer_id) do update set display_name=excluded.display_name, loyalty_points=excluded.loyalty_points, lifetime_points_earned=excluded.lifetime_points_earned, orders_count=excluded.orders_count, total_spent_cents=excluded.total_spent_cents, preferences_json=excluded.preferences_json, updated_at_iso=excluded.updated_at_iso",
      [
        profile.customerId,
        profile.displayName,
        profile.loyaltyPoints,
        profile.lifetimePointsEarned,
        profile.ordersCount,
        profile.totalSpentCents,
        JSON.stringify(profile.preferences),
        profile.updatedAtIso,
      ],
    );
  }

  async insertTransaction(transaction: LoyaltyTransaction): Promise<void> {
    await this.db.init();
    if (!this.db.isReady()) return;
    await this.db.query(
      "insert into loyalty_transactions (transaction_id, customer_id, type, points, order_id, balance_after, created_at_iso) values ($1,$2,$3,$4,$5,$6,$7) on conflict (transaction_id) do nothing",
      [
        transaction.transactionId,
        transaction.customerId,
        transaction.type,
        transaction.points,
        transaction.orderId,
        transaction.balanceAfter,
        transaction.createdAtIso,
      ],
    );
  }

  private mapProfile(row: DbRow): CustomerProfile {
    return {
      customerId: String(row.customer_id),
      displayName: String(row.display_name),
      loyaltyPoints: Number(row.loyalty_points),
      lifetimePointsEarned: Number(row.lifetime_points_earned),
      ordersCount: Number(row.orders_count),
      totalSpentCents: Number(row.total_spent_cents),
      preferences: JSON.parse(String(row.preferences_json)) as CustomerPreferences,
      updatedAtIso: String(row.updated_at_iso),
    };
  }

  private mapTransaction(row: DbRow): LoyaltyTransaction {
    const type = TRANSACTION_TYPES.find((candidate) => candidate === row.type);
    if (!type) throw new Error(`Unknown loyalty transaction type ${String(row.type)}`);
    return {
      transactionId: String(row.transaction_id),
      customerId: String(row.customer_id),
      type,
      points: Number(row.points),
      orderId: row.order_id ? String(row.order_id) : null,
      balanceAfter: Number(row.balance_after),
      createdAtIso: String(row.created_at_iso),
    };
  }
}
