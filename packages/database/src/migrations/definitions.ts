/** Forward statements run in order; `down` undoes them in reverse. */
export interface Migration {
  id: string;
  up: string[];
  down: string[];
}

export const MIGRATIONS: readonly Migration[] = [
  {
    id: "001_core_tables",
    up: [
      `
      create table if not exists carts (
        customer_id text primary key,
        vendor_id text null,
        delivery_method text not null,
        address_json text null,
        scheduled_for_iso text null,
        promo_code text null,
        loyalty_points_to_redeem integer not null default 0,
        lines_json text not null,
        totals_json text not null,
        updated_at_iso text not null
      );
      `,
      `
      create table if not exists orders (
        order_id text primary key,
        customer_id text not null,
        vendor_id text not null,
        driver_id text null,
        delivery_method text not null,
        status text not null,
        payment_method text not null,
        payment_status text not null,
        subtotal_cents integer not null,
        tax_cents integer not null,
        delivery_fee_cents integer not null,
        promo_discount_cents integer not null,
        loyalty_discount_cents integer not null,
        discount_cents integer not null,
        total_cents integer not null,
        item_count integer not null,
        address_json text null,
        scheduled_for_iso text null,
        promo_code text null,
        loyalty_points_redeemed integer not null default 0,
        rating integer null,
        cancellation_reason text null,
        created_at_iso text not null,
        updated_at_iso text not null
      );
      `,
      `
      create table if not exists order_lines (
        order_id text not null,
        line_id text not null,
        position integer not null,
        item_id text not null,
        vendor_id text not null,
        name text not null,
        unit_price_cents integer not null,
        customization_surcharge_cents integer not null,
        customizations_json text not null,
        quantity integer not null,
        note text not null,
        min_quantity integer not null,
        max_quantity integer null,
        line_total_cents integer not null,
        primary key(order_id, line_id)
      );
      `,
      `
      create table if not exists order_status_history (
        order_id text not null,
        position integer not null,
        status text not null,
        at_iso text not null,
        reason text null,
        primary key(order_id, position)
      );
      `,
      `
      create table if not exists customer_profiles (
        customer_id text primary key,
        display_name text not null,
        loyalty_points integer not null,
        lifetime_points_earned integer not null,
        orders_count integer not null,
        total_spent_cents integer not null,
        preferences_json text not null,
        updated_at_iso text not null
      );
      `,
      `
      create table if not exists loyalty_transactions (
        transaction_id text primary key,
        customer_id text not null,
        type text not null,
        points integer not null,
        order_id text null,
        balance_after integer not null,
        created_at_iso text not null
      );
      `,
      `
      create table if not exists audit_events (
        id text primary key,
        service text not null,
        actor_key text not null,
        actor_role text not null,
        action text not null,
        resource_type text not null,
        resource_id text null,
        outcome text not null,
        metadata_json text null,
        created_at_iso text not null
      );
      `,
    ],
    down: [
      "drop table if exists audit_events",
      "drop table if exists loyalty_transactions",
      "drop table if exists customer_profiles",
      "drop table if exists order_status_history",
      "drop table if exists order_lines",
      "drop table if exists orders",
      "drop table if exists carts",
    ],
  },
  {
    id: "002_indexes",
    up: [
      "create index if not exists idx_orders_customer_created on orders(customer_id, created_at_iso desc)",
      "create index if not exists idx_orders_vendor_status_created on orders(vendor_id, status, created_at_iso desc)",
      "create index if not exists idx_loyalty_customer_created on loyalty_transactions(customer_id, created_at_iso desc)",
      "create index if not exists idx_audit_service_created on audit_events(service, created_at_iso desc)",
      "create index if not exists idx_audit_actor_created on audit_events(actor_key, created_at_iso desc)",
    ],
    down: [
      "drop index if exists idx_audit_actor_created",
      "drop index if exists idx_audit_service_created",
      "drop index if exists idx_loyalty_customer_created",
      "drop index if exists idx_orders_vendor_status_created",
      "drop index if exists idx_orders_customer_created",
    ],
  },
];
