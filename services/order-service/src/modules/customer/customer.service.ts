import {
  CustomerProfile,
  LoyaltySummary,
  LoyaltyTransaction,
  LoyaltyTransactionType,
  UpdateCustomerProfileRequest,
} from "@tapau/types";
import { BadRequestException, Injectable, Logger, OnModuleInit } from "@nestjs/common";
import { randomUUID } from "crypto";
import { nextTierFor, pointsForOrder, tierFor } from "./loyalty.rules";
import { CustomerRepository } from "./repository/customer.repository";

@Injectable()
export class CustomerService implements OnModuleInit {
  private readonly logger = new Logger(CustomerService.name);
  private readonly profiles = new Map<string, CustomerProfile>();
  private readonly transactions: LoyaltyTransaction[] = [];

  constructor(private readonly customerRepository: CustomerRepository) {}

  async onModuleInit(): Promise<void> {
    const state = await this.customerRepository.loadState();
    if (!state) return;

    for (const profile of state.profiles) this.profiles.set(profile.customerId, profile);
    this.transactions.splice(0, this.transactions.length, ...state.transactions);
    this.logger.log("Hydrated customer profiles from repository");
  }

  getProfile(customerId: string): CustomerProfile {
    return this.profiles.get(customerId) || this.defaultProfile(customerId);
  }

  updateProfile(customerId: string, input: UpdateCustomerProfileRequest): CustomerProfile {
    const current = this.getProfile(customerId);
    const preferences = input.preferences;
    const next: CustomerProfile = {
      ...current,
      displayName: input.displayName?.trim() || current.displayName,
      preferences: {
        dietary: preferences?.dietary ? Array.from(new Set(preferences.dietary)) : current.preferences.dietary,
        notifications: {
          orderUpdates: preferences?.notifications?.orderUpdates ?? current.preferences.notifications.orderUpdates,
          promotions: preferences?.notifications?.promotions ?? current.preferences.notifications.promotions,
        },
      },
      updatedAtIso: new Date().toISOString(),
    };
    return this.saveProfile(next);
  }

  getLoyaltySummary(customerId: string, recentLimit = 20): LoyaltySummary {
    const profile = this.getProfile(customerId);
    const tier = tierFor(profile.lifetimePointsEarned);
    const next = nextTierFor(profile.lifetimePointsEarned);

    return {
      customerId,
      availablePoints: profile.loyaltyPoints,
      lifetimePointsEarned: profile.lifetimePointsEarned,
      tier: tier.tier,
      multiplier: tier.multiplierPercent / 100,
      nextTier: next ? next.tier : null,
      pointsToNextTier: next ? next.pointsNeeded : 0,
      recentTransactions: this.listTransactions(customerId, recentLimit, 0),
    };
  }

  listTransactions(customerId: string, limit: number, offset: number): LoyaltyTransaction[] {
    return this.transactions
      .filter((transaction) => transaction.customerId === customerId)
      .slice(offset, offset + limit);
  }

  redeemPoints(customerId: string, points: number, orderId: string): LoyaltyTransaction {
    const profile = this.getProfile(customerId);
    if (points <= 0) throw new BadRequestException("Points to redeem must be positive");
    if (points > profile.loyaltyPoints) {
      throw new BadRequestException(`Only ${profile.loyaltyPoints} loyalty points available`);
    }

    this.saveProfile({ ...profile, loyaltyPoints: profile.loyaltyPoints - points, updatedAtIso: new Date().toISOString() });
    return this.recordTransaction(customerId, "REDEEM", -points, orderId);
  }

  refundPoints(customerId: string, points: number, orderId: string): LoyaltyTransaction | null {
    if (points <= 0) return null;
    const profile = this.getProfile(customerId);
    this.saveProfile({ ...profile, loyaltyPoints: profile.loyaltyPoints + points, updatedAtIso: new Date().toISOString() });
    return this.recordTransaction(customerId, "REFUND", points, orderId);
  }

  /** Accrues points at the customer's current tier and updates order totals. */
  recordDeliveredOrder(customerId: string, orderId: string, totalCents: number): LoyaltyTransaction | null {
    const profile = this.getProfile(customerId);
    const earned = pointsForOrder(totalCents, tierFor(profile.lifetimePointsEarned).multiplierPercent);

    this.saveProfile({
      ...profile,
      loyaltyPoints: profile.loyaltyPoints + earned,
      lifetimePointsEarned: profile.lifetimePointsEarned + earned,
      ordersCount: profile.ordersCount + 1,
      totalSpentCents: profile.totalSpentCents + totalCents,
      updatedAtIso: new Date().toISOString(),
    });

    if (earned === 0) return null;
    return this.recordTransaction(customerId, "EARN", earned, orderId);
  }

  private recordTransaction(
    customerId: string,
    type: LoyaltyTransactionType,
    points: number,
    orderId: string | null,
  ): LoyaltyTransaction {
    const transaction: LoyaltyTransaction = {
      transactionId: `ltx_${randomUUID().slice(0, 12)}`,
      customerId,
      type,
      points,
      orderId,
      balanceAfter: this.getProfile(customerId).loyaltyPoints,
      createdAtIso: new Date().toISOString(),
    };

    this.transactions.unshift(transaction);
    if (this.transactions.length > 5000) this.transactions.length = 5000;
    void this.customerRepository.insertTransaction(transaction)
      .catch((error: unknown) => this.logger.warn(`Persist loyalty transaction failed: ${String(error)}`));
    return transaction;
  }

  private saveProfile(profile: CustomerProfile): CustomerProfile {
    this.profiles.set(profile.customerId, profile);
    void this.customerRepository.upsertProfile(profile)
      .catch((error: unknown) => this.logger.warn(`Persist customer profile failed: ${String(error)}`));
    return profile;
  }

  private defaultProfile(customerId: string): CustomerProfile {
    return {
      customerId,
      displayName: customerId,
      loyaltyPoints: 0,
      lifetimePointsEarned: 0,
      ordersCount: 0,
      totalSpentCents: 0,
      preferences: {
        dietary: [],
        notifications: { orderUpdates: true, promotions: false },
      },
      updatedAtIso: new Date().toISOString(),
    };
  }
}
