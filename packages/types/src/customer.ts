import { DietaryTag } from "./catalog";

export type LoyaltyTier = "BRONZE" | "SILVER" | "GOLD" | "PLATINUM" | "DIAMOND";

export type LoyaltyTransactionType = "EARN" | "REDEEM" | "REFUND";

export interface NotificationPreferences {
  orderUpdates: boolean;
  promotions: boolean;
}

export interface CustomerPreferences {
  dietary: DietaryTag[];
  notifications: NotificationPreferences;
}

export interface CustomerProfile {
  customerId: string;
  displayName: string;
  loyaltyPoints: number;
  lifetimePointsEarned: number;
  ordersCount: number;
  totalSpentCents: number;
  preferences: CustomerPreferences;
  updatedAtIso: string;
}

export interface UpdateCustomerProfileRequest {
  displayName?: string;
  preferences?: {
    dietary?: DietaryTag[];
    notifications?: Partial<NotificationPreferences>;
  };
}

export interface LoyaltyTransaction {
  transactionId: string;
  customerId: string;
  type: LoyaltyTransactionType;
  points: number;
  orderId: string | null;
  balanceAfter: number;
  createdAtIso: string;
}

export interface LoyaltySummary {
  customerId: string;
  availablePoints: number;
  lifetimePointsEarned: number;
  tier: LoyaltyTier;
  multiplier: number;
  nextTier: LoyaltyTier | null;
  pointsToNextTier: number;
  recentTransactions: LoyaltyTransaction[];
}
