export type DeliveryMethod =
  | "CUSTOMER_PICKUP"
  | "SALES_AGENT_PICKUP"
  | "OWN_FLEET"
  | "THIRD_PARTY"
  | "SCHEDULED";

export type OrderStatus =
  | "PENDING"
  | "CONFIRMED"
  | "PREPARING"
  | "READY"
  | "OUT_FOR_DELIVERY"
  | "DELIVERED"
  | "CANCELLED";

export type PaymentMethod = "CARD" | "WALLET" | "CASH";

export type PaymentStatus = "PENDING" | "PAID" | "FAILED" | "REFUNDED";

export type OrderAction =
  | "CANCEL"
  | "TRACK"
  | "CONFIRM_PICKUP"
  | "CONTACT_DRIVER"
  | "RATE"
  | "REORDER";

export type CheckoutIssueCode =
  | "CART_EMPTY"
  | "ADDRESS_REQUIRED"
  | "SCHEDULE_REQUIRED"
  | "SCHEDULE_INVALID"
  | "CUSTOMIZATION_REQUIRED"
  | "ITEM_UNAVAILABLE"
  | "BELOW_MINIMUM_ORDER";

export interface DeliveryAddress {
  line1: string;
  line2?: string;
  city: string;
  postcode: string;
  latitude?: number;
  longitude?: number;
}

export interface CartSelection {
  groupId: string;
  optionIds: string[];
}

export interface LineCustomization {
  groupId: string;
  groupName: string;
  required: boolean;
  optionIds: string[];
  optionNames: string[];
  surchargeCents: number;
}

export interface CartLine {
  lineId: string;
  itemId: string;
  vendorId: string;
  name: string;
  unitPriceCents: number;
  customizations: LineCustomization[];
  customizationSurchargeCents: number;
  quantity: number;
  note: string;
  minQuantity: number;
  maxQuantity: number | null;
  isAvailable: boolean;
  lineTotalCents: number;
}

export interface CartTotals {
  subtotalCents: number;
  taxCents: number;
  deliveryFeeCents: number;
  promoDiscountCents: number;
  loyaltyDiscountCents: number;
  /** promoDiscountCents + loyaltyDiscountCents, never more than the subtotal. */
  discountCents: number;
  totalCents: number;
  itemCount: number;
}

export interface CheckoutIssue {
  code: CheckoutIssueCode;
  message: string;
  lineId?: string;
}

export interface CheckoutEvaluation {
  allowed: boolean;
  issues: CheckoutIssue[];
}

export interface DeliveryQuote {
  deliveryMethod: DeliveryMethod;
  feeCents: number;
  distanceKm: number;
  estimatedDistance: boolean;
  quotedAtIso: string;
}

export interface CustomerCart {
  customerId: string;
  vendorId: string | null;
  lines: CartLine[];
  deliveryMethod: DeliveryMethod;
  address: DeliveryAddress | null;
  scheduledForIso: string | null;
  promoCode: string | null;
  loyaltyPointsToRedeem: number;
  totals: CartTotals;
  deliveryQuote: DeliveryQuote | null;
  checkout: CheckoutEvaluation;
  updatedAtIso: string;
}

export interface AddCartItemRequest {
  customerId: string;
  vendorId: string;
  itemId: string;
  quantity: number;
  selections?: CartSelection[];
  note?: string;
  replaceCart?: boolean;
}

export interface UpdateCartLineRequest {
  quantity?: number;
  selections?: CartSelection[];
  note?: string;
}

export interface SetDeliveryRequest {
  deliveryMethod: DeliveryMethod;
  address?: DeliveryAddress | null;
  scheduledForIso?: string | null;
}

export interface CheckoutRequest {
  customerId: string;
  paymentMethod: PaymentMethod;
}

export interface OrderStatusChange {
  status: OrderStatus;
  atIso: string;
  reason?: string;
}

export interface OrderRecord {
  orderId: string;
  customerId: string;
  vendorId: string;
  driverId: string | null;
  lines: CartLine[];
  totals: CartTotals;
  deliveryMethod: DeliveryMethod;
  address: DeliveryAddress | null;
  scheduledForIso: string | null;
  promoCode: string | null;
  loyaltyPointsRedeemed: number;
  paymentMethod: PaymentMethod;
  paymentStatus: PaymentStatus;
  status: OrderStatus;
  statusHistory: OrderStatusChange[];
  rating: number | null;
  cancellationReason: string | null;
  createdAtIso: string;
  updatedAtIso: string;
}

export interface OrderStatusView {
  status: OrderStatus;
  label: string;
  color: string;
  description: string;
  isTerminal: boolean;
  actions: OrderAction[];
}

export interface OrderDetails {
  order: OrderRecord;
  view: OrderStatusView;
}

export interface UpdateOrderStatusRequest {
  status: OrderStatus;
  driverId?: string;
  reason?: string;
}

export interface CustomerOrdersResponse {
  customerId: string;
  orders: OrderDetails[];
}

export interface RecordPaymentRequest {
  paymentStatus: "PAID" | "FAILED";
  reference?: string;
}

export interface ReorderResponse {
  cart: CustomerCart;
  /** Names of past items that could not be added back. */
  skippedItems: string[];
}
