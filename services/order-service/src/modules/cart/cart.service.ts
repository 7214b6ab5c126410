import {
  AddCartItemRequest,
  CartLine,
  CustomerCart,
  SetDeliveryRequest,
  UpdateCartLineRequest,
  VendorMenu,
} from "@tapau/types";
import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
  OnModuleInit,
} from "@nestjs/common";
import { KeyedQueue } from "@tapau/persistence";
import { getOrderEnv } from "../../config/env";
import { CatalogClient } from "../catalog/catalog.client";
import { CustomerService } from "../customer/customer.service";
import { DeliveryFeeService } from "../delivery-fee/delivery-fee.service";
import {
  buildCartLine,
  computeTotals,
  findMenuItem,
  foldLines,
  quantityError,
  resolveSelections,
  selectionsOf,
  withQuantity,
} from "./cart.pricing";
import { CheckoutRules, evaluateCheckout } from "./cart.validation";
import { requiresSchedule } from "./delivery-method";
import { PromoCodeService } from "./promo-code.service";
import { CartRepository, StoredCart } from "./repository/cart.repository";

export interface ReorderResult {
  cart: CustomerCart;
  skippedItems: string[];
}

@Injectable()
export class CartService implements OnModuleInit {
  private readonly logger = new Logger(CartService.name);
  private readonly env = getOrderEnv();
  private readonly carts = new Map<string, CustomerCart>();
  private readonly queue = new KeyedQueue();

  constructor(
    private readonly catalog: CatalogClient,
    private readonly deliveryFees: DeliveryFeeService,
    private readonly promoCodes: PromoCodeService,
    private readonly customers: CustomerService,
    private readonly cartRepository: CartRepository,
  ) {}

  async onModuleInit(): Promise<void> {
    const stored = await this.cartRepository.loadCarts();
    if (!stored) return;

    for (const cart of stored) this.carts.set(cart.customerId, this.withCheckoutState(cart));
    this.logger.log(`Hydrated ${stored.length} carts from repository`);
  }

  getCart(customerId: string): CustomerCart {
    return this.carts.get(customerId) || this.emptyCart(customerId);
  }

  /**
   * Runs `work` after every earlier change to the customer's cart has
   * settled. Each public mutation goes through here; checkout holds it while
   * it turns the cart into an order.
   */
  withCartLock<T>(customerId: string, work: () => Promise<T> | T): Promise<T> {
    return this.queue.run(customerId, work);
  }

  /** Re-reads prices and availability from the catalog. */
  refreshCart(customerId: string): Promise<CustomerCart> {
    return this.withCartLock(customerId, () => this.refreshNow(customerId));
  }

  addItem(input: AddCartItemRequest): Promise<CustomerCart> {
    return this.withCartLock(input.customerId, () => this.addItemNow(input));
  }

  updateLine(customerId: string, lineId: string, input: UpdateCartLineRequest): Promise<CustomerCart> {
    return this.withCartLock(customerId, () => this.updateLineNow(customerId, lineId, input));
  }

  removeLine(customerId: string, lineId: string): Promise<CustomerCart> {
    return this.withCartLock(customerId, () => this.removeLineNow(customerId, lineId));
  }

  clearCart(customerId: string): Promise<CustomerCart> {
    return this.withCartLock(customerId, () => this.save(this.withCheckoutState(this.withoutLines(this.getCart(customerId)))));
  }

  setDelivery(customerId: string, input: SetDeliveryRequest): Promise<CustomerCart> {
    return this.withCartLock(customerId, async () => {
      const cart = this.getCart(customerId);
      const next: CustomerCart = {
        ...cart,
        deliveryMethod: input.deliveryMethod,
        address: input.address !== undefined ? input.address : cart.address,
        scheduledForIso: requiresSchedule(input.deliveryMethod)
          ? (input.scheduledForIso !== undefined ? input.scheduledForIso : cart.scheduledForIso)
          : null,
      };
      return this.save(await this.reprice(next, null));
    });
  }

  applyPromo(customerId: string, code: string): Promise<CustomerCart> {
    return this.withCartLock(customerId, async () => {
      const promo = this.promoCodes.find(code);
      if (!promo) throw new NotFoundException("Promo code not found");

      const cart = await this.refreshNow(customerId);
      const eligibility = this.promoCodes.checkEligibility(promo, cart.totals.subtotalCents, new Date());
      if (!eligibility.eligible) throw new BadRequestException(eligibility.reason);

      return this.save(await this.reprice({ ...cart, promoCode: promo.code }, null));
    });
  }

  removePromo(customerId: string): Promise<CustomerCart> {
    return this.withCartLock(customerId, async () =>
      this.save(await this.reprice({ ...this.getCart(customerId), promoCode: null }, null)));
  }

  setLoyaltyRedemption(customerId: string, points: number): Promise<CustomerCart> {
    return this.withCartLock(customerId, async () => {
      const available = this.customers.getProfile(customerId).loyaltyPoints;
      if (points > available) throw new BadRequestException(`Only ${available} loyalty points available`);
      return this.save(await this.reprice({ ...this.getCart(customerId), loyaltyPointsToRedeem: points }, null));
    });
  }

  /**
   * Fresh prices, fees and checkout issues for the cart about to be ordered.
   * Call inside `withCartLock`.
   */
  async prepareCheckout(customerId: string): Promise<CustomerCart> {
    const cart = this.getCart(customerId);
    if (cart.lines.length === 0) return this.withCheckoutState(cart);
    return this.save(await this.reprice(cart, null));
  }

  /** Empties the cart after an order is placed; delivery choice and address stay. Call inside `withCartLock`. */
  resetAfterCheckout(customerId: string): CustomerCart {
    const cart = this.getCart(customerId);
    return this.save(this.withCheckoutState({ ...this.withoutLines(cart), scheduledForIso: null }));
  }

  addLinesFromOrder(
    customerId: string,
    vendorId: string,
    previous: CartLine[],
    replaceCart: boolean,
  ): Promise<ReorderResult> {
    return this.withCartLock(customerId, () => this.addLinesNow(customerId, vendorId, previous, replaceCart));
  }

  private async refreshNow(customerId: string): Promise<CustomerCart> {
    const cart = this.getCart(customerId);
    if (cart.lines.length === 0) return cart;
    return this.save(await this.reprice(cart, null));
  }

  private async addItemNow(input: AddCartItemRequest): Promise<CustomerCart> {
    const { menu, item } = await this.catalog.getItem(input.vendorId, input.itemId);
    if (!item.isAvailable) throw new BadRequestException(`${item.name} is currently unavailable`);

    let cart: StoredCart = this.getCart(input.customerId);
    if (cart.vendorId && cart.vendorId !== input.vendorId && cart.lines.length > 0) {
      if (!input.replaceCart) {
        throw new ConflictException({
          code: "VENDOR_CONFLICT",
          message: "Cart already contains items from another vendor",
          currentVendorId: cart.vendorId,
        });
      }
      this.logger.log(`Replacing cart of ${input.customerId} (vendor ${cart.vendorId} -> ${input.vendorId})`);
      cart = this.withoutLines(cart);
    }

    const resolved = resolveSelections(item, input.selections || []);
    if (resolved.errors.length > 0) {
      throw new BadRequestException({ message: "Invalid customization selection", errors: resolved.errors });
    }

    const candidate = buildCartLine(input.vendorId, item, resolved.customizations, input.quantity, input.note || "");
    const existing = cart.lines.find((line) => line.lineId === candidate.lineId);
    const line = existing ? withQuantity(candidate, existing.quantity + input.quantity) : candidate;
    this.assertQuantity(line);

    const lines = existing
      ? cart.lines.map((current) => (current.lineId === line.lineId ? line : current))
      : [...cart.lines, line];

    return this.save(await this.reprice({ ...cart, vendorId: input.vendorId, lines }, menu));
  }

  private async updateLineNow(customerId: string, lineId: string, input: UpdateCartLineRequest): Promise<CustomerCart> {
    const cart = this.getCart(customerId);
    const current = this.getLine(cart, lineId);
    if (input.quantity !== undefined && input.quantity <= 0) return this.removeLineNow(customerId, lineId);

    const menu = await this.catalog.getMenu(current.vendorId);
    const item = findMenuItem(menu, current.itemId);
    const quantity = input.quantity ?? current.quantity;
    const note = input.note ?? current.note;

    let updated: CartLine;
    if (item) {
      const resolved = resolveSelections(item, input.selections || selectionsOf(current));
      if (resolved.errors.length > 0) {
        throw new BadRequestException({ message: "Invalid customization selection", errors: resolved.errors });
      }
      updated = buildCartLine(current.vendorId, item, resolved.customizations, quantity, note);
    } else if (input.selections) {
      throw new BadRequestException(`${current.name} is no longer on the menu`);
    } else {
      updated = { ...withQuantity(current, quantity), note: note.trim() };
    }

    // an edit that makes two lines identical folds them into one
    const twin = cart.lines.find((line) => line.lineId === updated.lineId && line.lineId !== lineId);
    if (twin) updated = withQuantity(updated, twin.quantity + updated.quantity);
    this.assertQuantity(updated);

    const lines: CartLine[] = [];
    for (const line of cart.lines) {
      if (line.lineId === lineId) {
        if (!twin) lines.push(updated);
      } else if (twin && line.lineId === twin.lineId) {
        lines.push(updated);
      } else {
        lines.push(line);
      }
    }

    return this.save(await this.reprice({ ...cart, lines }, menu));
  }

  private async removeLineNow(customerId: string, lineId: string): Promise<CustomerCart> {
    const cart = this.getCart(customerId);
    this.getLine(cart, lineId);
    const lines = cart.lines.filter((line) => line.lineId !== lineId);
    if (lines.length === 0) return this.save(this.withCheckoutState(this.withoutLines(cart)));
    return this.save(await this.reprice({ ...cart, lines }, null));
  }

  private async addLinesNow(
    customerId: string,
    vendorId: string,
    previous: CartLine[],
    replaceCart: boolean,
  ): Promise<ReorderResult> {
    let cart: StoredCart = this.getCart(customerId);
    if (cart.vendorId && cart.vendorId !== vendorId && cart.lines.length > 0) {
      if (!replaceCart) {
        throw new ConflictException({
          code: "VENDOR_CONFLICT",
          message: "Cart already contains items from another vendor",
          currentVendorId: cart.vendorId,
        });
      }
      cart = this.withoutLines(cart);
    }

    const menu = await this.catalog.getMenu(vendorId);
    const skippedItems: string[] = [];
    const lines = [...cart.lines];

    for (const old of previous) {
      const item = findMenuItem(menu, old.itemId);
      if (!item || !item.isAvailable) {
        skippedItems.push(old.name);
        continue;
      }
      const resolved = resolveSelections(item, selectionsOf(old));
      if (resolved.errors.length > 0) {
        skippedItems.push(old.name);
        continue;
      }

      const candidate = buildCartLine(vendorId, item, resolved.customizations, old.quantity, old.note);
      const index = lines.findIndex((line) => line.lineId === candidate.lineId);
      const merged = index >= 0 ? withQuantity(candidate, lines[index].quantity + old.quantity) : candidate;
      const bounded = withQuantity(merged, this.boundQuantity(merged));
      if (index >= 0) lines[index] = bounded;
      else lines.push(bounded);
    }

    if (lines.length === 0) {
      return { cart: this.save(this.withCheckoutState(this.withoutLines(cart))), skippedItems };
    }
    const next = await this.reprice({ ...cart, vendorId, lines }, menu);
    return { cart: this.save(next), skippedItems };
  }

  private async reprice(cart: StoredCart, knownMenu: VendorMenu | null): Promise<CustomerCart> {
    if (cart.lines.length === 0 || !cart.vendorId) {
      return this.withCheckoutState(this.withoutLines(cart));
    }

    const vendorId = cart.vendorId;
    const menu = knownMenu || await this.catalog.getMenu(vendorId);
    const lines = foldLines(cart.lines.map((line) => this.refreshLine(line, menu)));
    const subtotalCents = lines.reduce((sum, line) => sum + line.lineTotalCents, 0);

    const vendor = await this.catalog.getVendor(vendorId);
    const deliveryQuote = await this.deliveryFees.quote({
      deliveryMethod: cart.deliveryMethod,
      subtotalCents,
      vendor,
      address: cart.address,
    });

    const now = new Date();
    const promoDiscountCents = this.promoCodes.discountFor(cart.promoCode, subtotalCents, now);
    const availablePoints = this.customers.getProfile(cart.customerId).loyaltyPoints;
    const totals = computeTotals(lines, {
      deliveryFeeCents: deliveryQuote.feeCents,
      promoDiscountCents,
      loyaltyDiscountCents: Math.min(cart.loyaltyPointsToRedeem, availablePoints),
      taxRateBps: this.env.taxRateBps,
    });

    return {
      ...cart,
      lines,
      totals,
      deliveryQuote,
      checkout: evaluateCheckout({ ...cart, lines, subtotalCents: totals.subtotalCents }, this.rules(), now),
      updatedAtIso: now.toISOString(),
    };
  }

  /**
   * Current price and availability; a withdrawn item or option marks the line
   * unavailable. The line id follows the refreshed options, so a new default
   * option gives the line the id a fresh add of the same item would get.
   */
  private refreshLine(line: CartLine, menu: VendorMenu): CartLine {
    const item = findMenuItem(menu, line.itemId);
    if (!item || !item.isAvailable) return { ...line, isAvailable: false };

    const resolved = resolveSelections(item, selectionsOf(line));
    if (resolved.errors.length > 0) return { ...line, isAvailable: false };

    return buildCartLine(line.vendorId, item, resolved.customizations, line.quantity, line.note);
  }

  private withCheckoutState(cart: StoredCart): CustomerCart {
    const totals = cart.lines.length === 0
      ? computeTotals([], { deliveryFeeCents: 0, promoDiscountCents: 0, loyaltyDiscountCents: 0, taxRateBps: this.env.taxRateBps })
      : cart.totals;
    return {
      ...cart,
      totals,
      deliveryQuote: null,
      checkout: evaluateCheckout({ ...cart, subtotalCents: totals.subtotalCents }, this.rules(), new Date()),
    };
  }

  private withoutLines(cart: StoredCart): StoredCart {
    return {
      customerId: cart.customerId,
      vendorId: null,
      lines: [],
      deliveryMethod: cart.deliveryMethod,
      address: cart.address,
      scheduledForIso: cart.scheduledForIso,
      promoCode: null,
      loyaltyPointsToRedeem: 0,
      totals: cart.totals,
      updatedAtIso: new Date().toISOString(),
    };
  }

  private emptyCart(customerId: string): CustomerCart {
    return this.withCheckoutState({
      customerId,
      vendorId: null,
      lines: [],
      deliveryMethod: "OWN_FLEET",
      address: null,
      scheduledForIso: null,
      promoCode: null,
      loyaltyPointsToRedeem: 0,
      totals: computeTotals([], { deliveryFeeCents: 0, promoDiscountCents: 0, loyaltyDiscountCents: 0, taxRateBps: this.env.taxRateBps }),
      updatedAtIso: new Date().toISOString(),
    });
  }

  private getLine(cart: CustomerCart, lineId: string): CartLine {
    const line = cart.lines.find((candidate) => candidate.lineId === lineId);
    if (!line) throw new NotFoundException("Cart line not found");
    return line;
  }

  private assertQuantity(line: CartLine): void {
    const problem = quantityError(line, line.quantity);
    if (problem) throw new BadRequestException(problem);
  }

  private boundQuantity(line: CartLine): number {
    const atLeastMin = Math.max(line.minQuantity, line.quantity);
    return line.maxQuantity === null ? atLeastMin : Math.min(line.maxQuantity, atLeastMin);
  }

  private rules(): CheckoutRules {
    return {
      minSubtotalCents: this.env.minSubtotalCents,
      scheduleLeadMinutes: this.env.scheduleLeadMinutes,
      businessOpenHour: this.env.businessOpenHour,
      businessCloseHour: this.env.businessCloseHour,
      timezoneOffsetMinutes: this.env.timezoneOffsetMinutes,
    };
  }

  private save(cart: CustomerCart): CustomerCart {
    this.carts.set(cart.customerId, cart);
    void this.cartRepository.upsertCart(cart)
      .catch((error: unknown) => this.logger.warn(`Persist cart failed: ${String(error)}`));
    return cart;
  }
}
