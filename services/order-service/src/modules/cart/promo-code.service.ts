import { Injectable, Logger } from "@nestjs/common";
import rawPromoCodes from "../../../data/promo-codes.json";
import { formatRinggit } from "./cart.pricing";

export type PromoCode =
  | { code: string; description: string; kind: "PERCENT"; percentOff: number; maxDiscountCents: number | null; minSubtotalCents: number; expiresAtIso: string | null }
  | { code: string; description: string; kind: "FIXED"; amountOffCents: number; minSubtotalCents: number; expiresAtIso: string | null };

export type PromoEligibility = { eligible: true } | { eligible: false; reason: string };

export function normalizePromoCode(code: string): string {
  return code.trim().toUpperCase();
}

export function promoDiscountCents(promo: PromoCode, subtotalCents: number): number {
  if (promo.kind === "FIXED") return Math.min(promo.amountOffCents, subtotalCents);
  const discount = Math.floor((subtotalCents * promo.percentOff) / 100);
  return promo.maxDiscountCents === null ? discount : Math.min(discount, promo.maxDiscountCents);
}

export function parsePromoCodes(raw: unknown): PromoCode[] {
  if (!Array.isArray(raw)) throw new Error("promo codes must be an array");
  return raw.map((entry: unknown, index): PromoCode => {
    if (typeof entry !== "object" || entry === null) throw new Error(`promo code #${index} is not an object`);
    const code = field(entry, "code");
    const description = field(entry, "description");
    const kind = field(entry, "kind");
    const minSubtotalCents = field(entry, "minSubtotalCents");
    const expiresAtIso = field(entry, "expiresAtIso");
    if (typeof code !== "string" || typeof description !== "string" || typeof minSubtotalCents !== "number") {
      throw new Error(`promo code #${index} is missing code, description or minSubtotalCents`);
    }
    const expiry = typeof expiresAtIso === "string" ? expiresAtIso : null;

    if (kind === "PERCENT") {
      const percentOff = field(entry, "percentOff");
      const maxDiscountCents = field(entry, "maxDiscountCents");
      if (typeof percentOff !== "number") throw new Error(`promo code ${code} needs percentOff`);
      return {
        code: normalizePromoCode(code),
        description,
        kind: "PERCENT",
        percentOff,
        maxDiscountCents: typeof maxDiscountCents === "number" ? maxDiscountCents : null,
        minSubtotalCents,
        expiresAtIso: expiry,
      };
    }
    if (kind === "FIXED") {
      const amountOffCents = field(entry, "amountOffCents");
      if (typeof amountOffCents !== "number") throw new Error(`promo code ${code} needs amountOffCents`);
      return { code: normalizePromoCode(code), description, kind: "FIXED", amountOffCents, minSubtotalCents, expiresAtIso: expiry };
    }
    throw new Error(`promo code ${code} has unknown kind ${String(kind)}`);
  });
}

function field(entry: object, key: string): unknown {
  return Object.entries(entry).find(([name]) => name === key)?.[1];
}

@Injectable()
export class PromoCodeService {
  private readonly logger = new Logger(PromoCodeService.name);
  private readonly codes: Map<string, PromoCode>;

  constructor() {
    this.codes = new Map(parsePromoCodes(rawPromoCodes).map((promo) => [promo.code, promo]));
    this.logger.log(`Loaded ${this.codes.size} promo codes`);
  }

  find(code: string): PromoCode | null {
    return this.codes.get(normalizePromoCode(code)) || null;
  }

  checkEligibility(promo: PromoCode, subtotalCents: number, now: Date): PromoEligibility {
    if (promo.expiresAtIso && Date.parse(promo.expiresAtIso) <= now.getTime()) {
      return { eligible: false, reason: `${promo.code} has expired` };
    }
    if (subtotalCents < promo.minSubtotalCents) {
      return { eligible: false, reason: `${promo.code} needs a subtotal of at least ${formatRinggit(promo.minSubtotalCents)}` };
    }
    return { eligible: true };
  }

  discountFor(code: string | null, subtotalCents: number, now: Date): number {
    if (!code) return 0;
    const promo = this.find(code);
    if (!promo) return 0;
    if (!this.checkEligibility(promo, subtotalCents, now).eligible) return 0;
    return promoDiscountCents(promo, subtotalCents);
  }
}
