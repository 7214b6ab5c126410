import { UnifiedPersistence } from "@tapau/persistence";
import { DeliveryAddress, DeliveryMethod, DeliveryQuote } from "@tapau/types";
import { Injectable, Logger } from "@nestjs/common";
import { getOrderEnv } from "../../config/env";
import { isPickup } from "../cart/delivery-method";
import { Coordinates, DEFAULT_DISTANCE_KM, computeDeliveryFee, haversineKm, toCoordinates } from "./delivery-fee.rules";

export interface DeliveryQuoteInput {
  deliveryMethod: DeliveryMethod;
  subtotalCents: number;
  vendor: { latitude?: number; longitude?: number } | null;
  address: DeliveryAddress | null;
}

@Injectable()
export class DeliveryFeeService {
  private readonly logger = new Logger(DeliveryFeeService.name);
  private readonly env = getOrderEnv();
  private readonly cache = new UnifiedPersistence({
    namespace: "order-service:delivery-fee",
    redisUrl: this.env.redisUrl,
    log: (message: string) => this.logger.log(message),
  });

  async quote(input: DeliveryQuoteInput): Promise<DeliveryQuote> {
    const from = toCoordinates(input.vendor);
    const to = toCoordinates(input.address);
    const cacheKey = [
      input.deliveryMethod,
      input.subtotalCents,
      from ? `${from.latitude},${from.longitude}` : "-",
      to ? `${to.latitude},${to.longitude}` : "-",
    ].join("|");

    return this.cache.remember(cacheKey, this.env.deliveryFeeCacheTtlSeconds, () => this.price(input, from, to));
  }

  private price(input: DeliveryQuoteInput, from: Coordinates | null, to: Coordinates | null): DeliveryQuote {
    const estimatedDistance = !from || !to;
    const distanceKm = isPickup(input.deliveryMethod)
      ? 0
      : from && to ? Number(haversineKm(from, to).toFixed(2)) : DEFAULT_DISTANCE_KM;

    const quote: DeliveryQuote = {
      deliveryMethod: input.deliveryMethod,
      feeCents: computeDeliveryFee(input.deliveryMethod, input.subtotalCents, distanceKm),
      distanceKm,
      estimatedDistance: !isPickup(input.deliveryMethod) && estimatedDistance,
      quotedAtIso: new Date().toISOString(),
    };

    return quote;
  }
}
