import { DeliveryMethod } from "@tapau/types";
import { isPickup } from "../cart/delivery-method";

type FleetRate = {
  /** Base fee by subtotal band: under RM100, under RM200, from RM200. */
  baseCents: [number, number, number];
  perKmCents: number;
};

export const DEFAULT_DISTANCE_KM = 5;
export const MIN_FEE_CENTS = 500;
export const MAX_FEE_CENTS = 5000;

const OWN_FLEET_RATE: FleetRate = { baseCents: [1000, 500, 0], perKmCents: 200 };
const THIRD_PARTY_RATE: FleetRate = { baseCents: [2000, 1500, 0], perKmCents: 300 };

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export function haversineKm(from: Coordinates, to: Coordinates): number {
  const toRad = (value: number): number => (value * Math.PI) / 180;
  const dLat = toRad(to.latitude - from.latitude);
  const dLng = toRad(to.longitude - from.longitude);
  const a =
    (Math.sin(dLat / 2) ** 2) +
    Math.cos(toRad(from.latitude)) * Math.cos(toRad(to.latitude)) * (Math.sin(dLng / 2) ** 2);
  return 6371 * (2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a)));
}

export function toCoordinates(point: { latitude?: number; longitude?: number } | null | undefined): Coordinates | null {
  if (!point || point.latitude === undefined || point.longitude === undefined) return null;
  return { latitude: point.latitude, longitude: point.longitude };
}

export function computeDeliveryFee(deliveryMethod: DeliveryMethod, subtotalCents: number, distanceKm: number): number {
  if (isPickup(deliveryMethod)) return 0;

  // scheduled deliveries go out with the vendor's own fleet
  const rate = deliveryMethod === "THIRD_PARTY" ? THIRD_PARTY_RATE : OWN_FLEET_RATE;
  const band = subtotalCents < 10000 ? 0 : subtotalCents < 20000 ? 1 : 2;
  const fee = rate.baseCents[band] + Math.round(rate.perKmCents * distanceKm);

  if (fee <= 0) return 0;
  return Math.min(MAX_FEE_CENTS, Math.max(MIN_FEE_CENTS, fee));
}
