import { CatalogVendorSearchItem, CatalogVendorSearchResponse, VendorMenu, VendorProfile } from "@tapau/types";

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

export interface VendorSearchQuery {
  text: string;
  origin: GeoPoint | null;
  radiusKm: number;
  limit: number;
}

export interface SearchableVendor {
  vendor: VendorProfile;
  menu: VendorMenu | undefined;
}

const EARTH_RADIUS_KM = 6371;

const WEIGHTS = { text: 0.6, distance: 0.25, open: 0.15 } as const;

export function clamp(value: number | undefined, min: number, max: number, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(min, Math.round(value)));
}

/** Returns null unless both coordinates are present and on the globe. */
export function toGeoPoint(latitude?: number, longitude?: number): GeoPoint | null {
  if (latitude === undefined || longitude === undefined) return null;
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) return null;
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) return null;
  return { latitude, longitude };
}

export function distanceKm(from: GeoPoint, to: GeoPoint): number {
  const rad = (degrees: number): number => (degrees * Math.PI) / 180;
  const dLat = rad(to.latitude - from.latitude);
  const dLng = rad(to.longitude - from.longitude);
  const h = Math.sin(dLat / 2) ** 2 + Math.cos(rad(from.latitude)) * Math.cos(rad(to.latitude)) * Math.sin(dLng / 2) ** 2;
  return EARTH_RADIUS_KM * 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

// vendor text plus every available item name and dietary tag on its menu
export function searchableText({ vendor, menu }: SearchableVendor): string {
  const itemWords = (menu?.sections ?? [])
    .flatMap((section) => section.items)
    .filter((item) => item.isAvailable)
    .flatMap((item) => [item.name, ...item.dietaryTags]);
  return [vendor.name, vendor.description, ...vendor.cuisineTags, ...itemWords].join(" ").toLowerCase();
}

export function scoreVendor(entry: SearchableVendor, terms: string[], query: VendorSearchQuery): CatalogVendorSearchItem | null {
  const text = searchableText(entry);
  const matchedTerms = terms.filter((term) => text.includes(term));
  if (terms.length > 0 && matchedTerms.length === 0) return null;

  const { vendor } = entry;
  const location = toGeoPoint(vendor.latitude, vendor.longitude);
  const km = query.origin && location ? distanceKm(query.origin, location) : null;
  if (km !== null && km > query.radiusKm) return null;

  const textScore = terms.length === 0 ? 0.35 : matchedTerms.length / terms.length;
  const distanceScore = km === null ? 0.2 : Math.max(0, 1 - km / query.radiusKm);
  const score = WEIGHTS.text * textScore + WEIGHTS.distance * distanceScore + (vendor.isOpen ? WEIGHTS.open : 0);

  return {
    vendor,
    distanceKm: km === null ? null : Number(km.toFixed(2)),
    rankScore: Number(score.toFixed(4)),
    matchedTerms,
  };
}

/** Every term is matched as a substring; a vendor needs at least one hit. */
export function searchVendors(entries: SearchableVendor[], query: VendorSearchQuery): CatalogVendorSearchResponse {
  const terms = query.text.toLowerCase().split(/\s+/).filter(Boolean);
  const items = entries
    .map((entry) => scoreVendor(entry, terms, query))
    .filter((item): item is CatalogVendorSearchItem => item !== null)
    .sort((a, b) => b.rankScore - a.rankScore)
    .slice(0, query.limit);

  return {
    query: query.text,
    origin: query.origin ?? undefined,
    radiusKm: query.radiusKm,
    limit: query.limit,
    total: items.length,
    items,
  };
}
