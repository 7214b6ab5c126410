import { UnifiedPersistence } from "@tapau/persistence";
import {
  CatalogSection,
  CatalogVendorSearchResponse,
  UpsertVendorMenuRequest,
  VendorMenu,
  VendorOnboardingRequest,
  VendorOnboardingResponse,
  VendorProfile,
} from "@tapau/types";
import { BadRequestException, Injectable, Logger, NotFoundException, OnModuleInit } from "@nestjs/common";
import { randomUUID } from "crypto";
import { getCatalogEnv } from "../../config/env";
import { menuErrors, normalizeSections } from "./menu.rules";
import { clamp, searchVendors, toGeoPoint } from "./vendor-search";

export interface VendorSearchParams {
  q?: string;
  lat?: number;
  lng?: number;
  radiusKm?: number;
  limit?: number;
}

const CACHE_TTL_SECONDS = { vendors: 15, menu: 30, search: 10 } as const;
const DEFAULT_PREP_MINUTES = 20;
const VENDORS_KEY = "vendors";

@Injectable()
export class CatalogService implements OnModuleInit {
  private readonly logger = new Logger(CatalogService.name);
  private readonly env = getCatalogEnv();
  private readonly vendors = new Map<string, VendorProfile>();
  private readonly menus = new Map<string, VendorMenu>();
  private readonly persistence = new UnifiedPersistence({
    namespace: "catalog-service",
    postgresUrl: this.env.databaseUrl,
    redisUrl: this.env.redisUrl,
    log: (message: string) => this.logger.log(message),
  });
  // part of every search cache key; bumped on each menu write
  private revision = 0;

  async onModuleInit(): Promise<void> {
    const stored = await this.persistence.getState<VendorProfile[]>(VENDORS_KEY);
    for (const vendor of stored ?? []) {
      this.vendors.set(vendor.vendorId, vendor);
      const menu = await this.persistence.getState<VendorMenu>(menuKey(vendor.vendorId));
      this.menus.set(vendor.vendorId, menu ?? emptyMenu(vendor.vendorId));
    }
    if (stored) this.logger.log(`Hydrated ${stored.length} vendors from state`);
  }

  async onboardVendor(input: VendorOnboardingRequest): Promise<VendorOnboardingResponse> {
    const vendor: VendorProfile = {
      vendorId: `vnd_${randomUUID().slice(0, 10)}`,
      ownerUserId: input.ownerUserId,
      name: input.name.trim(),
      description: input.description.trim(),
      isOpen: true,
      prepTimeMinutes: DEFAULT_PREP_MINUTES,
      cuisineTags: input.cuisineTags,
      latitude: input.latitude,
      longitude: input.longitude,
    };

    this.vendors.set(vendor.vendorId, vendor);
    await this.persistence.setState(VENDORS_KEY, [...this.vendors.values()]);
    await this.persistence.deleteCache(VENDORS_KEY);
    await this.saveMenu(emptyMenu(vendor.vendorId));
    this.logger.log(`Onboarded vendor ${vendor.vendorId}`);
    return { vendor };
  }

  getVendor(vendorId: string): VendorProfile {
    const vendor = this.vendors.get(vendorId);
    if (!vendor) throw new NotFoundException("Vendor not found");
    return vendor;
  }

  listVendors(): Promise<VendorProfile[]> {
    return this.persistence.remember(VENDORS_KEY, CACHE_TTL_SECONDS.vendors, () => [...this.vendors.values()]);
  }

  async upsertVendorMenu(input: UpsertVendorMenuRequest): Promise<VendorMenu> {
    this.getVendor(input.vendorId);
    return this.replaceMenu(input.vendorId, normalizeSections(input.sections));
  }

  /** Stores a complete menu after checking ids and customization groups. */
  async replaceMenu(vendorId: string, sections: CatalogSection[]): Promise<VendorMenu> {
    const errors = menuErrors(sections);
    if (errors.length > 0) throw new BadRequestException({ message: "Invalid menu", errors });

    const menu: VendorMenu = { vendorId, sections, updatedAtIso: new Date().toISOString() };
    await this.saveMenu(menu);
    return menu;
  }

  getVendorMenu(vendorId: string): Promise<VendorMenu> {
    return this.persistence.remember(menuKey(vendorId), CACHE_TTL_SECONDS.menu, () => {
      const menu = this.menus.get(vendorId);
      if (!menu) throw new NotFoundException("Menu not found");
      return menu;
    });
  }

  searchVendors(params: VendorSearchParams): Promise<CatalogVendorSearchResponse> {
    const query = {
      text: (params.q ?? "").trim(),
      origin: toGeoPoint(params.lat, params.lng),
      radiusKm: clamp(params.radiusKm, 1, 100, 8),
      limit: clamp(params.limit, 1, 100, 20),
    };
    const cacheKey = [
      `search@${this.revision}`,
      query.text.toLowerCase(),
      query.origin ? `${query.origin.latitude},${query.origin.longitude}` : "-",
      query.radiusKm,
      query.limit,
    ].join("|");

    return this.persistence.remember(cacheKey, CACHE_TTL_SECONDS.search, () =>
      searchVendors(
        [...this.vendors.values()].map((vendor) => ({ vendor, menu: this.menus.get(vendor.vendorId) })),
        query,
      ),
    );
  }

  nearbyVendors(lat: number, lng: number, radiusKm?: number, limit?: number): Promise<CatalogVendorSearchResponse> {
    return this.searchVendors({ lat, lng, radiusKm, limit });
  }

  private async saveMenu(menu: VendorMenu): Promise<void> {
    this.menus.set(menu.vendorId, menu);
    this.revision += 1;
    await this.persistence.setState(menuKey(menu.vendorId), menu);
    await this.persistence.setCache(menuKey(menu.vendorId), JSON.stringify(menu), CACHE_TTL_SECONDS.menu);
  }
}

function menuKey(vendorId: string): string {
  return `menus:${vendorId}`;
}

function emptyMenu(vendorId: string): VendorMenu {
  return { vendorId, sections: [], updatedAtIso: new Date().toISOString() };
}
