import { UnifiedPersistence } from "@tapau/persistence";
import { CatalogItem, VendorMenu, VendorProfile } from "@tapau/types";
import { Injectable, Logger, NotFoundException, ServiceUnavailableException } from "@nestjs/common";
import { getOrderEnv } from "../../config/env";
import { findMenuItem } from "../cart/cart.pricing";

/** Reads vendors and menus from the catalog service, with a short-lived cache. */
@Injectable()
export class CatalogClient {
  private readonly logger = new Logger(CatalogClient.name);
  private readonly env = getOrderEnv();
  private readonly cache = new UnifiedPersistence({
    namespace: "order-service:catalog",
    redisUrl: this.env.redisUrl,
    log: (message: string) => this.logger.log(message),
  });

  async getVendor(vendorId: string): Promise<VendorProfile> {
    return this.cached(`vendors:${vendorId}`, `/catalog/vendors/${encodeURIComponent(vendorId)}`, "Vendor not found");
  }

  async getMenu(vendorId: string): Promise<VendorMenu> {
    return this.cached(`vendors:${vendorId}:menu`, `/catalog/vendors/${encodeURIComponent(vendorId)}/menu`, "Menu not found");
  }

  async getItem(vendorId: string, itemId: string): Promise<{ menu: VendorMenu; item: CatalogItem }> {
    const menu = await this.getMenu(vendorId);
    const item = findMenuItem(menu, itemId);
    if (!item) throw new NotFoundException("Item not found");
    return { menu, item };
  }

  private async cached<T>(cacheKey: string, path: string, notFoundMessage: string): Promise<T> {
    return this.cache.remember(cacheKey, this.env.menuCacheTtlSeconds, async () =>
      JSON.parse(await this.fetchJson(path, notFoundMessage)) as T,
    );
  }

  private async fetchJson(path: string, notFoundMessage: string): Promise<string> {
    const url = `${this.env.catalogServiceUrl}${path}`;
    let response: Response;
    try {
      response = await fetch(url, { headers: { accept: "application/json" } });
    } catch (error) {
      this.logger.warn(`Catalog request ${path} failed: ${String(error)}`);
      throw new ServiceUnavailableException("Catalog service is unavailable");
    }

    if (response.status === 404) throw new NotFoundException(notFoundMessage);
    if (!response.ok) {
      this.logger.warn(`Catalog request ${path} returned ${response.status}`);
      throw new ServiceUnavailableException("Catalog service is unavailable");
    }
    return response.text();
  }
}
