import { Body, Controller, Get, Param, Post, Query } from "@nestjs/common";
import { CatalogVendorSearchResponse, VendorMenu, VendorOnboardingResponse, VendorProfile } from "@tapau/types";
import { CatalogService } from "./catalog.service";
import { NearbyVendorsQueryDto, OnboardVendorDto, UpsertVendorMenuDto, VendorSearchQueryDto } from "./dto/catalog.dto";

@Controller("catalog/vendors")
export class CatalogController {
  constructor(private readonly catalog: CatalogService) {}

  @Post()
  onboard(@Body() dto: OnboardVendorDto): Promise<VendorOnboardingResponse> {
    return this.catalog.onboardVendor(dto);
  }

  @Get()
  list(): Promise<VendorProfile[]> {
    return this.catalog.listVendors();
  }

  @Get("search")
  search(@Query() query: VendorSearchQueryDto): Promise<CatalogVendorSearchResponse> {
    return this.catalog.searchVendors(query);
  }

  // lat and lng are required here; search treats them as optional
  @Get("nearby")
  nearby(@Query() query: NearbyVendorsQueryDto): Promise<CatalogVendorSearchResponse> {
    return this.catalog.nearbyVendors(query.lat, query.lng, query.radiusKm, query.limit);
  }

  @Post("menu")
  upsertMenu(@Body() dto: UpsertVendorMenuDto): Promise<VendorMenu> {
    return this.catalog.upsertVendorMenu(dto);
  }

  @Get(":vendorId")
  vendor(@Param("vendorId") vendorId: string): VendorProfile {
    return this.catalog.getVendor(vendorId);
  }

  @Get(":vendorId/menu")
  menu(@Param("vendorId") vendorId: string): Promise<VendorMenu> {
    return this.catalog.getVendorMenu(vendorId);
  }
}
