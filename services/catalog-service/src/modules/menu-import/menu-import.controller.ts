import { BadRequestException, Body, Controller, Get, Param, Post, Query } from "@nestjs/common";
import { MenuImportCommitResult, MenuImportPreview } from "@tapau/types";
import { MenuImportCommitDto, MenuImportPreviewDto } from "./dto/menu-import.dto";
import { isMenuImportFilter, MENU_IMPORT_FILTERS, MenuImportService } from "./menu-import.service";

@Controller("catalog/vendors/:vendorId/menu/import")
export class MenuImportController {
  constructor(private readonly menuImportService: MenuImportService) {}

  @Post("preview")
  preview(@Param("vendorId") vendorId: string, @Body() dto: MenuImportPreviewDto): Promise<MenuImportPreview> {
    return this.menuImportService.preview(vendorId, dto);
  }

  @Get(":previewId")
  getPreview(
    @Param("vendorId") vendorId: string,
    @Param("previewId") previewId: string,
    @Query("filter") filter?: string,
  ): Promise<MenuImportPreview> {
    const normalized = (filter || "ALL").toUpperCase();
    if (!isMenuImportFilter(normalized)) {
      throw new BadRequestException(`filter must be one of ${MENU_IMPORT_FILTERS.join(", ")}`);
    }
    return this.menuImportService.getPreview(vendorId, previewId, normalized);
  }

  @Post("commit")
  commit(@Param("vendorId") vendorId: string, @Body() dto: MenuImportCommitDto): Promise<MenuImportCommitResult> {
    return this.menuImportService.commit(vendorId, dto);
  }
}
