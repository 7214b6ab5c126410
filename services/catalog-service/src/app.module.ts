import { Module } from "@nestjs/common";
import { ObservabilityModule } from "@tapau/observability";
import { CatalogController } from "./modules/catalog/catalog.controller";
import { CatalogService } from "./modules/catalog/catalog.service";
import { MenuImportController } from "./modules/menu-import/menu-import.controller";
import { MenuImportService } from "./modules/menu-import/menu-import.service";

@Module({
  imports: [ObservabilityModule.register("catalog-service")],
  controllers: [CatalogController, MenuImportController],
  providers: [CatalogService, MenuImportService],
})
export class AppModule {}
