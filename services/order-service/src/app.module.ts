import { Module } from "@nestjs/common";
import { ObservabilityModule } from "@tapau/observability";
import { AuditController } from "./modules/audit/audit.controller";
import { AuditRepository } from "./modules/audit/repository/audit.repository";
import { AuditService } from "./modules/audit/audit.service";
import { CartController } from "./modules/cart/cart.controller";
import { CartRepository } from "./modules/cart/repository/cart.repository";
import { CartService } from "./modules/cart/cart.service";
import { PromoCodeService } from "./modules/cart/promo-code.service";
import { CatalogClient } from "./modules/catalog/catalog.client";
import { CustomerController } from "./modules/customer/customer.controller";
import { CustomerRepository } from "./modules/customer/repository/customer.repository";
import { CustomerService } from "./modules/customer/customer.service";
import { DeliveryFeeService } from "./modules/delivery-fee/delivery-fee.service";
import { OrderController } from "./modules/order/order.controller";
import { OrderRepository } from "./modules/order/repository/order.repository";
import { OrderService } from "./modules/order/order.service";
import { RealtimeEventsService } from "./modules/realtime/realtime-events.service";
import { RealtimeGateway } from "./modules/realtime/realtime.gateway";

@Module({
  imports: [ObservabilityModule.register("order-service")],
  controllers: [CartController, OrderController, CustomerController, AuditController],
  providers: [
    CartService,
    CartRepository,
    PromoCodeService,
    CatalogClient,
    DeliveryFeeService,
    OrderService,
    OrderRepository,
    CustomerService,
    CustomerRepository,
    RealtimeEventsService,
    RealtimeGateway,
    AuditService,
    AuditRepository,
  ],
})
export class AppModule {}
