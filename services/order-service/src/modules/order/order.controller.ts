import { Body, Controller, Get, Headers, Param, Patch, Post, Query } from "@nestjs/common";
import { CustomerOrdersResponse, OrderDetails, ReorderResponse } from "@tapau/types";
import { OrderService } from "./order.service";
import {
  CancelOrderDto,
  CheckoutDto,
  CustomerOrderActionDto,
  RateOrderDto,
  RecordPaymentDto,
  ReorderDto,
  UpdateOrderStatusDto,
} from "./dto/order.dto";

@Controller("orders")
export class OrderController {
  constructor(private readonly orderService: OrderService) {}

  @Post("checkout")
  async checkout(
    @Body() dto: CheckoutDto,
    @Headers("x-idempotency-key") idempotencyKey?: string,
  ): Promise<OrderDetails> {
    return this.orderService.checkoutIdempotent(dto, idempotencyKey);
  }

  @Get("customer/:customerId")
  async customerOrders(
    @Param("customerId") customerId: string,
    @Query("limit") limit?: string,
    @Query("offset") offset?: string,
  ): Promise<CustomerOrdersResponse> {
    return this.orderService.listCustomerOrders(customerId, Number(limit || 25), Number(offset || 0));
  }

  @Get(":orderId")
  order(@Param("orderId") orderId: string): OrderDetails {
    return this.orderService.getOrderDetails(orderId);
  }

  @Patch(":orderId/status")
  updateStatus(@Param("orderId") orderId: string, @Body() dto: UpdateOrderStatusDto): OrderDetails {
    return this.orderService.updateStatus(orderId, dto, dto.actorKey);
  }

  @Post(":orderId/cancel")
  cancel(@Param("orderId") orderId: string, @Body() dto: CancelOrderDto): OrderDetails {
    return this.orderService.cancelOrder(orderId, dto.customerId, dto.reason);
  }

  @Post(":orderId/confirm-pickup")
  confirmPickup(@Param("orderId") orderId: string, @Body() dto: CustomerOrderActionDto): OrderDetails {
    return this.orderService.confirmPickup(orderId, dto.customerId);
  }

  @Post(":orderId/rating")
  rate(@Param("orderId") orderId: string, @Body() dto: RateOrderDto): OrderDetails {
    return this.orderService.rateOrder(orderId, dto.customerId, dto.rating);
  }

  @Post(":orderId/payment")
  recordPayment(@Param("orderId") orderId: string, @Body() dto: RecordPaymentDto): OrderDetails {
    return this.orderService.recordPayment(orderId, dto);
  }

  @Post(":orderId/reorder")
  async reorder(@Param("orderId") orderId: string, @Body() dto: ReorderDto): Promise<ReorderResponse> {
    return this.orderService.reorder(orderId, dto.customerId, dto.replaceCart === true);
  }
}
