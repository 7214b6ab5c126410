import { Body, Controller, Delete, Get, Param, Patch, Post, Put } from "@nestjs/common";
import { CustomerCart } from "@tapau/types";
import { CartService } from "./cart.service";
import {
  AddCartItemDto,
  ApplyPromoDto,
  LoyaltyRedemptionDto,
  SetDeliveryDto,
  UpdateCartLineDto,
} from "./dto/cart.dto";

@Controller("cart")
export class CartController {
  constructor(private readonly cartService: CartService) {}

  @Get(":customerId")
  cart(@Param("customerId") customerId: string): CustomerCart {
    return this.cartService.getCart(customerId);
  }

  @Post(":customerId/refresh")
  async refresh(@Param("customerId") customerId: string): Promise<CustomerCart> {
    return this.cartService.refreshCart(customerId);
  }

  @Post("items")
  async addItem(@Body() dto: AddCartItemDto): Promise<CustomerCart> {
    return this.cartService.addItem(dto);
  }

  @Patch(":customerId/lines/:lineId")
  async updateLine(
    @Param("customerId") customerId: string,
    @Param("lineId") lineId: string,
    @Body() dto: UpdateCartLineDto,
  ): Promise<CustomerCart> {
    return this.cartService.updateLine(customerId, lineId, dto);
  }

  @Delete(":customerId/lines/:lineId")
  async removeLine(@Param("customerId") customerId: string, @Param("lineId") lineId: string): Promise<CustomerCart> {
    return this.cartService.removeLine(customerId, lineId);
  }

  @Delete(":customerId")
  async clear(@Param("customerId") customerId: string): Promise<CustomerCart> {
    return this.cartService.clearCart(customerId);
  }

  @Put(":customerId/delivery")
  async setDelivery(@Param("customerId") customerId: string, @Body() dto: SetDeliveryDto): Promise<CustomerCart> {
    return this.cartService.setDelivery(customerId, dto);
  }

  @Post(":customerId/promo")
  async applyPromo(@Param("customerId") customerId: string, @Body() dto: ApplyPromoDto): Promise<CustomerCart> {
    return this.cartService.applyPromo(customerId, dto.code);
  }

  @Delete(":customerId/promo")
  async removePromo(@Param("customerId") customerId: string): Promise<CustomerCart> {
    return this.cartService.removePromo(customerId);
  }

  @Put(":customerId/loyalty")
  async setLoyalty(@Param("customerId") customerId: string, @Body() dto: LoyaltyRedemptionDto): Promise<CustomerCart> {
    return this.cartService.setLoyaltyRedemption(customerId, dto.points);
  }
}
