import { Body, Controller, Get, Param, Patch, Query } from "@nestjs/common";
import { CustomerProfile, LoyaltySummary, LoyaltyTransaction } from "@tapau/types";
import { CustomerService } from "./customer.service";
import { UpdateCustomerProfileDto } from "./dto/customer.dto";

@Controller("customers")
export class CustomerController {
  constructor(private readonly customerService: CustomerService) {}

  @Get(":customerId/profile")
  profile(@Param("customerId") customerId: string): CustomerProfile {
    return this.customerService.getProfile(customerId);
  }

  @Patch(":customerId/profile")
  updateProfile(@Param("customerId") customerId: string, @Body() dto: UpdateCustomerProfileDto): CustomerProfile {
    return this.customerService.updateProfile(customerId, dto);
  }

  @Get(":customerId/loyalty")
  loyalty(@Param("customerId") customerId: string): LoyaltySummary {
    return this.customerService.getLoyaltySummary(customerId);
  }

  @Get(":customerId/loyalty/transactions")
  loyaltyTransactions(
    @Param("customerId") customerId: string,
    @Query("limit") limit?: string,
    @Query("offset") offset?: string,
  ): LoyaltyTransaction[] {
    return this.customerService.listTransactions(customerId, Number(limit || 25), Number(offset || 0));
  }
}
