import { OrderStatus, PaymentMethod } from "@tapau/types";
import { IsBoolean, IsIn, IsInt, IsOptional, IsString, Max, MaxLength, Min } from "class-validator";
import { ORDER_STATUS_FLOW } from "../order-status";

export class CheckoutDto {
  @IsString()
  customerId!: string;

  @IsIn(["CARD", "WALLET", "CASH"])
  paymentMethod!: PaymentMethod;
}

export class UpdateOrderStatusDto {
  @IsIn([...ORDER_STATUS_FLOW, "CANCELLED"])
  status!: OrderStatus;

  @IsOptional()
  @IsString()
  driverId?: string;

  @IsOptional()
  @IsString()
  @MaxLength(300)
  reason?: string;

  @IsOptional()
  @IsString()
  actorKey?: string;
}

export class CustomerOrderActionDto {
  @IsString()
  customerId!: string;
}

export class CancelOrderDto extends CustomerOrderActionDto {
  @IsOptional()
  @IsString()
  @MaxLength(300)
  reason?: string;
}

export class RateOrderDto extends CustomerOrderActionDto {
  @IsInt()
  @Min(1)
  @Max(5)
  rating!: number;
}

export class ReorderDto extends CustomerOrderActionDto {
  @IsOptional()
  @IsBoolean()
  replaceCart?: boolean;
}

export class RecordPaymentDto {
  @IsIn(["PAID", "FAILED"])
  paymentStatus!: "PAID" | "FAILED";

  @IsOptional()
  @IsString()
  @MaxLength(120)
  reference?: string;
}
