import { Type } from "class-transformer";
import { DeliveryMethod } from "@tapau/types";
import {
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsISO8601,
  IsNumber,
  IsOptional,
  IsString,
  Length,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from "class-validator";
import { DELIVERY_METHODS } from "../delivery-method";

export class CartSelectionDto {
  @IsString()
  groupId!: string;

  @IsArray()
  @IsString({ each: true })
  optionIds!: string[];
}

export class AddCartItemDto {
  @IsString()
  customerId!: string;

  @IsString()
  vendorId!: string;

  @IsString()
  itemId!: string;

  @IsInt()
  @Min(1)
  quantity!: number;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CartSelectionDto)
  selections?: CartSelectionDto[];

  @IsOptional()
  @IsString()
  @MaxLength(200)
  note?: string;

  @IsOptional()
  @IsBoolean()
  replaceCart?: boolean;
}

export class UpdateCartLineDto {
  @IsOptional()
  @IsInt()
  @Min(0)
  quantity?: number;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CartSelectionDto)
  selections?: CartSelectionDto[];

  @IsOptional()
  @IsString()
  @MaxLength(200)
  note?: string;
}

export class DeliveryAddressDto {
  @IsString()
  @Length(1, 200)
  line1!: string;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  line2?: string;

  @IsString()
  @Length(1, 80)
  city!: string;

  @IsString()
  @Length(3, 10)
  postcode!: string;

  @IsOptional()
  @IsNumber()
  @Min(-90)
  @Max(90)
  latitude?: number;

  @IsOptional()
  @IsNumber()
  @Min(-180)
  @Max(180)
  longitude?: number;
}

export class SetDeliveryDto {
  @IsIn(DELIVERY_METHODS)
  deliveryMethod!: DeliveryMethod;

  @IsOptional()
  @ValidateNested()
  @Type(() => DeliveryAddressDto)
  address?: DeliveryAddressDto;

  @IsOptional()
  @IsISO8601()
  scheduledForIso?: string;
}

export class ApplyPromoDto {
  @IsString()
  @Length(1, 40)
  code!: string;
}

export class LoyaltyRedemptionDto {
  @IsInt()
  @Min(0)
  points!: number;
}
