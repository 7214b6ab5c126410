import { Type } from "class-transformer";
import { DIETARY_TAGS, DietaryTag } from "@tapau/types";
import { IsArray, IsBoolean, IsIn, IsOptional, IsString, Length, ValidateNested } from "class-validator";

export class NotificationPreferencesDto {
  @IsOptional()
  @IsBoolean()
  orderUpdates?: boolean;

  @IsOptional()
  @IsBoolean()
  promotions?: boolean;
}

export class CustomerPreferencesDto {
  @IsOptional()
  @IsArray()
  @IsIn(DIETARY_TAGS, { each: true })
  dietary?: DietaryTag[];

  @IsOptional()
  @ValidateNested()
  @Type(() => NotificationPreferencesDto)
  notifications?: NotificationPreferencesDto;
}

export class UpdateCustomerProfileDto {
  @IsOptional()
  @IsString()
  @Length(1, 80)
  displayName?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => CustomerPreferencesDto)
  preferences?: CustomerPreferencesDto;
}
