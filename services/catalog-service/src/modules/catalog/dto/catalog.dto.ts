import { DIETARY_TAGS, DietaryTag, SelectionMode } from "@tapau/types";
import { Type } from "class-transformer";
import {
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Length,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from "class-validator";

const SELECTION_MODES: readonly SelectionMode[] = ["SINGLE", "MULTIPLE"];

export class OnboardVendorDto {
  @IsString()
  ownerUserId!: string;

  @IsString()
  @Length(2, 100)
  name!: string;

  @IsString()
  @MaxLength(500)
  description!: string;

  @IsArray()
  @IsString({ each: true })
  cuisineTags!: string[];

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

export class CustomizationOptionDto {
  @IsString()
  optionId!: string;

  @IsString()
  @Length(1, 60)
  name!: string;

  @IsInt()
  @Min(0)
  @Max(99999)
  surchargeCents!: number;

  @IsOptional()
  @IsBoolean()
  isDefault?: boolean;

  @IsOptional()
  @IsBoolean()
  isAvailable?: boolean;
}

export class CustomizationGroupDto {
  @IsString()
  groupId!: string;

  @IsString()
  @Length(1, 60)
  name!: string;

  @IsBoolean()
  required!: boolean;

  @IsIn(SELECTION_MODES)
  selectionMode!: SelectionMode;

  @IsOptional()
  @IsInt()
  @Min(1)
  maxSelections?: number | null;

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => CustomizationOptionDto)
  options!: CustomizationOptionDto[];
}

export class CatalogItemDto {
  @IsString()
  itemId!: string;

  @IsString()
  @Length(2, 100)
  name!: string;

  @IsString()
  @MaxLength(500)
  description!: string;

  @IsInt()
  @Min(1)
  @Max(999999)
  priceCents!: number;

  @IsBoolean()
  isAvailable!: boolean;

  @IsOptional()
  @IsInt()
  @Min(1)
  minQuantity?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  maxQuantity?: number | null;

  @IsOptional()
  @IsIn(DIETARY_TAGS, { each: true })
  dietaryTags?: DietaryTag[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CustomizationGroupDto)
  customizations?: CustomizationGroupDto[];
}

export class CatalogSectionDto {
  @IsString()
  sectionId!: string;

  @IsString()
  @Length(1, 60)
  title!: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CatalogItemDto)
  items!: CatalogItemDto[];
}

export class UpsertVendorMenuDto {
  @IsString()
  vendorId!: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CatalogSectionDto)
  sections!: CatalogSectionDto[];
}

export class VendorSearchQueryDto {
  @IsOptional()
  @IsString()
  @MaxLength(120)
  q?: string;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  lat?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  lng?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  radiusKm?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  limit?: number;
}

export class NearbyVendorsQueryDto {
  @Type(() => Number)
  @IsNumber()
  lat!: number;

  @Type(() => Number)
  @IsNumber()
  lng!: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  radiusKm?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  limit?: number;
}
