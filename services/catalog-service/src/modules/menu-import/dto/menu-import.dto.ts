import { IsBoolean, IsOptional, IsString, Length, MaxLength } from "class-validator";

export class MenuImportPreviewDto {
  @IsString()
  @Length(1, 200)
  fileName!: string;

  // roughly 500 rows of generous width
  @IsString()
  @MaxLength(1_000_000)
  content!: string;
}

export class MenuImportCommitDto {
  @IsString()
  previewId!: string;

  @IsOptional()
  @IsBoolean()
  includeWarnings?: boolean;
}
