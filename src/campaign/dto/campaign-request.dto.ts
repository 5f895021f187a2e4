import { Type } from 'class-transformer';
import {
  IsArray,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';

export class ProspectRowDto {
  @IsString()
  @IsOptional()
  name?: string;

  @IsString()
  @IsOptional()
  title?: string;

  @IsString()
  company!: string;

  @IsString()
  @IsOptional()
  website?: string;

  @IsString()
  @IsOptional()
  email?: string;

  @IsString()
  @IsOptional()
  country?: string;

  @IsString()
  @IsOptional()
  industry?: string;

  @IsString()
  @IsOptional()
  description?: string;
}

/** Without `prospects` the campaign runs over the last exported CSV. */
export class CampaignRequestDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ProspectRowDto)
  @IsOptional()
  prospects?: ProspectRowDto[];

  @IsInt()
  @Min(1)
  @Max(50)
  @IsOptional()
  limit?: number;
}
