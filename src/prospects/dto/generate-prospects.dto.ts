import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';

export class GenerateProspectsDto {
  @IsString()
  @IsNotEmpty()
  icp!: string;

  @IsInt()
  @Min(1)
  @Max(50)
  @IsOptional()
  count?: number;

  @IsBoolean()
  @IsOptional()
  fallbackOnly?: boolean;
}
