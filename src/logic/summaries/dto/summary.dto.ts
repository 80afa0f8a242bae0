import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, MaxLength, Min } from 'class-validator';
import { EXPORT_FORMATS, ExportFormat, REFINEMENT_INTENTS, RefinementIntent, SUMMARY_SIZES, SummarySize } from '../types';

export class GenerateSummaryDto {
  @IsIn(SUMMARY_SIZES)
  size!: SummarySize;

  // length and denylist rules are enforced by the prompt builder
  @IsOptional()
  @IsString()
  @MaxLength(5000)
  customInstructions?: string;
}

export class RefineSummaryDto {
  @IsIn(REFINEMENT_INTENTS)
  intent!: RefinementIntent;

  @IsOptional()
  @IsString()
  @MaxLength(5000)
  customFeedback?: string;
}

export class CompareQueryDto {
  @Type(() => Number)
  @IsInt()
  @Min(1)
  from!: number;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  to!: number;
}

export class ExportQueryDto {
  @IsOptional()
  @IsIn(EXPORT_FORMATS)
  format?: ExportFormat;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  version?: number;
}
