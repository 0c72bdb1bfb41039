import { IsBoolean, IsInt, IsObject, IsOptional, IsString, IsNotEmpty, Max, Min } from 'class-validator';
import { Type } from 'class-transformer';
import type { RecordOutcome } from '../../../domain/value-objects';

export class ReportCardRunDto {
  @IsString()
  @IsNotEmpty()
  excelPath!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  mappingPath?: string;

  @IsString()
  @IsNotEmpty()
  className!: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  headerRowsToSkip?: number;

  /** field key -> format name, e.g. { "attendance": "percent" } */
  @IsOptional()
  @IsObject()
  fieldFormats?: Record<string, string>;
}

export class ValidateReportCardsDto extends ReportCardRunDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  templatePath?: string;
}

export class PreviewReportCardsDto extends ReportCardRunDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  limit?: number;
}

export class GenerateReportCardsDto extends ReportCardRunDto {
  @IsString()
  @IsNotEmpty()
  templatePath!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  outputDir?: string;

  @IsOptional()
  @IsBoolean()
  convertToPdf?: boolean;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  displayNameField?: string;
}

export class ConverterStatusResponseDto {
  available!: boolean;
  path!: string | null;
  version!: string | null;
}

export class ValidationResponseDto {
  valid!: boolean;
  mappingPath!: string;
  errors!: string[];
  warnings!: string[];
  totalStudents!: number;
}

export class PreviewResponseDto {
  fields!: Array<Record<string, string>>;
}

export class RunReportResponseDto {
  className!: string;
  outputDir!: string;
  totalRecords!: number;
  successCount!: number;
  failureCount!: number;
  cancelled!: boolean;
  outcomes!: RecordOutcome[];
  warnings!: string[];
  startedAt!: string;
  finishedAt!: string;
}
