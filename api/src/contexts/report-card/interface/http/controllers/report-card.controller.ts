import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  BadRequestException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ReportCardGeneratorService } from '../../../application/services';
import { fieldDictToRecord } from '../../../domain/value-objects';
import { ConverterUnavailableError, MappingLoadError, ValidationFailure } from '../../../domain/errors';
import {
  ConverterStatusResponseDto,
  GenerateReportCardsDto,
  PreviewReportCardsDto,
  PreviewResponseDto,
  RunReportResponseDto,
  ValidateReportCardsDto,
  ValidationResponseDto,
} from '../dto';

/**
 * Setup errors become HTTP errors; anything else propagates as a 500
 */
function toHttpException(error: unknown): unknown {
  if (error instanceof ValidationFailure) {
    return new BadRequestException({ message: 'Validation failed', errors: error.errors });
  }
  if (error instanceof MappingLoadError) {
    return new BadRequestException({ message: error.message, errors: [error.message] });
  }
  if (error instanceof ConverterUnavailableError) {
    return new ServiceUnavailableException(error.message);
  }
  return error;
}

@Controller('report-cards')
export class ReportCardController {
  constructor(private readonly generatorService: ReportCardGeneratorService) {}

  /**
   * LibreOffice availability
   * GET /api/report-cards/converter
   */
  @Get('converter')
  async converterStatus(): Promise<ConverterStatusResponseDto> {
    return this.generatorService.converterStatus();
  }

  /**
   * Pre-flight checks without generating anything
   * POST /api/report-cards/validate
   */
  @Post('validate')
  @HttpCode(HttpStatus.OK)
  async validate(@Body() dto: ValidateReportCardsDto): Promise<ValidationResponseDto> {
    return this.generatorService.validate(dto);
  }

  /**
   * POST /api/report-cards/preview
   */
  @Post('preview')
  @HttpCode(HttpStatus.OK)
  async preview(@Body() dto: PreviewReportCardsDto): Promise<PreviewResponseDto> {
    const { limit, ...params } = dto;
    try {
      const fields = await this.generatorService.preview(params, limit);
      return { fields: fields.map(fieldDictToRecord) };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  /**
   * Fill and convert one document per student
   * POST /api/report-cards/generate
   */
  @Post('generate')
  @HttpCode(HttpStatus.OK)
  async generate(@Body() dto: GenerateReportCardsDto): Promise<RunReportResponseDto> {
    try {
      const report = await this.generatorService.generate(dto);
      return {
        ...report,
        startedAt: report.startedAt.toISOString(),
        finishedAt: report.finishedAt.toISOString(),
      };
    } catch (error) {
      throw toHttpException(error);
    }
  }
}
