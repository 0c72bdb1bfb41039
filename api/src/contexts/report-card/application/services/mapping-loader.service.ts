import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs/promises';
import * as path from 'path';
import { FieldMappingVO } from '../../domain/value-objects';
import { MappingLoadError } from '../../domain/errors';
import { resolveReportCardConfig } from '../../config/report-card.config';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

@Injectable()
export class MappingLoaderService {
  private readonly logger = new Logger(MappingLoaderService.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Legacy layout: <mappingsDir>/<class_name>_mapping.json
   */
  resolvePathForClass(className: string): string {
    const { mappingsDir } = resolveReportCardConfig(this.configService);
    return path.resolve(mappingsDir, `${className.trim().replace(/ /g, '_')}_mapping.json`);
  }

  /**
   * Flat JSON object: placeholder key -> column letter
   */
  async load(mappingPath: string): Promise<FieldMappingVO> {
    let text: string;
    try {
      text = await fs.readFile(mappingPath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new MappingLoadError(`Mapping file not found: ${mappingPath}`, mappingPath, { cause: error });
      }
      throw new MappingLoadError(`Cannot read mapping file: ${mappingPath}`, mappingPath, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text.replace(/^\uFEFF/, ''));
    } catch (error) {
      throw new MappingLoadError(`Mapping file is not valid JSON: ${mappingPath}`, mappingPath, { cause: error });
    }

    if (!isPlainObject(parsed)) {
      throw new MappingLoadError(
        `Mapping file must contain a JSON object of field -> column letter: ${mappingPath}`,
        mappingPath,
      );
    }

    const columns: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value !== 'string') {
        throw new MappingLoadError(
          `Mapping value for "${key}" must be a column letter string, got ${Array.isArray(value) ? 'array' : typeof value}`,
          mappingPath,
        );
      }
      columns[key] = value;
    }

    let mapping: FieldMappingVO;
    try {
      mapping = FieldMappingVO.create(columns);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MappingLoadError(`Invalid mapping file ${mappingPath}: ${reason}`, mappingPath, { cause: error });
    }

    this.logger.log(`Loaded ${mapping.size} field mappings from ${mappingPath}`);
    return mapping;
  }
}
