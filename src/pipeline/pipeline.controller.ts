import {
  BadRequestException,
  Controller,
  HttpCode,
  Post,
  Query,
} from '@nestjs/common';
import { DownloadSummary } from '../production/csv-download.service';
import { UploadSummary } from '../production/production-upload.service';
import { ProfileSummary } from '../profiles/yearly-profile.service';
import { ImportSummary } from '../site-import/site-import.service';
import { PipelineService } from './pipeline.service';

/**
 * PipelineController
 *
 * Operator triggers for each pipeline stage. Every call runs the stage to
 * completion and returns its summary.
 *
 * Endpoints:
 * - POST /pipeline/import-sites?limit=500
 * - POST /pipeline/download-csvs
 * - POST /pipeline/upload-production
 * - POST /pipeline/calculate-profiles?recompute=true
 */
@Controller('pipeline')
export class PipelineController {
  constructor(private readonly pipelineService: PipelineService) {}

  @Post('import-sites')
  @HttpCode(200)
  async importSites(@Query('limit') limit?: string): Promise<ImportSummary> {
    let parsedLimit: number | undefined;
    if (limit !== undefined && limit !== '') {
      parsedLimit = Number(limit);
      if (!Number.isInteger(parsedLimit) || parsedLimit < 0) {
        throw new BadRequestException(
          'Query parameter "limit" must be a non-negative integer',
        );
      }
    }
    return this.pipelineService.importSites(parsedLimit);
  }

  @Post('download-csvs')
  @HttpCode(200)
  async downloadCsvs(): Promise<DownloadSummary> {
    return this.pipelineService.downloadCsvs();
  }

  @Post('upload-production')
  @HttpCode(200)
  async uploadProduction(): Promise<UploadSummary> {
    return this.pipelineService.uploadProduction();
  }

  @Post('calculate-profiles')
  @HttpCode(200)
  async calculateProfiles(
    @Query('recompute') recompute?: string,
  ): Promise<ProfileSummary> {
    return this.pipelineService.calculateProfiles({
      recompute: recompute === 'true' || recompute === '1',
    });
  }
}
