import {
  BadRequestException,
  Body,
  Controller,
  Logger,
  NotFoundException,
  Param,
  ParseIntPipe,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ConfigurationError } from '../common/errors';
import { SiteStage, isStageReached } from '../sites/site-stage';
import { SitesService } from '../sites/sites.service';
import {
  IngestSummary,
  ProductionIngestService,
} from './production-ingest.service';

export interface ProductionUploadResponse extends IngestSummary {
  /** true when the site was marked uploaded */
  uploaded: boolean;
}

interface ProductionUploadBody {
  timeZone?: string;
}

/**
 * ProductionController
 *
 * Manual production upload for a single site.
 *
 * Usage:
 *   POST /sites/42/production
 *   Content-Type: multipart/form-data
 *   Body: file=<csv_file>&timeZone=Europe/Berlin
 */
@Controller('sites')
export class ProductionController {
  private readonly logger = new Logger(ProductionController.name);

  constructor(
    private readonly ingestService: ProductionIngestService,
    private readonly sitesService: SitesService,
  ) {}

  @Post(':siteId/production')
  @UseInterceptors(FileInterceptor('file'))
  async uploadProduction(
    @Param('siteId', ParseIntPipe) siteId: number,
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() body: ProductionUploadBody,
  ): Promise<ProductionUploadResponse> {
    if (!file) {
      throw new BadRequestException('No file uploaded. Use form field "file".');
    }
    const site = await this.sitesService.getById(siteId);
    if (!site) {
      throw new NotFoundException(`Site ${siteId} not found`);
    }

    this.logger.log(
      `Production upload for site ${siteId}: ${file.originalname}, size=${file.size} bytes`,
    );

    let result: IngestSummary;
    try {
      result = await this.ingestService.ingest(site, file.buffer, {
        timeZone: body.timeZone || undefined,
      });
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }

    const uploaded =
      result.completed && result.rowsRead - result.rowsSkipped > 0;
    if (uploaded) {
      // A manually supplied file stands in for the export download.
      if (!isStageReached(site, SiteStage.Downloaded)) {
        await this.sitesService.markStage(siteId, SiteStage.Downloaded);
      }
      await this.sitesService.markStage(siteId, SiteStage.Uploaded);
    }

    return { ...result, uploaded };
  }
}
