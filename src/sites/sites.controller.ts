import {
  BadRequestException,
  Controller,
  Get,
  Logger,
  NotFoundException,
  Param,
  ParseIntPipe,
  Query,
} from '@nestjs/common';
import { Site } from '../database/entities/site.entity';
import { SitesService } from './sites.service';
import { STAGE_ORDER, SiteStage } from './site-stage';

interface SitesQuery {
  stage?: string;
  country?: string;
}

/**
 * SitesController
 *
 * Read endpoints for operators checking pipeline progress.
 *
 * Endpoints:
 * - GET /sites?stage=uploaded&country=India - List sites, optionally filtered
 * - GET /sites/:siteId - Get a single site
 */
@Controller('sites')
export class SitesController {
  private readonly logger = new Logger(SitesController.name);

  constructor(private readonly sitesService: SitesService) {}

  @Get()
  async getSites(@Query() query: SitesQuery): Promise<Site[]> {
    let stages: SiteStage[] | undefined;
    if (query.stage) {
      const stage = STAGE_ORDER.find((s) => s === query.stage);
      if (!stage) {
        throw new BadRequestException(
          `Invalid stage: ${query.stage}. Expected one of ${STAGE_ORDER.join(', ')}`,
        );
      }
      stages = [stage];
    }

    const sites = await this.sitesService.getAll({
      stages,
      countries: query.country ? [query.country] : undefined,
    });
    this.logger.log(`Returning ${sites.length} sites`);
    return sites;
  }

  @Get(':siteId')
  async getSite(@Param('siteId', ParseIntPipe) siteId: number): Promise<Site> {
    const site = await this.sitesService.getById(siteId);
    if (!site) {
      throw new NotFoundException(`Site ${siteId} not found`);
    }
    return site;
  }
}
