import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { productionConfig } from '../config/production.config';
import { profilesConfig } from '../config/profiles.config';
import { ReferenceYearPoint } from '../database/entities/reference-year-point.entity';
import { ProductionModule } from '../production/production.module';
import { SitesModule } from '../sites/sites.module';
import { ProfileNormalizerService } from './profile-normalizer.service';
import { ReferenceYearStore } from './reference-year.store';
import { YearlyProfileService } from './yearly-profile.service';

/**
 * ProfilesModule
 *
 * Reference-year normalization and its batch runner.
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([ReferenceYearPoint]),
    ConfigModule.forFeature(profilesConfig),
    ConfigModule.forFeature(productionConfig),
    ProductionModule,
    SitesModule,
  ],
  providers: [ProfileNormalizerService, ReferenceYearStore, YearlyProfileService],
  exports: [ProfileNormalizerService, YearlyProfileService],
})
export class ProfilesModule {}
