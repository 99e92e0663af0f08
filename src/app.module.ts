import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import {
  databaseConfig,
  DatabaseConfig,
  monitoringConfig,
  productionConfig,
  profilesConfig,
} from './config';
import { ENTITIES } from './database/entities';
import { MonitoringModule } from './monitoring/monitoring.module';
import { PipelineModule } from './pipeline/pipeline.module';
import { ProductionModule } from './production/production.module';
import { ProfilesModule } from './profiles/profiles.module';
import { SiteImportModule } from './site-import/site-import.module';
import { SitesModule } from './sites/sites.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [databaseConfig, monitoringConfig, productionConfig, profilesConfig],
    }),
    TypeOrmModule.forRootAsync({
      inject: [databaseConfig.KEY],
      useFactory: (db: DatabaseConfig) => ({
        type: 'postgres',
        host: db.host,
        port: db.port,
        username: db.username,
        password: db.password,
        database: db.database,
        schema: db.schema,
        entities: ENTITIES,
        synchronize: db.synchronize,
        logging: db.logging,
      }),
    }),
    MonitoringModule,
    SitesModule,
    SiteImportModule,
    ProductionModule,
    ProfilesModule,
    PipelineModule,
  ],
})
export class AppModule {}
