export { monitoringConfig } from './monitoring.config';
export type { MonitoringConfig } from './monitoring.config';
export { productionConfig } from './production.config';
export type { ProductionConfig } from './production.config';
export { profilesConfig } from './profiles.config';
export type { ProfilesConfig } from './profiles.config';
export { databaseConfig } from './database.config';
export type { DatabaseConfig } from './database.config';
