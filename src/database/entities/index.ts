import { Site } from './site.entity';
import { ProductionPoint } from './production-point.entity';
import { ReferenceYearPoint } from './reference-year-point.entity';

export { Site, ProductionPoint, ReferenceYearPoint };

export const ENTITIES = [Site, ProductionPoint, ReferenceYearPoint];
