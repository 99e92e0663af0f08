import { DateTime } from 'luxon';
import { ConfigurationError } from '../common/errors';
import countryTimeZones from './data/country-time-zones.json';

/**
 * Countries observing a single civil time zone, keyed by lowercase name.
 */
const COUNTRY_TIME_ZONES: Record<string, string> = countryTimeZones;

/**
 * True for IANA names ("Asia/Kolkata") and fixed offsets ("UTC+5:30").
 */
export function isValidTimeZone(zone: string): boolean {
  return DateTime.now().setZone(zone).isValid;
}

export function timeZoneForCountry(
  country: string | null | undefined,
): string | null {
  if (!country) return null;
  return COUNTRY_TIME_ZONES[country.trim().toLowerCase()] ?? null;
}

/**
 * Resolve the zone a site's local timestamps are written in:
 * explicit override, then the site's country, then the fallback.
 */
export function resolveSiteTimeZone(
  site: { country: string | null },
  fallback: string,
  explicit?: string | null,
): string {
  if (explicit) {
    if (!isValidTimeZone(explicit)) {
      throw new ConfigurationError(`Unknown time zone '${explicit}'`);
    }
    return explicit;
  }

  const fromCountry = timeZoneForCountry(site.country);
  if (fromCountry) {
    return fromCountry;
  }

  if (!isValidTimeZone(fallback)) {
    throw new ConfigurationError(`Unknown default time zone '${fallback}'`);
  }
  return fallback;
}
