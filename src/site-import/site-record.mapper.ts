import { DateTime } from 'luxon';
import { isRecord } from '../common/utils/is-record';
import { SiteAttributes } from '../sites/interfaces/site-store.interface';

export type SiteRecordMapping =
  | { ok: true; attributes: SiteAttributes }
  | { ok: false; reason: string };

/**
 * Date layouts seen in the listing, tried after ISO 8601.
 * Values without an offset are taken as UTC.
 */
const DATE_FORMATS = [
  'yyyy-MM-dd HH:mm:ss',
  'yyyy-MM-dd HH:mm',
  'yyyy-MM-dd',
  'M/d/yyyy H:mm',
  'M/d/yyyy',
];

/** Epoch values below this are seconds, above are milliseconds */
const EPOCH_MS_THRESHOLD = 1e11;

function readString(
  record: Record<string, unknown>,
  ...keys: string[]
): string | null {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
  }
  return null;
}

function readNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function parseSiteId(value: unknown): number | null {
  const id = readNumber(value);
  return id !== null && Number.isInteger(id) && id > 0 ? id : null;
}

/**
 * Installed capacity in kW.
 *
 * Plain numbers are kW. Strings may carry a unit: "4.5kWp", "5000 W",
 * "1.2 MW". Missing or unreadable values yield 0.
 */
export function parseCapacityKw(value: unknown): number {
  const plain = readNumber(value);
  if (plain !== null) {
    return plain >= 0 ? plain : 0;
  }
  if (typeof value !== 'string') {
    return 0;
  }

  const text = value.toLowerCase().replace(/,/g, '');
  const units: Array<[RegExp, number]> = [
    [/([\d.]+)\s*mw/, 1000],
    [/([\d.]+)\s*k/, 1],
    [/([\d.]+)\s*w/, 0.001],
  ];
  for (const [pattern, factor] of units) {
    const match = pattern.exec(text);
    if (match) {
      const amount = Number.parseFloat(match[1]);
      if (Number.isFinite(amount) && amount >= 0) {
        return amount * factor;
      }
    }
  }
  return 0;
}

/**
 * Parse an API date into a UTC instant, or null when unreadable.
 */
export function parseApiDate(value: unknown): Date | null {
  const epoch = readNumber(value);
  if (epoch !== null) {
    if (epoch <= 0) return null;
    return new Date(epoch < EPOCH_MS_THRESHOLD ? epoch * 1000 : epoch);
  }
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }

  const text = value.trim();
  const iso = DateTime.fromISO(text, { zone: 'utc' });
  if (iso.isValid) {
    return iso.toJSDate();
  }
  for (const format of DATE_FORMATS) {
    const parsed = DateTime.fromFormat(text, format, { zone: 'utc' });
    if (parsed.isValid) {
      return parsed.toJSDate();
    }
  }
  return null;
}

function validCoordinates(
  latitude: number | null,
  longitude: number | null,
): { latitude: number | null; longitude: number | null } {
  if (
    latitude === null ||
    longitude === null ||
    Math.abs(latitude) > 90 ||
    Math.abs(longitude) > 180
  ) {
    return { latitude: null, longitude: null };
  }
  return { latitude, longitude };
}

/**
 * Coordinates from explicit latitude/longitude fields, a "lat,lng"
 * location string, or a location object.
 */
export function parseCoordinates(record: Record<string, unknown>): {
  latitude: number | null;
  longitude: number | null;
} {
  const explicit = validCoordinates(
    readNumber(record.latitude),
    readNumber(record.longitude),
  );
  if (explicit.latitude !== null) {
    return explicit;
  }

  const location = record.location;
  if (typeof location === 'string') {
    const match = /^\s*(-?\d+(?:\.\d+)?)\s*,\s*(-?\d+(?:\.\d+)?)\s*$/.exec(
      location,
    );
    if (match) {
      return validCoordinates(Number(match[1]), Number(match[2]));
    }
  }
  if (isRecord(location)) {
    return validCoordinates(
      readNumber(location.lat ?? location.latitude),
      readNumber(location.lng ?? location.lon ?? location.longitude),
    );
  }
  return { latitude: null, longitude: null };
}

/**
 * Map one raw listing record to Site attributes.
 */
export function mapSiteRecord(record: unknown): SiteRecordMapping {
  if (!isRecord(record)) {
    return { ok: false, reason: 'Record is not an object' };
  }

  const siteId = parseSiteId(record.id);
  if (siteId === null) {
    return {
      ok: false,
      reason: `Record has no usable id: ${JSON.stringify(record.id ?? null)}`,
    };
  }

  return {
    ok: true,
    attributes: {
      siteId,
      name: readString(record, 'urlName', 'name'),
      status: readString(record, 'status'),
      siteType: readString(record, 'type'),
      zipCode: readString(record, 'zip', 'zipCode'),
      address: readString(record, 'address'),
      secondaryAddress: readString(record, 'secondaryAddress'),
      country: readString(record, 'country'),
      state: readString(record, 'state'),
      city: readString(record, 'city'),
      ...parseCoordinates(record),
      capacityKw: parseCapacityKw(record.peakPower),
      installationDate: parseApiDate(record.installationDate),
      lastReportingTime: parseApiDate(record.lastReportingTime),
    },
  };
}
