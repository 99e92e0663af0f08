import {
  mapSiteRecord,
  parseApiDate,
  parseCapacityKw,
  parseCoordinates,
  parseSiteId,
} from './site-record.mapper';
import { apiSiteRecord } from '../../test/utils/mock-data';

describe('site-record.mapper', () => {
  describe('parseSiteId', () => {
    it('should accept positive integers and numeric strings', () => {
      expect(parseSiteId(42)).toBe(42);
      expect(parseSiteId(' 17 ')).toBe(17);
    });

    it('should reject everything else', () => {
      expect(parseSiteId(0)).toBeNull();
      expect(parseSiteId(-3)).toBeNull();
      expect(parseSiteId(1.5)).toBeNull();
      expect(parseSiteId('abc')).toBeNull();
      expect(parseSiteId(undefined)).toBeNull();
    });
  });

  describe('parseCapacityKw', () => {
    it('should treat plain numbers as kW', () => {
      expect(parseCapacityKw(7.2)).toBe(7.2);
      expect(parseCapacityKw('3')).toBe(3);
    });

    it('should convert units', () => {
      expect(parseCapacityKw('5.5 kW')).toBe(5.5);
      expect(parseCapacityKw('4.5kWp')).toBe(4.5);
      expect(parseCapacityKw('5000 W')).toBe(5);
      expect(parseCapacityKw('1.2 MW')).toBe(1200);
      expect(parseCapacityKw('1,200 W')).toBeCloseTo(1.2);
    });

    it('should fall back to 0', () => {
      expect(parseCapacityKw(null)).toBe(0);
      expect(parseCapacityKw('unknown')).toBe(0);
      expect(parseCapacityKw(-5)).toBe(0);
    });
  });

  describe('parseApiDate', () => {
    it('should read ISO 8601', () => {
      expect(parseApiDate('2021-03-15T08:30:00+02:00')?.toISOString()).toBe(
        '2021-03-15T06:30:00.000Z',
      );
    });

    it('should read listing layouts as UTC', () => {
      expect(parseApiDate('2024-02-01 10:30:00')?.toISOString()).toBe(
        '2024-02-01T10:30:00.000Z',
      );
      expect(parseApiDate('3/7/2022 9:05')?.toISOString()).toBe(
        '2022-03-07T09:05:00.000Z',
      );
    });

    it('should read epochs in seconds and milliseconds', () => {
      expect(parseApiDate(1672531200)?.toISOString()).toBe(
        '2023-01-01T00:00:00.000Z',
      );
      expect(parseApiDate(1672531200000)?.toISOString()).toBe(
        '2023-01-01T00:00:00.000Z',
      );
    });

    it('should return null for unreadable values', () => {
      expect(parseApiDate('someday')).toBeNull();
      expect(parseApiDate('')).toBeNull();
      expect(parseApiDate(null)).toBeNull();
    });
  });

  describe('parseCoordinates', () => {
    it('should prefer explicit fields', () => {
      expect(parseCoordinates({ latitude: '52.5', longitude: 13.4 })).toEqual({
        latitude: 52.5,
        longitude: 13.4,
      });
    });

    it('should read a location string or object', () => {
      expect(parseCoordinates({ location: '28.6, 77.2' })).toEqual({
        latitude: 28.6,
        longitude: 77.2,
      });
      expect(parseCoordinates({ location: { lat: 1, lon: 2 } })).toEqual({
        latitude: 1,
        longitude: 2,
      });
    });

    it('should drop out-of-range values', () => {
      expect(parseCoordinates({ latitude: 95, longitude: 10 })).toEqual({
        latitude: null,
        longitude: null,
      });
    });
  });

  describe('mapSiteRecord', () => {
    it('should map a listing record to site attributes', () => {
      expect(mapSiteRecord(apiSiteRecord(9))).toEqual({
        ok: true,
        attributes: {
          siteId: 9,
          name: 'site-9',
          status: 'Active',
          siteType: 'Residential',
          zipCode: '10115',
          address: '9 Main St',
          secondaryAddress: null,
          country: 'Germany',
          state: 'Berlin',
          city: 'Berlin',
          latitude: null,
          longitude: null,
          capacityKw: 5.5,
          installationDate: new Date('2021-03-15T00:00:00.000Z'),
          lastReportingTime: new Date('2024-02-01T10:30:00.000Z'),
        },
      });
    });

    it('should fall back to name when urlName is absent', () => {
      const mapping = mapSiteRecord(
        apiSiteRecord(9, { urlName: undefined, name: 'Roof Array' }),
      );
      expect(mapping.ok && mapping.attributes.name).toBe('Roof Array');
    });

    it('should reject records without a usable id', () => {
      expect(mapSiteRecord({ name: 'x' })).toEqual({
        ok: false,
        reason: 'Record has no usable id: null',
      });
      expect(mapSiteRecord('nope')).toEqual({
        ok: false,
        reason: 'Record is not an object',
      });
    });
  });
});
