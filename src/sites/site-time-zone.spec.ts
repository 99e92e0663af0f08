import { ConfigurationError } from '../common/errors';
import { captureError } from '../../test/utils/test-helpers';
import {
  isValidTimeZone,
  resolveSiteTimeZone,
  timeZoneForCountry,
} from './site-time-zone';

describe('site time zones', () => {
  describe('isValidTimeZone', () => {
    it('should accept IANA names and fixed offsets', () => {
      expect(isValidTimeZone('Europe/Berlin')).toBe(true);
      expect(isValidTimeZone('UTC+5:30')).toBe(true);
    });

    it('should reject unknown names', () => {
      expect(isValidTimeZone('Mars/Olympus')).toBe(false);
    });
  });

  describe('timeZoneForCountry', () => {
    it('should match country names case-insensitively', () => {
      expect(timeZoneForCountry('India')).toBe('Asia/Kolkata');
      expect(timeZoneForCountry('  INDIA ')).toBe('Asia/Kolkata');
    });

    it('should return null for missing or unknown countries', () => {
      expect(timeZoneForCountry(null)).toBeNull();
      expect(timeZoneForCountry('Atlantis')).toBeNull();
    });
  });

  describe('resolveSiteTimeZone', () => {
    const indianSite = { country: 'India' };

    it('should prefer the explicit zone', () => {
      expect(resolveSiteTimeZone(indianSite, 'UTC', 'Europe/Berlin')).toBe(
        'Europe/Berlin',
      );
    });

    it("should fall back to the site's country, then the default", () => {
      expect(resolveSiteTimeZone(indianSite, 'UTC')).toBe('Asia/Kolkata');
      expect(resolveSiteTimeZone({ country: null }, 'UTC')).toBe('UTC');
    });

    it('should reject an unknown explicit zone', () => {
      const error = captureError(
        () => resolveSiteTimeZone(indianSite, 'UTC', 'Mars/Olympus'),
        ConfigurationError,
      );
      expect(error.message).toBe("Unknown time zone 'Mars/Olympus'");
    });

    it('should reject an unknown default zone', () => {
      const error = captureError(
        () => resolveSiteTimeZone({ country: null }, 'Nowhere/Town'),
        ConfigurationError,
      );
      expect(error.message).toBe("Unknown default time zone 'Nowhere/Town'");
    });
  });
});
