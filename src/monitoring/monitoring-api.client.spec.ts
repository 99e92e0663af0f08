import { Test, TestingModule } from '@nestjs/testing';
import { FetchError } from '../common/errors';
import { monitoringConfig } from '../config/monitoring.config';
import { listingPage } from '../../test/utils/mock-data';
import {
  captureRejection,
  testMonitoringConfig,
  textResponse,
} from '../../test/utils/test-helpers';
import { TolerantJsonDecoder } from './decoding/tolerant-json.decoder';
import { CleanupJsonStrategy } from './decoding/strategies/cleanup-json.strategy';
import { LenientJsonStrategy } from './decoding/strategies/lenient-json.strategy';
import { StrictJsonStrategy } from './decoding/strategies/strict-json.strategy';
import {
  MonitoringApiClient,
  computeBackoffDelay,
} from './monitoring-api.client';

// Mock global fetch
const mockFetch = jest.fn();
global.fetch = mockFetch;

const LISTING_URL =
  'http://monitoring.test/sites/list?start=20&limit=10&sort=maxImpact&dir=ASC&status=0&category=0&filter=&showMap=false';

describe('computeBackoffDelay', () => {
  it('should double the delay per attempt', () => {
    expect(computeBackoffDelay(1, 1000, 30000, () => 0)).toBe(1000);
    expect(computeBackoffDelay(2, 1000, 30000, () => 0)).toBe(2000);
    expect(computeBackoffDelay(3, 1000, 30000, () => 0)).toBe(4000);
  });

  it('should add up to 50% jitter', () => {
    expect(computeBackoffDelay(3, 1000, 30000, () => 0.5)).toBe(5000);
    expect(computeBackoffDelay(1, 1000, 30000, () => 1)).toBe(1500);
  });

  it('should cap the exponential part at the max delay', () => {
    expect(computeBackoffDelay(10, 1000, 30000, () => 0)).toBe(30000);
    expect(computeBackoffDelay(10, 1000, 30000, () => 1)).toBe(45000);
  });
});

describe('MonitoringApiClient', () => {
  let client: MonitoringApiClient;

  beforeEach(async () => {
    mockFetch.mockReset();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MonitoringApiClient,
        TolerantJsonDecoder,
        StrictJsonStrategy,
        CleanupJsonStrategy,
        LenientJsonStrategy,
        { provide: monitoringConfig.KEY, useValue: testMonitoringConfig() },
      ],
    }).compile();

    client = module.get<MonitoringApiClient>(MonitoringApiClient);
  });

  describe('fetchPage', () => {
    it('should request the listing with the paging parameters', async () => {
      mockFetch.mockResolvedValueOnce(textResponse(listingPage([21, 22], 22)));

      const page = await client.fetchPage(20, 10);

      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(mockFetch.mock.calls[0][0]).toBe(LISTING_URL);
      expect(page.totalCount).toBe(22);
      expect(page.records).toHaveLength(2);
    });

    it('should read a string totalCount and default a missing one to null', async () => {
      mockFetch
        .mockResolvedValueOnce(textResponse('{"records": [], "totalCount": "25"}'))
        .mockResolvedValueOnce(textResponse('{"records": []}'));

      await expect(client.fetchPage(0, 10)).resolves.toEqual({
        records: [],
        totalCount: 25,
      });
      await expect(client.fetchPage(0, 10)).resolves.toEqual({
        records: [],
        totalCount: null,
      });
    });

    it('should decode a malformed but recoverable body', async () => {
      mockFetch.mockResolvedValueOnce(
        textResponse('{"records": [{"id": 5,}], viewDashboard: true, "totalCount": 1}'),
      );

      const page = await client.fetchPage(0, 10);

      expect(page).toEqual({ records: [{ id: 5 }], totalCount: 1 });
    });

    it('should retry 5xx responses until one succeeds', async () => {
      mockFetch
        .mockResolvedValueOnce(textResponse('oops', 502))
        .mockResolvedValueOnce(textResponse('oops', 503))
        .mockResolvedValueOnce(textResponse(listingPage([1], 1)));

      const page = await client.fetchPage(0, 10);

      expect(mockFetch).toHaveBeenCalledTimes(3);
      expect(page.records).toHaveLength(1);
    });

    it('should retry 429 and transport errors', async () => {
      mockFetch
        .mockResolvedValueOnce(textResponse('slow down', 429))
        .mockRejectedValueOnce(new TypeError('fetch failed'))
        .mockResolvedValueOnce(textResponse(listingPage([1], 1)));

      await client.fetchPage(0, 10);

      expect(mockFetch).toHaveBeenCalledTimes(3);
    });

    it('should stop after maxAttempts with a retryable FetchError', async () => {
      mockFetch.mockImplementation(() =>
        Promise.resolve(textResponse('unavailable', 503)),
      );

      const error = await captureRejection(client.fetchPage(0, 10), FetchError);

      expect(mockFetch).toHaveBeenCalledTimes(3);
      expect(error.attempts).toBe(3);
      expect(error.retryable).toBe(true);
      expect(error.status).toBe(503);
    });

    it('should fail a 4xx immediately without retrying', async () => {
      mockFetch.mockResolvedValueOnce(
        textResponse('{"message": "unknown list"}', 404),
      );

      const error = await captureRejection(client.fetchPage(0, 10), FetchError);

      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(error.retryable).toBe(false);
      expect(error.status).toBe(404);
      expect(error.message).toBe(
        `Request to ${LISTING_URL.replace('start=20', 'start=0')} was rejected with HTTP 404: unknown list`,
      );
    });

    it('should re-request an undecodable page exactly once', async () => {
      mockFetch
        .mockResolvedValueOnce(textResponse('<html>maintenance</html>'))
        .mockResolvedValueOnce(textResponse(listingPage([3], 1)));

      const page = await client.fetchPage(0, 10);

      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(page.records).toHaveLength(1);
    });

    it('should give up after the second undecodable page', async () => {
      mockFetch.mockImplementation(() =>
        Promise.resolve(textResponse('<html>maintenance</html>')),
      );

      const error = await captureRejection(client.fetchPage(0, 10), FetchError);

      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(error.retryable).toBe(true);
      expect(error.attempts).toBe(2);
    });

    it('should treat a payload without records as undecodable', async () => {
      mockFetch.mockImplementation(() =>
        Promise.resolve(textResponse('{"sites": []}')),
      );

      await expect(client.fetchPage(0, 10)).rejects.toThrow(
        'Unparseable listing page at offset 0',
      );
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });
  });

  describe('downloadSiteCsv', () => {
    it('should request the chart export for the range', async () => {
      mockFetch.mockResolvedValueOnce(textResponse('Time,System Production (W)\n'));

      const csv = await client.downloadSiteCsv(42, {
        start: new Date('2023-01-01T00:00:00Z'),
        end: new Date('2023-01-02T00:00:00Z'),
      });

      expect(csv).toBe('Time,System Production (W)\n');
      expect(mockFetch.mock.calls[0][0]).toBe(
        'http://monitoring.test/charts/42/chartExport?st=1672531200000&et=1672617600000&fid=42&timeUnit=2&pn0=Power&id0=0&t0=0&hasMeters=false',
      );
    });
  });
});
