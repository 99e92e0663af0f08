import { Test, TestingModule } from '@nestjs/testing';
import { ConfigurationError, FetchError } from '../common/errors';
import { monitoringConfig } from '../config/monitoring.config';
import { MonitoringApiClient, MonitoringPage } from '../monitoring/monitoring-api.client';
import { SiteStage } from '../sites/site-stage';
import { SitesService } from '../sites/sites.service';
import { InMemorySiteStore } from '../../test/utils/in-memory-stores';
import { apiSiteRecord } from '../../test/utils/mock-data';
import { testMonitoringConfig } from '../../test/utils/test-helpers';
import { SiteImportService } from './site-import.service';

/**
 * Serves `records` by offset like the listing endpoint.
 */
function listingApi(records: unknown[], reportTotal = true) {
  return jest.fn(
    async (offset: number, limit: number): Promise<MonitoringPage> => ({
      records: records.slice(offset, offset + limit),
      totalCount: reportTotal ? records.length : null,
    }),
  );
}

/**
 * Ignores the requested limit and always serves `pageLength` records.
 */
function oversizedListingApi(records: unknown[], pageLength: number) {
  return jest.fn(
    async (offset: number, _limit: number): Promise<MonitoringPage> => ({
      records: records.slice(offset, offset + pageLength),
      totalCount: records.length,
    }),
  );
}

function siteRecords(count: number): unknown[] {
  return Array.from({ length: count }, (_, i) => apiSiteRecord(i + 1));
}

describe('SiteImportService', () => {
  let service: SiteImportService;
  let store: InMemorySiteStore;
  const mockApiClient = { fetchPage: jest.fn() };

  beforeEach(async () => {
    jest.clearAllMocks();
    store = new InMemorySiteStore();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SiteImportService,
        { provide: MonitoringApiClient, useValue: mockApiClient },
        { provide: SitesService, useValue: store },
        { provide: monitoringConfig.KEY, useValue: testMonitoringConfig({ pageSize: 10 }) },
      ],
    }).compile();

    service = module.get<SiteImportService>(SiteImportService);
  });

  it('should page through totalCount in three fetches', async () => {
    mockApiClient.fetchPage = listingApi(siteRecords(25));

    const summary = await service.run();

    expect(mockApiClient.fetchPage.mock.calls).toEqual([
      [0, 10],
      [10, 10],
      [20, 10],
    ]);
    expect(summary).toMatchObject({
      fetched: 25,
      created: 25,
      updated: 0,
      skipped: 0,
      failed: 0,
      pages: 3,
      completed: true,
      errors: [],
    });
    expect(store.sites.size).toBe(25);
  });

  it('should be idempotent and keep stage progress', async () => {
    mockApiClient.fetchPage = listingApi(siteRecords(25));
    await service.run();
    await store.markStage(1, SiteStage.Downloaded);

    const second = await service.run();

    expect(second.created).toBe(0);
    expect(second.updated).toBe(25);
    expect(store.sites.size).toBe(25);
    expect(store.sites.get(1)?.stage).toBe(SiteStage.Downloaded);
  });

  it('should stop at the record limit', async () => {
    mockApiClient.fetchPage = listingApi(siteRecords(25));

    const summary = await service.run(15);

    expect(mockApiClient.fetchPage.mock.calls).toEqual([
      [0, 10],
      [10, 5],
    ]);
    expect(summary.fetched).toBe(15);
    expect(summary.completed).toBe(true);
  });

  it('should keep every record when a page is larger than requested', async () => {
    mockApiClient.fetchPage = oversizedListingApi(siteRecords(25), 15);

    const summary = await service.run();

    expect(mockApiClient.fetchPage.mock.calls).toEqual([
      [0, 10],
      [15, 10],
    ]);
    expect(summary).toMatchObject({
      fetched: 25,
      created: 25,
      skipped: 0,
      failed: 0,
      completed: true,
      errors: [],
    });
    expect([...store.sites.keys()].sort((a, b) => a - b)).toEqual(
      Array.from({ length: 25 }, (_, i) => i + 1),
    );
  });

  it('should cut an oversized page only at the record limit', async () => {
    mockApiClient.fetchPage = oversizedListingApi(siteRecords(25), 15);

    const summary = await service.run(20);

    expect(mockApiClient.fetchPage.mock.calls).toEqual([
      [0, 10],
      [15, 5],
    ]);
    expect(summary.fetched).toBe(20);
    expect(store.sites.size).toBe(20);
    expect(store.sites.has(20)).toBe(true);
    expect(store.sites.has(21)).toBe(false);
  });

  it('should stop at an empty page when no total is reported', async () => {
    mockApiClient.fetchPage = listingApi(siteRecords(12), false);

    const summary = await service.run();

    expect(mockApiClient.fetchPage.mock.calls).toEqual([
      [0, 10],
      [10, 10],
      [12, 10],
    ]);
    expect(summary.fetched).toBe(12);
    expect(summary.pages).toBe(3);
  });

  it('should abort on FetchError and keep earlier pages', async () => {
    const api = listingApi(siteRecords(25));
    mockApiClient.fetchPage = jest.fn(async (offset: number, limit: number) => {
      if (offset === 10) {
        throw new FetchError('HTTP 503', { attempts: 3, retryable: true, status: 503 });
      }
      return api(offset, limit);
    });

    const summary = await service.run();

    expect(summary.completed).toBe(false);
    expect(summary.abortReason).toBe(
      'Page at offset 10 failed after 3 attempt(s): HTTP 503',
    );
    expect(summary.errors).toEqual([summary.abortReason]);
    expect(summary.fetched).toBe(10);
    expect(store.sites.size).toBe(10);
  });

  it('should propagate errors that are not fetch failures', async () => {
    mockApiClient.fetchPage = jest.fn().mockRejectedValue(new Error('boom'));

    await expect(service.run()).rejects.toThrow('boom');
  });

  it('should count unmappable records and failed upserts', async () => {
    mockApiClient.fetchPage = listingApi([
      apiSiteRecord(1),
      { name: 'no id' },
      apiSiteRecord(3),
    ]);
    store.failingIds.add(3);

    const summary = await service.run();

    expect(summary).toMatchObject({
      fetched: 3,
      created: 1,
      skipped: 1,
      failed: 1,
      completed: true,
    });
    expect(summary.errors).toEqual([
      'Skipped record: Record has no usable id: null',
      'Site 3: write failed for site 3',
    ]);
  });

  it('should reject an invalid limit', async () => {
    await expect(service.run(-1)).rejects.toThrow(ConfigurationError);
  });
});
