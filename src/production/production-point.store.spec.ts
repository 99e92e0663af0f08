import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ProductionPoint } from '../database/entities/production-point.entity';
import { ProductionPointStore } from './production-point.store';

describe('ProductionPointStore', () => {
  let store: ProductionPointStore;

  const mockQueryBuilder = {
    insert: jest.fn().mockReturnThis(),
    into: jest.fn().mockReturnThis(),
    values: jest.fn().mockReturnThis(),
    orIgnore: jest.fn().mockReturnThis(),
    returning: jest.fn().mockReturnThis(),
    execute: jest.fn(),
  };

  const mockRepository = {
    createQueryBuilder: jest.fn(() => mockQueryBuilder),
    find: jest.fn(),
  };

  const points = [
    { timestamp: new Date('2023-01-01T00:00:00Z'), productionWatts: 10 },
    { timestamp: new Date('2023-01-01T00:15:00Z'), productionWatts: 20 },
    { timestamp: new Date('2023-01-01T00:30:00Z'), productionWatts: 30 },
  ];

  beforeEach(async () => {
    jest.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ProductionPointStore,
        { provide: getRepositoryToken(ProductionPoint), useValue: mockRepository },
      ],
    }).compile();

    store = module.get<ProductionPointStore>(ProductionPointStore);
  });

  describe('insertBatch', () => {
    it('should insert with ON CONFLICT DO NOTHING and return the inserted count', async () => {
      mockQueryBuilder.execute.mockResolvedValue({
        raw: [{ timestamp: points[0].timestamp }, { timestamp: points[2].timestamp }],
      });

      await expect(store.insertBatch(4, points)).resolves.toBe(2);

      expect(mockQueryBuilder.into).toHaveBeenCalledWith(ProductionPoint);
      expect(mockQueryBuilder.orIgnore).toHaveBeenCalledTimes(1);
      expect(mockQueryBuilder.returning).toHaveBeenCalledWith('"timestamp"');
      expect(mockQueryBuilder.values).toHaveBeenCalledWith([
        { siteId: 4, timestamp: points[0].timestamp, productionWatts: 10 },
        { siteId: 4, timestamp: points[1].timestamp, productionWatts: 20 },
        { siteId: 4, timestamp: points[2].timestamp, productionWatts: 30 },
      ]);
    });

    it('should return 0 when every point already exists', async () => {
      mockQueryBuilder.execute.mockResolvedValue({ raw: [] });

      await expect(store.insertBatch(4, points)).resolves.toBe(0);
    });

    it('should skip the query for an empty batch', async () => {
      await expect(store.insertBatch(4, [])).resolves.toBe(0);

      expect(mockRepository.createQueryBuilder).not.toHaveBeenCalled();
    });

    it('should rethrow a failed insert', async () => {
      mockQueryBuilder.execute.mockRejectedValue(new Error('connection reset'));

      await expect(store.insertBatch(4, points)).rejects.toThrow('connection reset');
    });
  });

  it('should collect stored timestamps as epoch milliseconds', async () => {
    mockRepository.find.mockResolvedValue([{ timestamp: points[1].timestamp }]);

    await expect(store.existingTimestamps(4)).resolves.toEqual(
      new Set([points[1].timestamp.getTime()]),
    );
    expect(mockRepository.find).toHaveBeenCalledWith({
      select: ['timestamp'],
      where: { siteId: 4 },
    });
  });
});
