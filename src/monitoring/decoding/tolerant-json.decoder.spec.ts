import { Test, TestingModule } from '@nestjs/testing';
import { ParseError } from '../../common/errors';
import { captureError } from '../../../test/utils/test-helpers';
import { TolerantJsonDecoder } from './tolerant-json.decoder';
import { CleanupJsonStrategy } from './strategies/cleanup-json.strategy';
import { LenientJsonStrategy } from './strategies/lenient-json.strategy';
import { StrictJsonStrategy } from './strategies/strict-json.strategy';

describe('TolerantJsonDecoder', () => {
  let decoder: TolerantJsonDecoder;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TolerantJsonDecoder,
        StrictJsonStrategy,
        CleanupJsonStrategy,
        LenientJsonStrategy,
      ],
    }).compile();

    decoder = module.get<TolerantJsonDecoder>(TolerantJsonDecoder);
  });

  it('should decode well-formed JSON with the strict strategy', () => {
    expect(decoder.decode('{"records": [], "totalCount": 0}')).toEqual({
      payload: { records: [], totalCount: 0 },
      strategy: 'strict',
    });
  });

  it('should agree across all strategies on valid JSON', () => {
    const text = '{"records": [{"id": 1, "name": "A"}], "totalCount": 1}';
    const expected = JSON.parse(text);

    expect(new StrictJsonStrategy().decode(text)).toEqual(expected);
    expect(new CleanupJsonStrategy().decode(text)).toEqual(expected);
    expect(new LenientJsonStrategy().decode(text)).toEqual(expected);
  });

  it('should decode a single trailing comma with the cleanup strategy', () => {
    expect(decoder.decode('{"a": 1,}')).toEqual({
      payload: { a: 1 },
      strategy: 'cleanup',
    });
  });

  it('should keep string content intact when cleanup repairs a trailing comma', () => {
    const text =
      '{"records":[{"id":1,"address":"Lake viewpoint: north, east"},],"totalCount":1}';

    expect(decoder.decode(text)).toEqual({
      payload: {
        records: [{ id: 1, address: 'Lake viewpoint: north, east' }],
        totalCount: 1,
      },
      strategy: 'cleanup',
    });
  });

  it('should fall back to cleanup for dashboard fields and trailing commas', () => {
    const text =
      '{"viewOnly": 1, viewDashboard: true, "records": [{"id": 1,}]}';

    expect(decoder.decode(text)).toEqual({
      payload: { viewOnly: 1, records: [{ id: 1 }] },
      strategy: 'cleanup',
    });
  });

  it('should recover a truncated body with cleanup', () => {
    const result = decoder.decode('{"records": [{"id": 7, "name": "Ro');

    expect(result.strategy).toBe('cleanup');
    expect(result.payload).toEqual({ records: [{ id: 7, name: 'Ro' }] });
  });

  it('should fall back to lenient for unquoted keys and single quotes', () => {
    expect(decoder.decode("{records: [{id: 1, name: 'Alpha'}]}")).toEqual({
      payload: { records: [{ id: 1, name: 'Alpha' }] },
      strategy: 'lenient',
    });
  });

  it('should throw ParseError listing every strategy when all fail', () => {
    const text = 'not json at all <html>';

    const error = captureError(() => decoder.decode(text), ParseError);

    expect(error.excerpt).toBe(text);
    expect(error.failures.map((f) => f.strategy)).toEqual([
      'strict',
      'cleanup',
      'lenient',
    ]);
  });

  it('should reject payloads that are not objects', () => {
    const error = captureError(() => decoder.decode('[1, 2]'), ParseError);

    expect(error.failures[0]).toEqual({
      strategy: 'strict',
      reason: 'Decoded to array, expected an object',
    });
  });

  it('should cap the excerpt at 800 characters', () => {
    const error = captureError(
      () => decoder.decode('x'.repeat(1000)),
      ParseError,
    );

    expect(error.excerpt).toHaveLength(800);
  });
});
