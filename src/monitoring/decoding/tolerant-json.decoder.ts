import { Injectable, Logger } from '@nestjs/common';
import { ParseError, StrategyFailure, describeError } from '../../common/errors';
import { isRecord } from '../../common/utils/is-record';
import { IDecodeStrategy } from './interfaces/decode-strategy.interface';
import { StrictJsonStrategy } from './strategies/strict-json.strategy';
import { CleanupJsonStrategy } from './strategies/cleanup-json.strategy';
import { LenientJsonStrategy } from './strategies/lenient-json.strategy';

const EXCERPT_LENGTH = 800;

export interface DecodeResult {
  payload: Record<string, unknown>;
  /** Name of the strategy that produced the payload */
  strategy: string;
}

/**
 * TolerantJsonDecoder - decode possibly malformed API payloads.
 *
 * Strategies run in order (strict -> cleanup -> lenient); the first one
 * producing an object wins. When all fail, a ParseError carries a text
 * excerpt and every strategy's failure reason.
 */
@Injectable()
export class TolerantJsonDecoder {
  private readonly logger = new Logger(TolerantJsonDecoder.name);
  private readonly strategies: IDecodeStrategy[];

  constructor(
    private readonly strictStrategy: StrictJsonStrategy,
    private readonly cleanupStrategy: CleanupJsonStrategy,
    private readonly lenientStrategy: LenientJsonStrategy,
  ) {
    this.strategies = [
      this.strictStrategy,
      this.cleanupStrategy,
      this.lenientStrategy,
    ];
  }

  decode(text: string): DecodeResult {
    const failures: StrategyFailure[] = [];

    for (const strategy of this.strategies) {
      try {
        const value = strategy.decode(text);
        if (!isRecord(value)) {
          failures.push({
            strategy: strategy.name,
            reason: `Decoded to ${Array.isArray(value) ? 'array' : typeof value}, expected an object`,
          });
          continue;
        }
        if (failures.length > 0) {
          this.logger.debug(
            `Payload recovered by '${strategy.name}' after ${failures.map((f) => f.strategy).join(', ')} failed`,
          );
        }
        return { payload: value, strategy: strategy.name };
      } catch (error) {
        failures.push({ strategy: strategy.name, reason: describeError(error) });
      }
    }

    const excerpt = text.slice(0, EXCERPT_LENGTH);
    this.logger.warn(
      `All decode strategies failed. Excerpt: ${excerpt.slice(0, 200)}`,
    );
    throw new ParseError(
      `Unable to decode payload (${failures.map((f) => `${f.strategy}: ${f.reason}`).join(' | ')})`,
      excerpt,
      failures,
    );
  }
}
