import { Injectable } from '@nestjs/common';
import { IDecodeStrategy } from '../interfaces/decode-strategy.interface';

/**
 * Standard JSON.parse with no recovery.
 */
@Injectable()
export class StrictJsonStrategy implements IDecodeStrategy {
  readonly name = 'strict';

  decode(text: string): unknown {
    return JSON.parse(text);
  }
}
