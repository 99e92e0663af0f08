import { Injectable } from '@nestjs/common';
import { IDecodeStrategy } from '../interfaces/decode-strategy.interface';
import { cleanJsonText } from './json-cleanup';

/**
 * Repair common upstream glitches, then parse strictly.
 */
@Injectable()
export class CleanupJsonStrategy implements IDecodeStrategy {
  readonly name = 'cleanup';

  decode(text: string): unknown {
    return JSON.parse(cleanJsonText(text));
  }
}
