import { Injectable } from '@nestjs/common';
import JSON5 from 'json5';
import { IDecodeStrategy } from '../interfaces/decode-strategy.interface';
import { cleanJsonText } from './json-cleanup';

/**
 * Last resort: JSON5 grammar (single quotes, unquoted keys, comments,
 * trailing commas). Tries the raw text first, then the cleaned text.
 */
@Injectable()
export class LenientJsonStrategy implements IDecodeStrategy {
  readonly name = 'lenient';

  decode(text: string): unknown {
    try {
      return JSON5.parse(text);
    } catch (rawError) {
      try {
        return JSON5.parse(cleanJsonText(text));
      } catch (cleanedError) {
        const reason =
          cleanedError instanceof Error
            ? cleanedError.message
            : String(cleanedError);
        throw new Error(`JSON5 rejected raw and cleaned text: ${reason}`, {
          cause: rawError,
        });
      }
    }
  }
}
