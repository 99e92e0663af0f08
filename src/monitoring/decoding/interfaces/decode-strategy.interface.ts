/**
 * IDecodeStrategy Interface - one step of the tolerant decoding cascade.
 *
 * Strategies are tried in order by TolerantJsonDecoder until one returns
 * a value. Each strategy is a pure function of the raw text and signals
 * failure by throwing; the decoder collects the reasons.
 */
export interface IDecodeStrategy {
  /**
   * Identifier reported in decode results and ParseError failures.
   * Examples: 'strict', 'cleanup', 'lenient'
   */
  readonly name: string;

  /**
   * Decode raw response text.
   *
   * @param text - Raw response body
   * @returns The decoded value (any JSON value; the decoder checks shape)
   * @throws Error describing why the text could not be decoded
   */
  decode(text: string): unknown;
}
