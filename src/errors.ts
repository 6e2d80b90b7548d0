/**
 * Error kinds raised by the coders.
 *
 * Out-of-domain values (a symbol outside 0..3, a bad option) use the
 * built-in `RangeError`; everything about malformed input buffers uses the
 * classes below so callers can tell them apart with `instanceof`.
 */

/**
 * Base class for stream-level decoding failures.
 */
export class EntropyCodingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The buffer is shorter than its header or state bytes require.
 */
export class TruncatedStreamError extends EntropyCodingError {}

/**
 * A header field is structurally invalid (zero frequency, bad total).
 */
export class CorruptHeaderError extends EntropyCodingError {}

/**
 * A bit read ran past the end of the input buffer.
 */
export class OutOfDataError extends EntropyCodingError {}
