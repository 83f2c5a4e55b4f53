import { BaseCodec, ensureAvailable } from "./codec";
import { EncodeError, InvalidUtf8Error } from "./errors";
import { MaxUint16 } from "./types";
import type { Cursor } from "./types";

// Module-level singletons to avoid repeated instantiation
const textEncoder = new TextEncoder();
const strictDecoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
const lenientDecoder = new TextDecoder("utf-8", { ignoreBOM: true });

// Matches code units only, so a surrogate half without its partner is found.
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Options for string codecs.
 */
export interface StringCodecOptions {
  /**
   * Reject invalid UTF-8 with an `InvalidUtf8Error`. Turn off only when the
   * bytes were validated upstream. Default: true
   */
  validateUtf8?: boolean;
}

/**
 * Decodes UTF-8, throwing `InvalidUtf8Error` on malformed input.
 */
export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return strictDecoder.decode(bytes);
  } catch (e) {
    if (e instanceof TypeError) {
      throw new InvalidUtf8Error(bytes.length);
    }
    throw e;
  }
}

/**
 * Length-prefixed UTF-8 string: `[u16 BE byte length][bytes]`.
 */
export class StringCodec extends BaseCodec<string> {
  readonly name = "string";
  readonly fixedSize = undefined;
  private readonly validateUtf8: boolean;

  constructor(options: StringCodecOptions = {}) {
    super();
    this.validateUtf8 = options.validateUtf8 ?? true;
  }

  parse(value: string): Uint8Array {
    // TextEncoder would silently substitute U+FFFD for these.
    const surrogate = LONE_SURROGATE.exec(value);
    if (surrogate !== null) {
      throw new EncodeError(`String has an unpaired surrogate at index ${surrogate.index}`);
    }
    const bytes = textEncoder.encode(value);
    if (bytes.length > MaxUint16) {
      throw new EncodeError(
        `String of ${bytes.length} bytes exceeds the ${MaxUint16} byte limit`
      );
    }
    const out = new Uint8Array(2 + bytes.length);
    out[0] = bytes.length >>> 8;
    out[1] = bytes.length & 0xff;
    out.set(bytes, 2);
    return out;
  }

  compose(source: Uint8Array, cursor: Cursor): string {
    ensureAvailable(source, cursor, 2);
    const start = cursor.position;
    const length = (source[start] << 8) | source[start + 1];
    cursor.position += 2;

    ensureAvailable(source, cursor, length);
    const bytes = source.subarray(cursor.position, cursor.position + length);
    const value = this.validateUtf8 ? decodeUtf8(bytes) : lenientDecoder.decode(bytes);
    cursor.position += length;
    return value;
  }
}

export function createStringCodec(options: StringCodecOptions = {}): StringCodec {
  return new StringCodec(options);
}

export const string = new StringCodec();
