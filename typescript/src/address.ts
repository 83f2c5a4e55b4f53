import { isIPv4, isIPv6 } from "node:net";
import { BaseCodec, concatBytes, ensureAvailable } from "./codec";
import { EncodeError, UnknownAddressTagError } from "./errors";
import { u16, u32, u8 } from "./primitives";
import type { Cursor } from "./types";

export const IPV4_TAG = 4;
export const IPV6_TAG = 6;

/** Encoded size of an IPv4 end point, tag included. */
export const IPV4_ENCODED_SIZE = 7;

/** Encoded size of an IPv6 end point, tag included. */
export const IPV6_ENCODED_SIZE = 29;

export interface SocketAddressV4 {
  family: "ipv4";
  /** Dotted-quad text, e.g. "127.0.0.1". */
  address: string;
  port: number;
}

export interface SocketAddressV6 {
  family: "ipv6";
  /** Colon-hex text without a zone suffix, e.g. "fe80::1". */
  address: string;
  port: number;
  flowInfo: number;
  scopeId: number;
}

/**
 * An IP end point.
 */
export type SocketAddress = SocketAddressV4 | SocketAddressV6;

/**
 * Parses dotted-quad text into its four octets.
 */
export function parseIpv4(text: string): Uint8Array {
  if (!isIPv4(text)) {
    throw new EncodeError(`Invalid IPv4 address: ${text}`);
  }
  return Uint8Array.from(text.split("."), Number);
}

function parseGroups(part: string): number[] {
  const words: number[] = [];
  for (const group of part.split(":")) {
    if (group.includes(".")) {
      const [a, b, c, d] = parseIpv4(group);
      words.push((a << 8) | b, (c << 8) | d);
    } else {
      words.push(parseInt(group, 16));
    }
  }
  return words;
}

/**
 * Parses IPv6 text (with optional `::` compression and a dotted IPv4 tail)
 * into its sixteen address bytes.
 */
export function parseIpv6(text: string): Uint8Array {
  if (text.includes("%") || !isIPv6(text)) {
    throw new EncodeError(`Invalid IPv6 address: ${text}`);
  }

  const halves = text.split("::");
  const head = halves[0] === "" ? [] : parseGroups(halves[0]);
  let words = head;
  if (halves.length > 1) {
    const tail = halves[1] === "" ? [] : parseGroups(halves[1]);
    const gap = Array<number>(8 - head.length - tail.length).fill(0);
    words = [...head, ...gap, ...tail];
  }

  const bytes = new Uint8Array(16);
  words.forEach((word, i) => {
    bytes[i * 2] = word >>> 8;
    bytes[i * 2 + 1] = word & 0xff;
  });
  return bytes;
}

/**
 * Formats sixteen address bytes as RFC 5952 text: lowercase hex groups with
 * the longest run of two or more zero groups (the first, on a tie) replaced
 * by `::`.
 */
export function formatIpv6(bytes: Uint8Array): string {
  const words: number[] = [];
  for (let i = 0; i < 16; i += 2) {
    words.push((bytes[i] << 8) | bytes[i + 1]);
  }

  let bestStart = -1;
  let bestLength = 0;
  for (let i = 0; i < words.length; ) {
    if (words[i] !== 0) {
      i++;
      continue;
    }
    let j = i;
    while (j < words.length && words[j] === 0) {
      j++;
    }
    if (j - i > bestLength) {
      bestStart = i;
      bestLength = j - i;
    }
    i = j;
  }

  const hex = (word: number): string => word.toString(16);
  if (bestLength < 2) {
    return words.map(hex).join(":");
  }
  const head = words.slice(0, bestStart).map(hex).join(":");
  const tail = words.slice(bestStart + bestLength).map(hex).join(":");
  return `${head}::${tail}`;
}

/**
 * IP end point codec.
 *
 * Wire format:
 * - IPv4: `[0x04][4 address bytes][u16 port]`
 * - IPv6: `[0x06][u16 0][u16 port][u32 flow info][16 address bytes][u32 scope id]`
 */
export class SocketAddressCodec extends BaseCodec<SocketAddress> {
  readonly name = "SocketAddress";
  readonly fixedSize = undefined;

  parse(value: SocketAddress): Uint8Array {
    switch (value.family) {
      case "ipv4":
        return concatBytes([
          u8.parse(IPV4_TAG),
          parseIpv4(value.address),
          u16.parse(value.port),
        ]);
      case "ipv6":
        return concatBytes([
          u8.parse(IPV6_TAG),
          u16.parse(0),
          u16.parse(value.port),
          u32.parse(value.flowInfo),
          parseIpv6(value.address),
          u32.parse(value.scopeId),
        ]);
    }
  }

  compose(source: Uint8Array, cursor: Cursor): SocketAddress {
    ensureAvailable(source, cursor, 1);
    const tag = source[cursor.position];

    switch (tag) {
      case IPV4_TAG: {
        ensureAvailable(source, cursor, IPV4_ENCODED_SIZE);
        cursor.position += 1;
        const octets = source.subarray(cursor.position, cursor.position + 4);
        const address = Array.from(octets).join(".");
        cursor.position += 4;
        const port = u16.compose(source, cursor);
        return { family: "ipv4", address, port };
      }
      case IPV6_TAG: {
        ensureAvailable(source, cursor, IPV6_ENCODED_SIZE);
        cursor.position += 1;
        u16.compose(source, cursor); // reserved
        const port = u16.compose(source, cursor);
        const flowInfo = u32.compose(source, cursor);
        const address = formatIpv6(source.subarray(cursor.position, cursor.position + 16));
        cursor.position += 16;
        const scopeId = u32.compose(source, cursor);
        return { family: "ipv6", address, port, flowInfo, scopeId };
      }
      default:
        throw new UnknownAddressTagError(tag);
    }
  }
}

export const socketAddress = new SocketAddressCodec();
