import * as cbor from 'cbor';
import * as base45 from 'base45-js';
import { inflate } from 'pako';
import { isPlainObject } from 'lodash';
import { Either, left, right, tryCatch } from 'fp-ts/Either';

import { Base45DecodingError, DecompressionError } from './errors';

/**
 * https://datatracker.ietf.org/doc/html/rfc9285#section-4
 */
const BASE45_CHARSET = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ $%*+-./:';

export function stripPrefix(prefix: string) {
  return (input: string): string => {
    return prefix && input.startsWith(prefix) ? input.slice(prefix.length) : input;
  };
}

function checkBase45(text: string): string | undefined {
  if (text.length % 3 === 1) {
    return `length ${text.length} is not a valid Base45 length`;
  }
  const values: number[] = [];
  for (const char of text) {
    const value = BASE45_CHARSET.indexOf(char);
    if (value < 0) {
      return `unexpected character "${char}"`;
    }
    values.push(value);
  }
  for (let i = 0; i < values.length; i += 3) {
    const [c, d, e = 0] = values.slice(i, i + 3);
    const n = c + d * 45 + e * 45 * 45;
    const max = values.length - i >= 3 ? 0xffff : 0xff;
    if (n > max) {
      return `chunk at offset ${i} is out of range`;
    }
  }
  return undefined;
}

export function decodeBase45(text: string): Either<Base45DecodingError, Uint8Array> {
  const problem = checkBase45(text);
  if (problem) {
    return left(new Base45DecodingError(new Error(problem)));
  }
  return tryCatch(
    () => Uint8Array.from(base45.decode(text)),
    err => new Base45DecodingError(err)
  );
}

/**
 * Zlib streams start with a CMF byte of 0x78 (deflate, 32K window) and a FLG byte
 * that makes the pair a multiple of 31:
 *
 *   78 01 - No Compression/low
 *   78 9C - Default Compression
 *   78 DA - Best Compression
 *
 * A tagged COSE_Sign1 item starts with 0xD2.
 */
export function isZlibStream(buffer: Uint8Array): boolean {
  return buffer.length >= 2 && buffer[0] === 0x78 && (buffer[0] * 256 + buffer[1]) % 31 === 0;
}

export function decompress(buffer: Uint8Array): Either<DecompressionError, Uint8Array> {
  if (!isZlibStream(buffer)) {
    return right(buffer);
  }
  return tryCatch(
    () => {
      const inflated = inflate(buffer);
      if (!(inflated instanceof Uint8Array)) {
        throw new Error('Truncated zlib stream');
      }
      return inflated;
    },
    err => new DecompressionError(err)
  );
}

export type CBORItemFailure = { readonly kind: 'invalid'; readonly cause: unknown } | { readonly kind: 'absent' };

/**
 * Decodes the first CBOR data item of the given bytes, anything after it is ignored.
 * Nothing but an empty input yields no item, any other parse failure is reported
 * with its cause.
 */
export function decodeCBORItem(buffer: Uint8Array): Either<CBORItemFailure, unknown> {
  if (buffer.length === 0) {
    return left({ kind: 'absent' });
  }
  let result: unknown;
  try {
    result = cbor.decodeFirstSync(Buffer.from(buffer), { extendedResults: true });
  } catch (cause) {
    return left({ kind: 'invalid', cause });
  }
  if (typeof result !== 'object' || result === null || !('value' in result)) {
    return left({ kind: 'absent' });
  }
  return right(result.value);
}

export function encodeCBORItem(value: unknown): Uint8Array {
  return Uint8Array.from(cbor.encode(value));
}

/**
 * Entries of a decoded CBOR map, or `undefined` when the item is not a map.
 */
export function mapEntries(value: unknown): Array<[unknown, unknown]> | undefined {
  if (value instanceof Map) {
    return Array.from(value.entries());
  }
  // maps with nothing but text keys come back as plain objects
  if (typeof value === 'object' && value !== null && isPlainObject(value)) {
    return Object.entries(value);
  }
  return undefined;
}

// -----------------------------------------------------------------------
// Raw item boundaries
//
// https://datatracker.ietf.org/doc/html/rfc8949#section-3

type ItemHead = {
  readonly major: number;
  readonly info: number;
  readonly argument: number;
  /**
   * Offset of the first byte after the head.
   */
  readonly next: number;
};

const INDEFINITE = 31;
const BREAK = 0xff;

function readHead(bytes: Uint8Array, offset: number): ItemHead | undefined {
  if (offset >= bytes.length) {
    return undefined;
  }
  const major = bytes[offset] >> 5;
  const info = bytes[offset] & 0x1f;
  if (info < 24 || info === INDEFINITE) {
    return { major, info, argument: info < 24 ? info : 0, next: offset + 1 };
  }
  if (info > 27) {
    return undefined;
  }
  const size = 1 << (info - 24);
  if (offset + 1 + size > bytes.length) {
    return undefined;
  }
  let argument = 0;
  for (let i = 1; i <= size; i++) {
    argument = argument * 256 + bytes[offset + i];
  }
  return { major, info, argument, next: offset + 1 + size };
}

// Offsets of `count` consecutive items, or of the items up to a break when `count`
// is undefined. Returns the offsets and the end of the sequence.
function readSequence(
  bytes: Uint8Array,
  offset: number,
  count: number | undefined
): { offsets: number[]; end: number } | undefined {
  const offsets: number[] = [];
  let cursor: number | undefined = offset;
  while (cursor !== undefined) {
    if (count === undefined ? bytes[cursor] === BREAK : offsets.length === count) {
      return { offsets, end: count === undefined ? cursor + 1 : cursor };
    }
    if (cursor >= bytes.length) {
      return undefined;
    }
    offsets.push(cursor);
    cursor = skipItem(bytes, cursor);
  }
  return undefined;
}

/**
 * Offset of the first byte after the data item starting at `offset`.
 */
export function skipItem(bytes: Uint8Array, offset: number): number | undefined {
  const head = readHead(bytes, offset);
  if (!head) {
    return undefined;
  }
  const { major, info, argument, next } = head;
  const indefinite = info === INDEFINITE;
  switch (major) {
    case 0:
    case 1:
      return indefinite ? undefined : next;
    case 2:
    case 3:
      if (indefinite) {
        return readSequence(bytes, next, undefined)?.end;
      }
      return next + argument <= bytes.length ? next + argument : undefined;
    case 4:
      return readSequence(bytes, next, indefinite ? undefined : argument)?.end;
    case 5:
      return readSequence(bytes, next, indefinite ? undefined : argument * 2)?.end;
    case 6:
      return indefinite ? undefined : skipItem(bytes, next);
    default:
      return indefinite ? undefined : next;
  }
}

/**
 * Offsets of the elements of the array starting at `offset`, looking through any
 * tags around it.
 */
export function arrayItemOffsets(bytes: Uint8Array, offset = 0): number[] | undefined {
  let head = readHead(bytes, offset);
  while (head && head.major === 6 && head.info !== INDEFINITE) {
    head = readHead(bytes, head.next);
  }
  if (!head || head.major !== 4) {
    return undefined;
  }
  return readSequence(bytes, head.next, head.info === INDEFINITE ? undefined : head.argument)?.offsets;
}

/**
 * The encoded key and value of every entry of the map starting at `offset`, in
 * source order.
 */
export function mapItemSlices(bytes: Uint8Array, offset: number): Array<[Uint8Array, Uint8Array]> | undefined {
  const head = readHead(bytes, offset);
  if (!head || head.major !== 5) {
    return undefined;
  }
  const sequence = readSequence(bytes, head.next, head.info === INDEFINITE ? undefined : head.argument * 2);
  if (!sequence) {
    return undefined;
  }
  const { offsets, end } = sequence;
  const bounds = [...offsets, head.info === INDEFINITE ? end - 1 : end];
  const slices: Array<[Uint8Array, Uint8Array]> = [];
  for (let i = 0; i < offsets.length; i += 2) {
    slices.push([bytes.slice(bounds[i], bounds[i + 1]), bytes.slice(bounds[i + 1], bounds[i + 2])]);
  }
  return slices;
}
