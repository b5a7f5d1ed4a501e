import { Tagged } from 'cbor';
import { Either, left, right, isRight } from 'fp-ts/Either';

import { CBORProcessingError } from './errors';
import { arrayItemOffsets, decodeCBORItem, encodeCBORItem, mapEntries, mapItemSlices } from './transcoder';
import { CryptographicEnvelope, HeaderEntry } from './types';

/**
 * https://www.iana.org/assignments/cose/cose.xhtml#header-parameters
 */
const HEADER_ALGORITHM = 1;
const HEADER_KEY_ID = 4;

const isByteString = (value: unknown): value is Uint8Array => value instanceof Uint8Array;

const toHex = (bytes: Uint8Array) => Buffer.from(bytes).toString('hex');

const copyEntry = ({ key, value }: HeaderEntry): HeaderEntry => {
  return Object.freeze({ key: Uint8Array.from(key), value: Uint8Array.from(value) });
};

/**
 * Read-only view of the unprotected header. Entries are keyed by the hex form of
 * their encoded key, a repeated key keeps its first position and its last value.
 * Every read hands out copies of the stored bytes.
 */
export class HeaderMap implements ReadonlyMap<string, HeaderEntry> {
  readonly #entries = new Map<string, HeaderEntry>();

  constructor(entries: Iterable<[Uint8Array, Uint8Array]> = []) {
    for (const [key, value] of entries) {
      this.#entries.set(toHex(key), copyEntry({ key, value }));
    }
    Object.freeze(this);
  }

  get size(): number {
    return this.#entries.size;
  }

  has(key: string): boolean {
    return this.#entries.has(key);
  }

  get(key: string): HeaderEntry | undefined {
    const entry = this.#entries.get(key);
    return entry && copyEntry(entry);
  }

  keys() {
    return this.#entries.keys();
  }

  values() {
    return this.snapshot().values();
  }

  entries() {
    return this.snapshot().entries();
  }

  [Symbol.iterator]() {
    return this.snapshot()[Symbol.iterator]();
  }

  forEach(callback: (value: HeaderEntry, key: string, map: ReadonlyMap<string, HeaderEntry>) => void): void {
    this.snapshot().forEach((value, key) => callback(value, key, this));
  }

  private snapshot(): Map<string, HeaderEntry> {
    return new Map(Array.from(this.#entries, ([key, entry]): [string, HeaderEntry] => [key, copyEntry(entry)]));
  }
}

/**
 * Matches a decoded CBOR item against the tagged COSE_Sign1 array. The elements are
 * checked in order and the first mismatch is reported. The unprotected header
 * entries are sliced from `source`, the bytes the item was decoded from, so they
 * keep their encoding.
 *
 * https://datatracker.ietf.org/doc/html/rfc8152#section-4.2
 */
export function extractEnvelope(
  item: unknown,
  source: Uint8Array
): Either<CBORProcessingError, CryptographicEnvelope> {
  if (!(item instanceof Tagged)) {
    return left(new CBORProcessingError('contentMissing'));
  }
  const contents: unknown = item.value;
  if (!Array.isArray(contents)) {
    return left(new CBORProcessingError('contentMissing'));
  }
  const [protectedHeader, unprotectedHeader, payload, signature] = contents;

  if (!isByteString(protectedHeader)) {
    return left(new CBORProcessingError('protectedParameterMissing'));
  }
  const unprotectedOffset = arrayItemOffsets(source)?.[1];
  const unprotectedEntries =
    mapEntries(unprotectedHeader) && unprotectedOffset !== undefined
      ? mapItemSlices(source, unprotectedOffset)
      : undefined;
  if (!unprotectedEntries) {
    return left(new CBORProcessingError('unprotectedParameterMissing'));
  }
  if (!isByteString(payload)) {
    return left(new CBORProcessingError('payloadParameterMissing'));
  }
  if (!isByteString(signature)) {
    return left(new CBORProcessingError('signatureParameterMissing'));
  }
  return right({
    protected: Uint8Array.from(protectedHeader),
    unprotected: new HeaderMap(unprotectedEntries),
    payload: Uint8Array.from(payload),
    signature: Uint8Array.from(signature),
  });
}

/**
 * The `Sig_structure` a COSE_Sign1 signature is computed over, with an empty
 * external AAD as used by HCERT.
 *
 * https://datatracker.ietf.org/doc/html/rfc8152#section-4.4
 */
export function signatureInput(envelope: CryptographicEnvelope): Uint8Array {
  return encodeCBORItem([
    'Signature1',
    Buffer.from(envelope.protected),
    Buffer.alloc(0),
    Buffer.from(envelope.payload),
  ]);
}

export type HeaderParameters = {
  readonly algorithm?: number;
  readonly keyId?: Uint8Array;
};

function readProtectedHeader(envelope: CryptographicEnvelope): Map<string, unknown> {
  // A zero-length protected header stands for an empty map
  if (envelope.protected.length === 0) {
    return new Map();
  }
  const decoded = decodeCBORItem(envelope.protected);
  const entries = isRight(decoded) ? mapEntries(decoded.right) : undefined;
  return new Map((entries ?? []).map(([key, value]): [string, unknown] => [String(key), value]));
}

function readUnprotectedHeader(envelope: CryptographicEnvelope, label: number): unknown {
  const entry = envelope.unprotected.get(toHex(encodeCBORItem(label)));
  if (!entry) {
    return undefined;
  }
  const decoded = decodeCBORItem(entry.value);
  return isRight(decoded) ? decoded.right : undefined;
}

/**
 * Reads the signing algorithm and key identifier a verifier needs to pick the public
 * key. The protected bucket takes precedence over the unprotected one.
 */
export function readHeaderParameters(envelope: CryptographicEnvelope): HeaderParameters {
  const protectedHeader = readProtectedHeader(envelope);
  const lookup = (label: number) => {
    return protectedHeader.get(String(label)) ?? readUnprotectedHeader(envelope, label);
  };
  const algorithm = lookup(HEADER_ALGORITHM);
  const keyId = lookup(HEADER_KEY_ID);
  return {
    algorithm: typeof algorithm === 'number' ? algorithm : undefined,
    keyId: isByteString(keyId) ? Uint8Array.from(keyId) : undefined,
  };
}
