import { invariant } from '@navch/common';

import { Certificate, CertificateClaims, CryptographicEnvelope } from './types';

// Dates and byte arrays cannot be frozen, they are replaced by getters handing out copies
function copyOnRead(value: unknown): (() => unknown) | undefined {
  if (value instanceof Date) {
    const time = value.getTime();
    return () => new Date(time);
  }
  if (value instanceof Uint8Array) {
    const bytes = Uint8Array.from(value);
    return () => Uint8Array.from(bytes);
  }
  return undefined;
}

function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return value;
  }
  for (const key of Object.keys(value)) {
    const item: unknown = Reflect.get(value, key);
    const read = copyOnRead(item);
    if (read) {
      Object.defineProperty(value, key, { get: read, enumerable: true, configurable: false });
    } else {
      deepFreeze(item);
    }
  }
  Object.freeze(value);
  return value;
}

/**
 * Assembles a {@link Certificate} from the materialized claims. The transport details
 * are attached exactly once each, and only the frozen result leaves the decoder.
 */
export class CertificateBuilder {
  private base45Representation?: string;
  private cryptographicEnvelope?: CryptographicEnvelope;

  constructor(private readonly claims: CertificateClaims) {}

  withBase45Representation(input: string): this {
    invariant(this.base45Representation === undefined, 'Base45 representation is already attached');
    this.base45Representation = input;
    return this;
  }

  withCryptographicEnvelope(envelope: CryptographicEnvelope): this {
    invariant(this.cryptographicEnvelope === undefined, 'Cryptographic envelope is already attached');
    this.cryptographicEnvelope = envelope;
    return this;
  }

  build(): Certificate {
    const { base45Representation, cryptographicEnvelope } = this;
    if (base45Representation === undefined || cryptographicEnvelope === undefined) {
      throw new Error('Unable to build certificate: Base45 representation or envelope is missing');
    }
    return deepFreeze({ ...this.claims, cryptographicEnvelope, base45Representation });
  }
}
