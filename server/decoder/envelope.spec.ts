import * as cbor from 'cbor';
import { isRight } from 'fp-ts/Either';

import { HeaderMap, extractEnvelope, readHeaderParameters, signatureInput } from './envelope';
import { decodeCBORItem } from './transcoder';
import { CryptographicEnvelope } from './types';

describe('envelope', () => {
  const extract = (bytes: Uint8Array): CryptographicEnvelope => {
    const item = decodeCBORItem(bytes);
    if (!isRight(item)) throw new Error('Invalid CBOR fixture');

    const envelope = extractEnvelope(item.right, bytes);
    if (!isRight(envelope)) throw envelope.left;
    return envelope.right;
  };

  const protectedHeader = cbor.encode(new Map([[1, -7]]));
  const payload = cbor.encode(new Map([[1, 'DE']]));
  const signature = Buffer.alloc(64, 1);

  it('should keep the last value of a duplicated unprotected header', () => {
    const bytes = Buffer.concat([
      Buffer.from([0xd2, 0x84]),
      cbor.encode(protectedHeader),
      Buffer.from([0xa2, 0x04, 0x41, 0x01, 0x04, 0x41, 0x02]), // {4: h'01', 4: h'02'}
      cbor.encode(payload),
      cbor.encode(signature),
    ]);
    const envelope = extract(bytes);

    expect(envelope.unprotected.size).toBe(1);
    expect(envelope.unprotected.get('04')?.value).toEqual(Uint8Array.from([0x41, 0x02]));
  });

  const withUnprotected = (header: number[]) => {
    return Buffer.concat([
      Buffer.from([0xd2, 0x84]),
      cbor.encode(protectedHeader),
      Buffer.from(header),
      cbor.encode(payload),
      cbor.encode(signature),
    ]);
  };

  it('should keep the encoding of the unprotected header values', () => {
    // {4: 1.0} as a double precision float
    const envelope = extract(withUnprotected([0xa1, 0x04, 0xfb, 0x3f, 0xf0, 0, 0, 0, 0, 0, 0]));

    expect(envelope.unprotected.get('04')).toEqual({
      key: Uint8Array.from([0x04]),
      value: Uint8Array.from([0xfb, 0x3f, 0xf0, 0, 0, 0, 0, 0, 0]),
    });
  });

  it('should keep the order of text keys', () => {
    // {"b": 1, "1": 2}
    const envelope = extract(withUnprotected([0xa2, 0x61, 0x62, 0x01, 0x61, 0x31, 0x02]));

    expect(Array.from(envelope.unprotected.keys())).toEqual(['6162', '6131']);
  });

  it('should read an indefinite-length unprotected header', () => {
    // {_ 4: h'01'}
    const envelope = extract(withUnprotected([0xbf, 0x04, 0x41, 0x01, 0xff]));

    expect(Array.from(envelope.unprotected.entries())).toEqual([
      ['04', { key: Uint8Array.from([0x04]), value: Uint8Array.from([0x41, 0x01]) }],
    ]);
  });

  it('should keep the unprotected header order', () => {
    const unprotected = new Map<unknown, unknown>([
      [4, Buffer.from('kid')],
      ['x', 1],
      [-1, 'y'],
    ]);
    const envelope = extract(cbor.encode(new cbor.Tagged(18, [protectedHeader, unprotected, payload, signature])));

    expect(Array.from(envelope.unprotected.keys())).toEqual(['04', '6178', '20']);
  });

  it('should ignore the semantic tag number', () => {
    const envelope = extract(cbor.encode(new cbor.Tagged(98, [protectedHeader, {}, payload, signature])));

    expect(Buffer.from(envelope.signature)).toEqual(signature);
  });

  it('should build the Sig_structure over the protected header and payload', () => {
    const envelope = extract(cbor.encode(new cbor.Tagged(18, [protectedHeader, {}, payload, signature])));

    expect(cbor.decodeFirstSync(signatureInput(envelope))).toEqual([
      'Signature1',
      protectedHeader,
      Buffer.alloc(0),
      payload,
    ]);
  });

  describe('HeaderMap', () => {
    const headers = new HeaderMap([
      [Uint8Array.from([0x04]), Uint8Array.from([0x41, 0x01])],
      [Uint8Array.from([0x01]), Uint8Array.from([0x26])],
      [Uint8Array.from([0x04]), Uint8Array.from([0x41, 0x02])],
    ]);

    it('should keep the first position and the last value of a repeated key', () => {
      expect(headers.size).toBe(2);
      expect(Array.from(headers.keys())).toEqual(['04', '01']);
      expect(headers.get('04')?.value).toEqual(Uint8Array.from([0x41, 0x02]));
    });

    it('should not be modifiable', () => {
      expect(Object.isFrozen(headers)).toBe(true);
      expect(Reflect.get(headers, 'set')).toBeUndefined();
      expect(Reflect.get(headers, 'delete')).toBeUndefined();
    });

    it('should hand out copies of the stored bytes', () => {
      const entry = headers.get('01');
      if (!entry) throw new Error('Missing header entry');
      entry.value[0] = 0xff;

      expect(headers.get('01')?.value).toEqual(Uint8Array.from([0x26]));
      expect(Object.isFrozen(entry)).toBe(true);
    });

    it('should visit every entry', () => {
      const visited: string[] = [];
      headers.forEach((entry, key) => visited.push(`${key}=${Buffer.from(entry.value).toString('hex')}`));

      expect(visited).toEqual(['04=4102', '01=26']);
      expect(headers.has('01')).toBe(true);
      expect(headers.has('02')).toBe(false);
    });
  });

  describe('readHeaderParameters', () => {
    const envelopeWith = (protectedBytes: Uint8Array, unprotected: Map<unknown, unknown>) => {
      return extract(cbor.encode(new cbor.Tagged(18, [Buffer.from(protectedBytes), unprotected, payload, signature])));
    };

    it('should prefer the protected header', () => {
      const envelope = envelopeWith(
        cbor.encode(new Map<number, unknown>([[1, -7], [4, Buffer.from('protected-kid')]])),
        new Map([[4, Buffer.from('unprotected-kid')]])
      );

      expect(readHeaderParameters(envelope)).toEqual({
        algorithm: -7,
        keyId: Uint8Array.from(Buffer.from('protected-kid')),
      });
    });

    it('should fall back to the unprotected header', () => {
      const envelope = envelopeWith(
        cbor.encode(new Map([[1, -37]])),
        new Map([[4, Buffer.from('unprotected-kid')]])
      );

      expect(readHeaderParameters(envelope)).toEqual({
        algorithm: -37,
        keyId: Uint8Array.from(Buffer.from('unprotected-kid')),
      });
    });

    it('should read an empty protected header as an empty map', () => {
      const envelope = envelopeWith(new Uint8Array(), new Map());

      expect(readHeaderParameters(envelope)).toEqual({ algorithm: undefined, keyId: undefined });
    });
  });
});
