import * as cbor from 'cbor';
import { isLeft, isRight } from 'fp-ts/Either';

import { CertificateClaimsCodec } from './codec';
import { materialize, toJsonValue } from './materializer';
import { buildClaims, encodeClaims, recoveryContent, vaccinationContent } from './testkit';

describe('materializer', () => {
  const decodeClaims = materialize(CertificateClaimsCodec);

  describe('toJsonValue', () => {
    it('should key maps by the text form of their labels', () => {
      const value = new Map<unknown, unknown>([
        [1, 'DE'],
        [-260, new Map([[1, { ver: '1.3.0' }]])],
      ]);
      expect(toJsonValue(value)).toEqual({ _tag: 'Right', right: { '1': 'DE', '-260': { '1': { ver: '1.3.0' } } } });
    });

    it('should convert byte strings, tags and dates to text', () => {
      const value = {
        bytes: Buffer.from('test'),
        tagged: new cbor.Tagged(99, 'inner'),
        date: new Date('2026-01-01T00:00:00.000Z'),
      };
      expect(toJsonValue(value)).toEqual({
        _tag: 'Right',
        right: { bytes: 'dGVzdA==', tagged: 'inner', date: '2026-01-01T00:00:00.000Z' },
      });
    });

    it.each([
      ['undefined values', { a: [1, undefined] }, 'Unsupported CBOR value undefined at $.a[1]'],
      ['infinite numbers', { a: Infinity }, 'Non-finite number at $.a'],
      ['large integers', { a: 2n ** 64n }, 'Integer out of range at $.a'],
      ['array keys', new Map([[[1], 'a']]), 'Unsupported map key 1 at $'],
    ])('should reject %s', (_desc, value, message) => {
      const result = toJsonValue(value);

      expect(isLeft(result) && result.left.message).toBe(message);
    });
  });

  describe('materialize', () => {
    const decodePayload = (claims: Parameters<typeof encodeClaims>[0]) => {
      return decodeClaims(cbor.decodeFirstSync(encodeClaims(claims)));
    };

    it('should materialize vaccination claims', () => {
      const claims = buildClaims(vaccinationContent(1, 2));
      expect(decodePayload(claims)).toEqual({ _tag: 'Right', right: claims });
    });

    it('should materialize recovery claims', () => {
      const claims = buildClaims(recoveryContent('2025-12-01', '2026-05-31'));
      expect(decodePayload(claims)).toEqual({ _tag: 'Right', right: claims });
    });

    it('should ignore claims other than the certificate ones', () => {
      const payload = cbor.decodeFirstSync(encodeClaims(buildClaims(vaccinationContent())));
      payload.set(7, Buffer.from('token-id'));

      expect(isRight(decodeClaims(payload))).toBe(true);
    });

    it('should reject items that are not maps', () => {
      const result = decodeClaims(['DE']);

      expect(isLeft(result) && result.left._tag).toBe('PayloadConversionError');
      expect(isLeft(result) && result.left.cause).toBeUndefined();
    });

    it('should reject an empty map instead of producing an empty record', () => {
      const result = decodeClaims(new Map());

      expect(isLeft(result) && result.left._tag).toBe('SchemaDecodingError');
    });
  });
});
