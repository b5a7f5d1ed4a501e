import { pipe } from 'fp-ts/function';
import { Either, bindTo, bindW, chainFirstW, chainW, fromPredicate, isLeft, map, mapLeft, right } from 'fp-ts/Either';

import { Logger } from '../../logger';
import { CertificateBuilder } from '../builder';
import { CertificateClaimsCodec } from '../codec';
import { extractEnvelope } from '../envelope';
import {
  CBORDecodingError,
  COSEPayloadDecodingError,
  DecodingError,
  InputTooLargeError,
  MalformedCBORError,
} from '../errors';
import { ClaimsDecoder, materialize } from '../materializer';
import { decodeBase45, decodeCBORItem, decompress, stripPrefix } from '../transcoder';
import { Certificate } from '../types';

export type HCERTDecoderOptions = {
  /**
   * The Context Identifier the certificate text is prefixed with. Input without the
   * prefix is decoded as it is.
   */
  readonly prefix?: string;
  /**
   * Longest input accepted, checked before anything is decoded. `0` or `undefined`
   * disables the check.
   */
  readonly maxInputLength?: number;
  /**
   * Maps the generic payload structure onto the certificate claims.
   */
  readonly codec?: ClaimsDecoder;
};

export const DEFAULT_PREFIX = 'HC1:';

// Base45 > Zlib > COSE > CBOR > JSON
//
// https://github.com/ehn-dcc-development/hcert-spec
// https://github.com/ehn-dcc-development/ehn-sign-verify-javascript-trivial
export class HCERTDecoder {
  readonly prefix: string;
  readonly maxInputLength: number;
  readonly codec: ClaimsDecoder;

  constructor(
    readonly logger: Logger,
    options: HCERTDecoderOptions = {}
  ) {
    this.prefix = options.prefix ?? DEFAULT_PREFIX;
    this.maxInputLength = options.maxInputLength ?? 0;
    this.codec = options.codec ?? CertificateClaimsCodec;

    this.decode = this.decode.bind(this);
  }

  public isMatch(input: string): boolean {
    return input.startsWith(this.prefix);
  }

  decode(input: string): Either<DecodingError, Certificate> {
    this.logger.debug({ length: input.length, prefixed: this.isMatch(input) }, 'Decoding HCERT payload');

    const result = pipe(
      right<DecodingError, string>(input),
      chainFirstW(
        fromPredicate(
          (text: string) => this.maxInputLength <= 0 || text.length <= this.maxInputLength,
          (text: string) => new InputTooLargeError(text.length, this.maxInputLength)
        )
      ),
      map(stripPrefix(this.prefix)),
      chainW(decodeBase45),
      chainW(decompress),
      // COSE_Sign1 envelope
      chainW(buffer =>
        pipe(
          decodeCBORItem(buffer),
          mapLeft(failure =>
            failure.kind === 'absent' ? new MalformedCBORError(buffer) : new CBORDecodingError(failure.cause)
          ),
          chainW(item => extractEnvelope(item, buffer))
        )
      ),
      bindTo('envelope'),
      // CWT claims
      bindW('payload', ({ envelope }) =>
        pipe(
          decodeCBORItem(envelope.payload),
          mapLeft(failure => new COSEPayloadDecodingError(failure.kind === 'absent' ? undefined : failure.cause))
        )
      ),
      bindW('claims', ({ payload }) => materialize(this.codec)(payload)),
      map(({ envelope, claims }) =>
        new CertificateBuilder(claims)
          .withBase45Representation(input)
          .withCryptographicEnvelope(envelope)
          .build()
      )
    );

    if (isLeft(result)) {
      this.logger.debug({ err: result.left._tag }, 'Failed to decode HCERT input');
    }
    return result;
  }
}
