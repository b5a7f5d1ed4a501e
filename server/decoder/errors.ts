import * as t from 'io-ts';
import { PathReporter } from 'io-ts/PathReporter';
import { left } from 'fp-ts/Either';

export abstract class HCERTDecodingError extends Error {
  abstract readonly _tag: string;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

const describe = (cause: unknown): string => {
  return cause instanceof Error ? cause.message : String(cause);
};

const toHex = (bytes: Uint8Array, limit = 32): string => {
  const hex = Buffer.from(bytes.subarray(0, limit)).toString('hex');
  return bytes.length > limit ? `${hex}...` : hex;
};

export class InputTooLargeError extends HCERTDecodingError {
  readonly _tag = 'InputTooLargeError';

  constructor(
    readonly length: number,
    readonly limit: number
  ) {
    super(`Input of ${length} characters exceeds the limit of ${limit}`);
  }
}

export class Base45DecodingError extends HCERTDecodingError {
  readonly _tag = 'Base45DecodingError';

  constructor(cause: unknown) {
    super(`Invalid Base45 text: ${describe(cause)}`, cause);
  }
}

export class DecompressionError extends HCERTDecodingError {
  readonly _tag = 'DecompressionError';

  constructor(cause: unknown) {
    super(`Corrupt zlib stream: ${describe(cause)}`, cause);
  }
}

export class CBORDecodingError extends HCERTDecodingError {
  readonly _tag = 'CBORDecodingError';

  constructor(cause: unknown) {
    super(`Invalid CBOR data: ${describe(cause)}`, cause);
  }
}

export class MalformedCBORError extends HCERTDecodingError {
  readonly _tag = 'MalformedCBORError';

  constructor(readonly data: Uint8Array) {
    super(`No CBOR item found in [${toHex(data)}]`);
  }
}

export type CBORProcessingFailure =
  | 'contentMissing'
  | 'protectedParameterMissing'
  | 'unprotectedParameterMissing'
  | 'payloadParameterMissing'
  | 'signatureParameterMissing';

export class CBORProcessingError extends HCERTDecodingError {
  readonly _tag = 'CBORProcessingError';

  constructor(readonly reason: CBORProcessingFailure) {
    super(`Invalid COSE_Sign1 structure: ${reason}`);
  }
}

export class COSEPayloadDecodingError extends HCERTDecodingError {
  readonly _tag = 'COSEPayloadDecodingError';

  constructor(cause?: unknown) {
    const reason = cause === undefined ? 'no CBOR item found' : describe(cause);
    super(`Invalid COSE payload: ${reason}`, cause);
  }
}

export class PayloadConversionError extends HCERTDecodingError {
  readonly _tag = 'PayloadConversionError';

  constructor(cause?: unknown) {
    const reason = cause === undefined ? 'payload is not a CBOR map' : describe(cause);
    super(`Unable to convert COSE payload: ${reason}`, cause);
  }
}

export class SchemaDecodingError extends HCERTDecodingError {
  readonly _tag = 'SchemaDecodingError';

  constructor(readonly errors: t.Errors) {
    super(`Invalid certificate claims: ${PathReporter.report(left(errors)).join('; ')}`, errors);
  }
}

export type DecodingError =
  | InputTooLargeError
  | Base45DecodingError
  | DecompressionError
  | CBORDecodingError
  | MalformedCBORError
  | CBORProcessingError
  | COSEPayloadDecodingError
  | PayloadConversionError
  | SchemaDecodingError;
