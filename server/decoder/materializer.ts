import * as t from 'io-ts';
import { Tagged } from 'cbor';
import { isValid } from 'date-fns';
import { pipe } from 'fp-ts/function';
import { traverseWithIndex, traverse } from 'fp-ts/Array';
import { Applicative, Either, chain, chainW, left, map, mapLeft, right, tryCatch } from 'fp-ts/Either';

import { PayloadConversionError, SchemaDecodingError } from './errors';
import { mapEntries } from './transcoder';
import { CertificateClaims } from './types';

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export type ClaimsDecoder = t.Decoder<unknown, CertificateClaims>;

const toError = (cause: unknown): Error => (cause instanceof Error ? cause : new Error(String(cause)));

const unsupported = (path: string, reason: string) => new Error(`${reason} at ${path}`);

function toKey(key: unknown, path: string): Either<Error, string> {
  if (typeof key === 'string') {
    return right(key);
  }
  if ((typeof key === 'number' && Number.isInteger(key)) || typeof key === 'bigint') {
    return right(String(key));
  }
  return left(unsupported(path, `Unsupported map key ${String(key)}`));
}

/**
 * Converts a decoded CBOR item into a plain JSON structure. Map keys become their
 * textual form, so the CWT claim `-260` is found under `"-260"`.
 */
export function toJsonValue(value: unknown, path = '$'): Either<Error, JsonValue> {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return right(value);
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? right(value) : left(unsupported(path, 'Non-finite number'));
  }
  if (typeof value === 'bigint') {
    const number = Number(value);
    return Number.isSafeInteger(number) ? right(number) : left(unsupported(path, 'Integer out of range'));
  }
  if (value instanceof Uint8Array) {
    return right(Buffer.from(value).toString('base64'));
  }
  if (value instanceof Date) {
    return isValid(value) ? right(value.toISOString()) : left(unsupported(path, 'Invalid date'));
  }
  if (value instanceof Tagged) {
    return toJsonValue(value.value, path);
  }
  if (Array.isArray(value)) {
    return pipe(
      value,
      traverseWithIndex(Applicative)((index, item: unknown) => toJsonValue(item, `${path}[${index}]`))
    );
  }
  const entries = mapEntries(value);
  if (entries) {
    return pipe(
      entries,
      traverse(Applicative)(([rawKey, item]) =>
        pipe(
          toKey(rawKey, path),
          chain(key =>
            pipe(
              toJsonValue(item, `${path}.${key}`),
              map((converted): [string, JsonValue] => [key, converted])
            )
          )
        )
      ),
      map(pairs => Object.fromEntries(pairs))
    );
  }
  return left(unsupported(path, `Unsupported CBOR value ${String(value)}`));
}

/**
 * Turns the decoded COSE payload into certificate claims. The item goes through JSON
 * text on its way to the claims decoder, which sees exactly what a JSON consumer of
 * the payload would.
 */
export function materialize(decoder: ClaimsDecoder) {
  return (item: unknown): Either<PayloadConversionError | SchemaDecodingError, CertificateClaims> => {
    if (!mapEntries(item)) {
      return left(new PayloadConversionError());
    }
    return pipe(
      toJsonValue(item),
      chain(json => tryCatch((): unknown => JSON.parse(JSON.stringify(json)), toError)),
      mapLeft(cause => new PayloadConversionError(cause)),
      chainW(json => pipe(decoder.decode(json), mapLeft(errors => new SchemaDecodingError(errors))))
    );
  };
}
