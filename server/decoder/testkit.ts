import * as cbor from 'cbor';
import * as base45 from 'base45-js';
import { deflate } from 'pako';
import { parseISO } from 'date-fns';
import { KeyObject, generateKeyPairSync, sign } from 'crypto';

import { CertificateClaimsCodec } from './codec';
import { HeaderMap } from './envelope';
import { Certificate, CertificateClaims, CertificateContent } from './types';

/**
 * COSE_Sign1 tag, https://datatracker.ietf.org/doc/html/rfc8152#section-4.2
 */
export const COSE_SIGN1_TAG = 18;

export const ES256 = -7;

export function buildClaims(content: CertificateContent, overrides: Partial<CertificateClaims> = {}): CertificateClaims {
  return {
    issuer: 'DE',
    issuedAt: new Date('2026-01-01T00:00:00.000Z'),
    expiresAt: new Date('2027-01-01T00:00:00.000Z'),
    schemaVersion: '1.3.0',
    dateOfBirth: '1990-04-12',
    name: {
      familyName: 'Tester',
      familyNameStandardized: 'TESTER',
      givenName: 'Alex',
      givenNameStandardized: 'ALEX',
    },
    content,
    ...overrides,
  };
}

export function vaccinationContent(doseNumber = 2, totalSeriesOfDoses = 2): CertificateContent {
  return {
    type: 'vaccination',
    vaccination: {
      diseaseAgentTargeted: '840539006',
      vaccineOrProphylaxis: '1119349007',
      medicinalProduct: 'EU/1/20/1528',
      marketingAuthorizationHolder: 'ORG-100030215',
      doseNumber,
      totalSeriesOfDoses,
      dateOfVaccination: parseISO('2025-12-01'),
      country: 'DE',
      certificateIssuer: 'Test Issuer',
      certificateIdentifier: 'URN:UVCI:01:DE:TEST0001',
    },
  };
}

export function testContent(testResult: string, sampleCollectedAt: Date): CertificateContent {
  return {
    type: 'test',
    test: {
      diseaseAgentTargeted: '840539006',
      typeOfTest: 'LP6464-4',
      testName: 'Test PCR',
      sampleCollectedAt,
      testResult,
      testingCentre: 'Test Centre',
      country: 'DE',
      certificateIssuer: 'Test Issuer',
      certificateIdentifier: 'URN:UVCI:01:DE:TEST0002',
    },
  };
}

export function recoveryContent(validFrom: string, validUntil: string): CertificateContent {
  return {
    type: 'recovery',
    recovery: {
      diseaseAgentTargeted: '840539006',
      firstPositiveTestResultAt: parseISO('2025-11-20'),
      country: 'DE',
      certificateIssuer: 'Test Issuer',
      validFrom: parseISO(validFrom),
      validUntil: parseISO(validUntil),
      certificateIdentifier: 'URN:UVCI:01:DE:TEST0003',
    },
  };
}

/**
 * Encodes the claims the way an issuer does: a CBOR map keyed by the integer CWT
 * labels, with the DCC itself under `-260` / `1`.
 */
export function encodeClaims(claims: CertificateClaims): Buffer {
  const encoded = CertificateClaimsCodec.encode(claims);
  // drops the optional fields left undefined
  const hcert: unknown = JSON.parse(JSON.stringify(encoded['-260']['1']));
  return cbor.encode(
    new Map<number, unknown>([
      [1, encoded['1']],
      [4, encoded['4']],
      [6, encoded['6']],
      [-260, new Map([[1, hcert]])],
    ])
  );
}

export function encodeEnvelope(contents: unknown[], tag = COSE_SIGN1_TAG): Buffer {
  return cbor.encode(new cbor.Tagged(tag, contents));
}

export type TextOptions = {
  readonly compress?: boolean;
  readonly prefix?: string;
};

export function toCertificateText(data: Uint8Array, { compress = true, prefix = 'HC1:' }: TextOptions = {}): string {
  const bytes = compress ? deflate(data) : data;
  return prefix + base45.encode(Buffer.from(bytes));
}

export type SignedCertificate = {
  readonly text: string;
  readonly protectedHeader: Buffer;
  readonly payload: Buffer;
  readonly signature: Buffer;
  readonly publicKey: KeyObject;
};

export type SignOptions = TextOptions & {
  readonly keyId?: Buffer;
  readonly unprotectedHeader?: Map<number, unknown>;
};

/**
 * Issues a certificate signed with a throwaway ES256 key.
 */
export function signClaims(claims: CertificateClaims, options: SignOptions = {}): SignedCertificate {
  const { keyId = Buffer.from('test-kid'), unprotectedHeader = new Map() } = options;
  const { privateKey, publicKey } = generateKeyPairSync('ec', { namedCurve: 'P-256' });

  const protectedHeader = cbor.encode(
    new Map<number, unknown>([
      [1, ES256],
      [4, keyId],
    ])
  );
  const payload = encodeClaims(claims);
  const toBeSigned = cbor.encode(['Signature1', protectedHeader, Buffer.alloc(0), payload]);
  const signature = sign('sha256', toBeSigned, { key: privateKey, dsaEncoding: 'ieee-p1363' });

  const envelope = encodeEnvelope([protectedHeader, unprotectedHeader, payload, signature]);
  return {
    text: toCertificateText(envelope, options),
    protectedHeader,
    payload,
    signature,
    publicKey,
  };
}

export function toCertificate(claims: CertificateClaims): Certificate {
  return {
    ...claims,
    cryptographicEnvelope: {
      protected: new Uint8Array(),
      unprotected: new HeaderMap(),
      payload: new Uint8Array(),
      signature: new Uint8Array(),
    },
    base45Representation: '',
  };
}
