/**
 * An entry of the COSE unprotected header. Both sides keep the exact CBOR encoding
 * they were read with, they are never interpreted by the decoder.
 */
export type HeaderEntry = {
  readonly key: Uint8Array;
  readonly value: Uint8Array;
};

/**
 * The COSE_Sign1 structure a certificate was transported in.
 *
 * https://datatracker.ietf.org/doc/html/rfc8152#section-4.2
 */
export type CryptographicEnvelope = {
  readonly protected: Uint8Array;
  /**
   * Keyed by the hex form of the encoded key bytes, in the order the keys first
   * appeared in the source map.
   */
  readonly unprotected: ReadonlyMap<string, HeaderEntry>;
  readonly payload: Uint8Array;
  readonly signature: Uint8Array;
};

export type PersonName = {
  readonly familyName?: string;
  readonly familyNameStandardized: string;
  readonly givenName?: string;
  readonly givenNameStandardized?: string;
};

export type Vaccination = {
  readonly diseaseAgentTargeted: string;
  readonly vaccineOrProphylaxis: string;
  readonly medicinalProduct: string;
  readonly marketingAuthorizationHolder: string;
  readonly doseNumber: number;
  readonly totalSeriesOfDoses: number;
  readonly dateOfVaccination: Date;
  readonly country: string;
  readonly certificateIssuer: string;
  readonly certificateIdentifier: string;
};

export type Test = {
  readonly diseaseAgentTargeted: string;
  readonly typeOfTest: string;
  readonly testName?: string;
  readonly testNameAndManufacturer?: string;
  readonly sampleCollectedAt: Date;
  readonly testResult: string;
  readonly testingCentre?: string;
  readonly country: string;
  readonly certificateIssuer: string;
  readonly certificateIdentifier: string;
};

export type Recovery = {
  readonly diseaseAgentTargeted: string;
  readonly firstPositiveTestResultAt: Date;
  readonly country: string;
  readonly certificateIssuer: string;
  readonly validFrom: Date;
  readonly validUntil: Date;
  readonly certificateIdentifier: string;
};

export type CertificateContent =
  | { readonly type: 'vaccination'; readonly vaccination: Vaccination }
  | { readonly type: 'test'; readonly test: Test }
  | { readonly type: 'recovery'; readonly recovery: Recovery };

/**
 * The claims materialized from the COSE payload, before the pipeline attaches the
 * transport details.
 */
export type CertificateClaims = {
  readonly issuer: string;
  readonly issuedAt: Date;
  readonly expiresAt: Date;
  readonly schemaVersion: string;
  readonly dateOfBirth: string;
  readonly name: PersonName;
  readonly content: CertificateContent;
};

export type Certificate = CertificateClaims & {
  readonly cryptographicEnvelope: CryptographicEnvelope;
  /**
   * The full certificate text exactly as it was given to the decoder, prefix included.
   */
  readonly base45Representation: string;
};
