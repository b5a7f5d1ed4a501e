import * as t from 'io-ts';
import { pipe } from 'fp-ts/function';
import { chain } from 'fp-ts/Either';
import { format, fromUnixTime, getUnixTime, isValid, parseISO } from 'date-fns';

import { CertificateClaims, CertificateContent, Recovery, Test, Vaccination } from './types';

export const DateFromISOString = new t.Type<Date, string, unknown>(
  'DateFromISOString',
  (u): u is Date => u instanceof Date && isValid(u),
  (u, c) =>
    pipe(
      t.string.validate(u, c),
      chain(value => {
        const date = parseISO(value);
        return isValid(date) ? t.success(date) : t.failure(u, c, `Malformed date "${value}"`);
      })
    ),
  date => date.toISOString()
);

/**
 * Calendar dates such as the date of vaccination are written without a time.
 */
export const DateFromCalendarString = new t.Type<Date, string, unknown>(
  'DateFromCalendarString',
  DateFromISOString.is,
  DateFromISOString.validate,
  date => format(date, 'yyyy-MM-dd')
);

export const DateFromUnixTime = new t.Type<Date, number, unknown>(
  'DateFromUnixTime',
  (u): u is Date => u instanceof Date && isValid(u),
  (u, c) =>
    pipe(
      t.number.validate(u, c),
      chain(value => {
        const date = fromUnixTime(value);
        return Number.isInteger(value) && isValid(date)
          ? t.success(date)
          : t.failure(u, c, `Malformed timestamp ${value}`);
      })
    ),
  date => getUnixTime(date)
);

// The DCC schema allows a partial date of birth, or an empty one when it is unknown.
const DATE_OF_BIRTH_PATTERN = /^(\d{4}(-\d{2}(-\d{2})?)?)?$/;

const isDateOfBirth = (u: unknown): u is string => typeof u === 'string' && DATE_OF_BIRTH_PATTERN.test(u);

export const DateOfBirth = new t.Type<string, string, unknown>(
  'DateOfBirth',
  isDateOfBirth,
  (u, c) => (isDateOfBirth(u) ? t.success(u) : t.failure(u, c, `Malformed date of birth "${u}"`)),
  t.identity
);

// -----------------------------------------------------------------------
// Wire shapes of the DCC payload
//
// https://github.com/ehn-dcc-development/ehn-dcc-schema

const NameEntry = t.intersection([
  t.type({ fnt: t.string }),
  t.partial({ fn: t.string, gn: t.string, gnt: t.string }),
]);

const VaccinationEntry = t.type({
  tg: t.string, // disease or agent targeted
  vp: t.string, // vaccine or prophylaxis
  mp: t.string, // vaccine medicinal product
  ma: t.string, // marketing authorisation holder or manufacturer
  dn: t.number, // dose number
  sd: t.number, // total series of doses
  dt: DateFromCalendarString,
  co: t.string,
  is: t.string,
  ci: t.string,
});

const TestEntry = t.intersection([
  t.type({
    tg: t.string,
    tt: t.string, // type of test
    sc: DateFromISOString, // sample collection
    tr: t.string, // test result
    co: t.string,
    is: t.string,
    ci: t.string,
  }),
  t.partial({
    nm: t.string, // NAA test name
    ma: t.string, // RAT test name and manufacturer
    tc: t.string, // testing centre
  }),
]);

const RecoveryEntry = t.type({
  tg: t.string,
  fr: DateFromCalendarString, // first positive test result
  co: t.string,
  is: t.string,
  df: DateFromCalendarString,
  du: DateFromCalendarString,
  ci: t.string,
});

export type HealthCertificateEntry = t.TypeOf<typeof HealthCertificateEntry>;
export const HealthCertificateEntry = t.intersection([
  t.type({
    ver: t.string,
    nam: NameEntry,
    dob: DateOfBirth,
  }),
  t.partial({
    v: t.array(VaccinationEntry),
    t: t.array(TestEntry),
    r: t.array(RecoveryEntry),
  }),
]);

/**
 * The CWT claims carried in the COSE payload, keyed by their CBOR labels.
 *
 * https://github.com/ehn-dcc-development/hcert-spec/blob/main/hcert_spec.md#331-cwt-structure-overview
 */
export type CWTClaimsEntry = t.TypeOf<typeof CWTClaimsEntry>;
export const CWTClaimsEntry = t.type({
  '1': t.string, // Issuer, ISO 3166-1 alpha-2
  '4': DateFromUnixTime, // Expiration Time
  '6': DateFromUnixTime, // Issued At
  '-260': t.type({ '1': HealthCertificateEntry }),
});

// -----------------------------------------------------------------------

const toVaccination = (entry: t.TypeOf<typeof VaccinationEntry>): Vaccination => ({
  diseaseAgentTargeted: entry.tg,
  vaccineOrProphylaxis: entry.vp,
  medicinalProduct: entry.mp,
  marketingAuthorizationHolder: entry.ma,
  doseNumber: entry.dn,
  totalSeriesOfDoses: entry.sd,
  dateOfVaccination: entry.dt,
  country: entry.co,
  certificateIssuer: entry.is,
  certificateIdentifier: entry.ci,
});

const toTest = (entry: t.TypeOf<typeof TestEntry>): Test => ({
  diseaseAgentTargeted: entry.tg,
  typeOfTest: entry.tt,
  testName: entry.nm,
  testNameAndManufacturer: entry.ma,
  sampleCollectedAt: entry.sc,
  testResult: entry.tr,
  testingCentre: entry.tc,
  country: entry.co,
  certificateIssuer: entry.is,
  certificateIdentifier: entry.ci,
});

const toRecovery = (entry: t.TypeOf<typeof RecoveryEntry>): Recovery => ({
  diseaseAgentTargeted: entry.tg,
  firstPositiveTestResultAt: entry.fr,
  country: entry.co,
  certificateIssuer: entry.is,
  validFrom: entry.df,
  validUntil: entry.du,
  certificateIdentifier: entry.ci,
});

function selectContent(entry: HealthCertificateEntry): CertificateContent | string {
  const groups = [entry.v, entry.t, entry.r].filter(group => group !== undefined);
  if (groups.length !== 1) {
    return `expected exactly one of [v, t, r], found ${groups.length}`;
  }
  if (entry.v) {
    return entry.v.length > 0 ? { type: 'vaccination', vaccination: toVaccination(entry.v[0]) } : 'empty [v]';
  }
  if (entry.t) {
    return entry.t.length > 0 ? { type: 'test', test: toTest(entry.t[0]) } : 'empty [t]';
  }
  if (entry.r) {
    return entry.r.length > 0 ? { type: 'recovery', recovery: toRecovery(entry.r[0]) } : 'empty [r]';
  }
  return 'no certificate content';
}

function toContentEntry(content: CertificateContent): Pick<HealthCertificateEntry, 'v' | 't' | 'r'> {
  switch (content.type) {
    case 'vaccination': {
      const { vaccination: v } = content;
      return {
        v: [
          {
            tg: v.diseaseAgentTargeted,
            vp: v.vaccineOrProphylaxis,
            mp: v.medicinalProduct,
            ma: v.marketingAuthorizationHolder,
            dn: v.doseNumber,
            sd: v.totalSeriesOfDoses,
            dt: v.dateOfVaccination,
            co: v.country,
            is: v.certificateIssuer,
            ci: v.certificateIdentifier,
          },
        ],
      };
    }
    case 'test': {
      const { test: x } = content;
      return {
        t: [
          {
            tg: x.diseaseAgentTargeted,
            tt: x.typeOfTest,
            nm: x.testName,
            ma: x.testNameAndManufacturer,
            sc: x.sampleCollectedAt,
            tr: x.testResult,
            tc: x.testingCentre,
            co: x.country,
            is: x.certificateIssuer,
            ci: x.certificateIdentifier,
          },
        ],
      };
    }
    case 'recovery': {
      const { recovery: r } = content;
      return {
        r: [
          {
            tg: r.diseaseAgentTargeted,
            fr: r.firstPositiveTestResultAt,
            co: r.country,
            is: r.certificateIssuer,
            df: r.validFrom,
            du: r.validUntil,
            ci: r.certificateIdentifier,
          },
        ],
      };
    }
  }
}

/**
 * Maps the generic payload structure onto {@link CertificateClaims}. Every field the
 * DCC schema requires must be present with the expected type.
 */
export const CertificateClaimsCodec = new t.Type<CertificateClaims, t.OutputOf<typeof CWTClaimsEntry>, unknown>(
  'CertificateClaims',
  (u): u is CertificateClaims => {
    return typeof u === 'object' && u !== null && 'issuer' in u && 'content' in u;
  },
  (u, c) =>
    pipe(
      CWTClaimsEntry.validate(u, c),
      chain(claims => {
        const hcert = claims['-260']['1'];
        const content = selectContent(hcert);
        if (typeof content === 'string') {
          return t.failure(u, c, `Invalid certificate content: ${content}`);
        }
        return t.success({
          issuer: claims['1'],
          issuedAt: claims['6'],
          expiresAt: claims['4'],
          schemaVersion: hcert.ver,
          dateOfBirth: hcert.dob,
          name: {
            familyName: hcert.nam.fn,
            familyNameStandardized: hcert.nam.fnt,
            givenName: hcert.nam.gn,
            givenNameStandardized: hcert.nam.gnt,
          },
          content,
        });
      })
    ),
  claims =>
    CWTClaimsEntry.encode({
      '1': claims.issuer,
      '4': claims.expiresAt,
      '6': claims.issuedAt,
      '-260': {
        '1': {
          ver: claims.schemaVersion,
          nam: {
            fn: claims.name.familyName,
            fnt: claims.name.familyNameStandardized,
            gn: claims.name.givenName,
            gnt: claims.name.givenNameStandardized,
          },
          dob: claims.dateOfBirth,
          ...toContentEntry(claims.content),
        },
      },
    })
);
