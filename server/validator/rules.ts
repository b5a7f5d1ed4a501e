import { differenceInMinutes, endOfDay, isAfter, isBefore } from 'date-fns';

import { ValidationRule, allOf, leaf, when } from './rule';

/**
 * SNOMED CT codes of the `tr` value set.
 *
 * https://github.com/ehn-dcc-development/ehn-dcc-valuesets/blob/main/test-result.json
 */
export const TEST_RESULT_NOT_DETECTED = '260415000';
export const TEST_RESULT_DETECTED = '260373001';

export const DEFAULT_TEST_VALIDITY_HOURS = 72;

export const isVaccination = leaf('isVaccination', ({ content }) => content.type === 'vaccination');

export const isTest = leaf('isTest', ({ content }) => content.type === 'test');

export const isRecovery = leaf('isRecovery', ({ content }) => content.type === 'recovery');

export const isIssuedInPast = leaf('isIssuedInPast', ({ issuedAt }, { now }) => !isAfter(issuedAt, now));

export const isNotExpired = leaf('isNotExpired', ({ expiresAt }, { now }) => isBefore(now, expiresAt));

export const isFullyImmunized = leaf('isFullyImmunized', ({ content }) => {
  if (content.type !== 'vaccination') return false;
  const { doseNumber, totalSeriesOfDoses } = content.vaccination;
  return doseNumber >= totalSeriesOfDoses;
});

export const isTestedNegative = leaf('isTestedNegative', ({ content }) => {
  return content.type === 'test' && content.test.testResult === TEST_RESULT_NOT_DETECTED;
});

export function isTestResultRecent(hours = DEFAULT_TEST_VALIDITY_HOURS): ValidationRule {
  return leaf(`isTestResultRecent(${hours}h)`, ({ content }, { now }) => {
    if (content.type !== 'test') return false;
    const age = differenceInMinutes(now, content.test.sampleCollectedAt);
    return age >= 0 && age <= hours * 60;
  });
}

export const isRecoveryValid = leaf('isRecoveryValid', ({ content }, { now }) => {
  if (content.type !== 'recovery') return false;
  const { validFrom, validUntil } = content.recovery;
  return !isBefore(now, validFrom) && !isAfter(now, endOfDay(validUntil));
});

export function hasIssuer(...countries: string[]): ValidationRule {
  return leaf(`hasIssuer(${countries.join(',')})`, ({ issuer }) => countries.includes(issuer));
}

/**
 * Accepts certificates that are in their validity window and whose content stands on
 * its own: a completed vaccination series, a recent negative test, or a recovery
 * within its validity period.
 */
export const defaultRule: ValidationRule = allOf(
  isIssuedInPast,
  isNotExpired,
  when(isVaccination, isFullyImmunized),
  when(isTest, allOf(isTestedNegative, isTestResultRecent())),
  when(isRecovery, isRecoveryValid)
);
