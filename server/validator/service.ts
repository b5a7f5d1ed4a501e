import { Either, left, right } from 'fp-ts/Either';

import { Logger } from '../logger';
import { Certificate } from '../decoder/types';
import { ValidationContext, ValidationRule, check, describeRule } from './rule';
import { defaultRule } from './rules';

export class ValidationFailure extends Error {
  readonly _tag = 'ValidationFailure';

  constructor(readonly unsatisfiedRule: ValidationRule) {
    super(`Unsatisfied validation rule: ${describeRule(unsatisfiedRule)}`);
    this.name = 'ValidationFailure';
  }

  /**
   * The tag of the unsatisfied leaf, or `!` and the negated rule when a `not` failed.
   */
  get reason(): string {
    return describeRule(this.unsatisfiedRule);
  }
}

export type ValidationResult = Either<ValidationFailure, void>;

export class Validator {
  constructor(readonly logger: Logger) {
    this.evaluate = this.evaluate.bind(this);
  }

  evaluate(
    certificate: Certificate,
    rule: ValidationRule = defaultRule,
    context: ValidationContext = { now: new Date() }
  ): ValidationResult {
    const outcome = check(rule, certificate, context);
    if (!outcome.satisfied) {
      const failure = new ValidationFailure(outcome.culprit);
      this.logger.debug({ rule: failure.reason, issuer: certificate.issuer }, 'Certificate rejected');
      return left(failure);
    }
    return right(undefined);
  }
}
