import { invariant } from '@navch/common';

import { Certificate } from '../decoder/types';

export type ValidationContext = {
  /**
   * The instant the certificate is checked at.
   */
  readonly now: Date;
};

export type Predicate = (certificate: Certificate, context: ValidationContext) => boolean;

export type LeafRule = {
  readonly kind: 'leaf';
  readonly tag: string;
  readonly predicate: Predicate;
};

export type ValidationRule =
  | LeafRule
  | { readonly kind: 'and'; readonly left: ValidationRule; readonly right: ValidationRule }
  | { readonly kind: 'or'; readonly left: ValidationRule; readonly right: ValidationRule }
  | { readonly kind: 'not'; readonly rule: ValidationRule };

export function leaf(tag: string, predicate: Predicate): ValidationRule {
  invariant(tag.length > 0, 'A validation rule requires a tag');
  return { kind: 'leaf', tag, predicate };
}

export function and(left: ValidationRule, right: ValidationRule): ValidationRule {
  return { kind: 'and', left, right };
}

export function or(left: ValidationRule, right: ValidationRule): ValidationRule {
  return { kind: 'or', left, right };
}

export function not(rule: ValidationRule): ValidationRule {
  return { kind: 'not', rule };
}

export function allOf(...rules: ValidationRule[]): ValidationRule {
  invariant(rules.length > 0, 'allOf() requires at least one rule');
  return rules.reduce(and);
}

export function anyOf(...rules: ValidationRule[]): ValidationRule {
  invariant(rules.length > 0, 'anyOf() requires at least one rule');
  return rules.reduce(or);
}

/**
 * Applies `rule` only to certificates matching `condition`, others satisfy it as is.
 */
export function when(condition: ValidationRule, rule: ValidationRule): ValidationRule {
  return or(not(condition), rule);
}

export function describeRule(rule: ValidationRule): string {
  switch (rule.kind) {
    case 'leaf':
      return rule.tag;
    case 'and':
      return `(${describeRule(rule.left)} && ${describeRule(rule.right)})`;
    case 'or':
      return `(${describeRule(rule.left)} || ${describeRule(rule.right)})`;
    case 'not':
      return `!${describeRule(rule.rule)}`;
  }
}

export type RuleOutcome = { readonly satisfied: true } | { readonly satisfied: false; readonly culprit: ValidationRule };

/**
 * Evaluates the rule tree and names the rule that made it fail:
 *
 * - `and` short-circuits on its first unsatisfied side
 * - `or` reports the right-hand failure when neither side holds
 * - `not` reports itself, since no leaf below it failed
 */
export function check(rule: ValidationRule, certificate: Certificate, context: ValidationContext): RuleOutcome {
  switch (rule.kind) {
    case 'leaf':
      return rule.predicate(certificate, context) ? { satisfied: true } : { satisfied: false, culprit: rule };
    case 'and': {
      const outcome = check(rule.left, certificate, context);
      return outcome.satisfied ? check(rule.right, certificate, context) : outcome;
    }
    case 'or': {
      const outcome = check(rule.left, certificate, context);
      return outcome.satisfied ? outcome : check(rule.right, certificate, context);
    }
    case 'not': {
      const outcome = check(rule.rule, certificate, context);
      return outcome.satisfied ? { satisfied: false, culprit: rule } : { satisfied: true };
    }
  }
}
