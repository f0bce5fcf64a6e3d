import type { ClassifiedEvent, LogEvent } from '../../domain/log-event.js';
import type { ErrorKind } from '../../domain/error-kind.js';
import { ErrorKindSchema } from '../../domain/error-kind.js';
import { assertNever } from '../../runtime/assert-never.js';
import {
  DEFAULT_CLASSIFICATION_RULES,
  type ClassificationRule,
  type RuleMatcher,
} from './classification-rules.js';

export interface Classifier {
  classify(event: LogEvent): ClassifiedEvent | null;
}

export interface TextMatch {
  readonly kind: ErrorKind;
  readonly ruleId: string;
}

function matches(matcher: RuleMatcher, text: string): boolean {
  switch (matcher.type) {
    case 'substring':
      return text.includes(matcher.text);
    case 'pattern':
      return matcher.regex.test(text);
    default:
      return assertNever(matcher, 'rule matcher');
  }
}

/**
 * Table validation. A bad table is a programmer error, so this throws.
 */
function validateRules(rules: readonly ClassificationRule[]): void {
  const seen = new Set<string>();
  for (const rule of rules) {
    if (rule.id.trim() === '') {
      throw new Error('Classification rule with empty id');
    }
    if (seen.has(rule.id)) {
      throw new Error(`Duplicate classification rule id: ${rule.id}`);
    }
    seen.add(rule.id);

    const kind = ErrorKindSchema.safeParse(rule.kind);
    if (!kind.success) {
      throw new Error(`Classification rule ${rule.id} names unknown error kind: ${String(rule.kind)}`);
    }

    const { match } = rule;
    if (match.type === 'substring' && match.text === '') {
      throw new Error(`Classification rule ${rule.id} has an empty substring`);
    }
    // g and y make RegExp.test stateful through lastIndex.
    if (match.type === 'pattern' && (match.regex.global || match.regex.sticky)) {
      throw new Error(`Classification rule ${rule.id} uses a global or sticky regex`);
    }
  }
}

/**
 * Ordered first-match classifier. Lines that match no rule produce nothing.
 */
export class PatternClassifier implements Classifier {
  private readonly rules: readonly ClassificationRule[];

  constructor(rules: readonly ClassificationRule[] = DEFAULT_CLASSIFICATION_RULES) {
    validateRules(rules);
    this.rules = [...rules];
  }

  classify(event: LogEvent): ClassifiedEvent | null {
    const match = this.classifyText(event.raw);
    return match ? { event, kind: match.kind, ruleId: match.ruleId } : null;
  }

  classifyText(raw: string): TextMatch | null {
    for (const rule of this.rules) {
      if (matches(rule.match, raw)) {
        return { kind: rule.kind, ruleId: rule.id };
      }
    }
    return null;
  }

  listRules(): readonly ClassificationRule[] {
    return this.rules;
  }
}
