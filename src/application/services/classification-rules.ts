import type { ErrorKind } from '../../domain/error-kind.js';

export type RuleMatcher =
  | { readonly type: 'substring'; readonly text: string }
  | { readonly type: 'pattern'; readonly regex: RegExp };

export interface ClassificationRule {
  readonly id: string;
  readonly kind: ErrorKind;
  readonly match: RuleMatcher;
}

/**
 * Known failure signatures, most specific first.
 *
 * Order is part of the contract: the classifier stops at the first rule that matches.
 */
export const DEFAULT_CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    id: 'reference-tables-load-failed',
    kind: 'REFERENCE_TABLE_CORRUPT',
    match: { type: 'substring', text: 'storeAction() fail: LoadAll:getAllReferenceTables' },
  },
  {
    id: 'device-info-load-failed',
    kind: 'DEVICE_INFO_INVALID',
    match: { type: 'substring', text: 'storeAction() fail: LoadByKey:getDeviceInfo' },
  },
  {
    id: 'schema-init-internal-error',
    kind: 'SCHEMA_CORRUPT',
    match: { type: 'substring', text: 'init schema: error: Internal error' },
  },
  {
    id: 'stores-not-set-up',
    kind: 'STORES_NOT_CORRECTLY_SET_UP',
    match: { type: 'substring', text: 'Stores not correctly set up, db' },
  },
  {
    id: 'object-store-open-failed',
    kind: 'STORES_NOT_CORRECTLY_SET_UP',
    match: { type: 'pattern', regex: /object store '[^']*' could not be opened/ },
  },
];
