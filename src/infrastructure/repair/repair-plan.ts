import * as path from 'path';
import type { ErrorKind } from '../../domain/error-kind.js';
import { assertNever } from '../../runtime/assert-never.js';

/** What repairing a kind amounts to on disk. */
export type RepairAction =
  | { readonly type: 'hard_clear'; readonly targets: readonly string[] }
  | { readonly type: 'clear_network_state'; readonly targets: readonly string[] }
  /** Needs the application's IndexedDB opened through a browser; no filesystem equivalent. */
  | { readonly type: 'clear_reference_tables' };

export function repairActionFor(kind: ErrorKind, appRoot: string): RepairAction {
  const appData = path.join(appRoot, 'AppData');
  switch (kind) {
    case 'SCHEMA_CORRUPT':
    case 'STORES_NOT_CORRECTLY_SET_UP':
      return { type: 'hard_clear', targets: [appData] };
    case 'DEVICE_INFO_INVALID':
      return {
        type: 'clear_network_state',
        targets: [path.join(appData, 'Network'), path.join(appData, 'Service Worker')],
      };
    case 'REFERENCE_TABLE_CORRUPT':
      return { type: 'clear_reference_tables' };
    default:
      return assertNever(kind, 'error kind');
  }
}

export function describeRepairAction(action: RepairAction): string {
  switch (action.type) {
    case 'hard_clear':
      return `delete ${action.targets.join(', ')}`;
    case 'clear_network_state':
      return `clear cookies and service worker (${action.targets.join(', ')})`;
    case 'clear_reference_tables':
      return 'clear the reference table object store';
    default:
      return assertNever(action, 'repair action');
  }
}
