import type { RuntimeMode } from './runtime-mode.js';
import { assertNever } from './assert-never.js';

/**
 * Policy for process lifecycle management (signals, exit hooks, fault handlers).
 * Avoid boolean flags by using discriminated unions.
 */
export type ProcessLifecyclePolicy =
  | { kind: 'install_signal_handlers' }
  | { kind: 'no_signal_handlers' };

export function toProcessLifecyclePolicy(mode: RuntimeMode): ProcessLifecyclePolicy {
  switch (mode.kind) {
    case 'test':
      return { kind: 'no_signal_handlers' };
    case 'cli':
    case 'service':
      return { kind: 'install_signal_handlers' };
    default:
      return assertNever(mode, 'runtime mode');
  }
}
