import type { ProcessSignal } from './process-signals.js';

export type ShutdownSignal = Exclude<ProcessSignal, 'exit'>;

export type ShutdownEvent =
  | { readonly kind: 'shutdown_requested'; readonly signal: ShutdownSignal }
  | { readonly kind: 'stop_requested'; readonly source: string };

export type Unsubscribe = () => void;

/**
 * Port for requesting a watchdog shutdown.
 * Signals and service-control hooks emit here; only the composition root decides to exit.
 */
export interface ShutdownEvents {
  onShutdown(listener: (event: ShutdownEvent) => void): Unsubscribe;
  emit(event: ShutdownEvent): void;
}

export function describeShutdown(event: ShutdownEvent): string {
  return event.kind === 'shutdown_requested' ? `signal ${event.signal}` : `stop requested by ${event.source}`;
}
