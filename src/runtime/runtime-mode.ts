/**
 * Runtime mode of the current process.
 * Decided once by the composition root and injected; services never sniff env vars for it.
 */
export type RuntimeMode =
  | { kind: 'service' }
  | { kind: 'cli' }
  | { kind: 'test' };
