export const SECTIONS = {
  ADDRESS: 'ADDRESS',
  ENDPOINT: 'ENDPOINT',
  REQUEST: 'REQUEST',
  RESPONSE: 'RESPONSE',
  ERROR: 'ERROR',
  ASSERTS: 'ASSERTS',
  HEADERS: 'HEADERS',
  REQUEST_HEADERS: 'REQUEST_HEADERS',
  TLS: 'TLS',
  PROTO: 'PROTO',
  OPTIONS: 'OPTIONS',
} as const;

export type SectionName = typeof SECTIONS[keyof typeof SECTIONS];

export const REPEATABLE_SECTIONS: readonly SectionName[] = [SECTIONS.REQUEST, SECTIONS.ASSERTS];

export const OUTCOME_STATUS = {
  PASSED: 'PASSED',
  FAILED: 'FAILED',
  ERROR: 'ERROR',
} as const;

// Lower-cased substrings of transport failures worth another attempt
export const TRANSIENT_NETWORK_PATTERNS: readonly string[] = [
  'connection refused',
  'connection reset',
  'timeout',
  'timed out',
  'unavailable',
  'deadline exceeded',
  'deadline_exceeded',
  'deadline-exceeded',
  'network is unreachable',
];

export const WILDCARD = '*';

export const DEFINITION_EXTENSION = '.gctf';

export const DRY_RUN_DEFAULT_RESPONSE = {
  dry_run: true,
  message: 'Command preview completed',
  status: 'success',
} as const;
