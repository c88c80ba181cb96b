import type { LogLevel } from '../domain/index.js';

/**
 * Lead tokens that mark an error line, in priority order.
 * A line is attributed to the first token that matches.
 */
export const ERROR_LEAD_TOKENS: readonly { readonly token: string; readonly regex: RegExp }[] = [
  { token: 'error:', regex: /error:/i },
  { token: 'exception:', regex: /exception:/i },
  { token: 'fatal:', regex: /fatal:/i },
  { token: 'panic:', regex: /panic:/i },
  { token: 'failed:', regex: /failed:/i },
  { token: 'cannot', regex: /\bcannot\b/i },
];

export const WARNING_REGEX = /\bwarn(?:ing)?\b/i;

/** First match wins, checked in this order. */
export const LEVEL_PATTERNS: readonly { readonly level: LogLevel; readonly regex: RegExp }[] = [
  { level: 'ERROR', regex: /error|\berr\b|fatal|critical|\bcrit\b|exception/i },
  { level: 'WARNING', regex: /warn/i },
  { level: 'INFO', regex: /\binfo/i },
  { level: 'DEBUG', regex: /debug|\btrace\b/i },
];

/** Known failure signatures, counted per occurrence. */
export const KNOWN_PATTERNS: readonly { readonly pattern: string; readonly label: string; readonly regex: RegExp }[] = [
  { pattern: 'connection_refused', label: 'Connection Refused', regex: /connection refused/gi },
  { pattern: 'connection_timeout', label: 'Connection Timeout', regex: /connection.*timeout|timeout.*connection/gi },
  { pattern: 'no_such_host', label: 'DNS Resolution Failure', regex: /no such host|name resolution failed|could not resolve/gi },
  { pattern: 'permission_denied', label: 'Permission Denied', regex: /permission denied/gi },
  { pattern: 'out_of_memory', label: 'Out Of Memory', regex: /out of memory|\boom\b|cannot allocate memory/gi },
  { pattern: 'file_not_found', label: 'File Not Found', regex: /no such file|file not found|cannot find/gi },
  { pattern: 'port_in_use', label: 'Port In Use', regex: /address already in use|port.*already in use/gi },
  { pattern: 'authentication_failed', label: 'Authentication Failed', regex: /auth.*failed|invalid credentials/gi },
  { pattern: 'database_error', label: 'Database Error', regex: /database.*error|sql.*error|connection pool/gi },
  { pattern: 'network_unreachable', label: 'Network Unreachable', regex: /network.*unreachable/gi },
  { pattern: 'disk_full', label: 'Disk Full', regex: /no space left|disk.*full/gi },
  { pattern: 'certificate_error', label: 'Certificate Error', regex: /certificate.*error|tls.*error|ssl.*error/gi },
];

export const TRACE_START_REGEX = /traceback|stack trace|\bat\s+[\w$]+\.[\w$<>]+/i;

export const TRACE_CONTINUATION_REGEX = /^(?:\s+(?:at|File|line)\b|->)/;
