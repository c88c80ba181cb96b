import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

export type DedupBackend = 'memory' | 'redis';

/**
 * Intake configuration loaded from YAML, with environment overrides for
 * deployment-specific values.
 */
export interface IntakeConfig {
  dedup: {
    backend: DedupBackend;
    ttl_seconds: number;
    sweep_interval_seconds: number;
  };
  investigator: {
    url: string;
    timeout_ms: number;
    max_retries: number;
  };
}

/** Defaults: in-process cache, 5 minute window, one dispatch retry. */
export const DEFAULT_CONFIG: IntakeConfig = {
  dedup: { backend: 'memory', ttl_seconds: 300, sweep_interval_seconds: 60 },
  investigator: {
    url: 'http://localhost:8081/api/v1/investigations',
    timeout_ms: 300_000,
    max_retries: 1,
  },
};

type Section = Record<string, string | number | boolean>;

function parseScalar(raw: string): string | number | boolean {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (raw === '""' || raw === "''") return '';
  if (raw.length >= 2 && ((raw.startsWith('"') && raw.endsWith('"')) || (raw.startsWith("'") && raw.endsWith("'")))) {
    return raw.slice(1, -1);
  }
  if (/^-?\d+(\.\d+)?$/.test(raw)) return Number(raw);
  return raw;
}

/**
 * Minimal YAML parser for the two-level config structure.
 *
 * Handles only what config/intake.yaml uses: top-level section keys with
 * indented scalar values and `#` comments. Not a general-purpose parser.
 */
function parseSimpleYaml(content: string): Record<string, Section> {
  const result: Record<string, Section> = {};
  let current: Section | undefined;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.replace(/\s+#.*$/, '').trimEnd();
    if (line === '' || line.trimStart().startsWith('#')) continue;

    const colonIdx = line.indexOf(':');
    if (colonIdx === -1) continue;

    const key = line.slice(0, colonIdx).trim();
    const value = line.slice(colonIdx + 1).trim();

    // Top-level key (no leading whitespace)
    if (!line.startsWith(' ') && !line.startsWith('\t')) {
      current = {};
      result[key] = current;
      continue;
    }

    if (current !== undefined) {
      current[key] = parseScalar(value);
    }
  }

  return result;
}

function pickNumber(
  section: Section | undefined,
  key: string,
  fallback: number,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER,
): number {
  const value = section?.[key];
  return typeof value === 'number' && Number.isFinite(value) && value >= min && value <= max ? value : fallback;
}

function pickString(section: Section | undefined, key: string, fallback: string): string {
  const value = section?.[key];
  return typeof value === 'string' && value !== '' ? value : fallback;
}

function pickBackend(section: Section | undefined, fallback: DedupBackend): DedupBackend {
  const value = section?.['backend'];
  return value === 'memory' || value === 'redis' ? value : fallback;
}

function readConfigFile(filePath: string): Record<string, Section> {
  try {
    return parseSimpleYaml(readFileSync(filePath, 'utf-8'));
  } catch {
    // Missing or unreadable file: every value falls back to its default.
    return {};
  }
}

/**
 * Loads the intake configuration.
 *
 * Values from the YAML file are merged over DEFAULT_CONFIG; invalid values
 * keep their default; `max_retries` is at most 1. `INVESTIGATOR_URL` and
 * `DEDUP_BACKEND` in `env` override the file.
 */
export function loadIntakeConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): IntakeConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'intake.yaml');
  const parsed = readConfigFile(filePath);

  const dedup = parsed['dedup'];
  const investigator = parsed['investigator'];

  const envBackend = env['DEDUP_BACKEND'];
  const envUrl = env['INVESTIGATOR_URL'];

  return {
    dedup: {
      backend: envBackend === 'memory' || envBackend === 'redis'
        ? envBackend
        : pickBackend(dedup, DEFAULT_CONFIG.dedup.backend),
      ttl_seconds: pickNumber(dedup, 'ttl_seconds', DEFAULT_CONFIG.dedup.ttl_seconds, 1),
      sweep_interval_seconds: pickNumber(
        dedup,
        'sweep_interval_seconds',
        DEFAULT_CONFIG.dedup.sweep_interval_seconds,
        0,
      ),
    },
    investigator: {
      url: envUrl !== undefined && envUrl !== ''
        ? envUrl
        : pickString(investigator, 'url', DEFAULT_CONFIG.investigator.url),
      timeout_ms: pickNumber(investigator, 'timeout_ms', DEFAULT_CONFIG.investigator.timeout_ms, 1),
      max_retries: pickNumber(investigator, 'max_retries', DEFAULT_CONFIG.investigator.max_retries, 0, 1),
    },
  };
}
