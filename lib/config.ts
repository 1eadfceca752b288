export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export interface NavDataConfig {
  indexDbPath: string;
  logLevel: LogLevel;
}

const DEFAULT_INDEX_DB_PATH = ':memory:';
const DEFAULT_LOG_LEVEL: LogLevel = 'warn';
const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

let resolvedConfig: NavDataConfig | null = null;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function resolveLogLevel(raw: string | undefined): LogLevel {
  const normalized = (raw ?? '').trim().toLowerCase();
  if (!normalized) return DEFAULT_LOG_LEVEL;
  if (isLogLevel(normalized)) return normalized;
  console.warn(`[config] ignoring unknown NAVDATA_LOG_LEVEL "${raw}", using ${DEFAULT_LOG_LEVEL}`);
  return DEFAULT_LOG_LEVEL;
}

export function getConfig(): NavDataConfig {
  if (!resolvedConfig) {
    const indexDbPath = process.env.NAVDATA_INDEX_DB_PATH;
    resolvedConfig = {
      indexDbPath:
        typeof indexDbPath === 'string' && indexDbPath.length > 0
          ? indexDbPath
          : DEFAULT_INDEX_DB_PATH,
      logLevel: resolveLogLevel(process.env.NAVDATA_LOG_LEVEL)
    };
  }
  return resolvedConfig;
}

export function isLogLevelEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
  const configured = getConfig().logLevel;
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(configured);
}
