function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

export const APP_INFO = {
  name: 'Tasmota Fleet Updater',
  version: '0.1.0',
};

export const SERVER_CONFIG = {
  port: intFromEnv('PORT', 5001),
  host: process.env.HOST || '0.0.0.0',
  dbPath: process.env.DB_PATH || ':memory:',
  devicesFile: process.env.DEVICES_FILE || '',
};

export const RELEASE_CONFIG = {
  apiUrl: process.env.RELEASE_API_URL || 'https://api.github.com/repos/arendst/Tasmota/releases/latest',
  releaseNotesUrl: process.env.RELEASE_NOTES_URL || 'https://github.com/arendst/Tasmota/releases/',
  assetName: process.env.RELEASE_ASSET || 'tasmota.bin',
  cacheTtlMs: intFromEnv('RELEASE_CACHE_TTL_MINUTES', 30) * 60 * 1000,
  fetchTimeoutMs: 10000,
};

export const DEVICE_CONFIG = {
  commandPath: '/cm',
  statusCommand: 'Status 2',
  upgradeCommand: 'Upgrade 1',
  statusTimeoutMs: 5000,
  pingTimeoutMs: 2000,
  dnsTimeoutMs: 2000,
  recoveryTimeoutSeconds: intFromEnv('RECOVERY_TIMEOUT_SECONDS', 60),
  pollIntervalMs: intFromEnv('POLL_INTERVAL_SECONDS', 5) * 1000,
};

export const FLEET_CONFIG = {
  concurrency: Math.min(8, intFromEnv('FLEET_CONCURRENCY', 4)),
  maxConcurrency: 8,
};

export const SCHEDULER_CONFIG = {
  checkSchedule: process.env.CHECK_SCHEDULE || '0 */6 * * *',
  enabled: (process.env.SCHEDULER_ENABLED ?? (process.env.NODE_ENV === 'test' ? 'false' : 'true')).toLowerCase() === 'true',
};
