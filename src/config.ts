import 'dotenv/config';

export function numberFromEnv(name: string, fallback: number, env: NodeJS.ProcessEnv = process.env): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} must be a non-negative number, got "${raw}"`);
  }
  return value;
}

// Interval and page-size settings where zero would spin or reject every request.
export function positiveNumberFromEnv(name: string, fallback: number, env: NodeJS.ProcessEnv = process.env): number {
  const value = numberFromEnv(name, fallback, env);
  if (value <= 0) {
    throw new Error(`${name} must be greater than zero, got "${env[name] ?? ''}"`);
  }
  return value;
}

export const CFG = {
  token: process.env.DISCORD_TOKEN || '',
  clientId: process.env.DISCORD_CLIENT_ID || '',
  ownerId: process.env.OWNER_ID || '',
  dbPath: process.env.DATABASE_PATH || './data/challenges.db',
  logLevel: process.env.LOG_LEVEL || 'INFO',
  dedupWindowMs: numberFromEnv('CHALLENGE_DEDUP_WINDOW_MS', 24 * 60 * 60 * 1000),
  rewardMaxAttempts: numberFromEnv('REWARD_MAX_ATTEMPTS', 3),
  rewardRetryBaseMs: numberFromEnv('REWARD_RETRY_BASE_MS', 500),
  completionLeaseMs: numberFromEnv('COMPLETION_LEASE_MS', 5 * 60 * 1000),
  recoveryIntervalMs: positiveNumberFromEnv('RECOVERY_INTERVAL_MS', 60 * 1000),
  leaderboardSize: positiveNumberFromEnv('LEADERBOARD_SIZE', 10),
};

export function assertBotConfig() {
  if (!CFG.token) throw new Error('Missing DISCORD_TOKEN in .env');
  if (!CFG.clientId) throw new Error('Missing DISCORD_CLIENT_ID in .env');
}
