import type { DatabaseManager } from './db.js';
import type { ChallengeSettings } from '../models.js';

interface SettingsRow {
  enabled: number;
  announcement_channel_id: string | null;
  updated_at: number;
}

const DEFAULT_SETTINGS: ChallengeSettings = {
  enabled: true,
  announcementChannelId: null,
  updatedAt: 0,
};

export function getChallengeSettings(db: DatabaseManager): ChallengeSettings {
  const row = db
    .prepare<SettingsRow>('SELECT enabled, announcement_channel_id, updated_at FROM challenge_settings WHERE singleton_id=1')
    .get();
  if (!row) {
    return { ...DEFAULT_SETTINGS };
  }
  return {
    enabled: row.enabled === 1,
    announcementChannelId: row.announcement_channel_id,
    updatedAt: row.updated_at,
  };
}

export function upsertChallengeSettings(
  db: DatabaseManager,
  settings: Partial<Omit<ChallengeSettings, 'updatedAt'>>
): ChallengeSettings {
  const now = Date.now();
  const current = getChallengeSettings(db);
  const merged: ChallengeSettings = {
    ...current,
    ...settings,
    updatedAt: now,
  };
  db.prepare(
    `INSERT INTO challenge_settings (singleton_id, enabled, announcement_channel_id, created_at, updated_at)
     VALUES (1,?,?,?,?)
     ON CONFLICT(singleton_id) DO UPDATE SET
       enabled=excluded.enabled,
       announcement_channel_id=excluded.announcement_channel_id,
       updated_at=excluded.updated_at`
  ).run(merged.enabled ? 1 : 0, merged.announcementChannelId, now, now);
  return merged;
}
