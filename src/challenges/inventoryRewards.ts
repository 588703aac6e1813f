import type { DatabaseManager } from '../persistence/db.js';
import { errorMessage } from '../utils/errorhandler.js';
import type { GrantResult, RewardDispatcher, UserId } from '../models.js';

/**
 * Default dispatcher: credits the bot's own `inventories` table. The grant key is stored with
 * the credit in one transaction, so a repeated key is acknowledged without a second credit.
 */
export class InventoryRewardDispatcher implements RewardDispatcher {
  constructor(private readonly db: DatabaseManager) {}

  async grant(contributorId: UserId, rewardItem: string, rewardQuantity: number, grantKey: string): Promise<GrantResult> {
    try {
      this.db.transaction(() => {
        const now = Date.now();
        const fresh = this.db
          .prepare('INSERT OR IGNORE INTO reward_grants (grant_key, user_id, item_id, qty, ts) VALUES (?,?,?,?,?)')
          .run(grantKey, contributorId, rewardItem, rewardQuantity, now);
        if (fresh.changes === 0) return;
        this.db
          .prepare(
            `INSERT INTO inventories (user_id, item_id, qty, updated_at) VALUES (?,?,?,?)
             ON CONFLICT(user_id, item_id) DO UPDATE SET qty=qty+excluded.qty, updated_at=excluded.updated_at`
          )
          .run(contributorId, rewardItem, rewardQuantity, now);
      });
      return { ok: true };
    } catch (error) {
      return { ok: false, reason: errorMessage(error) };
    }
  }

  quantityOf(userId: UserId, itemId: string): number {
    const row = this.db
      .prepare<{ qty: number }>('SELECT qty FROM inventories WHERE user_id=? AND item_id=?')
      .get(userId, itemId);
    return row?.qty ?? 0;
  }
}
