import { CFG } from '../config.js';
import type { DatabaseManager } from '../persistence/db.js';
import { formatErrorForLogging } from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';
import type { Announcer, RewardDispatcher } from '../models.js';
import { ChallengeAdmin } from './admin.js';
import { AggregationEngine } from './aggregation.js';
import { CompletionCoordinator, type CompletionOptions } from './completion.js';
import { ProgressLedger, type LedgerOptions } from './ledger.js';
import { QueryService } from './query.js';
import { ChallengeStore } from './store.js';

export interface ChallengeSystemOptions extends LedgerOptions, CompletionOptions {
  clock?: () => number;
  ownerId?: string;
}

export interface ChallengeSystem {
  store: ChallengeStore;
  ledger: ProgressLedger;
  engine: AggregationEngine;
  completion: CompletionCoordinator;
  query: QueryService;
  admin: ChallengeAdmin;
  /** Periodic recovery sweep plus idempotency-key pruning. Returns a stop function. */
  startMaintenance(intervalMs: number): () => void;
}

export const DEFAULT_OPTIONS: ChallengeSystemOptions = {
  dedupWindowMs: CFG.dedupWindowMs,
  leaseMs: CFG.completionLeaseMs,
  rewardMaxAttempts: CFG.rewardMaxAttempts,
  rewardRetryBaseMs: CFG.rewardRetryBaseMs,
};

export function createChallengeSystem(
  db: DatabaseManager,
  collaborators: { dispatcher: RewardDispatcher; announcer: Announcer },
  overrides: Partial<ChallengeSystemOptions> = {}
): ChallengeSystem {
  const options = { ...DEFAULT_OPTIONS, ...overrides };
  const clock = options.clock ?? Date.now;

  const store = new ChallengeStore(db);
  const ledger = new ProgressLedger(store, options);
  const completion = new CompletionCoordinator(
    store,
    ledger,
    collaborators.dispatcher,
    collaborators.announcer,
    options,
    clock,
    options.ownerId
  );
  const engine = new AggregationEngine(store, ledger, completion, clock);
  const query = new QueryService(store, ledger);
  const admin = new ChallengeAdmin(store, ledger, completion);

  const sweep = async () => {
    const pruned = ledger.pruneExpiredKeys(clock());
    if (pruned) logger.debug('Pruned expired report keys', { pruned });
    const reports = await completion.recoverStalled();
    if (reports.length) {
      logger.info('Recovery sweep completed challenges', { challenges: reports.map((report) => report.challengeId) });
    }
  };

  const startMaintenance = (intervalMs: number) => {
    const tick = () => {
      sweep().catch((error) => logger.error('Challenge maintenance sweep failed', formatErrorForLogging(error)));
    };
    tick();
    const timer = setInterval(tick, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  };

  return { store, ledger, engine, completion, query, admin, startMaintenance };
}

export { ChallengeAdmin, AggregationEngine, CompletionCoordinator, ProgressLedger, QueryService, ChallengeStore };
