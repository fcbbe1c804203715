import type { Decision } from '../models/Decision.js';
import { createDecision } from '../models/Decision.js';
import type { MoveRecord } from '../models/MoveRecord.js';
import { DecisionState } from '../types/index.js';
import { DecisionNotFoundError, DecisionStateError } from '../lib/errors.js';
import type { StateStore } from './StateStore.js';
import type { IgnoreSet } from './IgnoreSet.js';
import type { MoveExecutor } from './MoveExecutor.js';
import { createChildLogger, getLogger } from '../lib/logger.js';

/**
 * Reversible record of folder moves.
 *
 * Callers run every method through one serial queue (the engine's command
 * inlet); the log itself does no locking.
 */
export class DecisionLog {
  private logger = getLogger();

  constructor(
    private store: StateStore,
    private ignoreSet: IgnoreSet,
    private executor: MoveExecutor,
    private retentionCount: number
  ) {
    if (!Number.isInteger(retentionCount) || retentionCount < 1) {
      throw new RangeError(`Decision retention must be a positive integer, got: ${retentionCount}`);
    }
  }

  /**
   * Persist an Active decision for a completed folder move, then apply retention
   */
  record(moveRecord: MoveRecord): Decision {
    const decision = createDecision(moveRecord);
    this.store.insertDecision(decision);
    this.store.pruneDecisions(this.retentionCount);

    this.logger.info(
      { decisionId: decision.id, originalPath: decision.originalPath, newPath: decision.newPath },
      'Folder decision recorded'
    );
    return decision;
  }

  /**
   * Move the folder back where it came from
   * @throws UndoConflictError when the original location is occupied; the decision stays Active
   */
  async undo(decisionId: string): Promise<Decision> {
    const decision = this.requireActive(decisionId);
    const logger = createChildLogger({ decisionId });

    await this.executor.relocate(decision.newPath, decision.originalPath, decision.id);

    this.store.updateDecisionState(decision.id, DecisionState.UNDONE_BY_USER);
    logger.info({ restoredPath: decision.originalPath }, 'Folder move undone');

    return { ...decision, state: DecisionState.UNDONE_BY_USER };
  }

  /**
   * Never process the folder's original location again. The folder stays put.
   */
  ignore(decisionId: string): Decision {
    const decision = this.requireActive(decisionId);

    this.ignoreSet.addPath(decision.originalPath);
    this.store.updateDecisionState(decision.id, DecisionState.IGNORED);
    this.logger.info({ decisionId, ignoredPath: decision.originalPath }, 'Folder location ignored');

    return { ...decision, state: DecisionState.IGNORED };
  }

  /**
   * A folder the user brought back by undo is left alone from then on
   */
  wasRestoredByUser(path: string): boolean {
    return this.store.hasUndoneDecisionFor(path);
  }

  get(decisionId: string): Decision | null {
    return this.store.getDecision(decisionId);
  }

  /**
   * Newest first
   */
  list(limit: number = this.retentionCount): Decision[] {
    return this.store.listDecisions(limit);
  }

  private requireActive(decisionId: string): Decision {
    const decision = this.store.getDecision(decisionId);
    if (!decision) {
      throw new DecisionNotFoundError(decisionId);
    }
    if (decision.state !== DecisionState.ACTIVE) {
      throw new DecisionStateError(decisionId, decision.state);
    }
    return decision;
  }
}
