/**
 * MigrationLedger - Applies and reverses revisions in strict chain order
 *
 * The ledger holds only the in-memory chain. The current revision is read
 * from, and written to, the target store inside each step's transaction.
 */

import { OperationError, errorMessage } from './errors.js';
import { checkReversible, describeOperation } from './operations.js';
import type { ReversibilityIssue } from './operations.js';
import { RevisionChain } from './RevisionChain.js';
import { BASE, Direction, HEAD } from './types.js';
import type { Revision, SchemaDriver } from './types.js';
import { silentLogger } from '../logger.js';
import type { Logger } from '../logger.js';

export interface LedgerOptions {
  logger?: Logger;
  /** Clock for step timestamps */
  now?: () => number;
}

export interface RunOptions {
  /** Resolve and return the plan without touching the store */
  dryRun?: boolean;
  /** Reject targets on the wrong side of the current revision with NotAncestorError instead of doing nothing */
  strict?: boolean;
}

export interface MigrationPlan {
  direction: Direction;
  from: string | null;
  to: string | null;
  revisions: Revision[];
}

export interface MigrationResult extends MigrationPlan {
  /** Revision ids whose operations were committed, in execution order */
  applied: string[];
  dryRun: boolean;
}

export interface HistoryEntry {
  id: string;
  parentId: string | null;
  message: string;
  createdAt?: string;
  isCurrent: boolean;
  isHead: boolean;
}

export class MigrationLedger {
  readonly chain: RevisionChain;
  private driver: SchemaDriver;
  private logger: Logger;
  private now: () => number;

  constructor(revisions: Revision[] | RevisionChain, driver: SchemaDriver, options: LedgerOptions = {}) {
    this.chain = revisions instanceof RevisionChain ? revisions : RevisionChain.fromRevisions(revisions);
    this.driver = driver;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  /**
   * The revision recorded in the store, validated against the chain
   */
  async current(): Promise<string | null> {
    const current = await this.driver.readCurrent();
    if (current !== null) {
      this.chain.position(current);
    }
    return current;
  }

  /**
   * Plan a forward walk. Targets at or behind the current revision yield an empty plan
   * unless `strict` is set.
   */
  async planUpgrade(target: string = HEAD, strict = false): Promise<MigrationPlan> {
    const from = await this.current();
    const to = this.chain.resolve(target);
    const revisions = !strict && this.chain.position(to) <= this.chain.position(from)
      ? []
      : this.chain.forwardPath(from, to);
    return { direction: Direction.Up, from, to, revisions };
  }

  /**
   * Plan a backward walk. Targets at or ahead of the current revision yield an empty plan
   * unless `strict` is set.
   */
  async planDowngrade(target: string, strict = false): Promise<MigrationPlan> {
    const from = await this.current();
    const to = this.chain.resolve(target);
    const revisions = !strict && this.chain.position(to) >= this.chain.position(from)
      ? []
      : this.chain.backwardPath(from, to);
    return { direction: Direction.Down, from, to, revisions };
  }

  async upgradeTo(target: string = HEAD, options: RunOptions = {}): Promise<MigrationResult> {
    return this.run(await this.planUpgrade(target, options.strict), options);
  }

  async downgradeTo(target: string, options: RunOptions = {}): Promise<MigrationResult> {
    return this.run(await this.planDowngrade(target, options.strict), options);
  }

  private async run(plan: MigrationPlan, options: RunOptions): Promise<MigrationResult> {
    const dryRun = options.dryRun ?? false;
    const applied: string[] = [];

    if (plan.revisions.length === 0) {
      this.logger.info(`Already at ${plan.from ?? BASE}, nothing to do`);
      return { ...plan, applied, dryRun };
    }

    for (const revision of plan.revisions) {
      const label = this.describeStep(plan.direction, revision);
      if (dryRun) {
        this.logger.info(`Would run ${label}`);
        continue;
      }

      this.logger.info(`Running ${label}`);
      await this.applyRevision(revision, plan.direction);
      applied.push(revision.id);
    }

    if (!dryRun) {
      this.logger.success(`Now at ${plan.to ?? BASE}`);
    }
    return { ...plan, applied, dryRun };
  }

  private describeStep(direction: Direction, revision: Revision): string {
    const arrow = direction === Direction.Up
      ? `${revision.parentId ?? BASE} -> ${revision.id}`
      : `${revision.id} -> ${revision.parentId ?? BASE}`;
    return `${direction === Direction.Up ? 'upgrade' : 'downgrade'} ${arrow}, ${revision.message}`;
  }

  /**
   * One revision, one transaction: operations, marker and log commit together
   */
  private async applyRevision(revision: Revision, direction: Direction): Promise<void> {
    const operations = direction === Direction.Up ? revision.upgrade : revision.downgrade;
    const marker = direction === Direction.Up ? revision.id : revision.parentId;

    await this.driver.transaction(async tx => {
      for (let i = 0; i < operations.length; i++) {
        const operation = operations[i];
        try {
          await tx.apply(operation);
        } catch (error) {
          const description = describeOperation(operation);
          this.logger.error(`Failed ${description}: ${errorMessage(error)}`);
          throw new OperationError(revision.id, i, operation, description, error);
        }
      }
      await tx.writeCurrent(marker);
      await tx.appendLog({ revisionId: revision.id, direction, appliedAt: this.now() });
    });
  }

  /**
   * Record a revision as current without running any operations
   */
  async stamp(target: string): Promise<string | null> {
    const to = this.chain.resolve(target);
    await this.driver.transaction(async tx => {
      await tx.writeCurrent(to);
    });
    this.logger.info(`Stamped ${to ?? BASE}`);
    return to;
  }

  /**
   * The chain in order, root first, with the current and head revisions flagged
   */
  async history(): Promise<HistoryEntry[]> {
    const current = await this.current();
    const head = this.chain.tip?.id ?? null;
    return this.chain.list().map(revision => ({
      id: revision.id,
      parentId: revision.parentId,
      message: revision.message,
      createdAt: revision.createdAt,
      isCurrent: revision.id === current,
      isHead: revision.id === head,
    }));
  }

  /**
   * Revisions whose downgrade is not the structural inverse of their upgrade
   */
  check(): ReversibilityIssue[] {
    const issues: ReversibilityIssue[] = [];
    for (const revision of this.chain.list()) {
      const issue = checkReversible(revision);
      if (issue) issues.push(issue);
    }
    return issues;
  }
}
