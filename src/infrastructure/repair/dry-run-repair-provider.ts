import type { RepairActionProvider, RepairAttemptContext } from '../../application/ports/repair-action-provider.js';
import type { Logger } from '../../core/logging/index.js';
import type { ErrorKind } from '../../domain/error-kind.js';
import { RepairOutcomes, type RepairOutcome } from '../../domain/remediation.js';
import { describeRepairAction, repairActionFor } from './repair-plan.js';

/**
 * Logs the action that would run and reports success. The default mode, so a fresh
 * install never deletes anything until it is configured to.
 */
export class DryRunRepairActionProvider implements RepairActionProvider {
  constructor(
    private readonly appRoot: string,
    private readonly logger: Logger,
  ) {}

  async attempt(kind: ErrorKind, context: RepairAttemptContext): Promise<RepairOutcome> {
    const action = repairActionFor(kind, this.appRoot);
    this.logger.info(
      { kind, action: action.type, deadline: new Date(context.deadlineMs).toISOString() },
      `DRY RUN: would ${describeRepairAction(action)}`,
    );
    return RepairOutcomes.succeeded();
  }
}
