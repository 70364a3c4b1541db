import { logger } from '../../config/logger';
import type { ErrorFinding, WarningFinding } from '../../types/validationReport';

/**
 * Run-scoped accumulator for findings.
 *
 * Created by the validator for one run and passed explicitly to each stage.
 * Findings are frozen on append; the two sequences only ever grow.
 */
export class FindingCollector {
  private readonly errorList: ErrorFinding[] = [];
  private readonly warningList: WarningFinding[] = [];

  addError(finding: ErrorFinding): void {
    logger.error(finding.message, { type: finding.type, severity: finding.severity });
    this.errorList.push(Object.freeze(finding));
  }

  addWarning(finding: WarningFinding): void {
    logger.warn(finding.message, { type: finding.type });
    this.warningList.push(Object.freeze(finding));
  }

  get errors(): readonly ErrorFinding[] {
    return [...this.errorList];
  }

  get warnings(): readonly WarningFinding[] {
    return [...this.warningList];
  }
}
