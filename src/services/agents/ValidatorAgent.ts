import { randomUUID } from 'crypto';
import { config } from '../../config/env';
import { errorMessage } from '../../errors';
import { runWithRequestId } from '../../middleware/requestId';
import type {
  AnomalyReport,
  BatchValidationResult,
  HandoffRecord,
  ProcessFeedback,
  ValidationRecord,
  ValidationSummaryReport,
  ValidatorAgentOptions,
  ValidatorRunInput,
} from '../../types/agents';
import type { ValidationReport } from '../../types/validationReport';
import { ReportWriter } from '../utility-validation/reporting/ReportWriter';
import { UtilityDataValidator } from '../utility-validation/UtilityDataValidator';
import { BaseAgent } from './BaseAgent';

const PROCESS_RECOMMENDATIONS: ReadonlyArray<[string, string]> = [
  ['MissingColumns', 'Update data collection process to ensure all required columns are present'],
  ['MissingMonths', 'Implement monthly data collection reminders to prevent gaps'],
  ['NegativeValues', 'Add data entry validation to prevent negative utility values'],
  ['DuplicateRows', 'Review data import process to prevent duplicate entries'],
];

const SCRIPT_SUGGESTIONS: ReadonlyArray<[string, string]> = [
  ['InvalidDates', 'Enhance date parsing to handle additional date formats'],
  ['NonNumericValues', 'Add data cleaning step to handle numeric values with units/symbols'],
];

const UNIT_MISMATCH_SUGGESTION = 'Implement unit conversion detection and normalization';

/**
 * Wraps the utility data validator: runs it per file, persists each report
 * and turns findings into feedback for the other agents.
 */
export class ValidatorAgent extends BaseAgent<ValidatorRunInput, ValidationReport> {
  private readonly minValueThreshold: number;
  private readonly maxValueThreshold: number;
  private readonly outputDir: string;
  private readonly validationResults: ValidationRecord[] = [];

  constructor(options: ValidatorAgentOptions = {}) {
    super('validator', options.clock);
    this.minValueThreshold = options.minValueThreshold ?? config.validation.minValueThreshold;
    this.maxValueThreshold = options.maxValueThreshold ?? config.validation.maxValueThreshold;
    this.outputDir = options.outputDir ?? config.reports.directory;
  }

  getCapabilities(): string[] {
    return [
      'validate_utility_data',
      'validate_submission',
      'check_compliance',
      'generate_validation_report',
      'detect_anomalies',
      'provide_feedback_to_scriptsmith',
      'provide_feedback_to_process_engineer',
    ];
  }

  /**
   * Validates one file and saves its report. Data problems come back in
   * the report; only unreadable files, bad thresholds and write failures
   * reject.
   */
  async run(input: ValidatorRunInput): Promise<ValidationReport> {
    const { inputFile } = input;

    return runWithRequestId(randomUUID(), async () => {
      this.logActivity('validation', 'started', { input_file: inputFile });

      try {
        const report = UtilityDataValidator.validate(inputFile, {
          minValueThreshold: input.minValue ?? this.minValueThreshold,
          maxValueThreshold: input.maxValue ?? this.maxValueThreshold,
          clock: this.clock,
        });

        const outputFile = input.outputFile ?? ReportWriter.defaultReportPath(this.outputDir, this.clock());
        const reportFile = await this.saveReport(report, outputFile);

        this.validationResults.push({
          input_file: inputFile,
          timestamp: this.now(),
          report_file: reportFile,
          report,
        });

        this.logActivity('validation', report.passed ? 'completed' : 'completed_with_errors', {
          input_file: inputFile,
          passed: report.passed,
          errors: report.summary.total_errors,
          warnings: report.summary.total_warnings,
        });

        this.status = 'ready';
        return report;
      } catch (error) {
        this.logActivity('validation', 'failed', { input_file: inputFile }, errorMessage(error));
        this.status = 'error';
        throw error;
      }
    });
  }

  /**
   * Validates files one after another. A failing file is recorded and
   * the batch carries on.
   */
  async validateMultiple(inputFiles: string[]): Promise<BatchValidationResult[]> {
    const results: BatchValidationResult[] = [];

    for (const file of inputFiles) {
      try {
        const report = await this.run({ inputFile: file });
        results.push({ file, status: 'success', report });
      } catch (error) {
        results.push({ file, status: 'error', error: errorMessage(error) });
      }
    }

    return results;
  }

  getValidationSummary(): ValidationSummaryReport {
    const total = this.validationResults.length;
    const passed = this.validationResults.filter((r) => r.report.passed).length;

    return {
      total_validations: total,
      passed,
      failed: total - passed,
      pass_rate: total > 0 ? `${((passed / total) * 100).toFixed(1)}%` : 'N/A',
      total_errors_found: this.validationResults.reduce((sum, r) => sum + r.report.summary.total_errors, 0),
      total_warnings_found: this.validationResults.reduce((sum, r) => sum + r.report.summary.total_warnings, 0),
      files_validated: this.validationResults.map((r) => r.input_file),
    };
  }

  handoffToProcessEngineer(report: ValidationReport): HandoffRecord<ProcessFeedback> {
    const feedback: ProcessFeedback = {
      validation_status: report.validation_status,
      error_types_found: [...new Set(report.errors.map((e) => e.type))],
      warning_types_found: [...new Set(report.warnings.map((w) => w.type))],
      recommendations: ValidatorAgent.processRecommendations(report),
    };

    return this.handoff('process_engineer', feedback, 'Validation feedback for process documentation update');
  }

  handoffToScriptsmith(report: ValidationReport): HandoffRecord<AnomalyReport> {
    const anomalies: AnomalyReport = {
      errors: report.errors,
      warnings: report.warnings,
      suggested_fixes: ValidatorAgent.scriptSuggestions(report),
    };

    return this.handoff('scriptsmith', anomalies, 'Anomaly report for automation script debugging');
  }

  private static processRecommendations(report: ValidationReport): string[] {
    const errorTypes = new Set<string>(report.errors.map((e) => e.type));
    return PROCESS_RECOMMENDATIONS.filter(([type]) => errorTypes.has(type)).map(([, text]) => text);
  }

  private static scriptSuggestions(report: ValidationReport): string[] {
    const errorTypes = new Set<string>(report.errors.map((e) => e.type));
    const suggestions = SCRIPT_SUGGESTIONS.filter(([type]) => errorTypes.has(type)).map(([, text]) => text);

    if (report.warnings.some((w) => w.type === 'PotentialUnitMismatch')) {
      suggestions.push(UNIT_MISMATCH_SUGGESTION);
    }
    return suggestions;
  }
}
