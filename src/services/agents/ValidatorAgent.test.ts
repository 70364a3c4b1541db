import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ValidationError } from '../../errors';
import { ReportWriter } from '../utility-validation/reporting/ReportWriter';
import { ValidatorAgent } from './ValidatorAgent';

const FIXED_TIME = new Date(Date.UTC(2025, 2, 1, 9, 30, 0));
const clock = () => FIXED_TIME;

describe('ValidatorAgent', () => {
  let tempDir: string;
  let reportDir: string;

  const writeFile = (name: string, lines: string[]): string => {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, `${lines.join('\n')}\n`);
    return filePath;
  };

  const validFile = () => writeFile('valid.csv', ['Date,kWh,Therms,Demand', '2024-01-01,100,10,5', '2024-02-01,110,11,6']);

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'validator-agent-'));
    reportDir = path.join(tempDir, 'reports');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should start in the initialized state', () => {
    const agent = new ValidatorAgent({ outputDir: reportDir, clock });

    expect(agent.getStatus()).toEqual({
      agent_name: 'validator',
      status: 'initialized',
      total_activities: 0,
      completed_activities: 0,
      failed_activities: 0,
      capabilities: agent.getCapabilities(),
    });
  });

  it('should validate, save the report and log the activity', async () => {
    const agent = new ValidatorAgent({ outputDir: reportDir, clock });
    const inputFile = validFile();

    const report = await agent.run({ inputFile });

    expect(report.passed).toBe(true);
    const saved = fs.readFileSync(ReportWriter.defaultReportPath(reportDir, FIXED_TIME), 'utf-8');
    expect(JSON.parse(saved)).toEqual(report);

    expect(agent.getActivityLog().map((a) => a.status)).toEqual(['started', 'completed']);
    expect(agent.getActivityLog({ status: 'completed' })[0].details).toEqual({
      input_file: inputFile,
      passed: true,
      errors: 0,
      warnings: 0,
    });
    expect(agent.getStatus().status).toBe('ready');
  });

  it('should save to an explicit output file', async () => {
    const agent = new ValidatorAgent({ outputDir: reportDir, clock });
    const outputFile = path.join(tempDir, 'custom', 'out.json');

    await agent.run({ inputFile: validFile(), outputFile });

    expect(fs.existsSync(outputFile)).toBe(true);
  });

  it('should mark runs with findings as completed with errors', async () => {
    const agent = new ValidatorAgent({ outputDir: reportDir, clock });
    const inputFile = writeFile('bad.csv', ['Date,kWh,Therms,Demand', '2024-01-01,-5,10,5']);

    const report = await agent.run({ inputFile });

    expect(report.passed).toBe(false);
    expect(agent.getActivityLog({ activityType: 'validation' }).map((a) => a.status)).toEqual([
      'started',
      'completed_with_errors',
    ]);
    expect(agent.getStatus().completed_activities).toBe(0);
  });

  it('should apply per-run thresholds', async () => {
    const agent = new ValidatorAgent({ outputDir: reportDir, clock });

    const report = await agent.run({ inputFile: validFile(), minValue: 50 });

    expect(report.errors).toMatchObject([
      { type: 'NegativeValues', column: 'Therms', count: 2 },
      { type: 'NegativeValues', column: 'Demand', count: 2 },
    ]);
  });

  it('should record a failure and rethrow on bad thresholds', async () => {
    const agent = new ValidatorAgent({ outputDir: reportDir, clock });

    await expect(agent.run({ inputFile: validFile(), minValue: 10, maxValue: 1 })).rejects.toBeInstanceOf(
      ValidationError
    );

    const [failure] = agent.getActivityLog({ status: 'failed' });
    expect(failure.error_message).toBe('Minimum threshold 10 is greater than maximum threshold 1');
    expect(agent.getStatus()).toMatchObject({ status: 'error', failed_activities: 1 });
  });

  it('should keep validating the batch after a failing file', async () => {
    const blocker = path.join(tempDir, 'blocker');
    fs.writeFileSync(blocker, '');
    const agent = new ValidatorAgent({ outputDir: blocker, clock });

    const results = await agent.validateMultiple([validFile(), validFile()]);

    expect(results).toHaveLength(2);
    expect(results.map((r) => r.status)).toEqual(['error', 'error']);
    expect(agent.getActivityLog({ status: 'failed' })).toHaveLength(2);
  });

  it('should return per-file reports for a batch', async () => {
    const agent = new ValidatorAgent({ outputDir: reportDir, clock });
    const missing = path.join(tempDir, 'missing.csv');

    const results = await agent.validateMultiple([validFile(), missing]);

    expect(results.map((r) => r.status)).toEqual(['success', 'success']);
    const second = results[1];
    if (second.status === 'success') {
      expect(second.report.errors[0].type).toBe('FileNotFound');
    }
  });

  it('should summarise validations performed', async () => {
    const agent = new ValidatorAgent({ outputDir: reportDir, clock });
    expect(agent.getValidationSummary().pass_rate).toBe('N/A');

    const good = validFile();
    const bad = writeFile('bad.csv', ['Date,kWh,Therms,Demand', '2024-01-01,-5,10,5']);
    await agent.run({ inputFile: good, outputFile: path.join(reportDir, 'a.json') });
    await agent.run({ inputFile: bad, outputFile: path.join(reportDir, 'b.json') });

    expect(agent.getValidationSummary()).toEqual({
      total_validations: 2,
      passed: 1,
      failed: 1,
      pass_rate: '50.0%',
      total_errors_found: 1,
      total_warnings_found: 0,
      files_validated: [good, bad],
    });
  });

  it('should hand process recommendations to the process engineer', async () => {
    const agent = new ValidatorAgent({ outputDir: reportDir, clock });
    const inputFile = writeFile('gaps.csv', [
      'Date,kWh,Therms,Demand',
      '2024-01-01,100,10,5',
      '2024-01-01,100,10,5',
      '2024-03-01,-1,10,5',
    ]);
    const report = await agent.run({ inputFile });

    const handoff = agent.handoffToProcessEngineer(report);

    expect(handoff).toEqual({
      from_agent: 'validator',
      to_agent: 'process_engineer',
      timestamp: FIXED_TIME.toISOString(),
      message: 'Validation feedback for process documentation update',
      data: {
        validation_status: 'FAIL',
        error_types_found: ['DuplicateRows', 'MissingMonths', 'NegativeValues'],
        warning_types_found: ['PotentialUnitMismatch'],
        recommendations: [
          'Implement monthly data collection reminders to prevent gaps',
          'Add data entry validation to prevent negative utility values',
          'Review data import process to prevent duplicate entries',
        ],
      },
    });
    expect(agent.getActivityLog({ activityType: 'handoff' })[0].details).toEqual({
      target_agent: 'process_engineer',
      message: 'Validation feedback for process documentation update',
    });
  });

  it('should hand script suggestions to the scriptsmith', async () => {
    const agent = new ValidatorAgent({ outputDir: reportDir, clock });
    const inputFile = writeFile('anomalies.csv', [
      'Date,kWh,Therms,Demand',
      'soon,100,10,5',
      '2024-02-01,100,n/a kWh,5',
      '2024-03-01,100,10,5',
      '2024-04-01,100,10,50000',
      '2024-05-01,100,10,5',
    ]);
    const report = await agent.run({ inputFile });

    const handoff = agent.handoffToScriptsmith(report);

    expect(handoff.to_agent).toBe('scriptsmith');
    expect(handoff.data.errors).toEqual(report.errors);
    expect(handoff.data.suggested_fixes).toEqual([
      'Enhance date parsing to handle additional date formats',
      'Add data cleaning step to handle numeric values with units/symbols',
      'Implement unit conversion detection and normalization',
    ]);
  });
});
