#!/usr/bin/env node
import path from 'path';
import { config } from './config/env';
import { AppError, BadRequestError, errorMessage } from './errors';
import { ProcessEngineerAgent } from './services/agents/ProcessEngineerAgent';
import { ValidatorAgent } from './services/agents/ValidatorAgent';
import { NumberUtils } from './utils/numberUtils';

/**
 * Command line entry point for the validator and process engineer agents
 * Run with: utility-validator <command> [options]
 */

export type CliCommand =
  | { command: 'validate'; inputFile: string; output?: string; minValue?: number; maxValue?: number }
  | { command: 'checklist'; buildingId?: string; year?: number; output?: string }
  | { command: 'docs'; year?: number; output?: string }
  | { command: 'status' }
  | { command: 'help' }
  | { command: 'unknown'; name: string };

type OptionKind = 'string' | 'number' | 'integer';

interface OptionSpec {
  key: string;
  kind: OptionKind;
}

type OptionValues = Map<string, string | number>;

const OUTPUT: OptionSpec = { key: 'output', kind: 'string' };
const YEAR: OptionSpec = { key: 'year', kind: 'integer' };

const VALIDATE_OPTIONS: Record<string, OptionSpec> = {
  '-o': OUTPUT,
  '--output': OUTPUT,
  '--min-value': { key: 'minValue', kind: 'number' },
  '--max-value': { key: 'maxValue', kind: 'number' },
};

const CHECKLIST_OPTIONS: Record<string, OptionSpec> = {
  '-b': { key: 'buildingId', kind: 'string' },
  '--building-id': { key: 'buildingId', kind: 'string' },
  '-y': YEAR,
  '--year': YEAR,
  '-o': OUTPUT,
  '--output': OUTPUT,
};

const DOCS_OPTIONS: Record<string, OptionSpec> = {
  '-y': YEAR,
  '--year': YEAR,
  '-o': OUTPUT,
  '--output': OUTPUT,
};

const USAGE = `Usage: utility-validator <command> [options]

Commands:
  validate <input_file> [-o|--output path] [--min-value n] [--max-value n]
                        Validate a utility data file
  checklist [-b|--building-id id] [-y|--year n] [-o|--output path]
                        Generate a compliance checklist
  docs [-y|--year n] [-o|--output path]
                        Generate process documentation
  status                Show agent status
  help                  Show this message

Examples:
  utility-validator validate utility_data.csv
  utility-validator checklist --building-id BLD123 --year 2025
  utility-validator docs -o process_docs.json
  utility-validator status`;

function parseOptionValue(flag: string, raw: string, kind: OptionKind): string | number {
  if (kind === 'string') {
    return raw;
  }

  const value = NumberUtils.parseNumber(raw);
  if (value === null || !Number.isFinite(value)) {
    throw new BadRequestError(`Option ${flag} expects a number, got '${raw}'`);
  }
  if (kind === 'integer' && !Number.isInteger(value)) {
    throw new BadRequestError(`Option ${flag} expects a whole number, got '${raw}'`);
  }
  return value;
}

function readOptions(
  args: readonly string[],
  specs: Record<string, OptionSpec>
): { positionals: string[]; values: OptionValues } {
  const positionals: string[] = [];
  const values: OptionValues = new Map();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (!arg.startsWith('-') || arg === '-') {
      positionals.push(arg);
      continue;
    }

    const spec = specs[arg];
    if (!spec) {
      throw new BadRequestError(`Unknown option: ${arg}`);
    }

    const raw = args[i + 1];
    if (raw === undefined) {
      throw new BadRequestError(`Option ${arg} requires a value`);
    }

    values.set(spec.key, parseOptionValue(arg, raw, spec.kind));
    i++;
  }

  return { positionals, values };
}

function stringOption(values: OptionValues, key: string): string | undefined {
  const value = values.get(key);
  return typeof value === 'string' ? value : undefined;
}

function numberOption(values: OptionValues, key: string): number | undefined {
  const value = values.get(key);
  return typeof value === 'number' ? value : undefined;
}

function rejectPositionals(command: string, positionals: string[]): void {
  if (positionals.length > 0) {
    throw new BadRequestError(`Unexpected argument for ${command}: ${positionals[0]}`);
  }
}

/**
 * Turns argv (without the node and script entries) into a command.
 * Malformed arguments throw BadRequestError.
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [name, ...rest] = argv;

  if (name === undefined || name === 'help' || name === '-h' || name === '--help') {
    return { command: 'help' };
  }

  switch (name) {
    case 'validate': {
      const { positionals, values } = readOptions(rest, VALIDATE_OPTIONS);
      if (positionals.length === 0) {
        throw new BadRequestError('validate requires an input file');
      }
      rejectPositionals('validate', positionals.slice(1));
      return {
        command: 'validate',
        inputFile: positionals[0],
        output: stringOption(values, 'output'),
        minValue: numberOption(values, 'minValue'),
        maxValue: numberOption(values, 'maxValue'),
      };
    }

    case 'checklist': {
      const { positionals, values } = readOptions(rest, CHECKLIST_OPTIONS);
      rejectPositionals('checklist', positionals);
      return {
        command: 'checklist',
        buildingId: stringOption(values, 'buildingId'),
        year: numberOption(values, 'year'),
        output: stringOption(values, 'output'),
      };
    }

    case 'docs': {
      const { positionals, values } = readOptions(rest, DOCS_OPTIONS);
      rejectPositionals('docs', positionals);
      return {
        command: 'docs',
        year: numberOption(values, 'year'),
        output: stringOption(values, 'output'),
      };
    }

    case 'status':
      rejectPositionals('status', rest);
      return { command: 'status' };

    default:
      return { command: 'unknown', name };
  }
}

async function runValidate(command: Extract<CliCommand, { command: 'validate' }>): Promise<number> {
  const agent = new ValidatorAgent({
    minValueThreshold: command.minValue,
    maxValueThreshold: command.maxValue,
    outputDir: command.output ? path.dirname(command.output) : config.reports.directory,
  });

  const report = await agent.run({ inputFile: command.inputFile, outputFile: command.output });

  console.log(`\n${'='.repeat(60)}`);
  console.log('VALIDATION RESULTS');
  console.log('='.repeat(60));
  console.log(`Status: ${report.validation_status}`);
  console.log(`Rows Processed: ${report.summary.rows_processed}`);
  console.log(`Errors: ${report.summary.total_errors}`);
  console.log(`Warnings: ${report.summary.total_warnings}`);

  if (report.errors.length > 0) {
    console.log('\nErrors Found:');
    for (const error of report.errors.slice(0, 5)) {
      console.log(`  - [${error.type}] ${error.message}`);
    }
  }

  if (report.warnings.length > 0) {
    console.log('\nWarnings:');
    for (const warning of report.warnings.slice(0, 5)) {
      console.log(`  - [${warning.type}] ${warning.message}`);
    }
  }

  console.log('='.repeat(60));
  return report.passed ? 0 : 1;
}

async function runChecklist(command: Extract<CliCommand, { command: 'checklist' }>): Promise<number> {
  const agent = new ProcessEngineerAgent({ regulationYear: command.year });
  const checklist = agent.createComplianceChecklist(command.buildingId, command.year);

  console.log(`\n${'='.repeat(60)}`);
  console.log(checklist.title.toUpperCase());
  console.log('='.repeat(60));
  if (checklist.building_id) {
    console.log(`Building ID: ${checklist.building_id}`);
  }
  console.log(`Deadline: ${checklist.deadline}`);
  console.log('\nTasks:');

  for (const item of checklist.items) {
    const statusIcon = item.status === 'pending' ? '[ ]' : '[x]';
    const required = item.required ? '*' : ' ';
    console.log(`  ${statusIcon}${required} ${item.id}. ${item.task}`);
    if (item.notes) {
      console.log(`        Note: ${item.notes}`);
    }
  }

  console.log('\n* = Required');
  console.log('='.repeat(60));

  if (command.output) {
    await agent.saveReport(checklist, command.output);
    console.log(`\nSaved to: ${command.output}`);
  }
  return 0;
}

async function runDocs(command: Extract<CliCommand, { command: 'docs' }>): Promise<number> {
  const agent = new ProcessEngineerAgent({ regulationYear: command.year });
  const docs = await agent.generateFullDocumentation(command.output);

  console.log(`\n${'='.repeat(60)}`);
  console.log('PROCESS DOCUMENTATION GENERATED');
  console.log('='.repeat(60));
  console.log(`Title: ${docs.title}`);
  console.log(`Regulation Year: ${docs.regulation_year}`);
  console.log(`Workflow Steps: ${docs.workflow.length}`);
  console.log(`Validation Rules: ${docs.validation_rules.length}`);
  console.log(`Common Errors Documented: ${docs.common_errors.length}`);
  if (command.output) {
    console.log(`\nSaved to: ${command.output}`);
  }
  console.log('='.repeat(60));
  return 0;
}

function runStatus(): number {
  console.log(`\n${'='.repeat(60)}`);
  console.log('AGENT STATUS');
  console.log('='.repeat(60));

  for (const agent of [new ValidatorAgent(), new ProcessEngineerAgent()]) {
    const status = agent.getStatus();
    console.log(`\n${status.agent_name.toUpperCase()}`);
    console.log(`  Status: ${status.status}`);
    console.log(`  Capabilities: ${status.capabilities.length}`);
    for (const capability of status.capabilities.slice(0, 5)) {
      console.log(`    - ${capability}`);
    }
    if (status.capabilities.length > 5) {
      console.log(`    ... and ${status.capabilities.length - 5} more`);
    }
  }

  console.log(`\n${'='.repeat(60)}`);
  console.log('Available Agents: validator, process_engineer');
  console.log('='.repeat(60));
  return 0;
}

/**
 * Runs one command and resolves to the process exit code:
 * 0 success, 1 failed validation or unknown command, 2 bad arguments
 * or other application errors
 */
export async function main(argv: readonly string[]): Promise<number> {
  try {
    const command = parseCliArgs(argv);

    switch (command.command) {
      case 'validate':
        return await runValidate(command);
      case 'checklist':
        return await runChecklist(command);
      case 'docs':
        return await runDocs(command);
      case 'status':
        return runStatus();
      case 'help':
        console.log(USAGE);
        return 0;
      case 'unknown':
        console.error(`Unknown command: ${command.name}\n`);
        console.log(USAGE);
        return 1;
    }
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    return error instanceof AppError ? 2 : 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exitCode = 1;
    });
}
