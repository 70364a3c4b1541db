import { describe, it, expect } from 'vitest';
import { FindingCollector } from '../FindingCollector';
import { UtilityTableLoader } from '../parsers/UtilityTableLoader';
import { UtilityTable } from '../UtilityTable';
import { TemporalValidator } from './TemporalValidator';

function tableWithDates(dates: string[]): UtilityTable {
  const lines = dates.map((date) => `${date},100,10,5`);
  const loaded = UtilityTableLoader.parseContent(['Date,kWh,Therms,Demand', ...lines].join('\n'));
  if (!loaded) {
    throw new Error('fixture did not parse');
  }
  return new UtilityTable(loaded);
}

describe('TemporalValidator.validateDates', () => {
  it('should attach parsed dates when every cell parses', () => {
    const findings = new FindingCollector();
    const table = tableWithDates(['2024-01-01', '02/01/2024', 'Mar 1, 2024']);

    TemporalValidator.validateDates(table, findings);

    expect(findings.errors).toEqual([]);
    expect(table.parsedDates).toEqual([
      new Date(Date.UTC(2024, 0, 1)),
      new Date(Date.UTC(2024, 1, 1)),
      new Date(Date.UTC(2024, 2, 1)),
    ]);
  });

  it('should report unparseable and missing dates and skip the month check', () => {
    const findings = new FindingCollector();
    const table = tableWithDates(['2024-01-01', 'garbage', '', '2024-06-01']);

    TemporalValidator.validateDates(table, findings);

    expect(findings.errors).toEqual([
      {
        type: 'InvalidDates',
        message: 'Found 2 invalid date entries',
        count: 2,
        examples: ['garbage', null],
        severity: 'high',
      },
    ]);
    expect(table.parsedDates).toBeNull();
  });

  it('should report a gap in the month sequence', () => {
    const findings = new FindingCollector();
    const table = tableWithDates(['2024-01-15', '2024-02-10', '2024-04-01']);

    TemporalValidator.validateDates(table, findings);

    expect(findings.errors).toEqual([
      {
        type: 'MissingMonths',
        message: 'Found 1 missing months in date sequence',
        count: 1,
        missing_months: ['2024-03'],
        severity: 'medium',
      },
    ]);
  });

  it('should ignore row order and repeated months', () => {
    const findings = new FindingCollector();
    const table = tableWithDates(['2024-03-01', '2024-01-01', '2024-02-01', '2024-02-20']);

    TemporalValidator.validateDates(table, findings);

    expect(findings.errors).toEqual([]);
  });
});

describe('TemporalValidator.checkMissingMonths', () => {
  it('should skip fewer than two dates', () => {
    const findings = new FindingCollector();

    TemporalValidator.checkMissingMonths([new Date(Date.UTC(2024, 0, 1))], findings);

    expect(findings.errors).toEqual([]);
  });

  it('should count every missing month but list at most twelve', () => {
    const findings = new FindingCollector();

    TemporalValidator.checkMissingMonths([new Date(Date.UTC(2020, 0, 1)), new Date(Date.UTC(2022, 0, 1))], findings);

    const [finding] = findings.errors;
    expect(finding).toMatchObject({ type: 'MissingMonths', count: 23 });
    if (finding.type === 'MissingMonths') {
      expect(finding.missing_months).toHaveLength(12);
      expect(finding.missing_months[0]).toBe('2020-02');
      expect(finding.missing_months[11]).toBe('2021-01');
    }
  });
});
