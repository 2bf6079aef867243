import fs from 'fs/promises';
import path from 'path';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { AggregatedTestCase, ResultRow } from './models.js';
import type { ResultRowReport, TestCaseReport } from './testCaseAggregator.js';

export interface ReportWriterConfig {
  outputDir: string;
}

export type CsvValue = string | number | boolean | undefined;

export interface CsvColumn<T> {
  header: string;
  value: (row: T) => CsvValue;
}

export const PATHS_SEPARATOR = '; ';
export const COMBINED_FILE_NAME = 'all_top_level_testcases.csv';

const joinPaths = (row: AggregatedTestCase) => row.paths.join(PATHS_SEPARATOR);

export const TEST_CASE_COLUMNS: CsvColumn<AggregatedTestCase>[] = [
  { header: 'TopSuiteId', value: (row) => row.topSuiteId },
  { header: 'TopSuiteName', value: (row) => row.topSuiteName },
  { header: 'TestCaseId', value: (row) => row.testCaseId },
  { header: 'TestCaseName', value: (row) => row.testCaseName },
  { header: 'Outcome', value: (row) => row.outcome },
  { header: 'NumPaths', value: (row) => row.numPaths },
  { header: 'Paths', value: joinPaths },
];

export const COMBINED_COLUMNS: CsvColumn<AggregatedTestCase>[] = TEST_CASE_COLUMNS.filter(
  (column) => column.header !== 'TopSuiteId'
);

export const RESULT_COLUMNS: CsvColumn<ResultRow>[] = [
  { header: '_planId', value: (row) => row.planId },
  { header: '_topSuiteId', value: (row) => row.topSuiteId },
  { header: '_runId', value: (row) => row.runId },
  { header: '_runName', value: (row) => row.runName },
  { header: '_automated', value: (row) => row.automated },
  { header: 'suitePath', value: (row) => row.suitePath },
  { header: 'id', value: (row) => row.resultId },
  { header: 'outcome', value: (row) => row.outcome },
  { header: 'state', value: (row) => row.state },
  { header: 'pointId', value: (row) => row.pointId },
  { header: 'testCaseId', value: (row) => row.testCaseId },
  { header: 'testCaseName', value: (row) => row.testCaseName },
  { header: 'startedDate', value: (row) => row.startedDate },
  { header: 'completedDate', value: (row) => row.completedDate },
  { header: 'durationInMs', value: (row) => row.durationInMs },
  { header: 'configurationName', value: (row) => row.configurationName },
  { header: 'ownerName', value: (row) => row.ownerName },
  { header: 'priority', value: (row) => row.priority },
];

export function slugify(name: string, maxLength: number = 80): string {
  const slug = name
    .trim()
    .toLowerCase()
    .replace(/&/g, 'and')
    .replace(/[^\w\s-]/g, '')
    .replace(/[\s-]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return slug.length > maxLength ? slug.substring(0, maxLength) : slug;
}

function csvCell(value: CsvValue): string {
  if (value === undefined) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv<T>(rows: readonly T[], columns: readonly CsvColumn<T>[]): string {
  const lines = [
    columns.map((column) => csvCell(column.header)).join(','),
    ...rows.map((row) => columns.map((column) => csvCell(column.value(row))).join(',')),
  ];
  return `${lines.join('\n')}\n`;
}

/**
 * Persists reports as CSV: one file per top-level suite, plus a combined file
 * for aggregated test cases.
 */
export class ReportWriter {
  private outputDir: string;
  private logger: Logger;

  constructor(config: ReportWriterConfig, logger: Logger = silentLogger) {
    this.outputDir = config.outputDir;
    this.logger = logger;
  }

  async writeTestCaseReport(report: TestCaseReport): Promise<string[]> {
    await fs.mkdir(this.outputDir, { recursive: true });
    const written: string[] = [];
    const names = this.fileNames(report.topSuites, (slug) => `${slug}_testcases.csv`);

    for (const top of report.topSuites) {
      const rows = report.rows.filter((row) => row.topSuiteId === top.id);
      written.push(await this.write(names.get(top.id) ?? `${top.id}_testcases.csv`, toCsv(rows, TEST_CASE_COLUMNS)));
      this.logger.info(`${top.name}: ${rows.length} unique test case row(s)`);
    }

    if (report.rows.length > 0) {
      written.push(await this.write(COMBINED_FILE_NAME, toCsv(report.rows, COMBINED_COLUMNS)));
    }
    return written;
  }

  async writeResultRows(report: ResultRowReport): Promise<string[]> {
    await fs.mkdir(this.outputDir, { recursive: true });
    const written: string[] = [];
    const names = this.fileNames(report.topSuites, (slug) => `results_${slug}.csv`);

    for (const top of report.topSuites) {
      const rows = report.rows.filter((row) => row.topSuiteId === top.id);
      written.push(await this.write(names.get(top.id) ?? `results_${top.id}.csv`, toCsv(rows, RESULT_COLUMNS)));
    }
    return written;
  }

  /** Suite id → file name; colliding or empty slugs are made unique with the suite id. */
  private fileNames(
    suites: ReadonlyArray<{ id: string; name: string }>,
    format: (slug: string) => string
  ): Map<string, string> {
    const used = new Set<string>();
    const names = new Map<string, string>();
    for (const suite of suites) {
      let slug = slugify(suite.name);
      if (!slug) {
        slug = `suite_${suite.id}`;
      } else if (used.has(slug)) {
        slug = `${slug}_${suite.id}`;
      }
      used.add(slug);
      names.set(suite.id, format(slug));
    }
    return names;
  }

  private async write(fileName: string, content: string): Promise<string> {
    const filePath = path.join(this.outputDir, fileName);
    await fs.writeFile(filePath, content, 'utf-8');
    this.logger.info(`Wrote ${filePath}`);
    return filePath;
  }
}
