#!/usr/bin/env node
import dotenv from 'dotenv';
import path from 'path';
import { loadConfig } from './config.js';
import { ConfigurationError, describeError } from './errors.js';
import { createLogger } from './logger.js';
import { createServices } from './services.js';

dotenv.config();

const logger = createLogger('export');

async function exportReport() {
  const config = loadConfig(process.env);
  if (!config.planName) {
    throw new ConfigurationError('TEST_PLAN_NAME is required for the export');
  }

  const { aggregator, writer } = createServices(config);
  const report = await aggregator.aggregate({
    planName: config.planName,
    backfillRunLimit: config.backfillRunLimit,
  });

  const files = await writer.writeTestCaseReport(report);

  console.log(`Plan '${report.plan.name}' (ID=${report.plan.id})`);
  for (const top of report.topSuites) {
    console.log(`   ${top.name}: ${top.testCases} unique test case(s)`);
  }
  if (report.backfill.warning) {
    console.log(`   Backfill skipped: ${report.backfill.warning}`);
  }
  console.log(`\n${files.length} file(s) written to ${path.resolve(config.outputDir)}`);
}

exportReport().catch((error) => {
  logger.error('Export failed');
  console.error(describeError(error));
  process.exit(1);
});
