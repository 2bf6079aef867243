import { AzureDevOpsClient, type HttpTransport } from './azureDevOpsClient.js';
import type { ReportingConfig } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { VersionedPaginationClient } from './paginationClient.js';
import { ReportWriter } from './reportWriter.js';
import { TestCaseAggregator } from './testCaseAggregator.js';
import { TestPlanApi } from './testPlanApi.js';
import type { ToolServices } from './tools.js';
import { WorkItemApi } from './workItemApi.js';

export interface ServiceOptions {
  transport?: HttpTransport;
  logger?: (component: string) => Logger;
}

/**
 * Wires the client stack for one configuration. Every component gets its own
 * component-tagged logger.
 */
export function createServices(config: ReportingConfig, options: ServiceOptions = {}): ToolServices {
  const loggerFor = options.logger ?? ((component: string) => createLogger(component, config.logLevel));

  const client = new AzureDevOpsClient(config, {
    transport: options.transport,
    logger: loggerFor('http'),
  });
  const pagination = new VersionedPaginationClient(client, loggerFor('pagination'));
  const testPlans = new TestPlanApi(client, pagination, loggerFor('test-plans'));

  return {
    config,
    testPlans,
    aggregator: new TestCaseAggregator(testPlans, loggerFor('aggregator')),
    workItems: new WorkItemApi(client, loggerFor('work-items')),
    writer: new ReportWriter({ outputDir: config.outputDir }, loggerFor('report-writer')),
  };
}
