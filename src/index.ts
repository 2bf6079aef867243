#!/usr/bin/env node
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema
} from '@modelcontextprotocol/sdk/types.js';
import dotenv from 'dotenv';
import { loadConfig, type ReportingConfig } from './config.js';
import { describeError } from './errors.js';
import { createLogger } from './logger.js';
import { createServices } from './services.js';
import { handleToolCall, tools } from './tools.js';

dotenv.config();

const logger = createLogger('server');

let config: ReportingConfig;
try {
  config = loadConfig(process.env);
} catch (error) {
  logger.error(describeError(error));
  console.error('Set ADO_ORG, ADO_PROJECT and ADO_PAT (in the environment or a .env file)');
  process.exit(1);
}

const services = createServices(config);

const server = new Server(
  {
    name: 'ado-test-reporting',
    version: '1.0.0',
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools,
}));

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  return handleToolCall(name, args, services);
});

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('ADO test reporting MCP server running on stdio', { project: config.project });
}

main().catch((error) => {
  logger.error(`Server error: ${describeError(error)}`);
  process.exit(1);
});
