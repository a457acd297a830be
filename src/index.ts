#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import * as dotenv from 'dotenv';
import { loadConfig } from './config.js';
import { ConnectionManager } from './connection.js';
import { closeLogger, getLogger, initLogger } from './logger.js';
import { SqlManagementClient } from './management/sql-management-client.js';
import { WindowsServiceController } from './management/windows-services.js';
import { createServer, tools } from './server.js';
import { runPowerShell } from './utils/powershell.js';

// Load environment variables
dotenv.config();

// Initialize configuration
const config = loadConfig();
initLogger(config.logLevel);
const logger = getLogger('mcp');

const connections = new ConnectionManager(config, getLogger('connection'));
const server = createServer({
  config,
  client: new SqlManagementClient(connections, runPowerShell, config.operationTimeout),
  services: new WindowsServiceController(runPowerShell, config.operationTimeout, getLogger('services')),
  diagnostics: getLogger('workflow'),
});

// Start server
async function main() {
  logger.info(
    {
      authType: config.authType,
      database: config.database,
      mode: config.mode,
      hadrIdempotency: config.hadrIdempotency,
      operationTimeout: config.operationTimeout,
    },
    'SQL Server guarded admin MCP server starting'
  );

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info({ tools: tools.map((tool) => tool.name) }, 'SQL Server guarded admin MCP server running on stdio');
}

async function shutdown() {
  logger.info({}, 'Shutting down');
  await server.close();
  closeLogger();
  process.exit(0);
}

main().catch((error) => {
  logger.fatal({ error: String(error) }, 'Fatal error');
  closeLogger();
  process.exit(1);
});

// Cleanup on exit
for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown().catch((error) => {
      logger.error({ error: String(error) }, 'Shutdown failed');
      process.exit(1);
    });
  });
}
