import { parseArgs } from 'node:util';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config/index.js';
import { loadCapabilityCatalog } from './config/catalog.js';
import { createConductor } from './conductor.js';
import { registerTools } from './server/tools.js';
import { setLogLevel, createLogger } from './utils/logger.js';

const log = createLogger('main');

const { values: flags } = parseArgs({
  options: {
    catalog: { type: 'string' },
  },
  strict: false,
});

async function main(): Promise<void> {
  log.info('Model Conductor starting...');

  // 1. Load configuration
  const config = loadConfig();
  setLogLevel(config.logging.level);
  log.info(`Configuration loaded. Default provider: ${config.defaultProvider}`);

  // 2. Load the capability catalog
  const catalogPath = typeof flags.catalog === 'string' ? flags.catalog : config.capabilityCatalogPath;
  const catalog = loadCapabilityCatalog(catalogPath);

  // 3. Assemble the core
  const conductor = createConductor(config, catalog);

  // 4. Start MCP stdio server
  const server = new McpServer({
    name: 'model-conductor',
    version: '1.0.0',
  });

  registerTools(server, conductor);
  log.info('MCP tools registered');

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info('Model Conductor is running on stdio transport');
}

main().catch((err) => {
  log.error('Fatal error during startup', err);
  process.exit(1);
});
