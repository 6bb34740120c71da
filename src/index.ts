#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config/index.js';
import { setLogLevel, createLogger } from './utils/logger.js';
import { createRuntime } from './runtime.js';
import { registerTools } from './server/tools.js';

const log = createLogger('main');

const { values: flags } = parseArgs({
  options: {
    http: { type: 'boolean', default: false },
    'http-only': { type: 'boolean', default: false },
    jsonl: { type: 'boolean', default: false },
  },
  strict: false,
});

async function main(): Promise<void> {
  log.info('shellsense starting...');

  // 1. Load configuration
  const config = loadConfig();
  setLogLevel(config.logging.level);
  log.info(`Configuration loaded. Model: ${config.model.enabled ? config.model.name : 'disabled'}`);

  // 2. Vocabulary, decision log, service
  const { service, decisionLog } = createRuntime(config);

  // 3. Bring the model up once; failure leaves the process heuristic-only
  await service.initialize();
  log.info(`Classification mode: ${service.mode}`);

  // 4. JSON lines on stdio, exclusive with the other transports
  if (flags.jsonl) {
    const { runJsonLines } = await import('./server/jsonl.js');
    const answered = await runJsonLines(process.stdin, process.stdout, service);
    log.info(`Answered ${answered} requests`);
    return;
  }

  // 5. Start HTTP server if enabled
  const httpEnabled = config.http.enabled || flags.http || flags['http-only'];
  if (httpEnabled) {
    const { createHttpServer } = await import('./server/http-server.js');
    const httpServer = createHttpServer({ service, decisionLog });
    httpServer.listen(config.http.port, () => {
      log.info(`HTTP server listening on http://localhost:${config.http.port}`);
    });
  }

  // 6. Start MCP stdio server (unless --http-only)
  if (!flags['http-only']) {
    const server = new McpServer({
      name: 'shellsense',
      version: '1.0.0',
    });

    registerTools(server, { config, service, decisionLog });
    log.info('MCP tools registered');

    const transport = new StdioServerTransport();
    await server.connect(transport);
    log.info('shellsense is running on stdio transport');
  }
}

main().catch((err) => {
  log.error('Fatal error during startup', err);
  process.exit(1);
});
