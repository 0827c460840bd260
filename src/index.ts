#!/usr/bin/env node
/**
 * mcp-gateway-client
 *
 * Connects to a Streamable HTTP MCP gateway and serves its filtered tool
 * catalog over stdio. With --probe, prints the catalog and diagnostics and exits.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createBridgeServer } from './bridge.js';
import { configFromEnvironment } from './config.js';
import { GatewayCoordinator } from './mcp-client/GatewayCoordinator.js';
import { ToolGateway } from './mcp-client/ToolGateway.js';
import { ToolSchemaTranslator } from './mcp-client/ToolSchemaTranslator.js';
import { ConfigError } from './mcp-client/errors.js';

async function probe(coordinator: GatewayCoordinator, gateway: ToolGateway): Promise<void> {
  try {
    await coordinator.setup();

    const lines = [gateway.getToolsSummary(), ''];
    for (const tool of coordinator.getCatalog().entries) {
      lines.push(ToolSchemaTranslator.summarizeTool(tool.descriptor), '');
    }
    lines.push(JSON.stringify(coordinator.diagnostics(), null, 2));
    process.stdout.write(`${lines.join('\n')}\n`);
  } finally {
    await coordinator.teardown();
  }
}

async function serve(coordinator: GatewayCoordinator, gateway: ToolGateway): Promise<void> {
  await coordinator.setup();

  coordinator.addEventListener(event => {
    if (event.type === 'catalogUpdated') {
      console.error(`[Bridge] Catalog updated: ${event.tools.join(', ') || '(empty)'}`);
    }
  });

  const server = createBridgeServer(gateway);
  const transport = new StdioServerTransport();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.error(`[Bridge] Received ${signal}, shutting down...`);
    try {
      await server.close();
      await coordinator.teardown();
    } finally {
      process.exit(0);
    }
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch(err => {
        console.error('[Bridge] Shutdown failed:', err);
        process.exit(1);
      });
    });
  }

  await server.connect(transport);
  console.error('[Bridge] MCP gateway bridge started on stdio');
}

async function main(): Promise<void> {
  const config = configFromEnvironment();
  const coordinator = new GatewayCoordinator(config);
  const gateway = new ToolGateway(coordinator);

  if (process.argv.includes('--probe')) {
    await probe(coordinator, gateway);
  } else {
    await serve(coordinator, gateway);
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(`[CONFIG] ${err.message}`);
  } else {
    console.error('[Bridge] Fatal error:', err);
  }
  process.exit(1);
});
