#!/usr/bin/env node

/**
 * Batch Group Orchestrator MCP Server - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { McpServer } from './presentation/McpServer.js';

async function main() {
  let mcpServer: McpServer | null = null;

  try {
    const config = getConfig();
    printConfigInfo(config);

    mcpServer = new McpServer(config);
    await mcpServer.start();

    mcpServer.printStats();

    let shuttingDown = false;
    const shutdown = async (signal: string, exitCode: number = 0) => {
      if (shuttingDown) return;
      shuttingDown = true;
      console.error(`\n\n📛 Received ${signal}, shutting down gracefully...`);

      try {
        await mcpServer?.shutdown();
      } catch (error) {
        console.error('⚠️ Error during shutdown:', error);
        exitCode = 1;
      }

      console.error('👋 Goodbye!\n');
      process.exit(exitCode);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    process.on('uncaughtException', (error) => {
      console.error('💥 Uncaught Exception:', error);
      void shutdown('UNCAUGHT_EXCEPTION', 1);
    });

    process.on('unhandledRejection', (reason) => {
      console.error('💥 Unhandled Rejection:', reason);
      void shutdown('UNHANDLED_REJECTION', 1);
    });
  } catch (error) {
    console.error('💥 Fatal error in main():', error);
    await mcpServer?.shutdown();
    process.exit(1);
  }
}

void main();
