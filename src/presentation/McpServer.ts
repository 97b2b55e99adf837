import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from '../config.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { BatchStore } from '../infrastructure/database/repositories/BatchStore.js';
import { OpenAIBatchProvider } from '../infrastructure/http/OpenAIBatchProvider.js';
import { GroupCoordinator } from '../application/services/GroupCoordinator.js';
import { CircuitBreaker, DEFAULT_RETRY_CONFIG } from '../utils/retry.js';
import { registerBatchTools } from './tools/BatchTools.js';
import { registerHealthCheckTool } from './tools/HealthCheckTool.js';

/**
 * Main MCP Server class that wires the store, provider and coordinator together
 */
export class McpServer {
  private server: BaseMcpServer;
  private dbConnection: DatabaseConnection;
  private coordinator: GroupCoordinator;
  private debugLog: (message: string) => void;

  constructor(config: Config) {
    this.debugLog = (message: string) => {
      if (config.server.debug) {
        console.error(`[DEBUG] ${message}`);
      }
    };

    this.dbConnection = new DatabaseConnection(config.batch.databasePath);
    const store = new BatchStore(this.dbConnection.getDatabase());

    const provider = new OpenAIBatchProvider({
      apiKey: config.openai.apiKey,
      baseUrl: config.openai.baseUrl,
      model: config.openai.model,
      endpoint: config.openai.endpoint,
      completionWindow: config.openai.completionWindow,
      circuitBreaker: new CircuitBreaker(5, 60000),
      retryConfig: {
        ...DEFAULT_RETRY_CONFIG,
        maxAttempts: config.retry.maxAttempts,
        initialDelayMs: config.retry.initialDelayMs,
        maxDelayMs: config.retry.maxDelayMs,
        timeoutMs: config.retry.timeoutMs,
      },
      log: this.debugLog,
    });

    this.coordinator = new GroupCoordinator(provider, store, {
      maxItemsPerBatch: config.batch.maxItemsPerBatch,
      concurrency: config.batch.concurrency,
      log: this.debugLog,
    });

    this.server = new BaseMcpServer({
      name: config.server.name,
      version: config.server.version,
    });
    registerBatchTools(this.server, this.coordinator);
    registerHealthCheckTool(this.server, this.dbConnection, provider);
  }

  /**
   * Submit or poll groups a previous run left unfinished
   */
  private async resumeActiveGroups() {
    try {
      const reports = await this.coordinator.resumeActiveGroups();
      if (reports.length > 0) {
        const issues = reports.reduce((sum, report) => sum + report.issues.length, 0);
        console.error(`✅ Database: Resumed ${reports.length} active batch group(s) with ${issues} issue(s)`);
      }
    } catch (error) {
      console.error(`⚠️ Database: Error resuming batch groups:`, error);
    }
  }

  printStats() {
    const stats = this.dbConnection.getStatistics();
    const byStatus = Object.entries(stats.jobsByStatus)
      .map(([status, count]) => `${count} ${status}`)
      .join(', ');
    console.error(
      `📊 Database Statistics: ${stats.totalGroups} groups, ${stats.totalJobs} batches${byStatus ? ` (${byStatus})` : ''}, ${(stats.databaseSize / 1024).toFixed(2)} KB`
    );
  }

  async start() {
    this.debugLog(`Database initialized at: ${this.dbConnection.getDatabasePath()}`);

    const transport = new StdioServerTransport();

    process.stdin.on('error', (error) => {
      console.error('⚠️ stdin error (non-fatal):', error.message);
    });

    process.stdout.on('error', (error) => {
      console.error('⚠️ stdout error (non-fatal):', error.message);
    });

    process.stdin.on('end', () => {
      console.error('⚠️ stdin ended - client may have disconnected');
    });

    await this.server.connect(transport);
    console.error(`\n✅ Batch Group Orchestrator MCP Server running on stdio`);
    this.debugLog('stdio transport connected successfully');

    // Resume in the background so the handshake never waits on the provider
    void this.resumeActiveGroups();
  }

  async shutdown() {
    console.error('\n👋 Shutting down gracefully...');
    await this.server.close();
    this.dbConnection.close();
  }
}
