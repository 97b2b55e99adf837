import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { DatabaseConnection } from '../../infrastructure/database/DatabaseConnection.js';
import { CircuitState } from '../../utils/retry.js';
import { ToolResult } from './BatchTools.js';

export interface ProviderHealth {
  readonly name: string;
  getCircuitBreakerState(): CircuitState;
}

interface HealthReport {
  timestamp: string;
  status: 'healthy' | 'degraded';
  components: {
    database: { status: 'healthy' | 'error'; message: string };
    provider: { name: string; circuitBreaker: CircuitState };
  };
}

export function createHealthCheckHandler(dbConnection: DatabaseConnection, provider: ProviderHealth) {
  return async (): Promise<ToolResult> => {
    const health: HealthReport = {
      timestamp: new Date().toISOString(),
      status: 'healthy',
      components: {
        database: { status: 'healthy', message: '' },
        provider: { name: provider.name, circuitBreaker: provider.getCircuitBreakerState() },
      },
    };

    try {
      const stats = dbConnection.getStatistics();
      health.components.database.message = `Database connected - ${stats.totalJobs} batches in ${stats.totalGroups} groups`;
    } catch (error) {
      health.components.database = {
        status: 'error',
        message: error instanceof Error ? error.message : String(error),
      };
      health.status = 'degraded';
    }

    // An open circuit means recent provider calls kept failing
    if (health.components.provider.circuitBreaker === 'open') {
      health.status = 'degraded';
    }

    return {
      content: [
        {
          type: 'text',
          text: `# System Health Check\n\n\`\`\`json\n${JSON.stringify(health, null, 2)}\n\`\`\``,
        },
      ],
    };
  };
}

/**
 * Register the health-check tool
 */
export function registerHealthCheckTool(
  server: McpServer,
  dbConnection: DatabaseConnection,
  provider: ProviderHealth
) {
  const handler = createHealthCheckHandler(dbConnection, provider);
  server.tool(
    'health-check',
    'Check the health of the server and its components (database status, provider circuit breaker state)',
    {},
    async () => handler()
  );
}
