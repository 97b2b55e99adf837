import { DatabaseConnection, IN_MEMORY } from '../src/infrastructure/database/DatabaseConnection.js';
import { BatchStore } from '../src/infrastructure/database/repositories/BatchStore.js';
import { ProviderHealth, createHealthCheckHandler } from '../src/presentation/tools/HealthCheckTool.js';
import { CircuitState } from '../src/utils/retry.js';

function providerIn(state: CircuitState): ProviderHealth {
  return { name: 'fake', getCircuitBreakerState: () => state };
}

function report(text: string): unknown {
  const json = text.replace('# System Health Check\n\n```json\n', '').replace(/\n```$/, '');
  return JSON.parse(json);
}

describe('health-check', () => {
  let connection: DatabaseConnection;

  beforeEach(() => {
    connection = new DatabaseConnection(IN_MEMORY);
  });

  afterEach(() => {
    connection.close();
  });

  test('should report a healthy system', async () => {
    const now = new Date();
    new BatchStore(connection.getDatabase()).saveGroup({
      id: 'g1',
      processor: 'summarize',
      totalItems: 0,
      maxItemsPerBatch: 30,
      isSplit: false,
      jobIds: [],
      createdAt: now,
      updatedAt: now,
    });

    const result = await createHealthCheckHandler(connection, providerIn('closed'))();

    expect(report(result.content[0].text)).toEqual({
      timestamp: expect.any(String),
      status: 'healthy',
      components: {
        database: { status: 'healthy', message: 'Database connected - 0 batches in 1 groups' },
        provider: { name: 'fake', circuitBreaker: 'closed' },
      },
    });
  });

  test('should be degraded while the provider circuit is open', async () => {
    const result = await createHealthCheckHandler(connection, providerIn('open'))();

    expect(report(result.content[0].text)).toMatchObject({ status: 'degraded' });
  });

  test('should be degraded when the database is unavailable', async () => {
    connection.close();

    const result = await createHealthCheckHandler(connection, providerIn('closed'))();

    expect(report(result.content[0].text)).toMatchObject({
      status: 'degraded',
      components: { database: { status: 'error' } },
    });
  });
});
