import type { RecordsStore } from '../records/records.types';

type CheckResult = { status: 'healthy'; latency: string } | { status: 'unhealthy'; error: string };

export interface HealthReport {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  checks: {
    database: CheckResult;
  };
}

export class HealthService {
  constructor(private readonly records: RecordsStore) {}

  async checkHealth(): Promise<HealthReport> {
    const database = await this.checkDatabase();

    return {
      status: database.status,
      timestamp: new Date().toISOString(),
      checks: { database },
    };
  }

  private async checkDatabase(): Promise<CheckResult> {
    try {
      const start = Date.now();

      await this.records.ping();

      return {
        status: 'healthy',
        latency: `${Date.now() - start}ms`,
      };
    } catch (error) {
      return {
        status: 'unhealthy',
        error: error instanceof Error ? error.message : 'Database unreachable',
      };
    }
  }
}
