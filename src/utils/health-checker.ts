export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface ComponentHealth {
  name: string;
  status: HealthStatus;
  latencyMs?: number;
  message?: string;
  lastCheck: Date;
}

export interface SystemHealth {
  status: HealthStatus;
  components: ComponentHealth[];
  timestamp: Date;
  uptime: number;
}

export type HealthCheckFn = () => Promise<ComponentHealth>;

export class HealthChecker {
  private checks: Map<string, HealthCheckFn> = new Map();
  private startTime: Date = new Date();

  registerCheck(name: string, check: HealthCheckFn): void {
    this.checks.set(name, check);
  }

  async checkComponent(name: string): Promise<ComponentHealth> {
    const check = this.checks.get(name);
    if (!check) {
      return {
        name,
        status: 'unhealthy',
        message: 'Check not registered',
        lastCheck: new Date(),
      };
    }

    try {
      return await check();
    } catch (error) {
      return {
        name,
        status: 'unhealthy',
        message: error instanceof Error ? error.message : 'Unknown error',
        lastCheck: new Date(),
      };
    }
  }

  async checkAll(): Promise<SystemHealth> {
    const components: ComponentHealth[] = [];

    for (const name of this.checks.keys()) {
      components.push(await this.checkComponent(name));
    }

    const unhealthyCount = components.filter((c) => c.status === 'unhealthy').length;
    const degradedCount = components.filter((c) => c.status === 'degraded').length;

    let status: HealthStatus = 'healthy';
    if (unhealthyCount > 0) {
      status = 'unhealthy';
    } else if (degradedCount > 0) {
      status = 'degraded';
    }

    return {
      status,
      components,
      timestamp: new Date(),
      uptime: this.getUptime(),
    };
  }

  getUptime(): number {
    return Date.now() - this.startTime.getTime();
  }
}

// Database health check factory
export function createDatabaseHealthCheck(db: { ping(): Promise<void> }): HealthCheckFn {
  return async (): Promise<ComponentHealth> => {
    const start = Date.now();
    try {
      await db.ping();

      const latencyMs = Date.now() - start;
      return {
        name: 'database',
        status: latencyMs > 1000 ? 'degraded' : 'healthy',
        latencyMs,
        message: latencyMs > 1000 ? 'High latency' : 'Connected',
        lastCheck: new Date(),
      };
    } catch (error) {
      return {
        name: 'database',
        status: 'unhealthy',
        latencyMs: Date.now() - start,
        message: error instanceof Error ? error.message : 'Connection failed',
        lastCheck: new Date(),
      };
    }
  };
}

interface SchedulerStatusSource {
  getStatus(): { running: boolean; lastCycle: { failed: number; succeeded: number } | null };
}

// Ingestion is degraded when the last cycle lost any account, unhealthy when the loop is not running
export function createSchedulerHealthCheck(scheduler: SchedulerStatusSource): HealthCheckFn {
  return async (): Promise<ComponentHealth> => {
    const { running, lastCycle } = scheduler.getStatus();
    if (!running) {
      return { name: 'scheduler', status: 'unhealthy', message: 'Not running', lastCheck: new Date() };
    }
    if (lastCycle && lastCycle.failed > 0) {
      return {
        name: 'scheduler',
        status: 'degraded',
        message: `${lastCycle.failed} account(s) failed in the last cycle`,
        lastCheck: new Date(),
      };
    }
    return { name: 'scheduler', status: 'healthy', message: 'Running', lastCheck: new Date() };
  };
}
