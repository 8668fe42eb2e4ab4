import type { Request, Response } from 'express';
import * as os from 'os';
import { getDefaultLogger } from './logger';
import { LoggerAdapter, QueueStats, StatsSource } from './types';

export type HealthState = 'healthy' | 'degraded' | 'unhealthy';

export interface QueueHealth extends QueueStats {
  utilization: number;
}

export interface HealthStatus {
  status: HealthState;
  timestamp: string;
  uptime: number;
  queues: Record<string, QueueHealth>;
  totals: {
    count: number;
    dropped: number;
  };
  system: {
    memory: NodeJS.MemoryUsage;
    platform: string;
    nodeVersion: string;
    pid: number;
  };
}

export interface HealthCheckerOptions {
  degradedDropThreshold?: number;
  unhealthyDropThreshold?: number;
  logger?: LoggerAdapter;
}

export class QueueHealthChecker {
  private queues = new Map<string, StatsSource>();
  private logger: LoggerAdapter;
  private degradedDropThreshold: number;
  private unhealthyDropThreshold: number;
  private startTime = Date.now();

  constructor(options: HealthCheckerOptions = {}) {
    this.logger = options.logger ?? getDefaultLogger();
    this.degradedDropThreshold = options.degradedDropThreshold ?? 10;
    this.unhealthyDropThreshold = options.unhealthyDropThreshold ?? 50;
  }

  register(name: string, queue: StatsSource): void {
    this.queues.set(name, queue);
  }

  unregister(name: string): boolean {
    return this.queues.delete(name);
  }

  getHealthStatus(): HealthStatus {
    const queues: Record<string, QueueHealth> = {};
    let count = 0;
    let dropped = 0;
    let anyFull = false;

    for (const [name, queue] of this.queues) {
      const stats = queue.getStats();
      queues[name] = {
        ...stats,
        utilization: stats.capacity > 0 ? stats.count / stats.capacity : 0
      };
      count += stats.count;
      dropped += stats.rejectedCount + stats.overwrittenCount;
      anyFull = anyFull || stats.state === 'FULL';
    }

    // Dropped items are rejected pushes plus overwritten items
    let status: HealthState = 'healthy';
    if (dropped > this.unhealthyDropThreshold) {
      status = 'unhealthy';
    } else if (dropped > this.degradedDropThreshold || anyFull) {
      status = 'degraded';
    }

    return {
      status,
      timestamp: new Date().toISOString(),
      uptime: (Date.now() - this.startTime) / 1000,
      queues,
      totals: { count, dropped },
      system: {
        memory: process.memoryUsage(),
        platform: os.platform(),
        nodeVersion: process.version,
        pid: process.pid
      }
    };
  }

  createHealthEndpoint() {
    return (req: Request, res: Response) => {
      try {
        const health = this.getHealthStatus();
        const statusCode = health.status === 'unhealthy' ? 503 : 200;

        res.status(statusCode).json(health);

        this.logger.debug('Health check requested', {
          requestId: req.headers['x-request-id'],
          ip: req.ip,
          healthStatus: health.status
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error('Health check failed', { error: message });

        res.status(500).json({
          status: 'unhealthy',
          timestamp: new Date().toISOString(),
          error: 'Health check failed',
          message
        });
      }
    };
  }
}
