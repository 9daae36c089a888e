/**
 * Health endpoints:
 * - GET /api/v1/health          process liveness and database reachability
 * - GET /api/v1/health/ready    200 once the HTTP server is up
 */

import type { Request, Response } from 'express';
import type { DbTransactionPort } from '../services/ports/db.port';
import { ok, fail, ErrorCodes } from '../utils/api-response';
import { logger } from '../utils/logger';

interface ServiceHealth {
  status: 'healthy' | 'unhealthy';
  responseTime: number;
  lastCheck: string;
  error?: string;
}

export interface SystemHealth {
  overall: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  services: {
    database: ServiceHealth;
  };
}

export class HealthController {
  constructor(private readonly db: Pick<DbTransactionPort, 'queryOne'>) {}

  private async checkDatabaseHealth(): Promise<ServiceHealth> {
    const startTime = Date.now();
    try {
      await this.db.queryOne('SELECT 1 AS ok', [], { operation: 'healthCheck' });
      return { status: 'healthy', responseTime: Date.now() - startTime, lastCheck: new Date().toISOString() };
    } catch (error) {
      return {
        status: 'unhealthy',
        responseTime: Date.now() - startTime,
        lastCheck: new Date().toISOString(),
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  async getHealthCheck(_req: Request, res: Response): Promise<Response> {
    const database = await this.checkDatabaseHealth();
    const health: SystemHealth = {
      overall: database.status,
      timestamp: new Date().toISOString(),
      uptime: Math.round(process.uptime()),
      services: { database },
    };
    if (health.overall !== 'healthy') {
      logger.warn('health-check-unhealthy', { database: database.error });
      return fail(res, ErrorCodes.SERVICE_UNAVAILABLE, 'One or more dependencies are unhealthy', 503, { ...health });
    }
    return ok(res, health);
  }

  getReadiness(_req: Request, res: Response): Response {
    res.setHeader('Cache-Control', 'no-store');
    return ok(res, { status: 'ready', environment: process.env.NODE_ENV || 'development' });
  }
}
