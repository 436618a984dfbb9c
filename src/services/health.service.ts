import fs from 'fs/promises';
import { constants } from 'fs';
import path from 'path';
import { HealthCheckResponse } from '../types';
import { env } from '../config';
import { getRedisClient, isRedisAvailable } from '../redis';

export type RedisHealth = 'disabled' | 'connected' | 'disconnected';

export interface ReadinessChecks {
  server: boolean;
  stagingRoot: boolean;
  uploadsDir: boolean;
}

/**
 * Health check service
 */
export class HealthService {
  private readonly startTime: number;
  private readonly version: string;

  constructor() {
    this.startTime = Date.now();
    this.version = process.env.npm_package_version || '1.0.0';
  }

  /**
   * Get health status
   */
  getHealthStatus(): HealthCheckResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      environment: env.NODE_ENV,
      version: this.version,
    };
  }

  /**
   * Creates the directory if needed and checks that the process can write to it
   */
  async isWritableDirectory(directory: string): Promise<boolean> {
    try {
      const resolved = path.resolve(directory);
      await fs.mkdir(resolved, { recursive: true });
      await fs.access(resolved, constants.W_OK);
      return true;
    } catch {
      return false;
    }
  }

  getRedisStatus(): RedisHealth {
    if (!env.REDIS_ENABLED) return 'disabled';
    getRedisClient();
    return isRedisAvailable() ? 'connected' : 'disconnected';
  }

  /**
   * Check if the service is ready.
   * Redis is reported but never blocks readiness.
   */
  async checkReadiness(): Promise<{ ready: boolean; checks: ReadinessChecks; redis: RedisHealth }> {
    const checks: ReadinessChecks = {
      server: true,
      stagingRoot: await this.isWritableDirectory(env.STAGING_ROOT),
      uploadsDir: await this.isWritableDirectory(env.UPLOADS_DIR),
    };

    const ready = Object.values(checks).every((check) => check);

    return { ready, checks, redis: this.getRedisStatus() };
  }
}

// Singleton instance
export const healthService = new HealthService();

export default healthService;
