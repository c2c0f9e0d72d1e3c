import logger from '../utils/logger';

export type HealthStatus = 'healthy' | 'degraded';

export interface HealthReport {
  status: HealthStatus;
  uptime: number;
  timestamp: string;
  lastDeployment: string | null;
  lastError: string | null;
}

export interface DeploymentMetrics {
  timestamp: string;
  uptime: number;
  memory: NodeJS.MemoryUsage;
  deployments: number;
  skipped: number;
  failures: number;
  lastEndpointName: string | null;
  nodeVersion: string;
}

const REQUIRED_ENV_VARS = ['SERVERLESS_ENVIRONMENT'];

/**
 * Tracks outcomes of invocations handled by the local API.
 */
export class HealthCheckService {
  private readonly startTime = Date.now();
  private lastDeploymentTime: Date | null = null;
  private lastEndpointName: string | null = null;
  private lastError: string | null = null;
  private deployments = 0;
  private skipped = 0;
  private failures = 0;

  constructor(private readonly env: Record<string, string | undefined> = process.env) {}

  /**
   * Current health, degraded while the last invocation failed.
   */
  getHealth(): HealthReport {
    return {
      // degraded until the next successful deployment
      status: this.lastError ? 'degraded' : 'healthy',
      uptime: this.uptimeSeconds(),
      timestamp: new Date().toISOString(),
      lastDeployment: this.lastDeploymentTime ? this.lastDeploymentTime.toISOString() : null,
      lastError: this.lastError
    };
  }

  /**
   * Invocation counters plus process memory.
   */
  getMetrics(): DeploymentMetrics {
    return {
      timestamp: new Date().toISOString(),
      uptime: this.uptimeSeconds(),
      memory: process.memoryUsage(),
      deployments: this.deployments,
      skipped: this.skipped,
      failures: this.failures,
      lastEndpointName: this.lastEndpointName,
      nodeVersion: process.version
    };
  }

  /**
   * Ready once every required setting is present.
   */
  isReady(): { ready: boolean; missingEnvVars?: string[] } {
    const missingEnvVars = REQUIRED_ENV_VARS.filter(name => !this.env[name]);
    return {
      ready: missingEnvVars.length === 0,
      missingEnvVars: missingEnvVars.length > 0 ? missingEnvVars : undefined
    };
  }

  /**
   * Records a created endpoint and clears the last error.
   */
  recordDeployment(endpointName: string): void {
    this.deployments++;
    this.lastDeploymentTime = new Date();
    this.lastEndpointName = endpointName;
    this.lastError = null;
  }

  /**
   * Records an ignored (non-create) event.
   */
  recordSkipped(): void {
    this.skipped++;
  }

  /**
   * Records a failed invocation.
   */
  recordFailure(message: string): void {
    this.failures++;
    this.lastError = message;
    logger.warn(`Health degraded after failed invocation: ${message}`);
  }

  /**
   * Whole seconds since the service was created.
   */
  private uptimeSeconds(): number {
    return Math.floor((Date.now() - this.startTime) / 1000);
  }
}
