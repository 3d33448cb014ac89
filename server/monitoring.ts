/**
 * Collaborator Monitoring & Metrics
 *
 * Tracks success rates, failures, and latency for each external collaborator.
 * Logs alerts when thresholds are exceeded.
 */

export const COLLABORATORS = ['embedding', 'preprocessing', 'geocoding', 'renderer', 'database'] as const;
export type CollaboratorName = typeof COLLABORATORS[number];

interface CollaboratorMetrics {
  success: number;
  failed: number;
  consecutiveFailures: number;
  totalLatencyMs: number;
  minLatencyMs: number;
  maxLatencyMs: number;
  lastError?: {
    message: string;
    timestamp: number;
    code?: string;
  };
  lastSuccessTimestamp: number;
  lastFailureTimestamp: number;
}

export type HealthStatus = 'healthy' | 'degraded' | 'down';

export interface CollaboratorHealth {
  collaborator: CollaboratorName;
  status: HealthStatus;
  failureRate: string;
  avgLatencyMs: number;
  totalRequests: number;
}

function emptyMetrics(): CollaboratorMetrics {
  return {
    success: 0,
    failed: 0,
    consecutiveFailures: 0,
    totalLatencyMs: 0,
    minLatencyMs: Infinity,
    maxLatencyMs: 0,
    lastSuccessTimestamp: Date.now(),
    lastFailureTimestamp: 0,
  };
}

export class MonitoringService {
  private metrics = new Map<CollaboratorName, CollaboratorMetrics>();
  private thresholds = {
    failureRatePercent: 10, // Alert if >10% of requests fail
    maxConsecutiveFailures: 5, // Alert if 5+ consecutive failures
    unavailableMinutes: 5, // Alert if collaborator unavailable for 5+ min
  };

  constructor() {
    this.reset();
  }

  private metricFor(name: CollaboratorName): CollaboratorMetrics {
    let metric = this.metrics.get(name);
    if (!metric) {
      metric = emptyMetrics();
      this.metrics.set(name, metric);
    }
    return metric;
  }

  recordSuccess(name: CollaboratorName, latencyMs: number): void {
    const metric = this.metricFor(name);
    metric.success++;
    metric.consecutiveFailures = 0;
    metric.totalLatencyMs += latencyMs;
    metric.minLatencyMs = Math.min(metric.minLatencyMs, latencyMs);
    metric.maxLatencyMs = Math.max(metric.maxLatencyMs, latencyMs);
    metric.lastSuccessTimestamp = Date.now();
    metric.lastError = undefined;
  }

  recordFailure(name: CollaboratorName, error: Error | string, code?: string): void {
    const metric = this.metricFor(name);
    metric.failed++;
    metric.consecutiveFailures++;
    metric.lastFailureTimestamp = Date.now();
    metric.lastError = {
      message: error instanceof Error ? error.message : String(error),
      timestamp: Date.now(),
      code,
    };

    this.checkAlerts(name);
  }

  getMetrics(name: CollaboratorName) {
    const metric = this.metricFor(name);
    const total = metric.success + metric.failed;
    const failureRate = total > 0 ? (metric.failed / total) * 100 : 0;
    const avgLatencyMs = metric.success > 0 ? metric.totalLatencyMs / metric.success : 0;

    return {
      ...metric,
      totalRequests: total,
      failureRate,
      avgLatencyMs: Math.round(avgLatencyMs),
      isHealthy: failureRate < this.thresholds.failureRatePercent,
      // Only a collaborator that has been failing counts as unavailable
      isUnavailable:
        metric.failed > 0 &&
        metric.lastFailureTimestamp > metric.lastSuccessTimestamp &&
        Date.now() - metric.lastSuccessTimestamp > this.thresholds.unavailableMinutes * 60 * 1000,
    };
  }

  getHealthStatus(): CollaboratorHealth[] {
    return COLLABORATORS.map((name) => {
      const metrics = this.getMetrics(name);

      let status: HealthStatus = 'healthy';
      if (metrics.isUnavailable) {
        status = 'down';
      } else if (metrics.failureRate > this.thresholds.failureRatePercent) {
        status = 'degraded';
      }

      return {
        collaborator: name,
        status,
        failureRate: metrics.failureRate.toFixed(1) + '%',
        avgLatencyMs: metrics.avgLatencyMs,
        totalRequests: metrics.totalRequests,
      };
    });
  }

  private checkAlerts(name: CollaboratorName): void {
    const metrics = this.getMetrics(name);

    if (metrics.consecutiveFailures === this.thresholds.maxConsecutiveFailures) {
      this.sendAlert(
        `${name.toUpperCase()} FAILING`,
        `${metrics.consecutiveFailures} consecutive failures, last: ${metrics.lastError?.message ?? 'unknown'}`,
        'critical'
      );
    } else if (metrics.totalRequests >= 10 && metrics.failureRate > this.thresholds.failureRatePercent) {
      this.sendAlert(
        `${name.toUpperCase()} HIGH FAILURE RATE`,
        `${metrics.failureRate.toFixed(1)}% of requests are failing (threshold: ${this.thresholds.failureRatePercent}%)`,
        'warning'
      );
    }
  }

  private sendAlert(title: string, message: string, severity: 'warning' | 'critical'): void {
    const output = `[${new Date().toISOString()}] [${severity.toUpperCase()}] ${title}: ${message}`;

    if (severity === 'critical') {
      console.error(output);
    } else {
      console.warn(output);
    }
  }

  reset(name?: CollaboratorName): void {
    if (name) {
      this.metrics.set(name, emptyMetrics());
      return;
    }
    for (const collaborator of COLLABORATORS) {
      this.metrics.set(collaborator, emptyMetrics());
    }
  }
}

export const monitoring = new MonitoringService();

/**
 * Wrapper to track collaborator latency
 */
export async function trackApiCall<T>(
  name: CollaboratorName,
  fn: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();
  try {
    const result = await fn();
    monitoring.recordSuccess(name, Date.now() - startTime);
    return result;
  } catch (error) {
    const failure = error instanceof Error ? error : new Error(String(error));
    const code = 'code' in failure && typeof failure.code === 'string' ? failure.code : 'unknown';
    monitoring.recordFailure(name, failure, code);
    throw error;
  }
}
