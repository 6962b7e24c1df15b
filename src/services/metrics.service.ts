/**
 * Prometheus Metrics Service
 *
 * Exposes application metrics for monitoring and alerting.
 *
 * Metrics:
 * - mailcheck_validations_total{result}: Detailed validations by result
 * - mailcheck_validation_failures_total{reason}: Failing checks by reason
 * - mailcheck_mx_lookups_total{source,result}: MX answers from cache or resolver
 * - mailcheck_dns_lookups_total{type,outcome}: Resolver queries by outcome
 * - mailcheck_api_requests_total{status_code,method,route}: API requests
 * - mailcheck_api_duration_seconds: API request duration histogram
 * - mailcheck_list_size{list}: Current block/allow list sizes
 * - mailcheck_mx_cache_size: Current MX cache entries
 */

import { Registry, Counter, Histogram, Gauge } from 'prom-client';

/**
 * Prometheus Metrics Registry
 */
export class MetricsService {
  private registry: Registry;

  // Counters
  public validationsTotal: Counter<'result'>;
  public validationFailuresTotal: Counter<'reason'>;
  public mxLookupsTotal: Counter<'source' | 'result'>;
  public dnsLookupsTotal: Counter<'type' | 'outcome'>;
  public apiRequestsTotal: Counter<'status_code' | 'method' | 'route'>;

  // Histograms
  public apiDuration: Histogram<'method' | 'route' | 'status_code'>;

  // Gauges
  public listSize: Gauge<'list'>;
  public mxCacheSize: Gauge;

  constructor() {
    this.registry = new Registry();

    this.registry.setDefaultLabels({
      app: 'mailcheck-api',
    });

    this.validationsTotal = new Counter({
      name: 'mailcheck_validations_total',
      help: 'Total number of detailed email validations by result',
      labelNames: ['result'] as const,
      registers: [this.registry],
    });

    this.validationFailuresTotal = new Counter({
      name: 'mailcheck_validation_failures_total',
      help: 'Total number of failing checks by reason',
      labelNames: ['reason'] as const,
      registers: [this.registry],
    });

    this.mxLookupsTotal = new Counter({
      name: 'mailcheck_mx_lookups_total',
      help: 'Total number of MX answers by source (cache or resolver) and result',
      labelNames: ['source', 'result'] as const,
      registers: [this.registry],
    });

    this.dnsLookupsTotal = new Counter({
      name: 'mailcheck_dns_lookups_total',
      help: 'Total number of resolver queries by record type and outcome',
      labelNames: ['type', 'outcome'] as const,
      registers: [this.registry],
    });

    this.apiRequestsTotal = new Counter({
      name: 'mailcheck_api_requests_total',
      help: 'Total number of API requests by status code',
      labelNames: ['status_code', 'method', 'route'] as const,
      registers: [this.registry],
    });

    this.apiDuration = new Histogram({
      name: 'mailcheck_api_duration_seconds',
      help: 'API request duration in seconds',
      labelNames: ['method', 'route', 'status_code'] as const,
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5], // seconds
      registers: [this.registry],
    });

    this.listSize = new Gauge({
      name: 'mailcheck_list_size',
      help: 'Number of domains in each list',
      labelNames: ['list'] as const,
      registers: [this.registry],
    });

    this.mxCacheSize = new Gauge({
      name: 'mailcheck_mx_cache_size',
      help: 'Number of domains held in the MX cache',
      registers: [this.registry],
    });
  }

  /**
   * Records a detailed validation and its failing checks
   */
  recordEmailValidation(valid: boolean, reasons: readonly string[] = []) {
    this.validationsTotal.inc({ result: valid ? 'VALID' : 'INVALID' });
    for (const reason of reasons) {
      this.validationFailuresTotal.inc({ reason });
    }
  }

  /**
   * Records an MX answer
   */
  recordMxLookup(source: 'cache' | 'resolver', hasMx: boolean) {
    this.mxLookupsTotal.inc({ source, result: hasMx ? 'FOUND' : 'NOT_FOUND' });
  }

  /**
   * Records a resolver query
   */
  recordDnsLookup(type: string, outcome: string) {
    this.dnsLookupsTotal.inc({ type, outcome });
  }

  /**
   * Records API request
   */
  recordApiRequest(method: string, route: string, statusCode: number, durationSeconds: number) {
    this.apiRequestsTotal.inc({
      method,
      route,
      status_code: statusCode.toString()
    });
    this.apiDuration.observe({
      method,
      route,
      status_code: statusCode.toString()
    }, durationSeconds);
  }

  /**
   * Updates list size gauge
   */
  updateListSize(list: 'blocklist' | 'allowlist', size: number) {
    this.listSize.set({ list }, size);
  }

  /**
   * Updates MX cache size gauge
   */
  updateMxCacheSize(size: number) {
    this.mxCacheSize.set(size);
  }

  /**
   * Gets metrics in Prometheus format
   */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  /**
   * Gets registry for custom metrics
   */
  getRegistry(): Registry {
    return this.registry;
  }

  /**
   * Resets all metrics (for testing)
   */
  reset() {
    this.registry.resetMetrics();
  }
}

/**
 * Global metrics instance
 */
export const metrics = new MetricsService();
