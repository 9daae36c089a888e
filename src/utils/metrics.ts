import * as client from 'prom-client';

// Metrics are registered once per process; repeated module loads (jest
// isolateModules, hot reload) reuse the existing collector.

export function getCounter(name: string, help: string, labelNames: string[] = []): client.Counter<string> {
  const existing = client.register.getSingleMetric(name);
  if (existing instanceof client.Counter) return existing;
  return new client.Counter({ name, help, labelNames });
}

export function getHistogram(
  name: string,
  help: string,
  labelNames: string[],
  buckets: number[]
): client.Histogram<string> {
  const existing = client.register.getSingleMetric(name);
  if (existing instanceof client.Histogram) return existing;
  return new client.Histogram({ name, help, labelNames, buckets });
}

export const metricsRegistry = client.register;
