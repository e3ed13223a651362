import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export interface AnonymizeRunMetrics {
  policy: string;
  overlapStrategy: string;
  /** Entity types of the emitted placeholders, one entry per placeholder. */
  entityTypes: string[];
  durationMs: number;
}

const registry = new Registry();
collectDefaultMetrics({ register: registry });

const anonymizeCounter = new Counter({
  name: 'pii_veil_anonymize_total',
  help: 'Number of anonymize calls',
  labelNames: ['policy', 'overlap_strategy'],
  registers: [registry],
});

const entityCounter = new Counter({
  name: 'pii_veil_entities_replaced_total',
  help: 'Number of values replaced with placeholders',
  labelNames: ['policy', 'entity_type'],
  registers: [registry],
});

const anonymizeDuration = new Histogram({
  name: 'pii_veil_anonymize_duration_seconds',
  help: 'Duration of anonymize calls in seconds',
  labelNames: ['policy'],
  buckets: [0.0005, 0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1],
  registers: [registry],
});

const deanonymizeCounter = new Counter({
  name: 'pii_veil_deanonymize_total',
  help: 'Number of deanonymize calls',
  registers: [registry],
});

export function recordAnonymizeMetrics(metrics: AnonymizeRunMetrics): void {
  anonymizeCounter.inc({ policy: metrics.policy, overlap_strategy: metrics.overlapStrategy });
  anonymizeDuration.observe({ policy: metrics.policy }, metrics.durationMs / 1000);
  for (const entityType of metrics.entityTypes) {
    entityCounter.inc({ policy: metrics.policy, entity_type: entityType });
  }
}

export function recordDeanonymizeMetrics(): void {
  deanonymizeCounter.inc();
}

export function metricsContentType(): string {
  return registry.contentType;
}

export async function getMetricsSnapshot(): Promise<string> {
  return registry.metrics();
}
