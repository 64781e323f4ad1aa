import client from 'prom-client';

export const metricsRegistry = new client.Registry();

export const pipelineRunCounter = new client.Counter({
  name: 'telco_churn_pipeline_runs_total',
  help: 'Total pipeline runs by outcome',
  labelNames: ['pipeline', 'status'],
  registers: [metricsRegistry],
});

export const pipelineRunDurationHistogram = new client.Histogram({
  name: 'telco_churn_pipeline_run_duration_seconds',
  help: 'Duration of a whole pipeline run',
  labelNames: ['pipeline'],
  buckets: [10, 30, 60, 120, 300, 600, 1200, 1800],
  registers: [metricsRegistry],
});

export const stageDurationHistogram = new client.Histogram({
  name: 'telco_churn_pipeline_stage_duration_seconds',
  help: 'Duration of a pipeline stage',
  labelNames: ['stage', 'status'],
  buckets: [1, 3, 5, 10, 20, 30, 60, 120, 300, 600],
  registers: [metricsRegistry],
});

export const stageFailureCounter = new client.Counter({
  name: 'telco_churn_pipeline_stage_failures_total',
  help: 'Stage failures by kind',
  labelNames: ['stage', 'kind'],
  registers: [metricsRegistry],
});

export const notificationCounter = new client.Counter({
  name: 'telco_churn_pipeline_notifications_total',
  help: 'Notification dispatches by result',
  labelNames: ['kind', 'result'],
  registers: [metricsRegistry],
});

/** Batch jobs do not live long enough to be scraped, so they push once at the end. */
export const pushMetrics = async (gatewayUrl: string, jobName: string, groupings: Record<string, string>) => {
  const gateway = new client.Pushgateway(gatewayUrl, {}, metricsRegistry);
  await gateway.pushAdd({ jobName, groupings });
};
