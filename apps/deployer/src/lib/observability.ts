import client from 'prom-client';

client.collectDefaultMetrics({ prefix: 'stackhook_' });

const requestDuration = new client.Histogram({
  name: 'stackhook_http_duration_seconds',
  help: 'HTTP request duration',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.005, 0.01, 0.03, 0.06, 0.1, 0.2, 0.5, 1, 2, 5, 30, 120, 600],
});

const requestCounter = new client.Counter({
  name: 'stackhook_http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'route', 'status_code'],
});

const stepDuration = new client.Histogram({
  name: 'stackhook_step_duration_seconds',
  help: 'Duration of deployment steps',
  labelNames: ['step', 'ok'],
  buckets: [0.1, 0.5, 1, 5, 15, 30, 60, 120, 300, 600],
});

const deploymentCounter = new client.Counter({
  name: 'stackhook_deployments_total',
  help: 'Deployments by outcome',
  labelNames: ['result'],
});

const rejectedAdmissions = new client.Counter({
  name: 'stackhook_rate_limited_total',
  help: 'Requests rejected by the rate limiter',
});

export const metricsRegistry = client.register;

export const instrumentHttpRequest = (input: {
  method: string;
  route: string;
  statusCode: number;
  durationSeconds: number;
}) => {
  const labels = {
    method: input.method,
    route: input.route,
    status_code: String(input.statusCode),
  };

  requestDuration.observe(labels, input.durationSeconds);
  requestCounter.inc(labels, 1);
};

export const recordStep = (input: { step: string; ok: boolean; durationMs: number }) => {
  stepDuration.observe({ step: input.step, ok: String(input.ok) }, input.durationMs / 1000);
};

export const recordDeployment = (result: 'succeeded' | 'failed' | 'rejected') => {
  deploymentCounter.inc({ result }, 1);
};

export const recordRateLimited = () => {
  rejectedAdmissions.inc(1);
};
