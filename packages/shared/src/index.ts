export type StepName = 'status' | 'config' | 'pull' | 'up';

export interface StepReport {
  name: StepName;
  ok: boolean;
  exit_code: number | null;
  duration_ms: number;
  tail: string;
}

export interface DeployEnvelope {
  ok: boolean;
  stack: string;
  steps: StepReport[];
  started_at: string;
  finished_at: string;
}

export interface ErrorEnvelope {
  ok: false;
  detail: string;
}

export interface HealthStatus {
  status: 'ok';
}
