export type FailureKind =
  | 'unauthorized'
  | 'bad_request'
  | 'not_found'
  | 'conflict'
  | 'too_many_requests'
  | 'internal';

export interface Failure {
  kind: FailureKind;
  detail: string;
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; failure: Failure };

const STATUS_BY_KIND: Record<FailureKind, number> = {
  unauthorized: 401,
  bad_request: 400,
  not_found: 404,
  conflict: 409,
  too_many_requests: 429,
  internal: 500,
};

export const succeed = <T>(value: T): Outcome<T> => ({ ok: true, value });

export const fail = <T = never>(kind: FailureKind, detail: string): Outcome<T> => ({
  ok: false,
  failure: { kind, detail },
});

export const statusForFailure = (failure: Failure): number => STATUS_BY_KIND[failure.kind];
