export type StoreViolationKind = 'non_monotonic' | 'invalid_sample';

/** append 가 거부된 경우. 시계 또는 어댑터 결함을 의미한다. */
export class StoreViolationError extends Error {
  constructor(
    readonly kind: StoreViolationKind,
    message: string,
  ) {
    super(message);
    this.name = 'StoreViolationError';
  }
}
