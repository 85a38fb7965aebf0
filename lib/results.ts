export type PointErrorCode =
  | 'DuplicateInstance'
  | 'NotFound'
  | 'InvalidPriority'
  | 'TypeMismatch'
  | 'ReadOnly'
  | 'InvalidDefinition';

export interface PointSuccess<T> {
  ok: true;
  value: T;
}

export interface PointFailure {
  ok: false;
  error: PointErrorCode;
  message: string;
}

export type PointResult<T> = PointSuccess<T> | PointFailure;

export function success<T>(value: T): PointSuccess<T> {
  return { ok: true, value };
}

export function failure(error: PointErrorCode, message: string): PointFailure {
  return { ok: false, error, message };
}
