import type { AppError } from '../../backend/src/utils/errors.js';
import type { Result } from '../../backend/src/types/index.js';

export function expectOk<T>(result: Result<T, AppError>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${result.error.code}: ${result.error.message}`);
  }
  return result.value;
}

export function expectErr<T>(result: Result<T, AppError>): AppError {
  if (result.ok) {
    throw new Error('Expected failure, got success');
  }
  return result.error;
}
