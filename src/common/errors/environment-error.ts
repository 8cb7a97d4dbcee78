import { SystemError } from './system-error';

/**
 * Simulated environment lifecycle errors (codes 4000-4009).
 */
export class EnvironmentError extends SystemError {
  constructor(code: number, message: string) {
    super(code, message, 'error');
  }
}

export const ENVIRONMENT_ERROR_CODES = {
  NOT_INITIALIZED: 4001,
  ALREADY_INITIALIZED: 4002,
} as const;
