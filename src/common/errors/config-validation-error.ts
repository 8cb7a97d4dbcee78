import { SystemError } from './system-error';

/**
 * Thrown when the simulation config file fails validation at startup.
 * Code 4010. Severity: critical, the simulation cannot start without it.
 */
export class ConfigValidationError extends SystemError {
  constructor(message: string, validationErrors: string[]) {
    super(4010, message, 'critical', undefined, { validationErrors });
  }
}
