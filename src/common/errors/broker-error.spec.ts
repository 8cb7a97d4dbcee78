import { describe, it, expect } from 'vitest';
import { BrokerError, BROKER_ERROR_CODES } from './broker-error';
import { SystemError } from './system-error';

describe('BrokerError', () => {
  it('should extend SystemError', () => {
    const error = new BrokerError(
      BROKER_ERROR_CODES.ORDER_NOT_FOUND,
      'test error',
      'error',
    );
    expect(error).toBeInstanceOf(SystemError);
    expect(error).toBeInstanceOf(BrokerError);
  });

  it('should store code, message, severity and metadata', () => {
    const error = new BrokerError(
      BROKER_ERROR_CODES.INSUFFICIENT_BUYING_POWER,
      'Not enough USD buying power',
      'warning',
      undefined,
      { asset: 'USD' },
    );
    expect(error.code).toBe(2004);
    expect(error.message).toBe('Not enough USD buying power');
    expect(error.severity).toBe('warning');
    expect(error.name).toBe('BrokerError');
    expect(error.retryStrategy).toBeUndefined();
    expect(error.metadata).toEqual({ asset: 'USD' });
  });

  it('should keep codes inside the 2000-2099 range', () => {
    for (const code of Object.values(BROKER_ERROR_CODES)) {
      expect(code).toBeGreaterThanOrEqual(2000);
      expect(code).toBeLessThan(2100);
    }
  });
});
