import { loadEnv } from '../../config/env-schema';
import { resolveScanOptions } from '../../config/ScanConfig';
import { InvalidArgumentError } from '../../errors';

describe('loadEnv', () => {
  it('should apply defaults', () => {
    expect(loadEnv({})).toEqual({ LOG_LEVEL: 'info' });
  });

  it('should read valid values', () => {
    expect(loadEnv({ LOG_LEVEL: 'trace' })).toEqual({ LOG_LEVEL: 'trace' });
  });

  it('should keep a valid log level when unrelated variables hold other values', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    try {
      expect(loadEnv({ NODE_ENV: 'staging', LOG_LEVEL: 'trace' })).toEqual({ LOG_LEVEL: 'trace' });
      expect(warn).not.toHaveBeenCalled();
    } finally {
      warn.mockRestore();
    }
  });

  it('should warn and fall back to defaults for invalid values', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    try {
      expect(loadEnv({ LOG_LEVEL: 'verbose' })).toEqual({ LOG_LEVEL: 'info' });
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][0]).toContain('LOG_LEVEL');
    } finally {
      warn.mockRestore();
    }
  });
});

describe('resolveScanOptions', () => {
  it('should apply defaults', () => {
    expect(resolveScanOptions()).toEqual({ reverse: false });
  });

  it('should keep valid options', () => {
    expect(resolveScanOptions({ reverse: true, limit: 3 })).toEqual({ reverse: true, limit: 3 });
  });

  it.each([0, -1, 1.5])('should reject limit %p', (limit) => {
    expect(() => resolveScanOptions({ limit })).toThrow(InvalidArgumentError);
  });

  it('should name the offending option', () => {
    expect(() => resolveScanOptions({ limit: 0 })).toThrow(/^Invalid argument "options": limit: /);
  });
});
