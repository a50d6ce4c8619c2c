import {
  debugLog,
  flagEnabled,
  isEngineDebugEnabled,
  isJestRuntime,
  isTestEnvironment,
  readEnv,
} from '../../src/shared/utils/envFlags';

describe('envFlags helpers', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
    jest.restoreAllMocks();
  });

  it('readEnv reads from process.env when present', () => {
    delete process.env.POLYBLOCK_TEST_FLAG;
    expect(readEnv('POLYBLOCK_TEST_FLAG')).toBeUndefined();

    process.env.POLYBLOCK_TEST_FLAG = 'abc';
    expect(readEnv('POLYBLOCK_TEST_FLAG')).toBe('abc');
  });

  it('flagEnabled returns true only for "1", "true", or "TRUE"', () => {
    for (const [raw, expected] of [
      ['1', true],
      ['true', true],
      ['TRUE', true],
      ['0', false],
      ['false', false],
      ['', false],
    ] as const) {
      process.env.POLYBLOCK_FLAG = raw;
      expect(flagEnabled('POLYBLOCK_FLAG')).toBe(expected);
    }

    delete process.env.POLYBLOCK_FLAG;
    expect(flagEnabled('POLYBLOCK_FLAG')).toBe(false);
  });

  it('isEngineDebugEnabled proxies POLYBLOCK_ENGINE_DEBUG', () => {
    process.env.POLYBLOCK_ENGINE_DEBUG = '1';
    expect(isEngineDebugEnabled()).toBe(true);

    process.env.POLYBLOCK_ENGINE_DEBUG = '0';
    expect(isEngineDebugEnabled()).toBe(false);
  });

  it('detects the test environment and the Jest runtime', () => {
    expect(isTestEnvironment()).toBe(true);
    expect(isJestRuntime()).toBe(true);

    process.env.NODE_ENV = 'production';
    expect(isTestEnvironment()).toBe(false);
    delete process.env.JEST_WORKER_ID;
    expect(isJestRuntime()).toBe(false);
  });

  it('debugLog writes only when the condition holds', () => {
    const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    debugLog(false, 'hidden');
    expect(spy).not.toHaveBeenCalled();
    debugLog(true, 'shown', { n: 1 });
    expect(spy).toHaveBeenCalledWith('shown', { n: 1 });
  });
});
