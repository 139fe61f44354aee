import { describe, it, expect } from 'vitest';
import { ConfigError, validateConfig } from '../../index';

function issuesOf(input: unknown): string[] {
  try {
    validateConfig(input);
  } catch (e) {
    if (e instanceof ConfigError) {
      return e.issues;
    }
    throw e;
  }
  return [];
}

describe('validateConfig', () => {
  it('fills in defaults', () => {
    expect(validateConfig()).toEqual({
      appName: 'partition-bridge',
      serializer: 'marshal',
      batchSize: 1024,
      staging: 'file',
      parallelizeStrategy: 'inplace',
      callSite: 'TypeScript',
      engine: { showProgress: false },
    });
  });

  it('keeps given values', () => {
    const config = validateConfig({
      serializer: 'json',
      batchSize: 8,
      engine: { workerCount: 3, localDir: '/tmp/scratch' },
    });

    expect(config.serializer).toBe('json');
    expect(config.batchSize).toBe(8);
    expect(config.engine).toEqual({
      workerCount: 3,
      showProgress: false,
      localDir: '/tmp/scratch',
    });
  });

  it('freezes the result', () => {
    const config = validateConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.engine)).toBe(true);
  });

  it('rejects a batch size below 1', () => {
    const issues = issuesOf({ batchSize: 0 });

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^batchSize: /);
  });

  it('refuses pair as the default serializer', () => {
    expect(issuesOf({ serializer: 'pair' })).toEqual([
      'serializer: pair needs key and value serializers, it cannot be the default',
    ]);
  });

  it('rejects unknown serializers and keys', () => {
    expect(issuesOf({ serializer: 'yaml' })[0]).toMatch(/^serializer: /);
    expect(issuesOf({ engine: { workerCount: 0 } })[0]).toMatch(
      /^engine\.workerCount: /,
    );
    expect(issuesOf({ batch_size: 10 })[0]).toMatch(/^\(root\): /);
  });

  it('keeps the app name usable as a file name prefix', () => {
    expect(validateConfig({ appName: 'etl-job_2.v1' }).appName).toBe(
      'etl-job_2.v1',
    );
    expect(issuesOf({ appName: 'a/b' })).toEqual([
      'appName: may only contain letters, digits, _, . and -',
    ]);
    expect(issuesOf({ appName: '' })).toHaveLength(1);
  });

  it('reports every issue at once', () => {
    expect(issuesOf({ batchSize: 1.5, staging: 'ftp' })).toHaveLength(2);
  });
});
