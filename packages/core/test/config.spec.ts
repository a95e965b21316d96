/* packages/core/test/config.spec.ts */
import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../src';

function configError(env: NodeJS.ProcessEnv): ConfigError {
  try {
    loadConfig(env);
  } catch (e) {
    if (e instanceof ConfigError) return e;
    throw e;
  }
  throw new Error('expected loadConfig to reject the environment');
}

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      modelLayer: 'table',
      includeMeta: false,
      checkBounds: false,
      timeout: 30,
      logLevel: 'info'
    });
  });

  it('reads every knob from the environment', () => {
    expect(loadConfig({
      GRAPHFLOW_MODEL_LAYER: 'live',
      GRAPHFLOW_INCLUDE_META: 'YES',
      GRAPHFLOW_CHECK_BOUNDS: ' 0 ',
      GRAPHFLOW_SERVER_URL: 'http://127.0.0.1:8188',
      GRAPHFLOW_TIMEOUT_S: '12',
      LOG_LEVEL: 'debug'
    })).toEqual({
      modelLayer: 'live',
      includeMeta: true,
      checkBounds: false,
      serverUrl: 'http://127.0.0.1:8188',
      timeout: 12,
      logLevel: 'debug'
    });
  });

  it('treats empty variables as unset', () => {
    const cfg = loadConfig({ GRAPHFLOW_MODEL_LAYER: '', GRAPHFLOW_TIMEOUT_S: '  ', GRAPHFLOW_SERVER_URL: '' });
    expect(cfg.modelLayer).toBe('table');
    expect(cfg.timeout).toBe(30);
    expect(cfg.serverUrl).toBeUndefined();
  });

  it('rejects invalid values with per-variable details', () => {
    const err = configError({ GRAPHFLOW_MODEL_LAYER: 'cached', GRAPHFLOW_TIMEOUT_S: 'soon' });
    expect(err.code).toBe('CONFIG_INVALID');
    expect(err.message).toBe('Invalid graphflow configuration');
    expect(err.details.map(d => d.path)).toEqual(['GRAPHFLOW_MODEL_LAYER', 'GRAPHFLOW_TIMEOUT_S']);
  });

  it('rejects unknown boolean spellings', () => {
    expect(configError({ GRAPHFLOW_INCLUDE_META: 'maybe' }).details[0]).toEqual({
      path: 'GRAPHFLOW_INCLUDE_META',
      msg: 'expected a boolean flag'
    });
  });
});
