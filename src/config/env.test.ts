/**
 * Unit tests for configuration loading
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from './env.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.sourceMode).toBe('static');
    expect(config.extractDir).toBe('./data/extracts');
    expect(config.auxDir).toBe('./data/aux');
    expect(config.outputDir).toBe('./output');
    expect(config.httpTimeoutMs).toBe(60000);
    expect(config.rankMatchRadiusMeters).toBe(1000);
    expect(config.buildingOffsetMeters).toBe(2);
    expect(config.logLevel).toBe('info');
    expect(config.languagePolicyPath).toBeUndefined();
    expect(config.port).toBeUndefined();
    expect(config.wfsUrl).toBe('https://wfs.geonorge.no/skwms1/wfs.stedsnavn');
  });

  it('should read overrides', () => {
    const config = loadConfig({
      SSR_SOURCE_MODE: 'wfs',
      SSR_LOG_LEVEL: 'debug',
      SSR_RANK_MATCH_RADIUS_M: '250',
      SSR_BUILDING_OFFSET_M: '0.5',
      SSR_LANGUAGE_POLICY: './policy.json',
      SSR_OUTPUT_DIR: '/tmp/out',
    });

    expect(config.sourceMode).toBe('wfs');
    expect(config.logLevel).toBe('debug');
    expect(config.rankMatchRadiusMeters).toBe(250);
    expect(config.buildingOffsetMeters).toBe(0.5);
    expect(config.languagePolicyPath).toBe('./policy.json');
    expect(config.outputDir).toBe('/tmp/out');
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ SSR_LOG_LEVEL: 'verbose' })).toThrow('Invalid SSR_LOG_LEVEL: verbose');
  });

  it('should reject an unknown source mode', () => {
    expect(() => loadConfig({ SSR_SOURCE_MODE: 'ftp' })).toThrow(
      'Invalid SSR_SOURCE_MODE: ftp (expected static or wfs)'
    );
  });

  it('should reject non-positive numbers', () => {
    expect(() => loadConfig({ SSR_BUILDING_OFFSET_M: '-1' })).toThrow(
      'Invalid SSR_BUILDING_OFFSET_M: -1 (expected a positive number)'
    );
    expect(() => loadConfig({ SSR_HTTP_TIMEOUT_MS: 'soon' })).toThrow('Invalid SSR_HTTP_TIMEOUT_MS: soon');
  });

  it('should read the HTTP port and reject an invalid one', () => {
    expect(loadConfig({ SSR_MCP_PORT: '3000' }).port).toBe(3000);
    expect(() => loadConfig({ SSR_MCP_PORT: '70000' })).toThrow('Invalid SSR_MCP_PORT: 70000');
  });

  it('should reject a malformed WFS URL', () => {
    expect(() => loadConfig({ SSR_WFS_URL: 'not a url' })).toThrow('Invalid SSR_WFS_URL: not a url');
  });
});
