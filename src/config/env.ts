/**
 * Configuration management for the Stedsnavn OSM server
 * Loads and validates environment variables
 */

import { isLogLevel, type LogLevel } from '../domain/logger.js';

export type SourceMode = 'static' | 'wfs';

export interface ServerConfig {
  // Registry sources
  sourceMode: SourceMode;
  extractDir: string;
  wfsUrl: string;
  municipalityApiUrl: string;
  httpTimeoutMs: number;

  // Auxiliary datasets and output
  auxDir: string;
  outputDir: string;

  // Conversion tuning
  rankMatchRadiusMeters: number;
  buildingOffsetMeters: number;
  languagePolicyPath?: string;

  // Server
  /** HTTP transport port; stdio when unset */
  port?: number;
  logLevel: LogLevel;
  serverName: string;
  serverVersion: string;
}

const DEFAULT_WFS_URL = 'https://wfs.geonorge.no/skwms1/wfs.stedsnavn';
const DEFAULT_MUNICIPALITY_API_URL = 'https://ws.geonorge.no/kommuneinfo/v1';

function parseUrl(name: string, value: string): string {
  try {
    new URL(value);
  } catch {
    throw new Error(`Invalid ${name}: ${value}`);
  }
  return value;
}

function parsePort(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid SSR_MCP_PORT: ${value}`);
  }
  return port;
}

function parsePositive(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name}: ${value} (expected a positive number)`);
  }
  return parsed;
}

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const logLevel = env.SSR_LOG_LEVEL || 'info';
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid SSR_LOG_LEVEL: ${logLevel}`);
  }

  const sourceMode = env.SSR_SOURCE_MODE || 'static';
  if (sourceMode !== 'static' && sourceMode !== 'wfs') {
    throw new Error(`Invalid SSR_SOURCE_MODE: ${sourceMode} (expected static or wfs)`);
  }

  return {
    sourceMode,
    extractDir: env.SSR_EXTRACT_DIR || './data/extracts',
    wfsUrl: parseUrl('SSR_WFS_URL', env.SSR_WFS_URL || DEFAULT_WFS_URL),
    municipalityApiUrl: parseUrl(
      'SSR_MUNICIPALITY_API_URL',
      env.SSR_MUNICIPALITY_API_URL || DEFAULT_MUNICIPALITY_API_URL
    ),
    httpTimeoutMs: parsePositive('SSR_HTTP_TIMEOUT_MS', env.SSR_HTTP_TIMEOUT_MS, 60000),
    auxDir: env.SSR_AUX_DIR || './data/aux',
    outputDir: env.SSR_OUTPUT_DIR || './output',
    rankMatchRadiusMeters: parsePositive('SSR_RANK_MATCH_RADIUS_M', env.SSR_RANK_MATCH_RADIUS_M, 1000),
    buildingOffsetMeters: parsePositive('SSR_BUILDING_OFFSET_M', env.SSR_BUILDING_OFFSET_M, 2),
    languagePolicyPath: env.SSR_LANGUAGE_POLICY || undefined,
    port: parsePort(env.SSR_MCP_PORT),
    logLevel,
    serverName: 'stedsnavn-osm',
    serverVersion: '0.1.0',
  };
}

// Singleton config instance
let configInstance: ServerConfig | null = null;

/**
 * Get the current configuration (loads on first call)
 */
export function getConfig(): ServerConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}
