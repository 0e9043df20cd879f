/**
 * MCP server factory
 * Creates and configures the MCP server with all tools, resources, and prompts
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { loadLanguagePolicy } from './catalog/languages.js';
import { NameTypeCatalog } from './catalog/name-types.js';
import type { ServerConfig, SourceMode } from './config/env.js';
import { Converter } from './conversion/converter.js';
import { logger } from './domain/logger.js';
import { wrapTool } from './domain/tool-wrapper.js';
import { GeoJsonFileWriter } from './output/geojson-writer.js';
import { GeoJsonAuxiliarySource } from './sources/aux-source.js';
import { HttpClient } from './sources/http-client.js';
import { MunicipalityRegistry, type CountyListing } from './sources/municipalities.js';
import type { RegistrySource } from './sources/registry-source.js';
import { StaticRegistrySource } from './sources/static-source.js';
import { WfsRegistrySource } from './sources/wfs-source.js';

// Resource imports
import {
  LICENSE_RESOURCE_URI,
  LICENSE_RESOURCE_NAME,
  LICENSE_RESOURCE_DESCRIPTION,
  readLicenseResource,
} from './resources/license.js';
import {
  NAME_TYPES_RESOURCE_URI,
  NAME_TYPES_RESOURCE_NAME,
  NAME_TYPES_RESOURCE_DESCRIPTION,
  readNameTypesResource,
} from './resources/name-types.js';
import {
  METRICS_RESOURCE_URI,
  METRICS_RESOURCE_NAME,
  METRICS_RESOURCE_DESCRIPTION,
  readMetricsResource,
} from './resources/metrics.js';

// Prompt imports
import {
  REVIEW_PLACE_IMPORT_PROMPT_NAME,
  REVIEW_PLACE_IMPORT_PROMPT_DESCRIPTION,
  ReviewPlaceImportArgsShape,
  ReviewPlaceImportArgsSchema,
  getReviewPlaceImportPrompt,
} from './prompts/review-place-import.js';

// Tool imports
import { ConvertPlacesInputSchema, handleConvertPlaces } from './tools/convert-places.js';
import { LookupScopeInputSchema, handleLookupScope } from './tools/lookup-scope.js';
import { DiffNamesInputSchema, handleDiffNames } from './tools/diff-names.js';

/**
 * Create and configure MCP server with all tools, resources, and prompts
 * Returns the configured server (not yet connected to any transport)
 */
export function createMcpServer(config: ServerConfig): McpServer {
  logger.info('Creating MCP server', {
    serverName: config.serverName,
    serverVersion: config.serverVersion,
    sourceMode: config.sourceMode,
  });

  const server = new McpServer(
    {
      name: config.serverName,
      version: config.serverVersion,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
        prompts: {},
      },
    }
  );

  const catalog = NameTypeCatalog.load();
  const languagePolicy = loadLanguagePolicy(config.languagePolicyPath);
  const municipalityClient = new HttpClient(config.municipalityApiUrl, config.httpTimeoutMs);
  const wfsClient = new HttpClient(config.wfsUrl, config.httpTimeoutMs);
  const auxiliary = new GeoJsonAuxiliarySource(config.auxDir);
  const writer = new GeoJsonFileWriter(config.outputDir);

  // The county listing is fetched on first use; a failed fetch is retried on the next call
  let countyListing: CountyListing[] | undefined;

  async function getRegistry(mode: SourceMode): Promise<MunicipalityRegistry> {
    if (!countyListing) {
      countyListing = await MunicipalityRegistry.fetchListing(municipalityClient);
    }
    return MunicipalityRegistry.fromCounties(countyListing, mode === 'wfs');
  }

  async function getRunner(mode: SourceMode): Promise<Converter> {
    const source: RegistrySource =
      mode === 'wfs' ? new WfsRegistrySource(wfsClient) : new StaticRegistrySource(config.extractDir);

    return new Converter({
      catalog,
      registry: await getRegistry(mode),
      source,
      auxiliary,
      writer,
      languagePolicy,
      rankMatchRadiusMeters: config.rankMatchRadiusMeters,
      buildingOffsetMeters: config.buildingOffsetMeters,
    });
  }

  // Register resources
  server.registerResource(
    LICENSE_RESOURCE_NAME,
    LICENSE_RESOURCE_URI,
    {
      description: LICENSE_RESOURCE_DESCRIPTION,
      mimeType: 'text/markdown',
    },
    () => readLicenseResource()
  );

  logger.debug('Registered license resource', { uri: LICENSE_RESOURCE_URI });

  server.registerResource(
    NAME_TYPES_RESOURCE_NAME,
    NAME_TYPES_RESOURCE_URI,
    {
      description: NAME_TYPES_RESOURCE_DESCRIPTION,
      mimeType: 'application/json',
    },
    () => readNameTypesResource(catalog)
  );

  logger.debug('Registered name types resource', { uri: NAME_TYPES_RESOURCE_URI });

  server.registerResource(
    METRICS_RESOURCE_NAME,
    METRICS_RESOURCE_URI,
    {
      description: METRICS_RESOURCE_DESCRIPTION,
      mimeType: 'text/plain',
    },
    () => readMetricsResource()
  );

  logger.debug('Registered metrics resource', { uri: METRICS_RESOURCE_URI });

  // Register tools
  server.registerTool(
    'ssr_convert_places',
    {
      description:
        'Convert place names from the Norwegian central place name register (SSR, Kartverket) into OpenStreetMap-tagged GeoJSON. Scope is a municipality, a county or "Norge"; one file is written per municipality or scope, and the result lists counts, failed units and review issues.',
      inputSchema: ConvertPlacesInputSchema.shape,
    },
    wrapTool('ssr_convert_places', async (args: unknown) => {
      const input = ConvertPlacesInputSchema.parse(args);
      return handleConvertPlaces(input, { defaultMode: config.sourceMode, getRunner });
    })
  );

  logger.debug('Registered convert places tool');

  server.registerTool(
    'ssr_lookup_scope',
    {
      description:
        'Resolve a municipality or county name or code (or "Norge") to its code, name and kind, with the municipalities it covers. Use this to check a scope before converting.',
      inputSchema: LookupScopeInputSchema.shape,
    },
    wrapTool('ssr_lookup_scope', async (args: unknown) => {
      const input = LookupScopeInputSchema.parse(args);
      return handleLookupScope(input, { defaultMode: config.sourceMode, getRegistry });
    })
  );

  logger.debug('Registered lookup scope tool');

  server.registerTool(
    'ssr_diff_names',
    {
      description:
        'Compare the name tags of two converted GeoJSON files, matching places by ssr:stedsnr. Reports changed names and places present in only one of the files.',
      inputSchema: DiffNamesInputSchema.shape,
    },
    wrapTool('ssr_diff_names', async (args: unknown) => {
      const input = DiffNamesInputSchema.parse(args);
      return handleDiffNames(input);
    })
  );

  logger.debug('Registered diff names tool');

  // Register prompts
  server.registerPrompt(
    REVIEW_PLACE_IMPORT_PROMPT_NAME,
    {
      description: REVIEW_PLACE_IMPORT_PROMPT_DESCRIPTION,
      argsSchema: ReviewPlaceImportArgsShape,
    },
    (args: unknown) => getReviewPlaceImportPrompt(ReviewPlaceImportArgsSchema.parse(args))
  );

  logger.debug('Registered review_place_import prompt');

  logger.info('MCP server created successfully', {
    tools: 3,
    resources: 3,
    prompts: 1,
  });

  return server;
}
