import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolRequest,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import config from '../utils/config.js';
import logger from '../utils/logger.js';
import { validateArgs } from '../utils/validation.js';
import {
  buildCatalogSchema,
  measureMotionSchema,
  reverseGeocodeSchema,
} from '../schemas/toolSchemas.js';
import { AnchorCache } from '../geo/anchorCache.js';
import { GeocodeResolver } from '../geo/geocodeResolver.js';
import { NominatimClient, type ReverseGeocoder } from '../geo/nominatimClient.js';
import { buildPhotoCatalog } from '../catalog/buildCatalog.js';
import type { MetadataProvider } from '../catalog/metadataProvider.js';
import { computeMotion } from '../catalog/motion.js';
import { formatUtcOffset, parseExifTimestamp, parseUtcOffset } from '../catalog/timezone.js';
import type { CaptureTime } from '../catalog/types.js';

/**
 * Collaborators the tools run against. Defaults talk to Nominatim and read
 * EXIF from disk.
 */
export interface PhotoCatalogMCPDependencies {
  geocoder?: ReverseGeocoder;
  metadata?: MetadataProvider;
}

function textResult(payload: unknown): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
  };
}

/**
 * Core MCP server implementation: tool definitions and handlers.
 * Transports are attached by subclasses.
 */
export class PhotoCatalogMCPCore {
  protected server: Server;
  private readonly geocoder: ReverseGeocoder;
  private readonly metadata?: MetadataProvider;
  /** Anchors shared by reverse_geocode calls for the life of the server */
  private readonly sessionResolver: GeocodeResolver;

  constructor(serverInfo: { name: string; version: string }, dependencies: PhotoCatalogMCPDependencies = {}) {
    this.server = new Server(serverInfo, {
      capabilities: {
        tools: {},
      },
    });

    this.geocoder = dependencies.geocoder ?? new NominatimClient();
    this.metadata = dependencies.metadata;
    this.sessionResolver = new GeocodeResolver(new AnchorCache(config.catalog.radiusMiles), this.geocoder);

    this.registerHandlers();
  }

  /**
   * Registers MCP request handlers
   * Protected to allow subclasses to customize handler registration
   */
  protected registerHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, this.handleListTools.bind(this));
    this.server.setRequestHandler(CallToolRequestSchema, this.handleCallTool.bind(this));
  }

  /**
   * Returns tool definitions
   */
  protected async handleListTools() {
    return {
      tools: [
        {
          name: 'build_photo_catalog',
          description:
            'Scan a folder of JPG photos, resolve a place for each from GPS (reusing nearby results), ' +
            'infer missing GPS from photos taken close in time, and write a CSV catalog',
          inputSchema: {
            type: 'object' as const,
            properties: {
              src: { type: 'string', description: 'Folder scanned recursively for JPG/JPEG files' },
              out: { type: 'string', description: 'Path of the CSV catalog to write' },
              radiusMiles: {
                type: 'number',
                description: `Reuse a resolved place within this many miles (default: ${config.catalog.radiusMiles})`,
              },
              cacheFile: { type: 'string', description: 'Anchor cache file kept between runs' },
              windowMinutes: {
                type: 'number',
                description: `Maximum time gap for GPS inference (default: ${config.catalog.inferenceWindowMinutes})`,
              },
              limit: { type: 'number', description: 'Only catalog the first N photos by capture time' },
              nearest: { type: 'boolean', description: 'Pick the nearest cached place instead of the first found' },
              resolveInferredPlaces: {
                type: 'boolean',
                description: 'Resolve places for inferred coordinates (default: true)',
              },
            },
            required: ['src', 'out'],
          },
        },
        {
          name: 'reverse_geocode',
          description: 'Resolve a coordinate to city, neighborhood, county, state and country code',
          inputSchema: {
            type: 'object' as const,
            properties: {
              latitude: { type: 'number', description: 'Latitude in decimal degrees' },
              longitude: { type: 'number', description: 'Longitude in decimal degrees' },
            },
            required: ['latitude', 'longitude'],
          },
        },
        {
          name: 'measure_motion',
          description: 'Distance, elapsed time and speed between two timestamped coordinates',
          inputSchema: {
            type: 'object' as const,
            properties: {
              from: { type: 'object', description: '{ latitude, longitude, timestamp, offset? }' },
              to: { type: 'object', description: '{ latitude, longitude, timestamp, offset? }' },
            },
            required: ['from', 'to'],
          },
        },
      ],
    };
  }

  /**
   * Handles tool execution requests
   */
  protected async handleCallTool(request: CallToolRequest): Promise<CallToolResult> {
    logger.info(`Handling tool request: ${request.params.name}`);

    switch (request.params.name) {
      case 'build_photo_catalog':
        return this.handleBuildCatalog(request);

      case 'reverse_geocode':
        return this.handleReverseGeocode(request);

      case 'measure_motion':
        return this.handleMeasureMotion(request);

      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${request.params.name}`);
    }
  }

  private async handleBuildCatalog(request: CallToolRequest): Promise<CallToolResult> {
    const args = validateArgs(request.params.arguments, buildCatalogSchema);

    const { stats } = await buildPhotoCatalog({
      src: args.src,
      out: args.out,
      radiusMiles: args.radiusMiles,
      cacheFile: args.cacheFile,
      windowMinutes: args.windowMinutes,
      limit: args.limit,
      strategy: args.nearest ? 'nearest' : 'first',
      resolveInferredPlaces: args.resolveInferredPlaces,
      geocoder: this.geocoder,
      metadata: this.metadata,
    });

    return textResult({ out: args.out, stats });
  }

  private async handleReverseGeocode(request: CallToolRequest): Promise<CallToolResult> {
    const coordinate = validateArgs(request.params.arguments, reverseGeocodeSchema);
    const outcome = await this.sessionResolver.resolve(coordinate);

    return textResult({
      latitude: coordinate.latitude,
      longitude: coordinate.longitude,
      status: outcome.status,
      place: outcome.place,
      ...(outcome.status === 'lookup-failed' ? { error: outcome.error.message } : {}),
    });
  }

  private async handleMeasureMotion(request: CallToolRequest): Promise<CallToolResult> {
    const args = validateArgs(request.params.arguments, measureMotionSchema);

    const toCaptureTime = (point: { timestamp: string; offset?: string }, label: string): CaptureTime => {
      const parsed = parseExifTimestamp(point.timestamp);
      if (!parsed) {
        throw new McpError(ErrorCode.InvalidParams, `Invalid parameters: ${label}.timestamp: unrecognized format`);
      }
      const offsetMinutes = point.offset === undefined ? parsed.embeddedOffsetMinutes : parseUtcOffset(point.offset);
      if (point.offset !== undefined && offsetMinutes === undefined) {
        throw new McpError(ErrorCode.InvalidParams, `Invalid parameters: ${label}.offset: expected ±HH:MM`);
      }
      return offsetMinutes === undefined
        ? { wallClockMs: parsed.wallClockMs, source: 'metadata' }
        : {
            wallClockMs: parsed.wallClockMs,
            offsetMinutes,
            utcOffset: formatUtcOffset(offsetMinutes),
            source: 'metadata',
          };
    };

    const motion = computeMotion(
      { coordinate: args.from, captureTime: toCaptureTime(args.from, 'from') },
      { coordinate: args.to, captureTime: toCaptureTime(args.to, 'to') }
    );

    return textResult(motion);
  }

  /**
   * Gets the MCP server instance
   */
  getServer(): Server {
    return this.server;
  }
}
