#!/usr/bin/env node
import { pathToFileURL } from 'url';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolRequest,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import config from './utils/config.js';
import logger from './utils/logger.js';
import { PhotoCatalogMCPCore, type PhotoCatalogMCPDependencies } from './mcp/core.js';

/**
 * Photo catalog MCP server on STDIO, with a timeout around every tool call.
 * Logs go to stderr; stdout carries the protocol.
 */
export class PhotoCatalogStdioServer extends PhotoCatalogMCPCore {
  private readonly toolTimeoutMs: number;

  constructor(dependencies: PhotoCatalogMCPDependencies = {}, toolTimeoutMs: number = config.mcp.toolTimeoutMs) {
    super({ name: config.mcp.name, version: config.mcp.version }, dependencies);
    this.toolTimeoutMs = toolTimeoutMs;
  }

  /**
   * Overrides parent to wrap the CallToolRequest handler in a timeout.
   */
  protected registerHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, this.handleListTools.bind(this));
    this.server.setRequestHandler(CallToolRequestSchema, (request: CallToolRequest) => this.callWithTimeout(request));
  }

  private async callWithTimeout(request: CallToolRequest): Promise<CallToolResult> {
    const timeoutMs = this.toolTimeoutMs;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new McpError(ErrorCode.InternalError, `Tool execution timeout after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      return await Promise.race([this.handleCallTool(request), timeout]);
    } catch (error) {
      logger.error(`Tool ${request.params.name} failed: ${error instanceof Error ? error.message : String(error)}`);

      if (error instanceof McpError) {
        throw error;
      }
      throw new McpError(
        ErrorCode.InternalError,
        `Failed to execute tool: ${error instanceof Error ? error.message : String(error)}`
      );
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Connects the server to STDIO.
   */
  async start(): Promise<void> {
    logger.info('Starting photo catalog MCP server in STDIO mode');
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    logger.info('Photo catalog MCP server running on stdio');
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.on('uncaughtException', error => {
    logger.error(`Uncaught exception: ${error.stack ?? error.message}`);
    process.exit(1);
  });

  process.on('unhandledRejection', reason => {
    logger.error(`Unhandled rejection: ${String(reason)}`);
    process.exit(1);
  });

  new PhotoCatalogStdioServer().start().catch((error: unknown) => {
    logger.error(`Failed to start server: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
}
