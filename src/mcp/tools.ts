// This module adapts Azure DevOps client operations into MCP tool handlers with typed argument decoding.

import type { z } from 'zod';
import type { AzureDevOpsClient } from '../azuredevops/client.js';
import { parseResourceUrl } from '../azuredevops/url-parser.js';
import type { CallToolResult, ToolHandler } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';
import type { ToolRegistry } from './tool-registry.js';
import {
  TOOL_NAMES,
  buildToolDescriptor,
  formatArgumentIssues,
  getBuildSchema,
  getReleaseSchema,
  getResourceFromUrlSchema,
  listBuildsSchema,
  listReleasesSchema,
  type ToolName
} from './tool-schemas.js';

// This type narrows the client to what tools call, so tests can supply an in-memory fake.
export type AzureDevOpsToolClient = Pick<
  AzureDevOpsClient,
  'listBuilds' | 'getBuild' | 'getBuildLogs' | 'listReleases' | 'getRelease' | 'getReleaseLogs'
>;

function textResult(text: string): CallToolResult {
  return {
    content: [{ type: 'text', text }]
  };
}

// This helper renders records as indented JSON text blocks.
function jsonResult(payload: unknown): CallToolResult {
  return textResult(JSON.stringify(payload, null, 2));
}

// This helper validates untyped tool arguments and raises a descriptive error on mismatch.
export function decodeArguments<T>(toolName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown): T {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    throw new AppError(400, 'validation_error', formatArgumentIssues(toolName, parsed.error), parsed.error.flatten());
  }

  return parsed.data;
}

// This function builds one handler per tool name bound to the given client.
export function createToolHandlers(client: AzureDevOpsToolClient): Record<ToolName, ToolHandler> {
  return {
    list_builds: async (args) => {
      const input = decodeArguments('list_builds', listBuildsSchema, args);
      return jsonResult(await client.listBuilds(input.project, input.top));
    },

    get_build: async (args) => {
      const input = decodeArguments('get_build', getBuildSchema, args);
      return jsonResult(await client.getBuild(input.project, input.buildId));
    },

    get_build_logs: async (args) => {
      const input = decodeArguments('get_build_logs', getBuildSchema, args);
      return textResult(await client.getBuildLogs(input.project, input.buildId));
    },

    list_releases: async (args) => {
      const input = decodeArguments('list_releases', listReleasesSchema, args);
      return jsonResult(await client.listReleases(input.project, input.top));
    },

    get_release: async (args) => {
      const input = decodeArguments('get_release', getReleaseSchema, args);
      return jsonResult(await client.getRelease(input.project, input.releaseId));
    },

    get_release_logs: async (args) => {
      const input = decodeArguments('get_release_logs', getReleaseSchema, args);
      return textResult(await client.getReleaseLogs(input.project, input.releaseId));
    },

    get_resource_from_url: async (args) => {
      const input = decodeArguments('get_resource_from_url', getResourceFromUrlSchema, args);
      const resource = parseResourceUrl(input.url);

      if (resource.type === 'build') {
        return jsonResult({
          resource,
          build: await client.getBuild(resource.project, resource.id)
        });
      }

      return jsonResult({
        resource,
        release: await client.getRelease(resource.project, resource.id)
      });
    }
  };
}

// This function registers every Azure DevOps tool with its descriptor and handler.
export function registerAzureDevOpsTools(registry: ToolRegistry, client: AzureDevOpsToolClient): void {
  const handlers = createToolHandlers(client);

  for (const name of TOOL_NAMES) {
    registry.register(buildToolDescriptor(name), handlers[name]);
  }
}
