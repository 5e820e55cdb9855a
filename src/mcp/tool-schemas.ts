// This module defines tool argument contracts and derives the JSON schemas advertised by tools/list.

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { McpTool } from '../types/mcp.js';

// JSON numbers may arrive as floats; ids and counts are truncated to integers.
function integerArg(description: string) {
  return z
    .number({ invalid_type_error: 'Expected an integer' })
    .finite()
    .transform((value) => Math.trunc(value))
    .refine((value) => value > 0, { message: 'Must be a positive integer' })
    .describe(description);
}

const projectArg = z
  .string()
  .trim()
  .min(1)
  .optional()
  .describe('Project name (optional, overrides default)');

export const listBuildsSchema = z.object({
  top: integerArg('Number of builds to retrieve (default 10)').default(10),
  project: projectArg
});

export const getBuildSchema = z.object({
  buildId: integerArg('ID of the build'),
  project: projectArg
});

export const listReleasesSchema = z.object({
  top: integerArg('Number of releases to retrieve (default 10)').default(10),
  project: projectArg
});

export const getReleaseSchema = z.object({
  releaseId: integerArg('ID of the release'),
  project: projectArg
});

export const getResourceFromUrlSchema = z.object({
  url: z.string().trim().min(1).describe('Azure DevOps build or release URL copied from the browser')
});

export const toolSchemas = {
  list_builds: listBuildsSchema,
  get_build: getBuildSchema,
  get_build_logs: getBuildSchema,
  list_releases: listReleasesSchema,
  get_release: getReleaseSchema,
  get_release_logs: getReleaseSchema,
  get_resource_from_url: getResourceFromUrlSchema
} as const;

export type ToolName = keyof typeof toolSchemas;

export const TOOL_NAMES: readonly ToolName[] = [
  'list_builds',
  'get_build',
  'get_build_logs',
  'list_releases',
  'get_release',
  'get_release_logs',
  'get_resource_from_url'
];

export const toolDescriptions: Record<ToolName, string> = {
  list_builds: 'List recent builds',
  get_build: 'Get build details',
  get_build_logs: 'Get build logs',
  list_releases: 'List recent releases',
  get_release: 'Get release details',
  get_release_logs: 'Get release logs',
  get_resource_from_url: 'Resolve an Azure DevOps build or release link and return its details'
};

// This helper renders one tool descriptor with an inline JSON schema of the accepted arguments.
export function buildToolDescriptor(name: ToolName): McpTool {
  const generated = zodToJsonSchema(toolSchemas[name], {
    $refStrategy: 'none'
  });
  const inputSchema = Object.fromEntries(Object.entries(generated).filter(([key]) => key !== '$schema'));

  return {
    name,
    description: toolDescriptions[name],
    inputSchema
  };
}

// This helper formats zod issues as one readable line per field for tool-level error text.
export function formatArgumentIssues(toolName: string, error: z.ZodError): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'arguments';
    return `${path}: ${issue.message}`;
  });

  return `Invalid arguments for ${toolName}: ${issues.join('; ')}`;
}
