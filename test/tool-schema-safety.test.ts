// This test suite verifies tool argument contracts and the JSON schemas advertised for them.

import { describe, expect, it } from 'vitest';
import {
  TOOL_NAMES,
  buildToolDescriptor,
  formatArgumentIssues,
  getBuildSchema,
  getReleaseSchema,
  getResourceFromUrlSchema,
  listBuildsSchema,
  toolSchemas
} from '../src/mcp/tool-schemas.js';

describe('tool schema safety', () => {
  it('declares a schema for every advertised tool name', () => {
    expect(new Set(TOOL_NAMES).size).toBe(TOOL_NAMES.length);
    expect([...TOOL_NAMES].sort()).toEqual(Object.keys(toolSchemas).sort());
  });

  it('defaults list sizes to ten', () => {
    expect(listBuildsSchema.parse({})).toEqual({ top: 10 });
    expect(listBuildsSchema.parse({ top: 3, project: 'Web' })).toEqual({ top: 3, project: 'Web' });
  });

  it('truncates fractional ids toward zero', () => {
    expect(getBuildSchema.parse({ buildId: 7.9 })).toEqual({ buildId: 7 });
    expect(getReleaseSchema.parse({ releaseId: 12.0 })).toEqual({ releaseId: 12 });
  });

  it('rejects ids that are not positive after truncation', () => {
    for (const buildId of [0, -4, 0.5]) {
      const parsed = getBuildSchema.safeParse({ buildId });
      expect(parsed.success).toBe(false);
      if (!parsed.success) {
        expect(parsed.error.issues[0]?.message).toBe('Must be a positive integer');
      }
    }
  });

  it('rejects non-numeric ids instead of coercing them', () => {
    const parsed = getBuildSchema.safeParse({ buildId: '42' });

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(formatArgumentIssues('get_build', parsed.error)).toBe('Invalid arguments for get_build: buildId: Expected an integer');
    }
  });

  it('reports missing required ids by field name', () => {
    const parsed = getReleaseSchema.safeParse({});

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(formatArgumentIssues('get_release', parsed.error)).toBe('Invalid arguments for get_release: releaseId: Required');
    }
  });

  it('rejects blank project overrides and blank urls', () => {
    expect(() => listBuildsSchema.parse({ project: '   ' })).toThrow();
    expect(() => getResourceFromUrlSchema.parse({ url: '' })).toThrow();
  });

  it('advertises inline object schemas without a $schema key', () => {
    for (const name of TOOL_NAMES) {
      const descriptor = buildToolDescriptor(name);
      expect(descriptor.name).toBe(name);
      expect(descriptor.description.length).toBeGreaterThan(0);
      expect(descriptor.inputSchema.type).toBe('object');
      expect(descriptor.inputSchema).not.toHaveProperty('$schema');
    }
  });

  it('marks only ids and urls as required', () => {
    expect(buildToolDescriptor('get_build').inputSchema.required).toEqual(['buildId']);
    expect(buildToolDescriptor('get_release_logs').inputSchema.required).toEqual(['releaseId']);
    expect(buildToolDescriptor('get_resource_from_url').inputSchema.required).toEqual(['url']);
    expect(buildToolDescriptor('list_builds').inputSchema).not.toHaveProperty('required');
  });

  it('exposes project and top as optional properties of list tools', () => {
    const properties = buildToolDescriptor('list_releases').inputSchema.properties;

    expect(properties).toMatchObject({
      top: { type: 'number', default: 10 },
      project: { type: 'string' }
    });
  });
});
