// This test suite verifies extraction of build and release references from Azure DevOps web links.

import { describe, expect, it } from 'vitest';
import { parseResourceUrl } from '../src/azuredevops/url-parser.js';
import { AppError } from '../src/utils/errors.js';

describe('resource url parser', () => {
  it('parses a build results link', () => {
    expect(parseResourceUrl('https://devops.example.com/tfs/Collection/Platform/_build/results?buildId=1234&view=logs')).toEqual({
      type: 'build',
      project: 'Platform',
      id: 1234
    });
  });

  it('parses a release link', () => {
    expect(parseResourceUrl('https://devops.example.com/tfs/Platform/_release?releaseId=88&_a=release-summary')).toEqual({
      type: 'release',
      project: 'Platform',
      id: 88
    });
  });

  it('decodes encoded and plus-separated project names', () => {
    expect(parseResourceUrl('https://devops.example.com/Web%20Shop/_build/results?buildId=3').project).toBe('Web Shop');
    expect(parseResourceUrl('https://devops.example.com/Web+Shop/_release?releaseId=4').project).toBe('Web Shop');
  });

  it('requires the id parameter that matches the path marker', () => {
    expect(() => parseResourceUrl('https://devops.example.com/Ops/_build/results?releaseId=5')).toThrowError(
      'Could not parse build or release info from URL.'
    );
  });

  it('rejects links without a recognizable resource', () => {
    expect(() => parseResourceUrl('https://devops.example.com/Platform/_git/repo')).toThrowError(
      'Could not parse build or release info from URL.'
    );
    expect(() => parseResourceUrl('https://devops.example.com/Platform/_build/results?buildId=')).toThrowError(
      'Could not parse build or release info from URL.'
    );
    expect(() => parseResourceUrl('https://devops.example.com/Platform/_build/results?buildId=1.5')).toThrowError(
      'Could not parse build or release info from URL.'
    );
  });

  it('rejects strings that are not urls', () => {
    let caught: unknown;
    try {
      parseResourceUrl('not a url');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AppError);
    expect(caught).toMatchObject({ statusCode: 400, code: 'validation_error', message: 'Invalid URL: not a url' });
  });
});
