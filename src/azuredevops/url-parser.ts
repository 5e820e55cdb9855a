// This module extracts build or release references from Azure DevOps web UI deep links.

import type { ParsedResource, ResourceType } from '../types/domain.js';
import { AppError } from '../utils/errors.js';

interface ResourceRoute {
  type: ResourceType;
  marker: string;
  idParam: string;
}

// Build links look like .../{project}/_build/results?buildId=N, release links like .../{project}/_release?releaseId=N.
const RESOURCE_ROUTES: ResourceRoute[] = [
  { type: 'build', marker: '/_build', idParam: 'buildId' },
  { type: 'release', marker: '/_release', idParam: 'releaseId' }
];

function parseIntegerParam(value: string | null): number | null {
  if (value === null || !/^[+-]?\d+$/.test(value.trim())) {
    return null;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

// This helper takes the path segment right before the marker and URL-decodes it as the project name.
function projectBefore(pathname: string, marker: string): string {
  const prefix = pathname.slice(0, pathname.indexOf(marker)).replace(/\/+$/, '');
  const segments = prefix.split('/');
  const raw = segments[segments.length - 1] ?? '';

  try {
    return decodeURIComponent(raw.replace(/\+/g, ' '));
  } catch {
    return raw;
  }
}

export function parseResourceUrl(rawUrl: string): ParsedResource {
  let url: URL;
  try {
    url = new URL(rawUrl.trim());
  } catch {
    throw new AppError(400, 'validation_error', `Invalid URL: ${rawUrl}`);
  }

  for (const route of RESOURCE_ROUTES) {
    if (!url.pathname.includes(route.marker)) {
      continue;
    }

    const id = parseIntegerParam(url.searchParams.get(route.idParam));
    if (id === null) {
      continue;
    }

    return {
      type: route.type,
      project: projectBefore(url.pathname, route.marker),
      id
    };
  }

  throw new AppError(400, 'validation_error', 'Could not parse build or release info from URL.');
}
