// This module provides shared fakes for protocol, transport, and tool tests.

import type { FastifyBaseLogger } from 'fastify';
import pino from 'pino';
import { vi } from 'vitest';
import type { AzureDevOpsToolClient } from '../../src/mcp/tools.js';
import type { AzureDevOpsSettings, Build, Release, TransportSettings } from '../../src/types/domain.js';

export function silentLogger(): FastifyBaseLogger {
  return pino({ level: 'silent' });
}

export const testTransport: TransportSettings = {
  sessionQueueCapacity: 10,
  keepAliveMs: 0
};

export const testAzureDevOps: AzureDevOpsSettings = {
  baseUrl: 'https://devops.example.com/tfs/',
  organization: undefined,
  project: 'Platform',
  releaseBaseUrl: undefined,
  token: 'test-token',
  requestTimeoutMs: 5_000,
  maxRetries: 0,
  retryBaseDelayMs: 0
};

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

// This helper exposes resolve/reject of a promise so tests control when slow work finishes.
export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((onResolve, onReject) => {
    resolve = onResolve;
    reject = onReject;
  });

  return { promise, resolve, reject };
}

// This helper returns an in-memory client whose methods can be inspected and overridden per test.
export function fakeAzureDevOpsClient(overrides: Partial<AzureDevOpsToolClient> = {}) {
  return {
    listBuilds: vi.fn<AzureDevOpsToolClient['listBuilds']>(overrides.listBuilds ?? (async () => [])),
    getBuild: vi.fn<AzureDevOpsToolClient['getBuild']>(
      overrides.getBuild ?? (async (_project, buildId) => sampleBuild(buildId))
    ),
    getBuildLogs: vi.fn<AzureDevOpsToolClient['getBuildLogs']>(overrides.getBuildLogs ?? (async () => '')),
    listReleases: vi.fn<AzureDevOpsToolClient['listReleases']>(overrides.listReleases ?? (async () => [])),
    getRelease: vi.fn<AzureDevOpsToolClient['getRelease']>(
      overrides.getRelease ?? (async (_project, releaseId) => sampleRelease(releaseId))
    ),
    getReleaseLogs: vi.fn<AzureDevOpsToolClient['getReleaseLogs']>(overrides.getReleaseLogs ?? (async () => ''))
  };
}

export function sampleBuild(id: number): Build {
  return {
    id,
    buildNumber: `20260101.${id}`,
    status: 'completed',
    result: 'succeeded',
    startTime: '2026-01-01T10:00:00Z',
    finishTime: '2026-01-01T10:05:00Z',
    url: `https://devops.example.com/tfs/Platform/_apis/build/Builds/${id}`,
    definition: { name: 'ci-main' }
  };
}

export function sampleRelease(id: number): Release {
  return {
    id,
    name: `Release-${id}`,
    status: 'active',
    createdOn: '2026-01-02T08:00:00Z',
    description: 'nightly rollout',
    releaseDefinition: { name: 'deploy-web' }
  };
}
