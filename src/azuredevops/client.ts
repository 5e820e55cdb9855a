// This module wraps Azure DevOps build and release REST calls with timeout, retry, and response validation.

import { setTimeout as sleep } from 'node:timers/promises';
import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import type { AzureDevOpsSettings, Build, Release } from '../types/domain.js';
import { AppError, errorMessage } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';

export const AZURE_DEVOPS_API_VERSION = '6.0';

type QueryValue = string | number | undefined;

const buildPayloadSchema = z.object({
  id: z.number(),
  buildNumber: z.string().nullish(),
  status: z.string().nullish(),
  result: z.string().nullish(),
  startTime: z.string().nullish(),
  finishTime: z.string().nullish(),
  url: z.string().nullish(),
  definition: z.object({ name: z.string().nullish() }).nullish()
});

const releasePayloadSchema = z.object({
  id: z.number(),
  name: z.string().nullish(),
  status: z.string().nullish(),
  createdOn: z.string().nullish(),
  description: z.string().nullish(),
  releaseDefinition: z.object({ name: z.string().nullish() }).nullish()
});

const buildListSchema = z.object({
  count: z.number().optional(),
  value: z.array(buildPayloadSchema)
});

const releaseListSchema = z.object({
  count: z.number().optional(),
  value: z.array(releasePayloadSchema)
});

const buildLogListSchema = z.object({
  value: z.array(
    z.object({
      id: z.number(),
      url: z.string().nullish()
    })
  )
});

const releaseTaskSchema = z.object({
  id: z.number().nullish(),
  name: z.string().nullish(),
  logUrl: z.string().nullish()
});

// This schema walks environment -> deploy step -> phase -> job -> task to reach task log URLs.
const releaseDetailSchema = z.object({
  environments: z
    .array(
      z.object({
        id: z.number().nullish(),
        name: z.string().nullish(),
        deploySteps: z
          .array(
            z.object({
              releaseDeployPhases: z
                .array(
                  z.object({
                    deploymentJobs: z.array(z.object({ tasks: z.array(releaseTaskSchema).nullish() })).nullish()
                  })
                )
                .nullish()
            })
          )
          .nullish()
      })
    )
    .nullish()
});

type BuildPayload = z.infer<typeof buildPayloadSchema>;
type ReleasePayload = z.infer<typeof releasePayloadSchema>;
type ReleaseDetail = z.infer<typeof releaseDetailSchema>;
type ReleaseTask = z.infer<typeof releaseTaskSchema>;

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '');
}

// This helper flattens the nested release structure into per-environment task lists.
function collectReleaseTasks(detail: ReleaseDetail): Array<{ environment: string; tasks: ReleaseTask[] }> {
  return (detail.environments ?? []).map((environment) => ({
    environment: environment.name ?? `environment ${environment.id ?? '?'}`,
    tasks: (environment.deploySteps ?? []).flatMap((step) =>
      (step.releaseDeployPhases ?? []).flatMap((phase) =>
        (phase.deploymentJobs ?? []).flatMap((job) => job.tasks ?? [])
      )
    )
  }));
}

// This class executes authenticated Azure DevOps REST operations for one configured server.
export class AzureDevOpsClient {
  private readonly baseUrl: string;
  private readonly releaseBaseUrl: string;
  private readonly settings: AzureDevOpsSettings;
  private readonly authorization: string;
  private readonly logger?: FastifyBaseLogger;

  public constructor(settings: AzureDevOpsSettings, logger?: FastifyBaseLogger) {
    this.settings = settings;
    this.baseUrl = trimTrailingSlash(settings.baseUrl);
    this.releaseBaseUrl = trimTrailingSlash(settings.releaseBaseUrl ?? settings.baseUrl);
    this.authorization = `Basic ${Buffer.from(`:${settings.token}`).toString('base64')}`;
    this.logger = logger?.child({
      component: 'azure_devops_client'
    });
  }

  // This helper applies exponential backoff with jitter between retries.
  private async waitWithBackoff(attempt: number): Promise<number> {
    const jitter = Math.floor(Math.random() * 100);
    const delay = this.settings.retryBaseDelayMs * 2 ** attempt + jitter;
    await sleep(delay);
    return delay;
  }

  // This helper writes one structured client event only when a logger is available.
  private log(level: 'debug' | 'info' | 'warn' | 'error', event: string, details?: Record<string, unknown>): void {
    const sanitized = sanitizeForLog(details ?? {});
    this.logger?.[level](
      {
        event,
        ...(typeof sanitized === 'object' && sanitized !== null ? sanitized : {})
      },
      event
    );
  }

  // This helper picks the per-call project override, falling back to the configured default project.
  private resolveProject(project?: string): string | undefined {
    const override = project?.trim();
    return override ? override : this.settings.project;
  }

  // This helper builds <base>[/<organization>][/<project>]/_apis/<path>?api-version=6.0 URLs.
  public buildApiUrl(
    path: string,
    options?: { project?: string; query?: Record<string, QueryValue>; area?: 'core' | 'release' }
  ): URL {
    const base = options?.area === 'release' ? this.releaseBaseUrl : this.baseUrl;
    const segments = [base];

    if (this.settings.organization) {
      segments.push(encodeURIComponent(this.settings.organization));
    }

    const project = this.resolveProject(options?.project);
    if (project) {
      segments.push(encodeURIComponent(project));
    }

    const url = new URL(`${segments.join('/')}/_apis/${path}`);
    url.searchParams.set('api-version', AZURE_DEVOPS_API_VERSION);

    for (const [key, value] of Object.entries(options?.query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }

    return url;
  }

  // This helper executes one GET with timeout and bounded retry policy, returning the raw body text.
  private async request(url: URL): Promise<string> {
    const maxAttempts = Math.max(1, this.settings.maxRetries + 1);
    const startedAt = Date.now();
    const path = url.pathname;

    this.log('debug', 'azure_devops_request_started', { path, maxAttempts });

    for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
      const abortController = new AbortController();
      const timer = setTimeout(() => abortController.abort(), this.settings.requestTimeoutMs);
      const attemptNumber = attempt + 1;

      try {
        const response = await fetch(url, {
          method: 'GET',
          headers: {
            Authorization: this.authorization,
            Accept: 'application/json, text/plain'
          },
          signal: abortController.signal
        });

        if (response.status === 429 || (response.status >= 500 && response.status <= 599)) {
          if (attempt < maxAttempts - 1) {
            // Releases the connection held by the unread body before the next attempt.
            await response.body?.cancel();
            const delayMs = await this.waitWithBackoff(attempt);
            this.log('warn', 'azure_devops_request_retry_scheduled', {
              path,
              attempt: attemptNumber,
              status: response.status,
              delayMs
            });
            continue;
          }
        }

        const body = await response.text();
        if (!response.ok) {
          this.log('error', 'azure_devops_request_http_error', {
            path,
            attempt: attemptNumber,
            status: response.status,
            bodyPreview: body
          });
          throw new AppError(
            response.status,
            'azure_devops_api_error',
            `Azure DevOps request failed with status ${response.status}: ${body}`
          );
        }

        this.log('info', 'azure_devops_request_completed', {
          path,
          attemptsUsed: attemptNumber,
          status: response.status,
          durationMs: Date.now() - startedAt
        });
        return body;
      } catch (error) {
        if (error instanceof AppError) {
          throw error;
        }

        if (attempt >= maxAttempts - 1) {
          this.log('error', 'azure_devops_request_failed_transport', {
            path,
            attempt: attemptNumber,
            error: errorForLog(error)
          });
          throw new AppError(502, 'azure_devops_unreachable', `Azure DevOps request failed: ${errorMessage(error)}`);
        }

        const delayMs = await this.waitWithBackoff(attempt);
        this.log('warn', 'azure_devops_request_retry_transport', {
          path,
          attempt: attemptNumber,
          delayMs,
          error: errorForLog(error)
        });
      } finally {
        clearTimeout(timer);
      }
    }

    throw new AppError(502, 'azure_devops_unreachable', 'Azure DevOps request failed after retries.');
  }

  // This helper fetches one JSON document and validates it against the expected payload schema.
  private async requestJson<T>(url: URL, schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): Promise<T> {
    const body = await this.request(url);

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (error) {
      throw new AppError(502, 'azure_devops_invalid_response', `Azure DevOps returned malformed JSON for ${label}.`, {
        originalMessage: errorMessage(error)
      });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new AppError(
        502,
        'azure_devops_invalid_response',
        `Azure DevOps returned an unexpected payload for ${label}.`,
        parsed.error.flatten()
      );
    }

    return parsed.data;
  }

  private mapBuild(raw: BuildPayload): Build {
    return {
      id: raw.id,
      buildNumber: raw.buildNumber ?? '',
      status: raw.status ?? '',
      result: raw.result ?? '',
      startTime: raw.startTime ?? null,
      finishTime: raw.finishTime ?? null,
      url: raw.url ?? '',
      definition: {
        name: raw.definition?.name ?? ''
      }
    };
  }

  private mapRelease(raw: ReleasePayload): Release {
    return {
      id: raw.id,
      name: raw.name ?? '',
      status: raw.status ?? '',
      createdOn: raw.createdOn ?? null,
      description: raw.description ?? '',
      releaseDefinition: {
        name: raw.releaseDefinition?.name ?? ''
      }
    };
  }

  // This helper fetches one log body and renders a marker instead when that single log is unavailable.
  private async fetchLogSection(url: URL, heading: string): Promise<string> {
    try {
      const content = await this.request(url);
      return `--- ${heading} ---\n${content}\n`;
    } catch (error) {
      this.log('warn', 'azure_devops_log_unavailable', {
        path: url.pathname,
        heading,
        error: errorForLog(error)
      });
      return `--- ${heading} (unavailable: ${errorMessage(error)}) ---\n`;
    }
  }

  public async listBuilds(project: string | undefined, top: number): Promise<Build[]> {
    const url = this.buildApiUrl('build/builds', { project, query: { $top: top } });
    const response = await this.requestJson(url, buildListSchema, 'build list');
    return response.value.map((raw) => this.mapBuild(raw));
  }

  public async getBuild(project: string | undefined, buildId: number): Promise<Build> {
    const url = this.buildApiUrl(`build/builds/${buildId}`, { project });
    const response = await this.requestJson(url, buildPayloadSchema, `build ${buildId}`);
    return this.mapBuild(response);
  }

  // This method lists log metadata for a build, then concatenates every log body in listing order.
  public async getBuildLogs(project: string | undefined, buildId: number): Promise<string> {
    const listUrl = this.buildApiUrl(`build/builds/${buildId}/logs`, { project });
    const listing = await this.requestJson(listUrl, buildLogListSchema, `build ${buildId} logs`);

    const sections: string[] = [];
    for (const entry of listing.value) {
      const logUrl = this.buildApiUrl(`build/builds/${buildId}/logs/${entry.id}`, { project });
      sections.push(await this.fetchLogSection(logUrl, `Log ID ${entry.id}`));
    }

    return sections.join('');
  }

  public async listReleases(project: string | undefined, top: number): Promise<Release[]> {
    const url = this.buildApiUrl('release/releases', { project, area: 'release', query: { $top: top } });
    const response = await this.requestJson(url, releaseListSchema, 'release list');
    return response.value.map((raw) => this.mapRelease(raw));
  }

  public async getRelease(project: string | undefined, releaseId: number): Promise<Release> {
    const url = this.buildApiUrl(`release/releases/${releaseId}`, { project, area: 'release' });
    const response = await this.requestJson(url, releasePayloadSchema, `release ${releaseId}`);
    return this.mapRelease(response);
  }

  // This method walks every environment of a release and concatenates the logs of tasks that expose a logUrl.
  public async getReleaseLogs(project: string | undefined, releaseId: number): Promise<string> {
    const url = this.buildApiUrl(`release/releases/${releaseId}`, { project, area: 'release' });
    const detail = await this.requestJson(url, releaseDetailSchema, `release ${releaseId}`);

    const sections: string[] = [];
    for (const { environment, tasks } of collectReleaseTasks(detail)) {
      sections.push(`=== Environment: ${environment} ===\n`);

      for (const task of tasks) {
        if (!task.logUrl) {
          continue;
        }

        const heading = `Task: ${task.name ?? `task ${task.id ?? '?'}`}`;
        let logUrl: URL;
        try {
          logUrl = new URL(task.logUrl);
        } catch {
          sections.push(`--- ${heading} (unavailable: invalid log URL) ---\n`);
          continue;
        }

        sections.push(await this.fetchLogSection(logUrl, heading));
      }
    }

    return sections.join('');
  }
}
