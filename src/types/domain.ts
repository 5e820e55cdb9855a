// This file defines the Azure DevOps records and runtime settings shared by client, tools, and bootstrap.

export interface AzureDevOpsSettings {
  baseUrl: string;
  organization?: string;
  project?: string;
  releaseBaseUrl?: string;
  token: string;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
}

export interface TransportSettings {
  sessionQueueCapacity: number;
  keepAliveMs: number;
}

export interface AppConfig {
  host: string;
  port: number;
  logLevel: string;
  azureDevOps: AzureDevOpsSettings;
  transport: TransportSettings;
}

export interface Build {
  id: number;
  buildNumber: string;
  status: string;
  result: string;
  startTime: string | null;
  finishTime: string | null;
  url: string;
  definition: {
    name: string;
  };
}

export interface Release {
  id: number;
  name: string;
  status: string;
  createdOn: string | null;
  description: string;
  releaseDefinition: {
    name: string;
  };
}

export type ResourceType = 'build' | 'release';

export interface ParsedResource {
  type: ResourceType;
  project: string;
  id: number;
}
