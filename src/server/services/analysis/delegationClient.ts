/**
 * Copyright 2025 GoodRx, Inc.
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import axios, { type AxiosInstance } from 'axios';
import {
  DelegateAnalyzeRequest,
  DelegateAnalyzeResponse,
  DelegateClient,
} from 'server/services/types/canaryAnalysis';
import { buildDelegateAnalysisPrompt } from 'server/services/ai/prompts/canaryAnalysis';
import { delegateResponseSchema } from 'server/lib/validation/canarySchemas';
import { validateAgainst } from 'server/lib/validation/validate';
import {
  DelegateResponseError,
  DelegateUnreachableError,
  OperationCancelledError,
  toError,
} from 'server/lib/errors';
import { getLogger, LogStage } from 'server/lib/logger';

export const DEFAULT_AGENT_USER_ID = 'argo-rollouts';
export const DEFAULT_HEALTH_TIMEOUT_MS = 10_000;
export const DEFAULT_ANALYZE_TIMEOUT_MS = 5 * 60 * 1000;

export interface DelegationClientOptions {
  baseUrl: string;
  userId?: string;
  healthTimeoutMs?: number;
  analyzeTimeoutMs?: number;
  http?: AxiosInstance;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Decodes the agent's answer. Missing fields take zero values; a body that is not a JSON
 * object, or carries a field of the wrong type, is rejected.
 */
export function decodeDelegateResponse(raw: unknown, statusCode: number): DelegateAnalyzeResponse {
  let body: unknown = raw;
  if (typeof raw === 'string') {
    try {
      body = JSON.parse(raw);
    } catch (error) {
      throw new DelegateResponseError(
        `failed to decode response: ${toError(error).message}`,
        statusCode,
        error
      );
    }
  }

  const validation = validateAgainst(body, delegateResponseSchema);
  if (!isRecord(body) || !validation.valid) {
    const reason = validation.errors.join(', ') || 'expected a JSON object';
    throw new DelegateResponseError(`failed to decode response: ${reason}`, statusCode);
  }

  const prLink = stringField(body, 'prLink');
  return {
    analysis: stringField(body, 'analysis'),
    rootCause: stringField(body, 'rootCause'),
    remediation: stringField(body, 'remediation'),
    ...(prLink ? { prLink } : {}),
    promote: body.promote === true,
    confidence: typeof body.confidence === 'number' ? Math.round(body.confidence) : 0,
  };
}

/**
 * HTTP client for the remote diagnostic agent. Transport failures surface as
 * DelegateUnreachableError; the caller never falls back to direct analysis.
 */
export class AgentDelegationClient implements DelegateClient {
  private http: AxiosInstance;
  private userId: string;
  private healthTimeoutMs: number;
  private analyzeTimeoutMs: number;

  constructor(options: DelegationClientOptions) {
    this.http = options.http ?? axios.create({ baseURL: options.baseUrl.replace(/\/+$/, '') });
    this.userId = options.userId || DEFAULT_AGENT_USER_ID;
    this.healthTimeoutMs = options.healthTimeoutMs ?? DEFAULT_HEALTH_TIMEOUT_MS;
    this.analyzeTimeoutMs = options.analyzeTimeoutMs ?? DEFAULT_ANALYZE_TIMEOUT_MS;
  }

  async healthCheck(signal?: AbortSignal): Promise<void> {
    try {
      // any status, 404 included, means the agent is reachable
      const response = await this.http.get('/', {
        timeout: this.healthTimeoutMs,
        validateStatus: () => true,
        signal,
      });
      getLogger({ stage: LogStage.DELEGATE_HEALTH }).debug(
        `Delegate: health check statusCode=${response.status}`
      );
    } catch (error) {
      throw this.transportError('health check failed', error, signal);
    }
  }

  async analyze(
    namespace: string,
    podName: string,
    stableLogs: string,
    canaryLogs: string,
    signal?: AbortSignal
  ): Promise<DelegateAnalyzeResponse> {
    getLogger({ stage: LogStage.DELEGATE_REQUEST }).info(
      `Delegate: sending analysis request namespace=${namespace} podName=${podName}`
    );

    const request: DelegateAnalyzeRequest = {
      userId: this.userId,
      prompt: buildDelegateAnalysisPrompt(namespace, podName),
      context: { namespace, podName, stableLogs, canaryLogs },
    };

    let status: number;
    let data: unknown;
    try {
      const response = await this.http.post<string>('/a2a/analyze', request, {
        timeout: this.analyzeTimeoutMs,
        validateStatus: () => true,
        responseType: 'text',
        transformResponse: [(body: unknown) => body],
        signal,
      });
      status = response.status;
      data = response.data;
    } catch (error) {
      throw this.transportError('failed to send request', error, signal);
    }

    if (status < 200 || status >= 300) {
      throw new DelegateResponseError(`agent returned status ${status}`, status);
    }

    const result = decodeDelegateResponse(data, status);
    getLogger({ stage: LogStage.DELEGATE_RESPONSE }).info(
      `Delegate: received analysis promote=${result.promote} confidence=${result.confidence} hasPR=${Boolean(
        result.prLink
      )}`
    );
    return result;
  }

  private transportError(context: string, error: unknown, signal?: AbortSignal): Error {
    if (signal?.aborted || axios.isCancel(error)) {
      return new OperationCancelledError(`${context}: request cancelled`);
    }
    const cause = toError(error);
    getLogger().error({ error: cause }, `Delegate: ${context}`);
    return new DelegateUnreachableError(`${context}: ${cause.message}`, cause);
  }
}
