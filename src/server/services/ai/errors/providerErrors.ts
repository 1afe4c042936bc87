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

import { ApiError as GeminiApiError } from '@google/genai';
import { OperationCancelledError, toError } from 'server/lib/errors';
import { extractFirstObject } from '../utils/jsonExtraction';
import { ErrorCategory, HTTP_TOO_MANY_REQUESTS, RESOURCE_EXHAUSTED } from './classification';

export const TYPE_URL_RETRY_INFO = 'type.googleapis.com/google.rpc.RetryInfo';
export const TYPE_URL_QUOTA_FAILURE = 'type.googleapis.com/google.rpc.QuotaFailure';

export type UpstreamErrorDetail = Record<string, unknown>;

export interface QuotaViolation {
  quotaMetric?: string;
  quotaId?: string;
  quotaValue?: string;
  quotaDimensions?: Record<string, unknown>;
}

export interface ModelCallErrorInit {
  message: string;
  status?: number;
  statusText?: string;
  details?: UpstreamErrorDetail[];
  cause?: unknown;
}

/**
 * Provider-neutral failure of a single model call. `status` is the HTTP code,
 * `statusText` the RPC status name (e.g. RESOURCE_EXHAUSTED).
 */
export class ModelCallError extends Error {
  readonly status?: number;
  readonly statusText?: string;
  readonly details: UpstreamErrorDetail[];

  constructor(init: ModelCallErrorInit) {
    super(init.message, { cause: init.cause });
    this.name = 'ModelCallError';
    this.status = init.status;
    this.statusText = init.statusText;
    this.details = init.details ?? [];
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

interface ErrorPayload {
  code?: number;
  message?: string;
  status?: string;
  details: UpstreamErrorDetail[];
}

function parseJsonRecord(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Reads the `{"error": {code, message, status, details}}` body that Gemini embeds in its error messages.
 */
export function parseErrorPayload(message: string): ErrorPayload | null {
  const body = parseJsonRecord(message) ?? parseJsonRecord(extractFirstObject(message));
  if (!body) return null;

  const inner = isRecord(body.error) ? body.error : body;
  const details = Array.isArray(inner.details) ? inner.details.filter(isRecord) : [];

  return {
    code: typeof inner.code === 'number' ? inner.code : undefined,
    message: optionalString(inner.message),
    status: optionalString(inner.status),
    details,
  };
}

export function normalizeGeminiError(error: unknown): Error {
  if (error instanceof GeminiApiError) {
    const payload = parseErrorPayload(error.message);
    return new ModelCallError({
      message: payload?.message ?? error.message,
      status: error.status ?? payload?.code,
      statusText: payload?.status,
      details: payload?.details ?? [],
      cause: error,
    });
  }
  return toError(error);
}

function readStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const status: unknown = Reflect.get(error, 'status');
  return typeof status === 'number' ? status : undefined;
}

export function classifyUpstreamError(error: unknown): ErrorCategory {
  if (error instanceof OperationCancelledError) return ErrorCategory.CANCELLED;
  if (error instanceof ModelCallError) {
    if (error.status === HTTP_TOO_MANY_REQUESTS || error.statusText === RESOURCE_EXHAUSTED) {
      return ErrorCategory.RATE_LIMITED;
    }
    return ErrorCategory.PERMANENT;
  }
  return readStatus(error) === HTTP_TOO_MANY_REQUESTS ? ErrorCategory.RATE_LIMITED : ErrorCategory.PERMANENT;
}

const RETRY_DELAY_PATTERN = /^(\d+(?:\.\d+)?)s$/;

/**
 * Parses a protobuf Duration in its JSON form (`"30s"`, `"1.5s"`) into milliseconds.
 * Other duration spellings are not recognized.
 */
export function parseRetryDelay(text: string): number | null {
  const match = RETRY_DELAY_PATTERN.exec(text.trim());
  if (!match) return null;
  return Math.round(Number(match[1]) * 1000);
}

export function extractRetryDelay(details: UpstreamErrorDetail[]): number | null {
  let delayMs: number | null = null;
  for (const detail of details) {
    if (detail['@type'] !== TYPE_URL_RETRY_INFO) continue;
    const raw = detail.retryDelay;
    if (typeof raw === 'string' && raw !== '') {
      const parsed = parseRetryDelay(raw);
      if (parsed != null) delayMs = parsed;
    }
  }
  return delayMs;
}

export function extractQuotaViolations(details: UpstreamErrorDetail[]): QuotaViolation[] {
  const violations: QuotaViolation[] = [];
  for (const detail of details) {
    if (detail['@type'] !== TYPE_URL_QUOTA_FAILURE || !Array.isArray(detail.violations)) continue;
    for (const violation of detail.violations) {
      if (!isRecord(violation)) continue;
      violations.push({
        quotaMetric: optionalString(violation.quotaMetric),
        quotaId: optionalString(violation.quotaId),
        quotaValue: optionalString(violation.quotaValue),
        quotaDimensions: isRecord(violation.quotaDimensions) ? violation.quotaDimensions : undefined,
      });
    }
  }
  return violations;
}
