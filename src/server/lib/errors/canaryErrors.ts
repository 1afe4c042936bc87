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

export class CanaryAnalysisError extends Error {
  code: string;
  details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.details = details;
    this.name = 'CanaryAnalysisError';
  }
}

export const CANARY_ERROR_CODES = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  UPSTREAM_RATE_LIMITED: 'UPSTREAM_RATE_LIMITED',
  UPSTREAM_FAILED: 'UPSTREAM_FAILED',
  DELEGATE_UNREACHABLE: 'DELEGATE_UNREACHABLE',
  DELEGATE_BAD_RESPONSE: 'DELEGATE_BAD_RESPONSE',
  OPERATION_CANCELLED: 'OPERATION_CANCELLED',
  PODS_NOT_FOUND: 'PODS_NOT_FOUND',
  REMEDIATION_FAILED: 'REMEDIATION_FAILED',
} as const;

/**
 * Missing or invalid inputs for the requested analysis. Never retried.
 */
export class ConfigurationError extends CanaryAnalysisError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(CANARY_ERROR_CODES.CONFIGURATION_ERROR, message, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised once the attempt cap is reached while the upstream keeps rate limiting.
 */
export class RetryExhaustedError extends CanaryAnalysisError {
  readonly attempts: number;
  readonly lastError: Error;

  constructor(attempts: number, lastError: Error) {
    super(
      CANARY_ERROR_CODES.UPSTREAM_RATE_LIMITED,
      `max retries exceeded after ${attempts} attempts, last error: ${lastError.message}`,
      { attempts },
      { cause: lastError }
    );
    this.attempts = attempts;
    this.lastError = lastError;
    this.name = 'RetryExhaustedError';
  }
}

export class PermanentUpstreamError extends CanaryAnalysisError {
  readonly attempts: number;

  constructor(cause: Error, attempts: number = 1) {
    super(CANARY_ERROR_CODES.UPSTREAM_FAILED, `upstream call failed: ${cause.message}`, { attempts }, { cause });
    this.attempts = attempts;
    this.name = 'PermanentUpstreamError';
  }
}

export class DelegateUnreachableError extends CanaryAnalysisError {
  constructor(message: string, cause?: unknown) {
    super(CANARY_ERROR_CODES.DELEGATE_UNREACHABLE, message, undefined, { cause });
    this.name = 'DelegateUnreachableError';
  }
}

export class DelegateResponseError extends CanaryAnalysisError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, cause?: unknown) {
    super(CANARY_ERROR_CODES.DELEGATE_BAD_RESPONSE, message, statusCode ? { statusCode } : undefined, { cause });
    this.statusCode = statusCode;
    this.name = 'DelegateResponseError';
  }
}

export class OperationCancelledError extends CanaryAnalysisError {
  constructor(message: string = 'operation cancelled') {
    super(CANARY_ERROR_CODES.OPERATION_CANCELLED, message);
    this.name = 'OperationCancelledError';
  }
}

export class PodsNotFoundError extends CanaryAnalysisError {
  constructor(namespace: string, labelSelector: string) {
    super(CANARY_ERROR_CODES.PODS_NOT_FOUND, `no pods found for selector ${labelSelector} in namespace ${namespace}`, {
      namespace,
      labelSelector,
    });
    this.name = 'PodsNotFoundError';
  }
}

/**
 * Failure of the remediation side effect. Logged by the resolver, never surfaced in a verdict.
 */
export class RemediationError extends CanaryAnalysisError {
  constructor(message: string, cause?: unknown) {
    super(CANARY_ERROR_CODES.REMEDIATION_FAILED, message, undefined, { cause });
    this.name = 'RemediationError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
