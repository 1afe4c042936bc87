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

import { retry, handleWhen, type IBackoff, type IBackoffFactory, type IRetryBackoffContext } from 'cockatiel';
import {
  ErrorCategory,
  ModelCallError,
  RetryState,
  classifyUpstreamError,
  extractQuotaViolations,
  extractRetryDelay,
  isRetryable,
} from '../errors';
import {
  OperationCancelledError,
  PermanentUpstreamError,
  RetryExhaustedError,
  toError,
} from 'server/lib/errors';
import { getLogger, LogStage } from 'server/lib/logger';

export const DEFAULT_MAX_ATTEMPTS = 3;

class RetryStateBackoffInstance implements IBackoff<IRetryBackoffContext<unknown>> {
  readonly duration: number;
  private readonly state: RetryState;

  constructor(state: RetryState) {
    this.state = state;
    this.duration = state.nextDelay();
  }

  next(_context: IRetryBackoffContext<unknown>): IBackoff<IRetryBackoffContext<unknown>> {
    return new RetryStateBackoffInstance(this.state);
  }
}

/**
 * Exponential backoff (1s, x2, capped at 60s, +/-10% jitter) whose next wait is
 * replaced by the server's retry hint when the last failure carried one.
 */
export class QuotaAwareBackoff implements IBackoffFactory<IRetryBackoffContext<unknown>> {
  private readonly state: RetryState;

  constructor(state: RetryState) {
    this.state = state;
  }

  next(_context: IRetryBackoffContext<unknown>): IBackoff<IRetryBackoffContext<unknown>> {
    return new RetryStateBackoffInstance(this.state);
  }
}

export interface QuotaRetryOptions {
  maxAttempts?: number;
  signal?: AbortSignal;
  random?: () => number;
}

function inspectRateLimit(error: unknown, state: RetryState): void {
  const logger = getLogger({ stage: LogStage.MODEL_RETRY });
  const details = error instanceof ModelCallError ? error.details : [];

  for (const violation of extractQuotaViolations(details)) {
    logger.warn(
      {
        quotaMetric: violation.quotaMetric,
        quotaId: violation.quotaId,
        quotaValue: violation.quotaValue,
        quotaDimensions: violation.quotaDimensions,
      },
      'Quota violation - API rate limit exceeded'
    );
  }

  const apiWaitMs = extractRetryDelay(details);
  if (apiWaitMs != null && apiWaitMs > 0) {
    state.suggestWait(apiWaitMs);
    logger.warn({ attempt: state.attempts, apiWaitMs }, 'Rate limit exceeded, using API-suggested wait time');
  } else {
    logger.warn({ attempt: state.attempts }, 'Rate limit exceeded, using exponential backoff');
  }
}

function rejectOnAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new OperationCancelledError('retry cancelled while waiting for upstream'));
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
  });
}

/**
 * Runs `operation` until it succeeds, fails with a non rate-limit error, or
 * `maxAttempts` attempts have been made. Only rate-limit failures are retried.
 */
export async function executeWithQuotaRetry<T>(
  operation: (signal?: AbortSignal) => Promise<T>,
  options: QuotaRetryOptions = {}
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const { signal } = options;
  const state = new RetryState(options.random);

  if (signal?.aborted) {
    throw new OperationCancelledError();
  }

  let lastError: Error | undefined;

  const policy = retry(
    handleWhen((err) => isRetryable(classifyUpstreamError(err))),
    {
      maxAttempts: maxAttempts - 1,
      backoff: new QuotaAwareBackoff(state),
    }
  ).dangerouslyUnref();

  policy.onRetry((reason) => {
    getLogger({ stage: LogStage.MODEL_RETRY }).info(
      `AI: retrying after rate limit attempt=${state.attempts} delayMs=${reason.delay}`
    );
  });

  const attemptOnce = async (): Promise<T> => {
    if (signal?.aborted) {
      throw new OperationCancelledError();
    }
    state.recordAttempt();
    try {
      return await operation(signal);
    } catch (error) {
      lastError = toError(error);
      if (error instanceof ModelCallError) {
        getLogger({ stage: LogStage.MODEL_RESPONSE }).error(
          { code: error.status, message: error.message, status: error.statusText },
          'Gemini API Error'
        );
      }
      if (classifyUpstreamError(error) === ErrorCategory.RATE_LIMITED) {
        inspectRateLimit(error, state);
      }
      throw error;
    }
  };

  try {
    return await rejectOnAbort(
      policy.execute(() => attemptOnce(), signal),
      signal
    );
  } catch (error) {
    if (error instanceof OperationCancelledError) {
      throw error;
    }
    const cause = lastError ?? toError(error);
    if (classifyUpstreamError(cause) === ErrorCategory.RATE_LIMITED) {
      throw new RetryExhaustedError(state.attempts, cause);
    }
    throw new PermanentUpstreamError(cause, state.attempts);
  }
}
