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

export const RETRY_INITIAL_INTERVAL_MS = 1000;
export const RETRY_MAX_INTERVAL_MS = 60_000;
export const RETRY_MULTIPLIER = 2;
export const RETRY_RANDOMIZATION_FACTOR = 0.1;

/**
 * Per-call retry bookkeeping: attempts made, the exponential interval for the next
 * wait, and an optional server-suggested wait that replaces it exactly once.
 */
export class RetryState {
  private readonly random: () => number;
  private attemptCount = 0;
  private currentInterval = RETRY_INITIAL_INTERVAL_MS;
  private suggestedWaitMs: number | null = null;

  constructor(random: () => number = Math.random) {
    this.random = random;
  }

  recordAttempt(): number {
    this.attemptCount++;
    return this.attemptCount;
  }

  get attempts(): number {
    return this.attemptCount;
  }

  suggestWait(waitMs: number): void {
    this.suggestedWaitMs = waitMs;
  }

  nextDelay(): number {
    if (this.suggestedWaitMs != null) {
      const wait = this.suggestedWaitMs;
      this.suggestedWaitMs = null;
      return wait;
    }

    const interval = this.currentInterval;
    this.currentInterval = Math.min(this.currentInterval * RETRY_MULTIPLIER, RETRY_MAX_INTERVAL_MS);

    const delta = RETRY_RANDOMIZATION_FACTOR * interval;
    return Math.round(interval - delta + this.random() * 2 * delta);
  }
}
