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

export enum ErrorCategory {
  RATE_LIMITED = 'rate-limited',
  PERMANENT = 'permanent',
  CANCELLED = 'cancelled',
}

export const RESOURCE_EXHAUSTED = 'RESOURCE_EXHAUSTED';
export const HTTP_TOO_MANY_REQUESTS = 429;

export function isRetryable(category: ErrorCategory): boolean {
  return category === ErrorCategory.RATE_LIMITED;
}
