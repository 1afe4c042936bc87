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

import { AsyncLocalStorage } from 'async_hooks';
import type { LogContext } from './types';

const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

export function getLogContext(): Partial<LogContext> {
  return asyncLocalStorage.getStore() || {};
}

export function withLogContext<T>(context: Partial<LogContext>, fn: () => T): T {
  const parentContext = getLogContext();
  const mergedContext: LogContext = {
    ...parentContext,
    ...context,
    correlationId: context.correlationId || parentContext.correlationId || 'unknown',
  };

  return asyncLocalStorage.run(mergedContext, fn);
}

export function updateLogContext(updates: Partial<LogContext>): void {
  const current = asyncLocalStorage.getStore();
  if (current) {
    Object.assign(current, updates);
  }
}
