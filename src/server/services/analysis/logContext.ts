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

export const STABLE_LOGS_MARKER = '--- STABLE LOGS ---';
export const CANARY_LOGS_MARKER = '--- CANARY LOGS ---';

export function composeLogContext(stableLogs: string, canaryLogs: string): string {
  return `${STABLE_LOGS_MARKER}\n${stableLogs}\n\n${CANARY_LOGS_MARKER}\n${canaryLogs}`;
}

/**
 * Inverse of composeLogContext. Segments are returned untrimmed. When either marker is
 * missing, or the canary marker precedes the stable one, the whole text is the stable segment.
 */
export function splitLogContext(text: string): { stableLogs: string; canaryLogs: string } {
  const stableIdx = text.indexOf(STABLE_LOGS_MARKER);
  const canaryIdx = text.indexOf(CANARY_LOGS_MARKER);

  if (stableIdx === -1 || canaryIdx === -1 || canaryIdx < stableIdx) {
    return { stableLogs: text, canaryLogs: '' };
  }

  return {
    stableLogs: text.substring(stableIdx + STABLE_LOGS_MARKER.length, canaryIdx),
    canaryLogs: text.substring(canaryIdx + CANARY_LOGS_MARKER.length),
  };
}
