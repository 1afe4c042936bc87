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

import { CANARY_LOGS_MARKER, STABLE_LOGS_MARKER } from 'server/services/analysis/logContext';

export const CANARY_ANALYSIS_INSTRUCTIONS = [
  'Analyze how this canary behaved based on the logs below, comparing the stable version with the canary version.',
  'Respond with a single JSON object and nothing else, containing exactly these entries:',
  '"text": a string with your analysis;',
  '"promote": true or false, whether the canary should be promoted;',
  '"confidence": a number from 0 to 100 expressing your confidence in that decision.',
  `The stable version logs start with '${STABLE_LOGS_MARKER}' and the canary version logs start with '${CANARY_LOGS_MARKER}'.`,
  'If the logs do not contain enough information to make a determination, default to "promote": true.',
].join(' ');

export function buildCanaryAnalysisInstructions(extraGuidance?: string): string {
  if (!extraGuidance) {
    return CANARY_ANALYSIS_INSTRUCTIONS;
  }
  return `${CANARY_ANALYSIS_INSTRUCTIONS}\n\nAdditional context: ${extraGuidance}`;
}

/**
 * Single text segment sent to the model: instructions, a blank line, then the log context.
 */
export function buildCanaryAnalysisRequestText(logContext: string, extraGuidance?: string): string {
  return `${buildCanaryAnalysisInstructions(extraGuidance)}\n\n${logContext}`;
}

export function buildDelegateAnalysisPrompt(namespace: string, podName: string): string {
  return (
    `Analyze canary deployment issue. Namespace: ${namespace}, Pod: ${podName}. ` +
    'Compare stable vs canary behavior and determine if canary should be promoted.'
  );
}
