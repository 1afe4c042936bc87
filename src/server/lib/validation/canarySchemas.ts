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

export const metricConfigSchema = {
  type: 'object',
  properties: {
    model: { type: 'string' },
    stableLabel: { type: 'string' },
    canaryLabel: { type: 'string' },
    baseBranch: { type: 'string' },
    githubUrl: { type: 'string' },
    analysisMode: { type: 'string' },
    namespace: { type: 'string' },
    podName: { type: 'string' },
    extraPrompt: { type: 'string' },
  },
};

/**
 * Shape the model is asked to answer with. Fields are optional because a partial
 * answer still yields a record with zero values for the missing entries.
 */
export const decisionRecordSchema = {
  type: 'object',
  properties: {
    text: { type: 'string' },
    promote: { type: 'boolean' },
    confidence: { type: 'number' },
  },
};

export const delegateResponseSchema = {
  type: 'object',
  properties: {
    analysis: { type: 'string' },
    rootCause: { type: 'string' },
    remediation: { type: 'string' },
    prLink: { type: 'string' },
    promote: { type: 'boolean' },
    confidence: { type: 'number' },
  },
};
