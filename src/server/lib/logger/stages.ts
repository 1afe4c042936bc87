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

export const LogStage = {
  ANALYSIS_STARTED: 'analysis.started',
  ANALYSIS_COMPLETE: 'analysis.complete',
  ANALYSIS_FAILED: 'analysis.failed',

  LOGS_FETCHING: 'logs.fetching',
  LOGS_FETCHED: 'logs.fetched',
  LOGS_MISSING: 'logs.missing',

  MODEL_REQUEST: 'model.request',
  MODEL_RETRY: 'model.retry',
  MODEL_RESPONSE: 'model.response',

  DELEGATE_HEALTH: 'delegate.health',
  DELEGATE_REQUEST: 'delegate.request',
  DELEGATE_RESPONSE: 'delegate.response',

  REMEDIATION_STARTING: 'remediation.starting',
  REMEDIATION_COMPLETE: 'remediation.complete',
  REMEDIATION_FAILED: 'remediation.failed',
} as const;

export type LogStageType = (typeof LogStage)[keyof typeof LogStage];
