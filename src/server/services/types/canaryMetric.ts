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

export const PROVIDER_TYPE = 'MetricAI';

export enum MeasurementPhase {
  SUCCESSFUL = 'Successful',
  FAILED = 'Failed',
  ERROR = 'Error',
}

export interface Measurement {
  phase?: MeasurementPhase;
  value?: string;
  message?: string;
  metadata?: Record<string, string>;
  startedAt: Date;
  finishedAt?: Date;
}

export interface AnalysisRunRef {
  name: string;
  namespace: string;
}

export interface MetricRef {
  name: string;
  provider: {
    /** plugin name to its configuration, either parsed or as raw JSON text */
    plugin?: Record<string, unknown>;
  };
}

export interface MetricConfig {
  model?: string;
  stableLabel?: string;
  canaryLabel?: string;
  baseBranch?: string;
  githubUrl?: string;
  analysisMode?: string;
  namespace?: string;
  podName?: string;
  extraPrompt?: string;
}
