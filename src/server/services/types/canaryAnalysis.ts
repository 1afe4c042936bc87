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

export enum AnalysisMode {
  DIRECT = 'default',
  DELEGATED = 'agent',
}

export interface AnalysisInput {
  readonly modelIdentifier: string;
  /** stable segment then canary segment, each introduced by its marker */
  readonly logContext: string;
  readonly extraGuidance?: string;
  readonly namespace?: string;
  /** pod name, or a pod template hash before resolution */
  readonly targetIdentifier?: string;
}

export interface DecisionRecord {
  narrative: string;
  promote: boolean;
  /** integer in [0, 100] */
  confidence: number;
  rootCause?: string;
  remediationSummary?: string;
  changeLink?: string;
}

export interface AnalysisOutcome {
  rawText: string;
  record: DecisionRecord;
}

export interface CanaryAnalyzer {
  analyze(input: AnalysisInput, signal?: AbortSignal): Promise<AnalysisOutcome>;
}

export type Verdict =
  | { kind: 'promote'; score: string; confidence: number }
  | { kind: 'fail'; score: '0'; confidence: number }
  | { kind: 'error'; message: string };

export interface DelegateContext {
  namespace: string;
  podName: string;
  stableLogs: string;
  canaryLogs: string;
}

export interface DelegateAnalyzeRequest {
  userId: string;
  prompt: string;
  context: DelegateContext;
}

export interface DelegateAnalyzeResponse {
  analysis: string;
  rootCause: string;
  remediation: string;
  prLink?: string;
  promote: boolean;
  confidence: number;
}

export interface DelegateClient {
  healthCheck(signal?: AbortSignal): Promise<void>;
  analyze(
    namespace: string,
    podName: string,
    stableLogs: string,
    canaryLogs: string,
    signal?: AbortSignal
  ): Promise<DelegateAnalyzeResponse>;
}

export interface RepositoryCoordinates {
  githubUrl?: string;
  baseBranch?: string;
}

export interface RemediationRequest extends RepositoryCoordinates {
  logContext: string;
  narrative: string;
  modelIdentifier: string;
}

export interface RemediationResult {
  issueNumber: number;
  issueUrl: string;
}

export interface RemediationTrigger {
  trigger(request: RemediationRequest): Promise<RemediationResult>;
}
