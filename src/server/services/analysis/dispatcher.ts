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

import {
  AnalysisInput,
  AnalysisMode,
  AnalysisOutcome,
  CanaryAnalyzer,
  DecisionRecord,
  DelegateAnalyzeResponse,
  DelegateClient,
} from 'server/services/types/canaryAnalysis';
import { ConfigurationError } from 'server/lib/errors';
import { getLogger, LogStage } from 'server/lib/logger';
import { clampConfidence } from './decisionRecord';
import { splitLogContext } from './logContext';

export function resolveAnalysisMode(mode: string | undefined): AnalysisMode {
  return mode === AnalysisMode.DELEGATED ? AnalysisMode.DELEGATED : AnalysisMode.DIRECT;
}

export function delegateResponseToOutcome(response: DelegateAnalyzeResponse): AnalysisOutcome {
  const record: DecisionRecord = {
    narrative: response.analysis,
    promote: response.promote,
    confidence: clampConfidence(response.confidence),
    rootCause: response.rootCause,
    remediationSummary: response.remediation,
    ...(response.prLink ? { changeLink: response.prLink } : {}),
  };

  const rawText = JSON.stringify({
    text: record.narrative,
    promote: record.promote,
    confidence: record.confidence,
    rootCause: response.rootCause,
    remediation: response.remediation,
    ...(response.prLink ? { prLink: response.prLink } : {}),
  });

  return { rawText, record };
}

/**
 * Routes one analysis to the direct model analyzer or the remote agent. An explicit
 * `agent` request never falls back to direct analysis.
 */
export class ModeDispatcher {
  private direct: CanaryAnalyzer;
  private delegate: DelegateClient;

  constructor(direct: CanaryAnalyzer, delegate: DelegateClient) {
    this.direct = direct;
    this.delegate = delegate;
  }

  async dispatch(mode: string | undefined, input: AnalysisInput, signal?: AbortSignal): Promise<AnalysisOutcome> {
    const resolved = resolveAnalysisMode(mode);

    getLogger({ stage: LogStage.ANALYSIS_STARTED, mode: resolved }).info(
      `Analysis: dispatching mode=${resolved} namespace=${input.namespace || 'none'} target=${
        input.targetIdentifier || 'none'
      }`
    );

    if (resolved === AnalysisMode.DELEGATED) {
      return this.dispatchDelegated(input, signal);
    }
    return this.direct.analyze(input, signal);
  }

  private async dispatchDelegated(input: AnalysisInput, signal?: AbortSignal): Promise<AnalysisOutcome> {
    const { namespace, targetIdentifier } = input;
    if (!namespace || !targetIdentifier) {
      throw new ConfigurationError('namespace and podName are required for agent mode', {
        namespace: namespace ?? null,
        podName: targetIdentifier ?? null,
      });
    }

    await this.delegate.healthCheck(signal);

    const { stableLogs, canaryLogs } = splitLogContext(input.logContext);
    const response = await this.delegate.analyze(namespace, targetIdentifier, stableLogs, canaryLogs, signal);

    if (response.prLink) {
      getLogger({ stage: LogStage.DELEGATE_RESPONSE }).info(`Delegate: agent opened a change prLink=${response.prLink}`);
    }

    return delegateResponseToOutcome(response);
  }
}
