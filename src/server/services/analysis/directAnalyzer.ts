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

import { ModelCaller, ModelResponse } from 'server/services/ai/types/provider';
import { executeWithQuotaRetry, DEFAULT_MAX_ATTEMPTS } from 'server/services/ai/resilience/quotaRetry';
import { buildCanaryAnalysisRequestText } from 'server/services/ai/prompts/canaryAnalysis';
import { extractFirstObject } from 'server/services/ai/utils/jsonExtraction';
import { AnalysisInput, AnalysisOutcome, CanaryAnalyzer } from 'server/services/types/canaryAnalysis';
import { parseDecisionRecord, zeroDecision } from './decisionRecord';
import { getLogger, LogStage } from 'server/lib/logger';

export interface DirectAnalyzerOptions {
  maxAttempts?: number;
  random?: () => number;
}

export function concatenateCandidates(response: ModelResponse): string {
  return response.candidates.map((candidate) => candidate.fragments.join('')).join('');
}

/**
 * Turns the model's text into a decision. Unparsable text is not an error: it yields
 * the zero-value record paired with the original text.
 */
export function interpretModelText(rawText: string): AnalysisOutcome {
  const direct = parseDecisionRecord(rawText);
  if (direct) {
    return { rawText, record: direct };
  }

  const extracted = extractFirstObject(rawText);
  if (extracted) {
    const record = parseDecisionRecord(extracted);
    if (record) {
      return { rawText: extracted, record };
    }
  }

  getLogger({ stage: LogStage.MODEL_RESPONSE }).warn(
    `AI: model response is not a decision record, using zero value length=${rawText.length}`
  );
  return { rawText, record: zeroDecision() };
}

export class DirectModelAnalyzer implements CanaryAnalyzer {
  private caller: ModelCaller;
  private maxAttempts: number;
  private random?: () => number;

  constructor(caller: ModelCaller, options: DirectAnalyzerOptions = {}) {
    this.caller = caller;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.random = options.random;
  }

  async analyze(input: AnalysisInput, signal?: AbortSignal): Promise<AnalysisOutcome> {
    const requestText = buildCanaryAnalysisRequestText(input.logContext, input.extraGuidance);

    getLogger({ stage: LogStage.MODEL_REQUEST, model: input.modelIdentifier }).info(
      `AI: direct analysis provider=${this.caller.name} model=${input.modelIdentifier}`
    );

    const response = await executeWithQuotaRetry(
      (attemptSignal) =>
        this.caller.generateContent({ model: input.modelIdentifier, segments: [requestText] }, attemptSignal),
      { maxAttempts: this.maxAttempts, signal, random: this.random }
    );

    return interpretModelText(concatenateCandidates(response).trim());
  }
}
