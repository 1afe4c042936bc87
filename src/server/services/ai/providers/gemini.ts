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
  GoogleGenAI,
  type GenerateContentParameters,
  type GenerateContentResponse,
} from '@google/genai';
import { BaseModelCaller } from './base';
import { ModelRequest, ModelResponse } from '../types/provider';
import { normalizeGeminiError } from '../errors';
import { OperationCancelledError } from 'server/lib/errors';
import { getLogger, LogStage } from 'server/lib/logger';

export interface GeminiModelsApi {
  generateContent(params: GenerateContentParameters): Promise<GenerateContentResponse>;
}

export function toModelResponse(response: GenerateContentResponse): ModelResponse {
  return {
    candidates: (response.candidates ?? []).map((candidate) => ({
      fragments: (candidate.content?.parts ?? [])
        .map((part) => part.text ?? '')
        .filter((text) => text !== ''),
    })),
  };
}

export class GeminiModelCaller extends BaseModelCaller {
  name = 'gemini';
  private models: GeminiModelsApi;

  constructor(apiKey?: string, models?: GeminiModelsApi) {
    super();
    if (models) {
      this.models = models;
    } else {
      const key = this.validateApiKey(apiKey, 'Gemini');
      this.models = new GoogleGenAI({ apiKey: key }).models;
    }
  }

  async generateContent(request: ModelRequest, signal?: AbortSignal): Promise<ModelResponse> {
    if (signal?.aborted) {
      throw new OperationCancelledError('Request aborted');
    }

    getLogger({ stage: LogStage.MODEL_REQUEST }).debug(
      `AI: generateContent model=${request.model} segments=${request.segments.length}`
    );

    let response: GenerateContentResponse;
    try {
      response = await this.models.generateContent({
        model: request.model,
        contents: [{ role: 'user', parts: request.segments.map((text) => ({ text })) }],
        ...(signal ? { config: { abortSignal: signal } } : {}),
      });
    } catch (error) {
      throw normalizeGeminiError(error);
    }

    const result = toModelResponse(response);
    if (result.candidates.length === 0) {
      getLogger({ stage: LogStage.MODEL_RESPONSE }).warn(
        `AI: Gemini returned no candidates promptFeedback=${JSON.stringify(response.promptFeedback ?? null)}`
      );
    }
    return result;
  }
}
