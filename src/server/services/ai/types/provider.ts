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

export interface ModelRequest {
  model: string;
  segments: string[];
}

export interface ModelCandidate {
  fragments: string[];
}

export interface ModelResponse {
  candidates: ModelCandidate[];
}

/**
 * One upstream model call. Implementations throw ModelCallError for API failures so
 * the retry layer can read status codes and retry hints without knowing the SDK.
 */
export interface ModelCaller {
  name: string;

  generateContent(request: ModelRequest, signal?: AbortSignal): Promise<ModelResponse>;
}
