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

import { ModelCaller, ModelRequest, ModelResponse } from '../types/provider';

export abstract class BaseModelCaller implements ModelCaller {
  abstract name: string;

  abstract generateContent(request: ModelRequest, signal?: AbortSignal): Promise<ModelResponse>;

  protected validateApiKey(apiKey: string | undefined, providerName: string): string {
    if (!apiKey) {
      throw new Error(
        `${providerName} API key is required. ` +
          `Mount it as google_api_key in the secrets directory or set GOOGLE_API_KEY.`
      );
    }
    return apiKey;
  }
}
