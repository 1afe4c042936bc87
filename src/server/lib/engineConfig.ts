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
  AGENT_USER_ID,
  AI_MAX_ATTEMPTS,
  DEFAULT_MODEL,
  DELEGATE_ANALYZE_TIMEOUT_MS,
  DELEGATE_HEALTH_TIMEOUT_MS,
  K8S_AGENT_URL,
  SECRETS_DIR,
} from 'shared/config';
import { EngineSecrets, loadSecretsFromDirectory } from './secrets';

export interface EngineConfig {
  readonly secrets: Readonly<EngineSecrets>;
  readonly agentUrl: string;
  readonly agentUserId: string;
  readonly aiMaxAttempts: number;
  readonly defaultModel: string;
  readonly delegateHealthTimeoutMs: number;
  readonly delegateAnalyzeTimeoutMs: number;
}

export type EngineSettings = Omit<EngineConfig, 'secrets'>;

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = Object.freeze({
  agentUrl: K8S_AGENT_URL,
  agentUserId: AGENT_USER_ID,
  aiMaxAttempts: AI_MAX_ATTEMPTS,
  defaultModel: DEFAULT_MODEL,
  delegateHealthTimeoutMs: DELEGATE_HEALTH_TIMEOUT_MS,
  delegateAnalyzeTimeoutMs: DELEGATE_ANALYZE_TIMEOUT_MS,
});

export function buildEngineConfig(secrets: EngineSecrets, settings: Partial<EngineSettings> = {}): EngineConfig {
  return Object.freeze({
    ...DEFAULT_ENGINE_SETTINGS,
    ...settings,
    secrets: Object.freeze({ ...secrets }),
  });
}

export async function loadEngineConfig(
  secretsDir: string = SECRETS_DIR,
  settings: Partial<EngineSettings> = {}
): Promise<EngineConfig> {
  const secrets = await loadSecretsFromDirectory(secretsDir);
  return buildEngineConfig(secrets, settings);
}
