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

import 'dotenv/config';

type EnvValue = string | number;

const getEnvConfig = <T extends EnvValue>(key: string, fallback?: T): string | T => {
  const value = process.env[key];
  if (value !== undefined && value !== '') {
    return value;
  }
  if (fallback !== undefined) {
    return fallback;
  }

  throw new Error(`Required config missing: '${key}'`);
};

const getNumericEnvConfig = (key: string, fallback: number): number => {
  const value = Number(getEnvConfig(key, fallback));
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid numeric config '${key}': expected a positive number`);
  }
  return value;
};

export const LOG_LEVEL = getEnvConfig('LOG_LEVEL', 'info');

/**
 * @description mounted secret files (google_api_key, google_cloud_project, github_token)
 */
export const SECRETS_DIR = getEnvConfig('SECRETS_DIR', '/etc/secrets');

/**
 * @description delegated analysis (remote diagnostic agent)
 */
export const K8S_AGENT_URL = getEnvConfig('K8S_AGENT_URL', 'http://kubernetes-agent.argo-rollouts.svc.cluster.local:8080');
export const AGENT_USER_ID = getEnvConfig('AGENT_USER_ID', 'argo-rollouts');
export const DELEGATE_HEALTH_TIMEOUT_MS = getNumericEnvConfig('DELEGATE_HEALTH_TIMEOUT_MS', 10_000);
export const DELEGATE_ANALYZE_TIMEOUT_MS = getNumericEnvConfig('DELEGATE_ANALYZE_TIMEOUT_MS', 5 * 60 * 1000);

/**
 * @description direct model analysis
 */
export const AI_MAX_ATTEMPTS = getNumericEnvConfig('AI_MAX_ATTEMPTS', 3);
export const DEFAULT_MODEL = getEnvConfig('DEFAULT_MODEL', 'gemini-2.0-flash');

export const PLUGIN_CONFIG_KEY = 'argoproj-labs/metric-ai';
