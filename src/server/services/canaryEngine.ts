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

import { EngineConfig } from 'server/lib/engineConfig';
import { createOctokitClient, OctokitIssueCreator } from 'server/lib/github/client';
import { KubePodLogFetcher, PodLogFetcher } from 'server/lib/kubernetes/podLogs';
import { GeminiModelCaller } from 'server/services/ai/providers/gemini';
import { ModelCaller } from 'server/services/ai/types/provider';
import { DelegateClient, RemediationTrigger } from 'server/services/types/canaryAnalysis';
import { AgentDelegationClient } from './analysis/delegationClient';
import { DirectModelAnalyzer } from './analysis/directAnalyzer';
import { ModeDispatcher } from './analysis/dispatcher';
import { DecisionResolver } from './analysis/resolver';
import { GitHubIssueRemediation } from './remediation/githubIssue';
import { CanaryMetricProvider } from './canaryMetric';

export interface CanaryEngineOverrides {
  modelCaller?: ModelCaller;
  delegate?: DelegateClient;
  podLogs?: PodLogFetcher;
  remediation?: RemediationTrigger;
  random?: () => number;
  now?: () => Date;
}

export function createCanaryEngine(config: EngineConfig, overrides: CanaryEngineOverrides = {}): CanaryMetricProvider {
  const modelCaller = overrides.modelCaller ?? new GeminiModelCaller(config.secrets.googleApiKey);
  const direct = new DirectModelAnalyzer(modelCaller, {
    maxAttempts: config.aiMaxAttempts,
    random: overrides.random,
  });

  const delegate =
    overrides.delegate ??
    new AgentDelegationClient({
      baseUrl: config.agentUrl,
      userId: config.agentUserId,
      healthTimeoutMs: config.delegateHealthTimeoutMs,
      analyzeTimeoutMs: config.delegateAnalyzeTimeoutMs,
    });

  const remediation =
    overrides.remediation ??
    new GitHubIssueRemediation(
      new OctokitIssueCreator(createOctokitClient({ token: config.secrets.githubToken, caller: 'canaryFailureIssue' }))
    );

  return new CanaryMetricProvider({
    dispatcher: new ModeDispatcher(direct, delegate),
    resolver: new DecisionResolver(remediation),
    podLogs: overrides.podLogs ?? new KubePodLogFetcher(),
    defaultModel: config.defaultModel,
    now: overrides.now,
  });
}
