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

import * as k8s from '@kubernetes/client-node';
import { ConfigurationError, PodsNotFoundError, toError } from 'server/lib/errors';
import { getLogger, LogStage } from 'server/lib/logger';

export const POD_TEMPLATE_HASH_LABEL = 'rollouts-pod-template-hash';

export type PodApi = Pick<k8s.CoreV1Api, 'listNamespacedPod' | 'readNamespacedPodLog'>;

export interface PodLogFetcher {
  /** full log of the first pod matching the selector; PodsNotFoundError when none match */
  fetchFirstPodLogs(namespace: string, labelSelector: string): Promise<string>;
  findFirstPodName(namespace: string, labelSelector: string, limit?: number): Promise<string | null>;
}

export function loadKubeConfig(): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  try {
    kc.loadFromCluster();
  } catch {
    kc.loadFromDefault();
  }
  return kc;
}

export class KubePodLogFetcher implements PodLogFetcher {
  private coreApi: PodApi;

  constructor(coreApi?: PodApi) {
    this.coreApi = coreApi ?? loadKubeConfig().makeApiClient(k8s.CoreV1Api);
  }

  async findFirstPodName(namespace: string, labelSelector: string, limit?: number): Promise<string | null> {
    const podResp = await this.coreApi.listNamespacedPod(
      namespace,
      undefined,
      undefined,
      undefined,
      undefined,
      labelSelector,
      limit
    );
    const pods = podResp.body.items ?? [];
    return pods[0]?.metadata?.name ?? null;
  }

  async fetchFirstPodLogs(namespace: string, labelSelector: string): Promise<string> {
    const logger = getLogger({ stage: LogStage.LOGS_FETCHING, namespace });

    let podName: string | null;
    try {
      podName = await this.findFirstPodName(namespace, labelSelector);
    } catch (error) {
      logger.error({ error }, `K8s: failed to list pods labelSelector=${labelSelector}`);
      throw new Error(
        `failed to list pods for selector ${labelSelector} in namespace ${namespace}: ${toError(error).message}`,
        { cause: error }
      );
    }

    if (!podName) {
      getLogger({ stage: LogStage.LOGS_MISSING, namespace }).warn(`K8s: no pods found labelSelector=${labelSelector}`);
      throw new PodsNotFoundError(namespace, labelSelector);
    }

    try {
      const logResp = await this.coreApi.readNamespacedPodLog(podName, namespace);
      getLogger({ stage: LogStage.LOGS_FETCHED, namespace }).debug(
        `K8s: fetched pod logs podName=${podName} length=${logResp.body.length}`
      );
      return logResp.body;
    } catch (error) {
      logger.error({ error }, `K8s: failed to fetch logs podName=${podName}`);
      throw new Error(
        `failed to fetch logs for pod ${podName} in namespace ${namespace}: ${toError(error).message}`,
        { cause: error }
      );
    }
  }
}

/**
 * A target without a dash is a pod template hash; it is resolved to the name of the first
 * pod carrying that hash.
 */
export async function resolvePodName(fetcher: PodLogFetcher, namespace: string, target: string): Promise<string> {
  if (target.includes('-')) {
    return target;
  }

  const selector = `${POD_TEMPLATE_HASH_LABEL}=${target}`;
  let podName: string | null;
  try {
    podName = await fetcher.findFirstPodName(namespace, selector, 1);
  } catch (error) {
    throw new Error(`failed to find pod with template hash ${target}: ${toError(error).message}`, { cause: error });
  }

  if (!podName) {
    throw new ConfigurationError(`no pods found with template hash ${target}`, { namespace, templateHash: target });
  }

  getLogger({ namespace }).info(`K8s: resolved pod template hash templateHash=${target} podName=${podName}`);
  return podName;
}
