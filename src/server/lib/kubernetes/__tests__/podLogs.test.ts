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

jest.mock('server/lib/logger', () => ({
  getLogger: () => ({ info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() }),
  LogStage: jest.requireActual('server/lib/logger/stages').LogStage,
}));

import { KubePodLogFetcher, PodApi, PodLogFetcher, resolvePodName } from '../podLogs';
import { ConfigurationError, PodsNotFoundError } from 'server/lib/errors';

function podList(...names: string[]) {
  return { response: {}, body: { items: names.map((name) => ({ metadata: { name } })) } };
}

describe('KubePodLogFetcher', () => {
  const listNamespacedPod = jest.fn();
  const readNamespacedPodLog = jest.fn();
  const coreApi: PodApi = { listNamespacedPod, readNamespacedPodLog };
  const fetcher = new KubePodLogFetcher(coreApi);

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('reads the full log of the first matching pod', async () => {
    listNamespacedPod.mockResolvedValue(podList('web-stable-a', 'web-stable-b'));
    readNamespacedPodLog.mockResolvedValue({ response: {}, body: 'GET / 200\n' });

    await expect(fetcher.fetchFirstPodLogs('shop', 'role=stable')).resolves.toBe('GET / 200\n');
    expect(listNamespacedPod).toHaveBeenCalledWith(
      'shop',
      undefined,
      undefined,
      undefined,
      undefined,
      'role=stable',
      undefined
    );
    expect(readNamespacedPodLog).toHaveBeenCalledWith('web-stable-a', 'shop');
  });

  it('raises PodsNotFoundError when no pod matches', async () => {
    listNamespacedPod.mockResolvedValue(podList());

    const error = await fetcher.fetchFirstPodLogs('shop', 'role=canary').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PodsNotFoundError);
    expect(error).toHaveProperty('message', 'no pods found for selector role=canary in namespace shop');
    expect(readNamespacedPodLog).not.toHaveBeenCalled();
  });

  it('wraps list failures', async () => {
    listNamespacedPod.mockRejectedValue(new Error('forbidden'));

    await expect(fetcher.fetchFirstPodLogs('shop', 'role=stable')).rejects.toThrow(
      'failed to list pods for selector role=stable in namespace shop: forbidden'
    );
  });

  it('wraps log read failures', async () => {
    listNamespacedPod.mockResolvedValue(podList('web-stable-a'));
    readNamespacedPodLog.mockRejectedValue(new Error('container is waiting to start'));

    await expect(fetcher.fetchFirstPodLogs('shop', 'role=stable')).rejects.toThrow(
      'failed to fetch logs for pod web-stable-a in namespace shop: container is waiting to start'
    );
  });

  it('passes the limit when looking up a pod name', async () => {
    listNamespacedPod.mockResolvedValue(podList('web-6f7d8-x'));

    await expect(fetcher.findFirstPodName('shop', 'app=web', 1)).resolves.toBe('web-6f7d8-x');
    expect(listNamespacedPod.mock.calls[0][6]).toBe(1);
  });
});

describe('resolvePodName', () => {
  const findFirstPodName = jest.fn<Promise<string | null>, [string, string, number?]>();
  const fetcher: PodLogFetcher = { findFirstPodName, fetchFirstPodLogs: jest.fn() };

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('keeps a name that contains a dash', async () => {
    await expect(resolvePodName(fetcher, 'shop', 'web-6f7d8-x')).resolves.toBe('web-6f7d8-x');
    expect(findFirstPodName).not.toHaveBeenCalled();
  });

  it('resolves a template hash to the first pod carrying it', async () => {
    findFirstPodName.mockResolvedValue('web-6f7d8c9b5-q2x7z');

    await expect(resolvePodName(fetcher, 'shop', '6f7d8c9b5')).resolves.toBe('web-6f7d8c9b5-q2x7z');
    expect(findFirstPodName).toHaveBeenCalledWith('shop', 'rollouts-pod-template-hash=6f7d8c9b5', 1);
  });

  it('rejects a template hash without pods', async () => {
    findFirstPodName.mockResolvedValue(null);

    const error = await resolvePodName(fetcher, 'shop', '6f7d8c9b5').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toHaveProperty('message', 'no pods found with template hash 6f7d8c9b5');
  });

  it('wraps lookup failures', async () => {
    findFirstPodName.mockRejectedValue(new Error('timeout'));

    await expect(resolvePodName(fetcher, 'shop', 'abc123')).rejects.toThrow(
      'failed to find pod with template hash abc123: timeout'
    );
  });
});
