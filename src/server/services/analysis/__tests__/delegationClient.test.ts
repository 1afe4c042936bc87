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

import axios, { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { AgentDelegationClient, decodeDelegateResponse } from '../delegationClient';
import { DelegateResponseError, DelegateUnreachableError, OperationCancelledError } from 'server/lib/errors';

function respondWith(status: number, data: unknown, seen?: InternalAxiosRequestConfig[]): AxiosAdapter {
  return async (config) => {
    seen?.push(config);
    return { data, status, statusText: '', headers: {}, config };
  };
}

const refuseConnection: AxiosAdapter = async (config) => {
  throw new AxiosError('connect ECONNREFUSED 127.0.0.1:8080', 'ECONNREFUSED', config);
};

function clientWith(adapter: AxiosAdapter, userId?: string): AgentDelegationClient {
  return new AgentDelegationClient({
    baseUrl: 'http://agent.test',
    userId,
    http: axios.create({ baseURL: 'http://agent.test', adapter }),
  });
}

const agentAnswer = JSON.stringify({
  analysis: 'canary leaks connections',
  rootCause: 'pool not closed',
  remediation: 'close the pool on shutdown',
  prLink: 'https://github.com/acme/shop/pull/7',
  promote: false,
  confidence: 88,
});

describe('AgentDelegationClient', () => {
  describe('healthCheck', () => {
    it('treats a 404 answer as healthy', async () => {
      const seen: InternalAxiosRequestConfig[] = [];
      const client = clientWith(respondWith(404, 'not found', seen));

      await expect(client.healthCheck()).resolves.toBeUndefined();
      expect(seen[0].method).toBe('get');
      expect(seen[0].url).toBe('/');
      expect(seen[0].timeout).toBe(10_000);
    });

    it('reports a refused connection as unreachable', async () => {
      const client = clientWith(refuseConnection);

      const error = await client.healthCheck().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DelegateUnreachableError);
      expect(error).toHaveProperty('message', 'health check failed: connect ECONNREFUSED 127.0.0.1:8080');
      expect(error).toHaveProperty('code', 'DELEGATE_UNREACHABLE');
    });

    it('reports an aborted signal as cancellation', async () => {
      const controller = new AbortController();
      controller.abort();
      const client = clientWith(respondWith(200, ''));

      await expect(client.healthCheck(controller.signal)).rejects.toBeInstanceOf(OperationCancelledError);
    });
  });

  describe('analyze', () => {
    it('posts the analysis request and decodes the answer', async () => {
      const seen: InternalAxiosRequestConfig[] = [];
      const client = clientWith(respondWith(200, agentAnswer, seen));

      const result = await client.analyze('shop', 'shop-7d9f-abcde', 'stable text', 'canary text');

      expect(result).toEqual({
        analysis: 'canary leaks connections',
        rootCause: 'pool not closed',
        remediation: 'close the pool on shutdown',
        prLink: 'https://github.com/acme/shop/pull/7',
        promote: false,
        confidence: 88,
      });
      expect(seen[0].method).toBe('post');
      expect(seen[0].url).toBe('/a2a/analyze');
      expect(seen[0].timeout).toBe(300_000);
      expect(JSON.parse(String(seen[0].data))).toEqual({
        userId: 'argo-rollouts',
        prompt:
          'Analyze canary deployment issue. Namespace: shop, Pod: shop-7d9f-abcde. ' +
          'Compare stable vs canary behavior and determine if canary should be promoted.',
        context: {
          namespace: 'shop',
          podName: 'shop-7d9f-abcde',
          stableLogs: 'stable text',
          canaryLogs: 'canary text',
        },
      });
    });

    it('sends the configured operator identity', async () => {
      const seen: InternalAxiosRequestConfig[] = [];
      const client = clientWith(respondWith(200, agentAnswer, seen), 'release-bot');

      await client.analyze('shop', 'shop-1', '', '');

      expect(JSON.parse(String(seen[0].data))).toHaveProperty('userId', 'release-bot');
    });

    it('rejects a non-success status', async () => {
      const client = clientWith(respondWith(503, 'unavailable'));

      const error = await client.analyze('shop', 'shop-1', '', '').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DelegateResponseError);
      expect(error).toHaveProperty('message', 'agent returned status 503');
      expect(error).toHaveProperty('statusCode', 503);
    });

    it('rejects a body that is not JSON', async () => {
      const client = clientWith(respondWith(200, '<html>oops</html>'));

      const error = await client.analyze('shop', 'shop-1', '', '').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DelegateResponseError);
      expect(String(error)).toContain('failed to decode response:');
    });

    it('reports a transport failure as unreachable', async () => {
      const client = clientWith(refuseConnection);

      await expect(client.analyze('shop', 'shop-1', '', '')).rejects.toThrow(
        'failed to send request: connect ECONNREFUSED 127.0.0.1:8080'
      );
    });
  });
});

describe('decodeDelegateResponse', () => {
  it('fills missing fields with zero values and omits an empty change link', () => {
    expect(decodeDelegateResponse('{"promote":true,"confidence":64.4,"prLink":""}', 200)).toEqual({
      analysis: '',
      rootCause: '',
      remediation: '',
      promote: true,
      confidence: 64,
    });
  });

  it('accepts an already parsed body', () => {
    expect(decodeDelegateResponse({ analysis: 'x', promote: false, confidence: 5 }, 200)).toEqual({
      analysis: 'x',
      rootCause: '',
      remediation: '',
      promote: false,
      confidence: 5,
    });
  });

  it('rejects a field of the wrong type', () => {
    expect(() => decodeDelegateResponse('{"promote":"yes"}', 200)).toThrow(DelegateResponseError);
  });

  it('rejects a JSON array', () => {
    expect(() => decodeDelegateResponse('[]', 200)).toThrow('failed to decode response:');
  });
});
