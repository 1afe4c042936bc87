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

const mockRequest = jest.fn();
jest.mock('@octokit/core', () => ({
  Octokit: jest.fn().mockImplementation(() => ({ request: mockRequest })),
}));
jest.mock('server/lib/logger', () => ({
  getLogger: () => ({ info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() }),
}));

import { Octokit } from '@octokit/core';
import { OctokitIssueCreator, createOctokitClient, parseRepositoryUrl } from '../client';

describe('github client', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('creates an authenticated client', () => {
    createOctokitClient({ token: 'test-token' });

    expect(Octokit).toHaveBeenCalledWith({ auth: 'test-token', userAgent: 'rollouts-metric-canary-ai' });
  });

  it('creates issues through the REST endpoint', async () => {
    mockRequest.mockResolvedValue({ data: { number: 42, html_url: 'https://github.com/acme/shop/issues/42' } });
    const creator = new OctokitIssueCreator(createOctokitClient({ token: 'test-token' }));

    const issue = await creator.createIssue({ owner: 'acme', repo: 'shop', title: 't', body: 'b', labels: ['x'] });

    expect(issue).toEqual({ number: 42, url: 'https://github.com/acme/shop/issues/42' });
    expect(mockRequest).toHaveBeenCalledWith('POST /repos/{owner}/{repo}/issues', {
      owner: 'acme',
      repo: 'shop',
      title: 't',
      body: 'b',
      labels: ['x'],
    });
  });

  describe('parseRepositoryUrl', () => {
    it.each<[string, { owner: string; repo: string }]>([
      ['https://github.com/acme/shop', { owner: 'acme', repo: 'shop' }],
      ['https://github.com/acme/shop.git', { owner: 'acme', repo: 'shop' }],
      ['https://github.com/acme/shop/', { owner: 'acme', repo: 'shop' }],
      ['git@github.com:acme/shop.git', { owner: 'acme', repo: 'shop' }],
      ['git@github.com:acme/shop', { owner: 'acme', repo: 'shop' }],
    ])('parses %s', (url, expected) => {
      expect(parseRepositoryUrl(url)).toEqual(expected);
    });

    it.each(['', 'acme/shop', 'https://github.com/acme', 'https://github.com/acme/shop/tree/main'])(
      'rejects %p',
      (url) => {
        expect(parseRepositoryUrl(url)).toBeNull();
      }
    );
  });
});
