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

import { GitHubIssueRemediation, MAX_ISSUE_LOG_CHARS, buildIssueBody, truncate } from '../githubIssue';
import { CreateIssueOptions, CreatedIssue, IssueCreator } from 'server/lib/github/client';
import { RemediationError } from 'server/lib/errors';
import { RemediationRequest } from 'server/services/types/canaryAnalysis';

describe('GitHubIssueRemediation', () => {
  const createIssue = jest.fn<Promise<CreatedIssue>, [CreateIssueOptions]>();
  const issues: IssueCreator = { createIssue };
  const remediation = new GitHubIssueRemediation(issues);

  const request: RemediationRequest = {
    logContext: 'logs',
    narrative: 'canary returns 500s',
    modelIdentifier: 'gemini-2.0-flash',
    githubUrl: 'git@github.com:acme/shop.git',
    baseBranch: 'main',
  };

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('opens an issue in the configured repository', async () => {
    createIssue.mockResolvedValue({ number: 3, url: 'https://github.com/acme/shop/issues/3' });

    await expect(remediation.trigger(request)).resolves.toEqual({
      issueNumber: 3,
      issueUrl: 'https://github.com/acme/shop/issues/3',
    });
    expect(createIssue).toHaveBeenCalledWith({
      owner: 'acme',
      repo: 'shop',
      title: 'Canary analysis failed (gemini-2.0-flash)',
      body: buildIssueBody(request),
      labels: ['canary-failure', 'ai-analysis'],
    });
  });

  it('requires a repository URL', async () => {
    const error = await remediation.trigger({ ...request, githubUrl: undefined }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemediationError);
    expect(error).toHaveProperty('code', 'REMEDIATION_FAILED');
    expect(createIssue).not.toHaveBeenCalled();
  });

  it('rejects a URL it cannot read', async () => {
    await expect(remediation.trigger({ ...request, githubUrl: 'not a url' })).rejects.toThrow(
      'invalid GitHub repository URL: not a url'
    );
  });

  it('wraps API failures', async () => {
    createIssue.mockRejectedValue(new Error('Bad credentials'));

    await expect(remediation.trigger(request)).rejects.toThrow('failed to create issue in acme/shop: Bad credentials');
  });
});

describe('buildIssueBody', () => {
  it('lists model, branch, narrative and logs', () => {
    expect(
      buildIssueBody({ logContext: 'L', narrative: 'N', modelIdentifier: 'm', baseBranch: 'main' })
    ).toBe(
      [
        '## Canary analysis failed',
        '',
        '**Model:** m',
        '**Base branch:** main',
        '',
        '### Analysis',
        '',
        'N',
        '',
        '### Logs',
        '',
        '```',
        'L',
        '```',
      ].join('\n')
    );
  });

  it('truncates long log context', () => {
    const body = buildIssueBody({ logContext: 'x'.repeat(MAX_ISSUE_LOG_CHARS + 10), narrative: '', modelIdentifier: 'm' });

    expect(body).toContain(`${'x'.repeat(MAX_ISSUE_LOG_CHARS)}...\n\`\`\``);
    expect(body).toContain('**Base branch:** not specified');
  });
});

describe('truncate', () => {
  it('keeps short text', () => {
    expect(truncate('abc', 3)).toBe('abc');
  });

  it('cuts and marks long text', () => {
    expect(truncate('abcdef', 3)).toBe('abc...');
  });
});
