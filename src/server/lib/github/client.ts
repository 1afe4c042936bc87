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

import { Octokit } from '@octokit/core';
import { getLogger } from 'server/lib/logger';

export interface CreateIssueOptions {
  owner: string;
  repo: string;
  title: string;
  body: string;
  labels?: string[];
}

export interface CreatedIssue {
  number: number;
  url: string;
}

export interface IssueCreator {
  createIssue(options: CreateIssueOptions): Promise<CreatedIssue>;
}

export function createOctokitClient({ token, caller }: { token: string; caller?: string }): Octokit {
  getLogger().debug(`GitHub: creating client caller=${caller || 'unknown'}`);
  return new Octokit({ auth: token, userAgent: 'rollouts-metric-canary-ai' });
}

export class OctokitIssueCreator implements IssueCreator {
  private client: Octokit;

  constructor(client: Octokit) {
    this.client = client;
  }

  async createIssue({ owner, repo, title, body, labels }: CreateIssueOptions): Promise<CreatedIssue> {
    const response = await this.client.request('POST /repos/{owner}/{repo}/issues', {
      owner,
      repo,
      title,
      body,
      labels,
    });
    return { number: response.data.number, url: response.data.html_url };
  }
}

/**
 * Accepts `https://github.com/owner/repo`, `git@github.com:owner/repo` and either with a
 * trailing `.git` or slash.
 */
export function parseRepositoryUrl(url: string): { owner: string; repo: string } | null {
  const match = /^(?:https?:\/\/[^/]+\/|git@[^:]+:)([^/\s]+)\/([^/\s]+?)(?:\.git)?\/?$/.exec(url.trim());
  if (!match) return null;
  return { owner: match[1], repo: match[2] };
}
