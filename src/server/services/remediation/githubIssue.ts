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

import { IssueCreator, parseRepositoryUrl } from 'server/lib/github/client';
import {
  RemediationRequest,
  RemediationResult,
  RemediationTrigger,
} from 'server/services/types/canaryAnalysis';
import { RemediationError, toError } from 'server/lib/errors';
import { getLogger, LogStage } from 'server/lib/logger';

export const MAX_ISSUE_LOG_CHARS = 60_000;
export const CANARY_FAILURE_LABELS = ['canary-failure', 'ai-analysis'];

export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return `${text.substring(0, max)}...`;
}

export function buildIssueBody(request: RemediationRequest): string {
  return [
    '## Canary analysis failed',
    '',
    `**Model:** ${request.modelIdentifier}`,
    `**Base branch:** ${request.baseBranch || 'not specified'}`,
    '',
    '### Analysis',
    '',
    request.narrative || '_No analysis text was returned._',
    '',
    '### Logs',
    '',
    '```',
    truncate(request.logContext, MAX_ISSUE_LOG_CHARS),
    '```',
  ].join('\n');
}

/**
 * Opens a GitHub issue describing a failed canary in the repository the metric points at.
 */
export class GitHubIssueRemediation implements RemediationTrigger {
  private issues: IssueCreator;

  constructor(issues: IssueCreator) {
    this.issues = issues;
  }

  async trigger(request: RemediationRequest): Promise<RemediationResult> {
    if (!request.githubUrl) {
      throw new RemediationError('githubUrl is not configured, skipping issue creation');
    }

    const coordinates = parseRepositoryUrl(request.githubUrl);
    if (!coordinates) {
      throw new RemediationError(`invalid GitHub repository URL: ${request.githubUrl}`);
    }

    const repo = `${coordinates.owner}/${coordinates.repo}`;
    getLogger({ stage: LogStage.REMEDIATION_STARTING, repo }).info('GitHub: creating canary failure issue');

    try {
      const issue = await this.issues.createIssue({
        ...coordinates,
        title: `Canary analysis failed (${request.modelIdentifier})`,
        body: buildIssueBody(request),
        labels: CANARY_FAILURE_LABELS,
      });
      return { issueNumber: issue.number, issueUrl: issue.url };
    } catch (error) {
      throw new RemediationError(`failed to create issue in ${repo}: ${toError(error).message}`, error);
    }
  }
}
