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
  AnalysisInput,
  DecisionRecord,
  RemediationTrigger,
  RepositoryCoordinates,
  Verdict,
} from 'server/services/types/canaryAnalysis';
import { toError } from 'server/lib/errors';
import { getLogger, LogStage } from 'server/lib/logger';

export function formatScore(confidence: number): string {
  return (confidence / 100).toFixed(2);
}

export class DecisionResolver {
  private remediation: RemediationTrigger;

  constructor(remediation: RemediationTrigger) {
    this.remediation = remediation;
  }

  resolve(record: DecisionRecord): Verdict {
    if (record.promote) {
      return { kind: 'promote', score: formatScore(record.confidence), confidence: record.confidence };
    }
    return { kind: 'fail', score: '0', confidence: record.confidence };
  }

  resolveError(error: unknown): Verdict {
    return { kind: 'error', message: toError(error).message };
  }

  /**
   * Opens the remediation for a failed canary. Failures are logged and never reach the verdict.
   */
  async onFailure(input: AnalysisInput, record: DecisionRecord, repository: RepositoryCoordinates): Promise<void> {
    const logger = getLogger({ stage: LogStage.REMEDIATION_STARTING });
    logger.info(`Remediation: canary failed, triggering remediation githubUrl=${repository.githubUrl || 'none'}`);

    try {
      const result = await this.remediation.trigger({
        logContext: input.logContext,
        narrative: record.narrative,
        modelIdentifier: input.modelIdentifier,
        githubUrl: repository.githubUrl,
        baseBranch: repository.baseBranch,
      });
      getLogger({ stage: LogStage.REMEDIATION_COMPLETE }).info(
        `Remediation: issue created number=${result.issueNumber} url=${result.issueUrl}`
      );
    } catch (error) {
      getLogger({ stage: LogStage.REMEDIATION_FAILED }).error(
        { error: toError(error) },
        'Remediation: failed to create canary failure issue'
      );
    }
  }
}
