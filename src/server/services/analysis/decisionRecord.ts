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

import { DecisionRecord } from 'server/services/types/canaryAnalysis';
import { decisionRecordSchema } from 'server/lib/validation/canarySchemas';
import { validateAgainst } from 'server/lib/validation/validate';

export function zeroDecision(): DecisionRecord {
  return { narrative: '', promote: false, confidence: 0 };
}

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, Math.round(value)));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses a model answer of the form `{"text": ..., "promote": ..., "confidence": ...}`.
 * Returns null when the text is not a JSON object or a present field has the wrong type.
 */
export function parseDecisionRecord(text: string): DecisionRecord | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }

  if (!isRecord(parsed) || !validateAgainst(parsed, decisionRecordSchema).valid) {
    return null;
  }

  const { text: narrative, promote, confidence } = parsed;
  return {
    narrative: typeof narrative === 'string' ? narrative : '',
    promote: promote === true,
    confidence: typeof confidence === 'number' ? clampConfidence(confidence) : 0,
  };
}
