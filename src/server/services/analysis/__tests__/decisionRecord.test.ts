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

import { clampConfidence, parseDecisionRecord, zeroDecision } from '../decisionRecord';

describe('decisionRecord', () => {
  describe('parseDecisionRecord', () => {
    it('parses a complete record', () => {
      expect(parseDecisionRecord('{"text":"looks fine","promote":true,"confidence":85}')).toEqual({
        narrative: 'looks fine',
        promote: true,
        confidence: 85,
      });
    });

    it('fills missing fields with zero values', () => {
      expect(parseDecisionRecord('{"promote":true}')).toEqual({ narrative: '', promote: true, confidence: 0 });
    });

    it('ignores unknown fields', () => {
      expect(parseDecisionRecord('{"text":"t","promote":false,"confidence":10,"extra":[1]}')).toEqual({
        narrative: 't',
        promote: false,
        confidence: 10,
      });
    });

    it('rejects a field of the wrong type', () => {
      expect(parseDecisionRecord('{"text":"t","promote":"yes","confidence":10}')).toBeNull();
    });

    it('rejects text that is not JSON', () => {
      expect(parseDecisionRecord('The canary looks healthy.')).toBeNull();
    });

    it('rejects JSON that is not an object', () => {
      expect(parseDecisionRecord('[1,2]')).toBeNull();
      expect(parseDecisionRecord('42')).toBeNull();
    });

    it('rounds and clamps confidence', () => {
      expect(parseDecisionRecord('{"confidence":150}')?.confidence).toBe(100);
      expect(parseDecisionRecord('{"confidence":-3}')?.confidence).toBe(0);
      expect(parseDecisionRecord('{"confidence":72.6}')?.confidence).toBe(73);
    });
  });

  describe('clampConfidence', () => {
    it('maps non-finite values to zero', () => {
      expect(clampConfidence(Number.NaN)).toBe(0);
      expect(clampConfidence(Number.POSITIVE_INFINITY)).toBe(0);
    });
  });

  it('zeroDecision returns a fresh zero-value record', () => {
    const first = zeroDecision();
    first.promote = true;
    expect(zeroDecision()).toEqual({ narrative: '', promote: false, confidence: 0 });
  });
});
