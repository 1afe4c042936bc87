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
  getLogger: () => ({ info: jest.fn(), error: jest.fn(), warn: jest.fn(), debug: jest.fn() }),
  LogStage: jest.requireActual('server/lib/logger/stages').LogStage,
}));

import { ApiError as GeminiApiError } from '@google/genai';
import { GeminiModelCaller } from '../gemini';
import { ModelCallError } from '../../errors';
import { OperationCancelledError } from 'server/lib/errors';

describe('GeminiModelCaller', () => {
  const generateContent = jest.fn();
  let caller: GeminiModelCaller;

  beforeEach(() => {
    generateContent.mockReset();
    caller = new GeminiModelCaller(undefined, { generateContent });
  });

  it('sends all segments as parts of a single user turn', async () => {
    generateContent.mockResolvedValue({ candidates: [] });

    await caller.generateContent({ model: 'gemini-2.0-flash', segments: ['instructions', 'logs'] });

    expect(generateContent).toHaveBeenCalledWith({
      model: 'gemini-2.0-flash',
      contents: [{ role: 'user', parts: [{ text: 'instructions' }, { text: 'logs' }] }],
    });
  });

  it('forwards the abort signal to the SDK', async () => {
    generateContent.mockResolvedValue({ candidates: [] });
    const controller = new AbortController();

    await caller.generateContent({ model: 'm', segments: ['x'] }, controller.signal);

    expect(generateContent).toHaveBeenCalledWith(expect.objectContaining({ config: { abortSignal: controller.signal } }));
  });

  it('maps candidates to text fragments and drops non-text parts', async () => {
    generateContent.mockResolvedValue({
      candidates: [
        { content: { parts: [{ text: '{"text":' }, { functionCall: { name: 'noop' } }, { text: '"ok"}' }] } },
        { content: { parts: [{ text: 'second' }] } },
        {},
      ],
    });

    const response = await caller.generateContent({ model: 'm', segments: ['x'] });

    expect(response).toEqual({
      candidates: [{ fragments: ['{"text":', '"ok"}'] }, { fragments: ['second'] }, { fragments: [] }],
    });
  });

  it('normalizes SDK errors into ModelCallError', async () => {
    generateContent.mockRejectedValue(
      new GeminiApiError({
        message: JSON.stringify({ error: { code: 429, message: 'quota', status: 'RESOURCE_EXHAUSTED', details: [] } }),
        status: 429,
      })
    );

    const error = await caller.generateContent({ model: 'm', segments: ['x'] }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelCallError);
    expect(error).toMatchObject({ status: 429, statusText: 'RESOURCE_EXHAUSTED', message: 'quota' });
  });

  it('refuses to call the SDK with an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(caller.generateContent({ model: 'm', segments: ['x'] }, controller.signal)).rejects.toBeInstanceOf(
      OperationCancelledError
    );
    expect(generateContent).not.toHaveBeenCalled();
  });

  it('requires an API key when no client is injected', () => {
    expect(() => new GeminiModelCaller()).toThrow('Gemini API key is required.');
  });
});
