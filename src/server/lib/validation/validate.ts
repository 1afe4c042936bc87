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

import JsonSchema, { type Schema } from 'jsonschema';

const validator = new JsonSchema.Validator();

export interface SchemaValidation {
  valid: boolean;
  errors: string[];
}

export function validateAgainst(instance: unknown, schema: Schema): SchemaValidation {
  const result = validator.validate(instance, schema);
  return {
    valid: result.valid,
    errors: result.errors.map((e) => e.stack),
  };
}
