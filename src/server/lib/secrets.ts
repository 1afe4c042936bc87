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

import fs from 'fs';
import path from 'path';
import { ConfigurationError, toError } from 'server/lib/errors';
import { getLogger } from 'server/lib/logger';

export interface EngineSecrets {
  googleApiKey: string;
  googleCloudProject?: string;
  githubToken: string;
}

async function readSecretFile(dir: string, name: string): Promise<string> {
  const file = path.join(dir, name);
  try {
    return (await fs.promises.readFile(file, 'utf8')).trim();
  } catch (error) {
    throw new ConfigurationError(`failed to read ${name} from ${file}: ${toError(error).message}`, { file });
  }
}

async function readRequiredSecret(dir: string, name: string): Promise<string> {
  const value = await readSecretFile(dir, name);
  if (!value) {
    throw new ConfigurationError(`${name} is empty in ${path.join(dir, name)}`);
  }
  return value;
}

/**
 * Reads the mounted secret files. `google_cloud_project` is optional.
 */
export async function loadSecretsFromDirectory(dir: string): Promise<EngineSecrets> {
  const googleApiKey = await readRequiredSecret(dir, 'google_api_key');

  let googleCloudProject: string | undefined;
  try {
    googleCloudProject = (await readSecretFile(dir, 'google_cloud_project')) || undefined;
  } catch (error) {
    getLogger().warn(`Config: google_cloud_project not found dir=${dir} reason=${toError(error).message}`);
  }

  const githubToken = await readRequiredSecret(dir, 'github_token');

  getLogger().info(`Config: loaded secrets from mounted files dir=${dir}`);
  return { googleApiKey, googleCloudProject, githubToken };
}
