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

import { PLUGIN_CONFIG_KEY } from 'shared/config';
import { ConfigurationError, PodsNotFoundError, toError } from 'server/lib/errors';
import { getLogger, LogStage, updateLogContext, withLogContext, withSpan } from 'server/lib/logger';
import { PodLogFetcher, resolvePodName } from 'server/lib/kubernetes/podLogs';
import { metricConfigSchema } from 'server/lib/validation/canarySchemas';
import { validateAgainst } from 'server/lib/validation/validate';
import { AnalysisInput, AnalysisMode, AnalysisOutcome } from 'server/services/types/canaryAnalysis';
import {
  AnalysisRunRef,
  Measurement,
  MeasurementPhase,
  MetricConfig,
  MetricRef,
  PROVIDER_TYPE,
} from 'server/services/types/canaryMetric';
import { composeLogContext } from './analysis/logContext';
import { ModeDispatcher, resolveAnalysisMode } from './analysis/dispatcher';
import { DecisionResolver } from './analysis/resolver';

export const DEFAULT_STABLE_SELECTOR = 'role=stable';
export const DEFAULT_CANARY_SELECTOR = 'role=canary';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(body: Record<string, unknown>, key: keyof MetricConfig): string | undefined {
  const value = body[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Reads this plugin's entry from the metric provider block. A metric without an entry
 * yields an empty configuration.
 */
export function parseMetricConfig(metric: MetricRef): MetricConfig {
  const raw = metric.provider.plugin?.[PLUGIN_CONFIG_KEY];
  if (raw === undefined || raw === null) {
    return {};
  }

  let body: unknown = raw;
  if (typeof raw === 'string') {
    try {
      body = JSON.parse(raw);
    } catch (error) {
      throw new ConfigurationError(`failed to parse plugin configuration: ${toError(error).message}`);
    }
  }

  const validation = validateAgainst(body, metricConfigSchema);
  if (!isRecord(body) || !validation.valid) {
    throw new ConfigurationError(
      `invalid plugin configuration: ${validation.errors.join(', ') || 'expected a JSON object'}`,
      { errors: validation.errors }
    );
  }

  const config = body;
  return {
    model: optionalString(config, 'model'),
    stableLabel: optionalString(config, 'stableLabel'),
    canaryLabel: optionalString(config, 'canaryLabel'),
    baseBranch: optionalString(config, 'baseBranch'),
    githubUrl: optionalString(config, 'githubUrl'),
    analysisMode: optionalString(config, 'analysisMode'),
    namespace: optionalString(config, 'namespace'),
    podName: optionalString(config, 'podName'),
    extraPrompt: optionalString(config, 'extraPrompt'),
  };
}

export interface CanaryMetricProviderOptions {
  dispatcher: ModeDispatcher;
  resolver: DecisionResolver;
  podLogs: PodLogFetcher;
  defaultModel: string;
  now?: () => Date;
}

/**
 * Metric provider surface: one `run` fetches stable and canary logs, analyzes them and
 * turns the verdict into a measurement. Analysis is synchronous, so `resume` and
 * `terminate` hand the measurement back unchanged.
 */
export class CanaryMetricProvider {
  private dispatcher: ModeDispatcher;
  private resolver: DecisionResolver;
  private podLogs: PodLogFetcher;
  private defaultModel: string;
  private now: () => Date;

  constructor(options: CanaryMetricProviderOptions) {
    this.dispatcher = options.dispatcher;
    this.resolver = options.resolver;
    this.podLogs = options.podLogs;
    this.defaultModel = options.defaultModel;
    this.now = options.now ?? (() => new Date());
  }

  type(): string {
    return PROVIDER_TYPE;
  }

  async run(analysisRun: AnalysisRunRef, metric: MetricRef, signal?: AbortSignal): Promise<Measurement> {
    const context = {
      correlationId: `${analysisRun.namespace}/${analysisRun.name}/${metric.name}`,
      analysisRun: analysisRun.name,
      namespace: analysisRun.namespace,
      metric: metric.name,
      mode: this.modeFor(metric),
    };

    return withLogContext(context, () =>
      withSpan('canary.analysis', () => this.measure(analysisRun, metric, signal), { resource: metric.name })
    );
  }

  // Configuration errors surface from measure; here they only leave the span untagged.
  private modeFor(metric: MetricRef): AnalysisMode | undefined {
    try {
      return resolveAnalysisMode(parseMetricConfig(metric).analysisMode);
    } catch {
      return undefined;
    }
  }

  resume(_analysisRun: AnalysisRunRef, _metric: MetricRef, measurement: Measurement): Measurement {
    return measurement;
  }

  terminate(analysisRun: AnalysisRunRef, metric: MetricRef, measurement: Measurement): Measurement {
    getLogger().info(`Metric: terminating measurement analysisRun=${analysisRun.name} metric=${metric.name}`);
    return measurement;
  }

  garbageCollect(analysisRun: AnalysisRunRef, metric: MetricRef, limit: number): void {
    getLogger().debug(
      `Metric: garbage collection is a no-op analysisRun=${analysisRun.name} metric=${metric.name} limit=${limit}`
    );
  }

  getMetadata(metric: MetricRef): Record<string, string> {
    const metadata: Record<string, string> = { provider: PROVIDER_TYPE };

    let config: MetricConfig;
    try {
      config = parseMetricConfig(metric);
    } catch (error) {
      getLogger().debug(`Metric: metadata without plugin configuration reason=${toError(error).message}`);
      return metadata;
    }

    if (config.model) metadata.model = config.model;
    if (config.stableLabel) metadata.stableLabel = config.stableLabel;
    if (config.canaryLabel) metadata.canaryLabel = config.canaryLabel;
    return metadata;
  }

  private markError(measurement: Measurement, error: unknown): Measurement {
    const verdict = this.resolver.resolveError(error);
    getLogger({ stage: LogStage.ANALYSIS_FAILED }).error({ error: toError(error) }, 'Metric: analysis failed');
    return {
      ...measurement,
      phase: MeasurementPhase.ERROR,
      message: verdict.kind === 'error' ? verdict.message : toError(error).message,
      finishedAt: this.now(),
    };
  }

  private async measure(analysisRun: AnalysisRunRef, metric: MetricRef, signal?: AbortSignal): Promise<Measurement> {
    const measurement: Measurement = { startedAt: this.now() };
    getLogger({ stage: LogStage.ANALYSIS_STARTED }).info('Metric: running canary analysis');

    let config: MetricConfig;
    try {
      config = parseMetricConfig(metric);
    } catch (error) {
      return this.markError(measurement, error);
    }

    const stableSelector = config.stableLabel || DEFAULT_STABLE_SELECTOR;
    const canarySelector = config.canaryLabel || DEFAULT_CANARY_SELECTOR;
    const modelIdentifier = config.model || this.defaultModel;
    const mode = resolveAnalysisMode(config.analysisMode);
    updateLogContext({ mode, model: modelIdentifier });

    getLogger({ stage: LogStage.LOGS_FETCHING }).info(
      `Metric: fetching pod logs stableSelector=${stableSelector} canarySelector=${canarySelector}`
    );

    let stableLogs: string;
    try {
      stableLogs = await this.podLogs.fetchFirstPodLogs(analysisRun.namespace, stableSelector);
    } catch (error) {
      return this.markError(measurement, error);
    }

    let canaryLogs: string;
    try {
      canaryLogs = await this.podLogs.fetchFirstPodLogs(analysisRun.namespace, canarySelector);
    } catch (error) {
      if (error instanceof PodsNotFoundError) {
        getLogger({ stage: LogStage.LOGS_MISSING }).warn('Metric: canary pods not found, marking as successful');
        return { ...measurement, phase: MeasurementPhase.SUCCESSFUL, value: '1', finishedAt: this.now() };
      }
      return this.markError(measurement, error);
    }

    getLogger({ stage: LogStage.LOGS_FETCHED }).info(
      `Metric: fetched pod logs stableLength=${stableLogs.length} canaryLength=${canaryLogs.length}`
    );

    let targetIdentifier = config.podName;
    if (mode === AnalysisMode.DELEGATED) {
      if (!config.namespace || !config.podName) {
        return this.markError(
          measurement,
          new ConfigurationError('agent mode requires namespace and podName to be configured')
        );
      }
      try {
        targetIdentifier = await resolvePodName(this.podLogs, config.namespace, config.podName);
      } catch (error) {
        return this.markError(measurement, error);
      }
    }

    const input: AnalysisInput = {
      modelIdentifier,
      logContext: composeLogContext(stableLogs, canaryLogs),
      extraGuidance: config.extraPrompt,
      namespace: config.namespace,
      targetIdentifier,
    };

    let outcome: AnalysisOutcome;
    try {
      outcome = await this.dispatcher.dispatch(mode, input, signal);
    } catch (error) {
      return this.markError(measurement, error);
    }

    const { record, rawText } = outcome;
    const verdict = this.resolver.resolve(record);
    const metadata = {
      analysis: record.narrative,
      analysisJSON: rawText,
      confidence: String(record.confidence),
    };

    getLogger({ stage: LogStage.ANALYSIS_COMPLETE }).info(
      `Metric: analysis complete promote=${record.promote} confidence=${record.confidence} verdict=${verdict.kind}`
    );

    if (verdict.kind === 'promote') {
      return {
        ...measurement,
        phase: MeasurementPhase.SUCCESSFUL,
        value: verdict.score,
        metadata,
        finishedAt: this.now(),
      };
    }

    await this.resolver.onFailure(input, record, { githubUrl: config.githubUrl, baseBranch: config.baseBranch });
    return {
      ...measurement,
      phase: MeasurementPhase.FAILED,
      value: verdict.kind === 'fail' ? verdict.score : '0',
      metadata,
      finishedAt: this.now(),
    };
  }
}
