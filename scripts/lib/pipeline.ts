import { existsSync } from 'fs';
import {
  CancelledError,
  CollaboratorError,
  ConfigurationError,
  DigestError,
  describeError,
} from './errors.js';
import { fetchMessages, fetchSummaryMessage, type SummaryLocatorOptions } from './messages.js';
import {
  dayDirectory,
  ensureDirectory,
  filteredPath,
  loadRecord,
  recordPath,
  reportPath,
  saveRecord,
  saveText,
  todayKey,
} from './storage.js';
import { withTimeout } from './timeout.js';
import type { AggregateRecord, ChannelMessage, Logger, MessageSource } from './types.js';

export interface ReportModel {
  filterRecord(record: AggregateRecord, instruction: string, signal?: AbortSignal): Promise<AggregateRecord>;
  summarize(record: AggregateRecord, instruction: string, signal?: AbortSignal): Promise<string>;
}

export interface ReportOptions {
  filter: boolean;
  summarize: boolean;
  prompt: string;
  filterPrompt: string;
  language: string;
}

export interface PipelineDeps {
  source: MessageSource;
  model?: ReportModel;
  logger?: Logger;
}

export interface PipelineOptions {
  channels: string[];
  saveDir: string;
  refresh: boolean;
  windowHours: number;
  timeoutMs: number;
  summary: SummaryLocatorOptions;
  report?: ReportOptions | null;
  now?: Date;
  signal?: AbortSignal;
}

export interface PipelineResult {
  date: string;
  record: AggregateRecord;
  recordPath: string;
  fromCache: boolean;
  filteredPath?: string;
  reportPath?: string;
}

const HOUR_MS = 60 * 60 * 1000;

export function reportInstruction(prompt: string, language: string): string {
  return (
    `${prompt}\n\n` +
    `Write the result as a markdown summary in ${language}. ` +
    'Give the time range each item covers and cite the source channel.'
  );
}

/** Runs one step against a collaborator, bounded and with step/channel context on failure. */
async function collaboratorStep<T>(
  step: string,
  channel: string | undefined,
  options: { timeoutMs: number | null; signal?: AbortSignal },
  operation: () => Promise<T>
): Promise<T> {
  const label = channel ? `${step} (${channel})` : step;
  try {
    return await withTimeout(label, options.timeoutMs, operation, options.signal);
  } catch (error) {
    if (error instanceof DigestError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new CollaboratorError(`${label} failed: ${reason}`, step, channel, error);
  }
}

async function collectRecord(
  source: MessageSource,
  options: PipelineOptions,
  since: Date,
  logger: Logger
): Promise<AggregateRecord> {
  if (options.signal?.aborted) {
    throw new CancelledError('connect');
  }

  const connectBound = {
    timeoutMs: source.interactiveLogin ? null : options.timeoutMs,
    signal: options.signal,
  };
  try {
    await collaboratorStep('connect', undefined, connectBound, () => source.connect());
  } catch (error) {
    await source.disconnect().catch((e: unknown) => logger.warn(`Disconnect failed: ${describeError(e)}`));
    throw error;
  }

  try {
    const summary = await collaboratorStep('summary', options.summary.channel, options, () =>
      fetchSummaryMessage(source, options.summary)
    );
    logger.log(summary ? `Found summary message ${summary.id}` : 'No summary message found');

    const channels: Record<string, ChannelMessage[]> = {};
    for (const channel of options.channels) {
      const messages = await collaboratorStep('fetch', channel, options, () =>
        fetchMessages(source, channel, since)
      );
      channels[channel] = messages;
      logger.log(`Fetched ${messages.length} messages from ${channel}`);
    }

    return { summary, channels };
  } finally {
    await source.disconnect();
  }
}

async function runReport(
  model: ReportModel,
  record: AggregateRecord,
  report: ReportOptions,
  options: PipelineOptions,
  date: string,
  logger: Logger
): Promise<Pick<PipelineResult, 'filteredPath' | 'reportPath'>> {
  const result: Pick<PipelineResult, 'filteredPath' | 'reportPath'> = {};
  let input = record;

  if (report.filter) {
    const path = filteredPath(options.saveDir, date);
    if (existsSync(path) && !options.refresh) {
      logger.log(`Filtered data already exists at ${path}, skipping...`);
      input = loadRecord(path);
    } else {
      input = await collaboratorStep('filter', undefined, options, () =>
        model.filterRecord(record, report.filterPrompt, options.signal)
      );
      saveRecord(input, path);
      logger.log(`Saved filtered data to ${path}`);
    }
    result.filteredPath = path;
  }

  if (report.summarize) {
    const path = reportPath(options.saveDir, date);
    if (existsSync(path) && !options.refresh) {
      logger.log(`Report already exists at ${path}, skipping...`);
    } else {
      const markdown = await collaboratorStep('summarize', undefined, options, () =>
        model.summarize(input, reportInstruction(report.prompt, report.language), options.signal)
      );
      saveText(markdown, path);
      logger.log(`Saved report to ${path}`);
    }
    result.reportPath = path;
  }

  return result;
}

/**
 * Collects today's record (or loads the cached one), persists it, and runs the
 * language-model steps when `options.report` is set.
 */
export async function runAggregation(deps: PipelineDeps, options: PipelineOptions): Promise<PipelineResult> {
  const logger = deps.logger ?? console;
  const now = options.now ?? new Date();
  const date = todayKey(now);
  const since = new Date(now.getTime() - options.windowHours * HOUR_MS);
  const path = recordPath(options.saveDir, date);

  let record: AggregateRecord;
  let fromCache = false;

  try {
    if (existsSync(path) && !options.refresh) {
      logger.log(`Data for ${date} already exists at ${path}, skipping fetch`);
      record = loadRecord(path);
      fromCache = true;
    } else {
      logger.log(`Fetching ${options.channels.length} channels since ${since.toISOString()}...`);
      record = await collectRecord(deps.source, options, since, logger);

      ensureDirectory(dayDirectory(options.saveDir, date));
      saveRecord(record, path);
      logger.log(`Saved to ${path}`);
    }

    const result: PipelineResult = { date, record, recordPath: path, fromCache };

    if (options.report) {
      if (!deps.model) {
        throw new ConfigurationError('Report step enabled without a language model');
      }
      ensureDirectory(dayDirectory(options.saveDir, date));
      Object.assign(result, await runReport(deps.model, record, options.report, options, date, logger));
    }

    return result;
  } catch (error) {
    logger.error(`Aggregation failed: ${describeError(error)}`);
    throw error;
  }
}
