import { existsSync, readFileSync } from 'fs';
import { parseArgs } from 'util';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { DEFAULT_SCAN_LIMIT } from './messages.js';
import { DEFAULT_OPENAI_CONFIG, type OpenAIConfig } from './openai.js';
import type { SourcesConfig } from './types.js';
import type { TelegramConfig } from './telegram-client.js';

export const DEFAULT_PROMPT = 'Filter and summarize the following data:';

export const DEFAULT_FILTER_PROMPT =
  'Keep only messages with information about weaponry, sighting locations, movement and status. ' +
  'Drop everything else.';

export const DEFAULT_CONFIG_PATH = './config/sources.json';

const sourcesSchema = z.object({
  telegram: z.object({
    defaultChannels: z.array(z.string().min(1)),
    summary: z.object({
      channel: z.string().min(1),
      marker: z.string().min(1),
      symbol: z.string().min(1),
      scanLimit: z.number().int().positive().default(DEFAULT_SCAN_LIMIT),
    }),
  }),
});

export interface CliArgs {
  apiId?: string;
  apiHash?: string;
  openaiKey?: string;
  addChannels: string[];
  saveDir: string;
  openaiProcessing: boolean;
  refresh: boolean;
  prompt?: string;
  filterPrompt?: string;
  language?: string;
  model?: string;
  windowHours?: string;
  timeout?: string;
  skipFilter: boolean;
  skipSummary: boolean;
  keepDuplicates: boolean;
  config: string;
  sessionFile?: string;
  help: boolean;
}

export interface AppConfig {
  telegram: TelegramConfig;
  openai: OpenAIConfig | null;
  channels: string[];
  summary: SourcesConfig['telegram']['summary'];
  saveDir: string;
  refresh: boolean;
  windowHours: number;
  timeoutMs: number;
  report: {
    filter: boolean;
    summarize: boolean;
    prompt: string;
    filterPrompt: string;
    language: string;
  } | null;
}

export const USAGE = `Usage: digest [options]

  --api-id <id>             Telegram API ID (env TELEGRAM_API_ID)
  --api-hash <hash>         Telegram API hash (env TELEGRAM_API_HASH)
  --openai-key <key>        OpenAI API key (env OPENAI_API_KEY)
  -a, --add-channels <list> Extra channels, comma separated, repeatable
  -d, --save-dir <path>     Output directory (default ./reports)
  --openai-processing       Filter and summarize with the language model
  -r, --refresh             Re-fetch even if today's data exists
  -p, --prompt <text>       Instruction for the summary report
  --filter-prompt <text>    Instruction for the filtering step
  --language <name>         Report language (default English)
  --model <name>            Model name (env OPENAI_MODEL)
  --window-hours <n>        Look-back window in hours (default 24)
  --timeout <seconds>       Upper bound per network call (default 120)
  --skip-filter             Do not run the filtering step
  --skip-summary            Do not write the markdown report
  --keep-duplicates         Fetch duplicated channels again
  --config <path>           Sources file (default ./config/sources.json)
  --session-file <path>     Telegram session file (default ./digest.session)
  -h, --help                Show this help`;

export function parseCliArgs(argv: string[]): CliArgs {
  try {
    const { values } = parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        'api-id': { type: 'string' },
        'api-hash': { type: 'string' },
        'openai-key': { type: 'string' },
        'add-channels': { type: 'string', short: 'a', multiple: true },
        'save-dir': { type: 'string', short: 'd' },
        'openai-processing': { type: 'boolean' },
        refresh: { type: 'boolean', short: 'r' },
        prompt: { type: 'string', short: 'p' },
        'filter-prompt': { type: 'string' },
        language: { type: 'string' },
        model: { type: 'string' },
        'window-hours': { type: 'string' },
        timeout: { type: 'string' },
        'skip-filter': { type: 'boolean' },
        'skip-summary': { type: 'boolean' },
        'keep-duplicates': { type: 'boolean' },
        config: { type: 'string' },
        'session-file': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    });

    return {
      apiId: values['api-id'],
      apiHash: values['api-hash'],
      openaiKey: values['openai-key'],
      addChannels: (values['add-channels'] ?? [])
        .flatMap((entry) => entry.split(/[\s,]+/))
        .filter((channel) => channel.length > 0),
      saveDir: values['save-dir'] ?? './reports',
      openaiProcessing: values['openai-processing'] ?? false,
      refresh: values.refresh ?? false,
      prompt: values.prompt,
      filterPrompt: values['filter-prompt'],
      language: values.language,
      model: values.model,
      windowHours: values['window-hours'],
      timeout: values.timeout,
      skipFilter: values['skip-filter'] ?? false,
      skipSummary: values['skip-summary'] ?? false,
      keepDuplicates: values['keep-duplicates'] ?? false,
      config: values.config ?? DEFAULT_CONFIG_PATH,
      sessionFile: values['session-file'],
      help: values.help ?? false,
    };
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error), error);
  }
}

export function loadSources(path: string): SourcesConfig {
  if (!existsSync(path)) {
    throw new ConfigurationError(`Config file not found: ${path}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot parse config file ${path}`, error);
  }

  const result = sourcesSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid config file ${path}: ${result.error.message}`);
  }
  return result.data;
}

/** Default channels followed by extra ones; first occurrence wins unless `keepDuplicates`. */
export function mergeChannels(defaults: string[], extra: string[], keepDuplicates = false): string[] {
  const all = [...defaults, ...extra];
  return keepDuplicates ? all : Array.from(new Set(all));
}

function positiveNumber(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive number, got "${value}"`);
  }
  return parsed;
}

/** CLI values win over the environment. */
export function resolveConfig(
  args: CliArgs,
  env: NodeJS.ProcessEnv,
  sources: SourcesConfig
): AppConfig {
  const apiIdRaw = args.apiId ?? env.TELEGRAM_API_ID;
  const apiHash = args.apiHash ?? env.TELEGRAM_API_HASH;
  const openaiKey = args.openaiKey ?? env.OPENAI_API_KEY;

  if (!apiIdRaw || !apiHash) {
    throw new ConfigurationError(
      'Telegram API ID and API hash must be provided either via --api-id/--api-hash or TELEGRAM_API_ID/TELEGRAM_API_HASH'
    );
  }

  const apiId = Number(apiIdRaw);
  if (!Number.isInteger(apiId) || apiId <= 0) {
    throw new ConfigurationError(`Telegram API ID must be a positive integer, got "${apiIdRaw}"`);
  }

  if (args.openaiProcessing && !openaiKey) {
    throw new ConfigurationError(
      'OpenAI API key must be provided via --openai-key or OPENAI_API_KEY when --openai-processing is set'
    );
  }

  const timeoutMs = positiveNumber('--timeout', args.timeout, 120) * 1000;

  return {
    telegram: {
      apiId,
      apiHash,
      session: env.TELEGRAM_SESSION,
      sessionFile: args.sessionFile ?? './digest.session',
      phoneNumber: env.TELEGRAM_PHONE,
    },
    openai:
      args.openaiProcessing && openaiKey
        ? {
            ...DEFAULT_OPENAI_CONFIG,
            apiKey: openaiKey,
            model: args.model ?? env.OPENAI_MODEL ?? DEFAULT_OPENAI_CONFIG.model,
            baseUrl: env.OPENAI_BASE_URL ?? DEFAULT_OPENAI_CONFIG.baseUrl,
            timeoutMs,
          }
        : null,
    channels: mergeChannels(sources.telegram.defaultChannels, args.addChannels, args.keepDuplicates),
    summary: sources.telegram.summary,
    saveDir: args.saveDir,
    refresh: args.refresh,
    windowHours: positiveNumber('--window-hours', args.windowHours, 24),
    timeoutMs,
    report: args.openaiProcessing
      ? {
          filter: !args.skipFilter,
          summarize: !args.skipSummary,
          prompt: args.prompt ?? DEFAULT_PROMPT,
          filterPrompt: args.filterPrompt ?? DEFAULT_FILTER_PROMPT,
          language: args.language ?? 'English',
        }
      : null,
  };
}
