// A post reduced to what the digest keeps
export interface ChannelMessage {
  id: number;
  timestamp: string;
  text: string;
}

// Unit of persistence and of language-model input
export interface AggregateRecord {
  summary: ChannelMessage | null;
  channels: Record<string, ChannelMessage[]>;
}

// Message as yielded by a message source, before reduction
export interface SourceMessage {
  id: number;
  date: Date;
  text: string;
  hasPhoto: boolean;
}

export interface IterMessagesOptions {
  limit?: number;
  offsetDate?: Date;
  reverse?: boolean;
}

export interface MessageSource {
  /** True when connecting may wait on a person, so it must not be time-bounded. */
  readonly interactiveLogin: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  iterMessages(channel: string, options: IterMessagesOptions): AsyncIterable<SourceMessage>;
}

export interface SummaryCandidate {
  text: string;
  hasMedia: boolean;
}

export type SummaryPredicate = (candidate: SummaryCandidate) => boolean;

// Configuration for the summary channel
export interface SummarySourceConfig {
  channel: string;
  marker: string;
  symbol: string;
  scanLimit: number;
}

export interface SourcesConfig {
  telegram: {
    defaultChannels: string[];
    summary: SummarySourceConfig;
  };
}

export interface Logger {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}
