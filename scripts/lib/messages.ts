import type {
  ChannelMessage,
  MessageSource,
  SourceMessage,
  SummaryPredicate,
} from './types.js';

export const DEFAULT_SCAN_LIMIT = 200;

export function toChannelMessage(msg: SourceMessage): ChannelMessage {
  return {
    id: msg.id,
    timestamp: msg.date.toISOString(),
    text: msg.text,
  };
}

/**
 * Fetches every text-bearing message posted at or after `since`, oldest first.
 */
export async function fetchMessages(
  source: MessageSource,
  channel: string,
  since: Date
): Promise<ChannelMessage[]> {
  const messages: ChannelMessage[] = [];
  const cutoff = since.getTime();

  for await (const msg of source.iterMessages(channel, { offsetDate: since, reverse: true })) {
    // Offset dates have second precision on the wire
    if (msg.date.getTime() < cutoff) continue;
    if (!msg.text || msg.text.trim().length === 0) continue;
    messages.push(toChannelMessage(msg));
  }

  return messages;
}

export interface SummaryMarker {
  marker: string;
  symbol: string;
}

/** Text present, photo attached, marker (any case) and symbol both in the text. */
export function createSummaryPredicate({ marker, symbol }: SummaryMarker): SummaryPredicate {
  const needle = marker.toLowerCase();
  return ({ text, hasMedia }) =>
    text.length > 0 && hasMedia && text.toLowerCase().includes(needle) && text.includes(symbol);
}

export interface SummaryLocatorOptions {
  channel: string;
  predicate: SummaryPredicate;
  scanLimit?: number;
}

/**
 * Scans the newest `scanLimit` messages of the summary channel and returns the
 * first one the predicate accepts, or null.
 */
export async function fetchSummaryMessage(
  source: MessageSource,
  { channel, predicate, scanLimit = DEFAULT_SCAN_LIMIT }: SummaryLocatorOptions
): Promise<ChannelMessage | null> {
  let scanned = 0;

  for await (const msg of source.iterMessages(channel, { limit: scanLimit })) {
    if (scanned >= scanLimit) break;
    scanned++;

    if (predicate({ text: msg.text, hasMedia: msg.hasPhoto })) {
      return toChannelMessage(msg);
    }
  }

  return null;
}
