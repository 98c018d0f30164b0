import { describe, expect, it } from 'vitest';
import { createSummaryPredicate, fetchMessages, fetchSummaryMessage } from './messages.js';
import { FakeSource, UnfilteredSource, message } from './testing/fake-source.js';

const HOUR = 60 * 60 * 1000;
const now = new Date('2026-10-19T12:00:00.000Z');
const since = new Date(now.getTime() - 24 * HOUR);
const hoursAgo = (h: number) => new Date(now.getTime() - h * HOUR);

const isSummary = createSummaryPredicate({ marker: 'summary', symbol: '⚡' });

describe('fetchMessages', () => {
  it('returns only messages inside the window', async () => {
    const source = new FakeSource({
      c1: [message(1, hoursAgo(1), 'collect'), message(2, hoursAgo(30), 'too old')],
    });

    const messages = await fetchMessages(source, 'c1', since);

    expect(messages).toEqual([{ id: 1, timestamp: '2026-10-19T11:00:00.000Z', text: 'collect' }]);
  });

  it('iterates oldest first from the lower bound', async () => {
    const source = new FakeSource({
      c1: [message(2, hoursAgo(1), 'second'), message(1, hoursAgo(5), 'first')],
    });

    const messages = await fetchMessages(source, 'c1', since);

    expect(messages.map((m) => m.text)).toEqual(['first', 'second']);
    expect(source.calls).toEqual([{ channel: 'c1', options: { offsetDate: since, reverse: true } }]);
  });

  it('drops textless and stale messages even when the source yields them', async () => {
    const source = new UnfilteredSource([
      message(1, hoursAgo(30), 'stale'),
      message(2, hoursAgo(3), '', true),
      message(3, hoursAgo(2), '   '),
      message(4, hoursAgo(1), 'kept'),
    ]);

    const messages = await fetchMessages(source, 'c1', since);

    expect(messages).toEqual([{ id: 4, timestamp: '2026-10-19T11:00:00.000Z', text: 'kept' }]);
  });

  it('returns an empty list for a quiet channel', async () => {
    const source = new FakeSource({});

    expect(await fetchMessages(source, 'quiet', since)).toEqual([]);
  });
});

describe('createSummaryPredicate', () => {
  it('accepts text with a photo, the marker in any case and the symbol', () => {
    expect(isSummary({ text: 'Daily SUMMARY ⚡', hasMedia: true })).toBe(true);
  });

  it('rejects when any clause is missing', () => {
    expect(isSummary({ text: 'Daily summary ⚡', hasMedia: false })).toBe(false);
    expect(isSummary({ text: 'Daily summary', hasMedia: true })).toBe(false);
    expect(isSummary({ text: 'Daily report ⚡', hasMedia: true })).toBe(false);
    expect(isSummary({ text: '', hasMedia: true })).toBe(false);
  });
});

describe('fetchSummaryMessage', () => {
  it('returns the newest matching message', async () => {
    const source = new FakeSource({
      news: [
        message(1, hoursAgo(10), 'Summary ⚡ older', true),
        message(2, hoursAgo(5), 'Summary ⚡ newer', true),
        message(3, hoursAgo(1), 'just chatter', true),
      ],
    });

    const summary = await fetchSummaryMessage(source, { channel: 'news', predicate: isSummary });

    expect(summary).toEqual({ id: 2, timestamp: '2026-10-19T07:00:00.000Z', text: 'Summary ⚡ newer' });
    expect(source.calls[0].options).toEqual({ limit: 200 });
  });

  it('returns null when no message has both a photo and the marker', async () => {
    const source = new FakeSource({
      news: [
        message(1, hoursAgo(3), 'Summary ⚡ without photo'),
        message(2, hoursAgo(2), 'photo only ⚡', true),
      ],
    });

    expect(await fetchSummaryMessage(source, { channel: 'news', predicate: isSummary })).toBeNull();
  });

  it('stops after the scan limit', async () => {
    const messages = [
      message(1, hoursAgo(3), 'Summary ⚡', true),
      message(2, hoursAgo(2), 'later'),
      message(3, hoursAgo(1), 'latest'),
    ];

    const limited = await fetchSummaryMessage(new FakeSource({ news: messages }), {
      channel: 'news',
      predicate: isSummary,
      scanLimit: 2,
    });
    const unlimitedSource = await fetchSummaryMessage(new UnfilteredSource([...messages].reverse()), {
      channel: 'news',
      predicate: isSummary,
      scanLimit: 2,
    });

    expect(limited).toBeNull();
    expect(unlimitedSource).toBeNull();
  });

  it('uses a custom predicate', async () => {
    const source = new FakeSource({
      news: [message(1, hoursAgo(2), 'pinned note'), message(2, hoursAgo(1), 'other')],
    });

    const summary = await fetchSummaryMessage(source, {
      channel: 'news',
      predicate: ({ text }) => text.startsWith('pinned'),
    });

    expect(summary?.id).toBe(1);
  });
});
