/**
 * Tests for alternative transformer - converts TXT records to AlternativeRecord DTOs.
 */
import { describe, it, expect } from 'vitest';
import { parseAlternative, compareAlternatives, transformAlternatives } from '../alternative.js';

describe('parseAlternative', () => {
  it('strips the prefix and splits on the first "="', () => {
    expect(parseAlternative('_xmpp-client-websocket=wss://example.com/ws')).toEqual({
      kind: 'alternative',
      alternative: { name: 'websocket', value: 'wss://example.com/ws' },
    });
  });

  it('matches the prefix case-insensitively and keeps the name case', () => {
    expect(parseAlternative('_XMPP-Client-XBOSH=https://example.com/bosh')).toEqual({
      kind: 'alternative',
      alternative: { name: 'XBOSH', value: 'https://example.com/bosh' },
    });
  });

  it('keeps further "=" in the value', () => {
    expect(parseAlternative('_xmpp-client-xbosh=https://example.com/bosh?a=1')).toEqual({
      kind: 'alternative',
      alternative: { name: 'xbosh', value: 'https://example.com/bosh?a=1' },
    });
  });

  it('accepts an empty value', () => {
    expect(parseAlternative('_xmpp-client-websocket=')).toEqual({
      kind: 'alternative',
      alternative: { name: 'websocket', value: '' },
    });
  });

  it('ignores records with another prefix', () => {
    expect(parseAlternative('_xmpp-server-websocket=wss://example.com/s2s')).toEqual({ kind: 'ignored' });
    expect(parseAlternative('v=spf1 -all')).toEqual({ kind: 'ignored' });
  });

  it('ignores unrelated records without "="', () => {
    expect(parseAlternative('hello world')).toEqual({ kind: 'ignored' });
  });

  it('flags a matching key without "=" as malformed', () => {
    expect(parseAlternative('_xmpp-client-websocket')).toEqual({
      kind: 'malformed',
      raw: '_xmpp-client-websocket',
    });
  });
});

describe('compareAlternatives', () => {
  it('orders by name, then value', () => {
    const a = { name: 'websocket', value: 'wss://a.example.com/ws' };
    const b = { name: 'websocket', value: 'wss://b.example.com/ws' };
    const c = { name: 'xbosh', value: 'https://a.example.com/bosh' };

    expect(compareAlternatives(a, b)).toBe(-1);
    expect(compareAlternatives(c, a)).toBe(1);
    expect(compareAlternatives(a, { ...a })).toBe(0);
  });
});

describe('transformAlternatives', () => {
  it('returns only matching records, compacted and sorted', () => {
    const result = transformAlternatives([
      'v=spf1 -all',
      '_xmpp-client-xbosh=https://example.com/bosh',
      'google-site-verification=placeholder',
      '_xmpp-client-websocket=wss://example.com/ws',
    ]);

    expect(result).toEqual({
      alternatives: [
        { name: 'websocket', value: 'wss://example.com/ws' },
        { name: 'xbosh', value: 'https://example.com/bosh' },
      ],
      malformed: [],
    });
  });

  it('collects malformed records separately', () => {
    const result = transformAlternatives(['_xmpp-client-websocket', '_xmpp-client-xbosh=https://example.com/bosh']);

    expect(result.alternatives).toEqual([{ name: 'xbosh', value: 'https://example.com/bosh' }]);
    expect(result.malformed).toEqual(['_xmpp-client-websocket']);
  });

  it('produces the same output for any input order', () => {
    const records = [
      '_xmpp-client-websocket=wss://b.example.com/ws',
      '_xmpp-client-websocket=wss://a.example.com/ws',
      '_xmpp-client-xbosh=https://example.com/bosh',
    ];

    const forward = transformAlternatives(records);
    const reversed = transformAlternatives([...records].reverse());

    expect(JSON.stringify(reversed)).toBe(JSON.stringify(forward));
  });
});
