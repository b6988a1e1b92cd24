/**
 * Tests for discovery orchestrator
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import pino from 'pino';
import { resolveXmppRecords } from './orchestrator.js';
import { ResolutionError, type LookupOutcome, type SrvAnswer } from './types.js';

const logger = pino({ level: 'silent' });

function fakeLookup(srv: LookupOutcome<SrvAnswer>, txt: LookupOutcome<string>) {
  return {
    lookupSrv: vi.fn().mockResolvedValue(srv),
    lookupTxt: vi.fn().mockResolvedValue(txt),
  };
}

const server: SrvAnswer = { target: 'xmpp.example.com', port: 5222, priority: 10, weight: 5 };

describe('resolveXmppRecords', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it('queries the xmpp-client SRV name and the _xmppconnect TXT name', async () => {
    const lookup = fakeLookup({ status: 'not-found' }, { status: 'not-found' });

    await resolveXmppRecords('example.com', lookup, logger);

    expect(lookup.lookupSrv).toHaveBeenCalledWith('xmpp-client', 'tcp', 'example.com');
    expect(lookup.lookupTxt).toHaveBeenCalledWith('_xmppconnect.example.com');
  });

  it('does not normalize the domain', async () => {
    const lookup = fakeLookup({ status: 'not-found' }, { status: 'not-found' });

    await resolveXmppRecords('Example.COM', lookup, logger);

    expect(lookup.lookupSrv).toHaveBeenCalledWith('xmpp-client', 'tcp', 'Example.COM');
    expect(lookup.lookupTxt).toHaveBeenCalledWith('_xmppconnect.Example.COM');
  });

  describe('found', () => {
    it('combines servers and alternatives', async () => {
      const lookup = fakeLookup(
        { status: 'found', records: [server] },
        { status: 'found', records: ['_xmpp-client-websocket=wss://example.com/ws'] }
      );

      const result = await resolveXmppRecords('example.com', lookup, logger);

      expect(result).toEqual({
        status: 'found',
        servers: [server],
        alternatives: [{ name: 'websocket', value: 'wss://example.com/ws' }],
      });
    });

    it('returns servers with empty alternatives when TXT name is missing', async () => {
      const lookup = fakeLookup({ status: 'found', records: [server] }, { status: 'not-found' });

      const result = await resolveXmppRecords('example.com', lookup, logger);

      expect(result).toEqual({ status: 'found', servers: [server], alternatives: [] });
    });

    it('returns alternatives with empty servers when SRV name is missing', async () => {
      const lookup = fakeLookup(
        { status: 'not-found' },
        { status: 'found', records: ['_xmpp-client-xbosh=https://example.com/bosh'] }
      );

      const result = await resolveXmppRecords('example.com', lookup, logger);

      expect(result).toEqual({
        status: 'found',
        servers: [],
        alternatives: [{ name: 'xbosh', value: 'https://example.com/bosh' }],
      });
    });

    it('sorts servers regardless of answer order', async () => {
      const backup = { target: 'backup.example.com', port: 5222, priority: 20, weight: 0 };
      const lookup = fakeLookup({ status: 'found', records: [backup, server] }, { status: 'not-found' });

      const result = await resolveXmppRecords('example.com', lookup, logger);

      expect(result).toEqual({ status: 'found', servers: [server, backup], alternatives: [] });
    });

    it('logs and skips TXT records without value', async () => {
      const warn = vi.spyOn(logger, 'warn');
      const lookup = fakeLookup(
        { status: 'found', records: [server] },
        { status: 'found', records: ['_xmpp-client-websocket'] }
      );

      const result = await resolveXmppRecords('example.com', lookup, logger);

      expect(result).toEqual({ status: 'found', servers: [server], alternatives: [] });
      expect(warn).toHaveBeenCalledWith(
        { domain: 'example.com', record: '_xmpp-client-websocket' },
        'Skipping TXT record without value'
      );
    });
  });

  describe('not-found', () => {
    it('returns not-found when both names are missing', async () => {
      const lookup = fakeLookup({ status: 'not-found' }, { status: 'not-found' });

      expect(await resolveXmppRecords('example.com', lookup, logger)).toEqual({ status: 'not-found' });
    });

    it('returns not-found when no TXT record is relevant', async () => {
      const lookup = fakeLookup({ status: 'not-found' }, { status: 'found', records: ['v=spf1 -all'] });

      expect(await resolveXmppRecords('example.com', lookup, logger)).toEqual({ status: 'not-found' });
    });

    it('returns not-found when both lookups return empty lists', async () => {
      const lookup = fakeLookup({ status: 'found', records: [] }, { status: 'found', records: [] });

      expect(await resolveXmppRecords('example.com', lookup, logger)).toEqual({ status: 'not-found' });
    });
  });

  describe('resolution errors', () => {
    it('throws ResolutionError when SRV lookup fails', async () => {
      const cause = new Error('query timed out');
      const lookup = fakeLookup({ status: 'error', error: cause }, { status: 'found', records: [] });

      const error = await resolveXmppRecords('example.com', lookup, logger).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ResolutionError);
      if (error instanceof ResolutionError) {
        expect(error.domain).toBe('example.com');
        expect(error.recordType).toBe('srv');
        expect(error.cause).toBe(cause);
        expect(error.message).toBe('Error resolving SRV records for example.com: query timed out');
      }
    });

    it('throws ResolutionError when TXT lookup fails even if SRV was found', async () => {
      const lookup = fakeLookup(
        { status: 'found', records: [server] },
        { status: 'error', error: new Error('SERVFAIL') }
      );

      await expect(resolveXmppRecords('example.com', lookup, logger)).rejects.toMatchObject({
        name: 'ResolutionError',
        recordType: 'txt',
      });
    });

    it('reports the SRV failure first when both fail', async () => {
      const lookup = fakeLookup(
        { status: 'error', error: new Error('srv down') },
        { status: 'error', error: new Error('txt down') }
      );

      await expect(resolveXmppRecords('example.com', lookup, logger)).rejects.toMatchObject({
        recordType: 'srv',
      });
    });
  });
});
