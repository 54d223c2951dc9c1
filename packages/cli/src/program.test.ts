/**
 * CLI program tests
 */

import { describe, it, expect, vi } from 'vitest';
import { SentimentClient, createAllStocksStream, createStocksStream } from '@sentiment-investor/client';
import { buildProgram } from './program.js';
import { stripAnsi } from './utils/display.js';
import type { CLIContext } from './utils/context.js';
import {
  createFakeApi,
  createSocketRecorder,
  json,
  type FakeReply,
  type ReplyFn,
} from '../../../tests/helpers/fakes.js';

function setup(reply: FakeReply | ReplyFn = json({ success: true })) {
  const api = createFakeApi(reply);
  const recorder = createSocketRecorder();
  const out: string[] = [];
  const err: string[] = [];
  const hooks: { interrupt?: () => void } = {};

  const ctx: CLIContext = {
    createClient: (options) => new SentimentClient({
      token: options.token ?? 'test-token',
      key: options.key ?? 'test-key',
      adapter: api.adapter,
    }),
    createStream: (_options, selection) => selection.all
      ? createAllStocksStream({ token: 'test-token', key: 'test-key', createSocket: recorder.createSocket })
      : createStocksStream({
        token: 'test-token',
        key: 'test-key',
        symbols: selection.symbols,
        createSocket: recorder.createSocket,
      }),
    print: (text) => out.push(stripAnsi(text)),
    error: (text) => err.push(stripAnsi(text)),
    onInterrupt: (handler) => {
      hooks.interrupt = handler;
      return () => {
        hooks.interrupt = undefined;
      };
    },
  };

  const program = buildProgram(ctx);
  const silent = { writeOut: () => {}, writeErr: () => {} };
  for (const command of [program, ...program.commands]) {
    command.exitOverride().configureOutput(silent);
  }

  const run = (...args: string[]) => program.parseAsync(args, { from: 'user' });

  return { run, out, err, requests: api.requests, recorder, hooks };
}

describe('sentiment CLI', () => {
  describe('REST commands', () => {
    it('should print parsed data as JSON with an upper-cased symbol', async () => {
      const { run, out, requests } = setup(json({ success: true, symbol: 'AAPL', results: { AHI: 0.5 } }));

      await run('--json', 'parsed', 'aapl');

      expect(requests[0].url).toBe('parsed');
      expect(requests[0].params).toMatchObject({ symbol: 'AAPL' });
      expect(out).toEqual([JSON.stringify({ success: true, symbol: 'AAPL', AHI: 0.5 }, null, 2)]);
    });

    it('should prefer credentials given on the command line', async () => {
      const { run, requests } = setup(json({ success: true, results: {} }));

      await run('--token', 'cli-token', '--key', 'cli-key', 'raw', 'TSLA');

      expect(requests[0].params).toMatchObject({ token: 'cli-token', key: 'cli-key', symbol: 'TSLA' });
    });

    it('should pass the enrich flag to quote', async () => {
      const { run, requests } = setup(json({ success: true, results: {} }));

      await run('quote', 'gme', '--enrich');

      expect(requests[0].params).toMatchObject({ symbol: 'GME', enrich: 'true' });
    });

    it('should pass the sort limit', async () => {
      const { run, out, requests } = setup(json({ success: true, results: [{ symbol: 'AMC', AHI: 1.9 }] }));

      await run('--json', 'sort', 'AHI', '--limit', '3');

      expect(requests[0].params).toMatchObject({ metric: 'AHI', limit: '3' });
      expect(JSON.parse(out[0])).toEqual([{ symbol: 'AMC', AHI: 1.9 }]);
    });

    it('should reject an invalid limit before calling the API', async () => {
      const { run, requests } = setup();

      await expect(run('sort', 'AHI', '--limit', '0')).rejects.toMatchObject({
        code: 'commander.invalidArgument',
      });
      expect(requests).toHaveLength(0);
    });

    it('should accept dates and epoch seconds for historical ranges', async () => {
      const { run, out, requests } = setup(json({
        success: true,
        results: [{ timestamp: 1618057166, data: 0.5 }],
      }));

      await run('--json', 'historical', 'aapl', 'RHI', '--start', '2021-03-01', '--end', '1619654469');

      expect(requests[0].params).toMatchObject({
        symbol: 'AAPL',
        metric: 'RHI',
        start: '1614556800',
        end: '1619654469',
      });
      expect(JSON.parse(out[0])).toEqual({ '1618057166': 0.5 });
    });

    it('should split comma separated bulk symbols', async () => {
      const { run, requests } = setup(json({ success: true, results: [] }));

      await run('--json', 'bulk', 'aapl,tsla', 'pypl');

      expect(requests[0].params).toMatchObject({ symbols: 'AAPL,TSLA,PYPL', enrich: 'false' });
    });

    it('should check each symbol for support', async () => {
      const { run, out } = setup((config) => json({ success: true, results: config.params?.symbol === 'AAPL' }));

      await run('supported', 'aapl', 'sntpy');

      expect(out).toEqual(['═══ Supported ═══', 'AAPL [SUPPORTED]\nSNTPY [UNSUPPORTED]']);
    });

    it('should list stocks in alphabetical order', async () => {
      const { run, out } = setup(json({ success: true, results: ['TSLA', 'AAPL', 'GME'] }));

      await run('--json', 'stocks');

      expect(JSON.parse(out[0])).toEqual(['AAPL', 'GME', 'TSLA']);
    });

    it('should show the account tier', async () => {
      const { run, out } = setup(json({ success: true, tier: 1 }));

      await run('account');

      expect(out[0]).toBe('═══ Account ═══');
      expect(out[1].endsWith('Tier: STARTER')).toBe(true);
    });

    it('should report API errors', async () => {
      const { run, out, err } = setup({ body: 'incorrect_key' });

      await run('parsed', 'AAPL');

      expect(out).toEqual([]);
      expect(err).toEqual(['Error: Incorrect key or token']);
    });
  });

  describe('stream command', () => {
    it('should print updates until interrupted', async () => {
      const { run, out, err, recorder, hooks } = setup();

      const running = run('--json', 'stream', 'aapl');
      await vi.waitFor(() => expect(recorder.sockets).toHaveLength(1));

      const socket = recorder.latest();
      socket.open();
      socket.receive({ symbol: 'AAPL', AHI: 1.5 });
      hooks.interrupt?.();
      await running;

      expect(socket.url).toBe('ws://socket.sentimentinvestor.com/stocks');
      expect(JSON.parse(socket.sent[0])).toEqual({ key: 'test-key', token: 'test-token', symbols: ['AAPL'] });
      expect(out).toEqual(['{"symbol":"AAPL","AHI":1.5}', 'Closing stream...']);
      expect(err).toEqual([]);
      expect(hooks.interrupt).toBeUndefined();
    });

    it('should subscribe to every stock with --all', async () => {
      const { run, recorder, hooks } = setup();

      const running = run('stream', '--all');
      await vi.waitFor(() => expect(recorder.sockets).toHaveLength(1));
      recorder.latest().open();
      hooks.interrupt?.();
      await running;

      expect(recorder.latest().url).toBe('ws://socket.sentimentinvestor.com/all');
    });

    it('should require symbols or --all', async () => {
      const { run, err, recorder } = setup();

      await run('stream');

      expect(err).toEqual(['Error: give at least one symbol or --all']);
      expect(recorder.sockets).toHaveLength(0);
    });

    it('should fail when authentication is rejected', async () => {
      const { run, err, recorder } = setup();

      const running = run('stream', 'AAPL');
      await vi.waitFor(() => expect(recorder.sockets).toHaveLength(1));
      const socket = recorder.latest();
      socket.open();
      socket.receive({ authState: false });
      await running;

      expect(err).toEqual(['Error: Not authenticated or invalid request']);
    });
  });
});
