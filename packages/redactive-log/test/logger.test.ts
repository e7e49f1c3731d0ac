/**
 * 構造化ロガーのテスト
 */
import { afterEach, describe, it, expect, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Email, Secret } from '@redactive/policy';
import { Sensitive, classifyText, parseEnv } from '@redactive/core';
import {
  consoleSink,
  createFileSink,
  createLoggerFromEnv,
  createMemorySink,
  createRedactedLogger,
  isLevelEnabled,
  redactedField,
} from '../src/index.js';

interface Account {
  id: string;
  email: string;
  password: string;
}

const accountShape = Sensitive.struct<Account>('Account', {
  email: classifyText(Email),
  password: classifyText(Secret),
});

const account = (): Account => ({ id: 'acc-1', email: 'ann@example.com', password: 'test-secret' });

const FIXED_TS = '2026-01-01T00:00:00.000Z';
const fixedNow = (): string => FIXED_TS;

const parseLines = (lines: readonly string[]): unknown[] => lines.map((line) => JSON.parse(line));

describe('isLevelEnabled', () => {
  it('しきい値以上のレベルのみ有効', () => {
    expect(isLevelEnabled('info', 'debug')).toBe(false);
    expect(isLevelEnabled('info', 'info')).toBe(true);
    expect(isLevelEnabled('info', 'error')).toBe(true);
    expect(isLevelEnabled('error', 'warn')).toBe(false);
  });
});

describe('createRedactedLogger', () => {
  it('redactedField は秘匿してから出力する', () => {
    const sink = createMemorySink();
    const logger = createRedactedLogger({ sink, now: fixedNow });

    logger.info('account created', { account: redactedField(account(), accountShape), requestId: 'r-1' });

    expect(parseLines(sink.lines)).toEqual([
      {
        ts: FIXED_TS,
        level: 'info',
        msg: 'account created',
        account: { id: 'acc-1', email: 'an*************', password: '[REDACTED]' },
        requestId: 'r-1',
      },
    ]);
  });

  it('1行1JSON で出力する', () => {
    const sink = createMemorySink();
    const logger = createRedactedLogger({ sink, now: fixedNow });

    logger.warn('slow', { ms: 1200 });

    expect(sink.lines).toEqual([`{"ts":"${FIXED_TS}","level":"warn","msg":"slow","ms":1200}`]);
  });

  it('しきい値未満のレベルは出力しない', () => {
    const sink = createMemorySink();
    const logger = createRedactedLogger({ level: 'warn', sink, now: fixedNow });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(parseLines(sink.lines)).toEqual([
      { ts: FIXED_TS, level: 'warn', msg: 'w' },
      { ts: FIXED_TS, level: 'error', msg: 'e' },
    ]);
  });

  it('child は束縛フィールドを追加する', () => {
    const sink = createMemorySink();
    const logger = createRedactedLogger({ sink, now: fixedNow }).child({ service: 'billing' });

    logger.info('charged', { amount: 10 });

    expect(parseLines(sink.lines)).toEqual([
      { ts: FIXED_TS, level: 'info', msg: 'charged', service: 'billing', amount: 10 },
    ]);
  });

  it('予約キーはフィールドで上書きしない', () => {
    const sink = createMemorySink();
    const logger = createRedactedLogger({ sink, now: fixedNow });

    logger.info('original', { msg: 'overridden', level: 'error', ts: 'x' });

    expect(parseLines(sink.lines)).toEqual([{ ts: FIXED_TS, level: 'info', msg: 'original' }]);
  });

  it('シリアライズできないフィールドはプレースホルダー', () => {
    interface Loop {
      next?: Loop;
    }
    const loop: Loop = {};
    loop.next = loop;
    const sink = createMemorySink();
    const logger = createRedactedLogger({ sink, now: fixedNow });

    logger.error('failed', { state: redactedField(loop, Sensitive.passthrough<Loop>()), raw: loop });

    expect(parseLines(sink.lines)).toEqual([
      {
        ts: FIXED_TS,
        level: 'error',
        msg: 'failed',
        state: 'Failed to serialize redacted value',
        raw: 'Failed to serialize redacted value',
      },
    ]);
  });
});

describe('sinks', () => {
  let dir: string | undefined;

  afterEach(() => {
    vi.restoreAllMocks();
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('consoleSink は stderr に出力する', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    consoleSink.write('{"msg":"hello"}');

    expect(spy).toHaveBeenCalledWith('{"msg":"hello"}');
  });

  it('createFileSink はディレクトリを作成して追記する', () => {
    dir = mkdtempSync(join(tmpdir(), 'redactive-log-'));
    const path = join(dir, 'nested', 'app.jsonl');
    const sink = createFileSink(path);

    sink.write('{"n":1}');
    sink.write('{"n":2}');

    expect(readFileSync(path, 'utf-8')).toBe('{"n":1}\n{"n":2}\n');
  });

  it('createLoggerFromEnv は設定からレベルと出力先を決める', () => {
    dir = mkdtempSync(join(tmpdir(), 'redactive-log-'));
    const path = join(dir, 'app.jsonl');
    const logger = createLoggerFromEnv(
      parseEnv({ REDACTIVE_LOG_LEVEL: 'error', REDACTIVE_LOG_PATH: path })
    );

    logger.warn('skipped');
    logger.error('kept', { account: redactedField(account(), accountShape) });

    expect(logger.level).toBe('error');
    const lines = readFileSync(path, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      level: 'error',
      msg: 'kept',
      account: { id: 'acc-1', email: 'an*************', password: '[REDACTED]' },
    });
  });
});
