import test from 'node:test';
import assert from 'node:assert/strict';
import { createLogger, parseLogLevel } from '../src/core/log';

function capture(): { lines: Array<Record<string, unknown>>; sink: (line: string) => void } {
  const lines: Array<Record<string, unknown>> = [];
  return { lines, sink: (line) => lines.push(JSON.parse(line)) };
}

test('parseLogLevel: known levels, silence words and fallback', () => {
  assert.equal(parseLogLevel(undefined), 'warn');
  assert.equal(parseLogLevel(' DEBUG '), 'debug');
  assert.equal(parseLogLevel('off'), null);
  assert.equal(parseLogLevel('verbose'), 'warn');
});

test('logger: drops records below the threshold and merges fields', () => {
  const { lines, sink } = capture();
  const log = createLogger({ component: 'test' }, { level: 'info', sink });
  log.debug('hidden');
  log.info('shown', { n: 1 });
  log.child({ cmd: 'doc' }).warn('child');

  assert.deepEqual(
    lines.map((l) => [l.level, l.msg, l.component, l.n, l.cmd]),
    [
      ['info', 'shown', 'test', 1, undefined],
      ['warn', 'child', 'test', undefined, 'doc'],
    ]
  );
});

test('logger: null level silences everything', () => {
  const { lines, sink } = capture();
  createLogger({}, { level: null, sink }).error('nope');
  assert.equal(lines.length, 0);
});

test('logger: span rethrows and records the failure', async () => {
  const { lines, sink } = capture();
  const log = createLogger({}, { level: 'debug', sink });

  assert.equal(await log.span('ok_step', { a: 1 }, async () => 42), 42);
  await assert.rejects(
    log.span('bad_step', {}, async () => {
      throw new Error('boom');
    }),
    /boom/
  );

  assert.deepEqual(
    lines.map((l) => [l.level, l.msg, l.ok]),
    [
      ['debug', 'ok_step', true],
      ['error', 'bad_step', false],
    ]
  );
});
