import test from 'node:test';
import assert from 'node:assert/strict';
import { clampWrapWidth, defaultDocConfig, loadDocConfig, mergeDocConfig } from '../src/core/config';

test('config: defaults', () => {
  const config = defaultDocConfig();
  assert.equal(config.rootEnvVar, 'ODIN_ROOT');
  assert.equal(config.sourceExtension, '.odin');
  assert.deepEqual(config.collections, ['core', 'base', 'vendor']);
  assert.equal(config.wrapWidth, 80);
});

test('config: merge clamps wrap width', () => {
  assert.equal(mergeDocConfig({ wrapWidth: 10 }).wrapWidth, 40);
  assert.equal(mergeDocConfig({ wrapWidth: 500 }).wrapWidth, 200);
  assert.equal(mergeDocConfig({ wrapWidth: 72.9 }).wrapWidth, 72);
  assert.equal(clampWrapWidth(Number.NaN), 80);
});

test('config: ODINDOC_WIDTH overrides the wrap width', () => {
  assert.equal(loadDocConfig({ ODINDOC_WIDTH: '100' }).wrapWidth, 100);
  assert.equal(loadDocConfig({ ODINDOC_WIDTH: 'wide' }).wrapWidth, 80);
  assert.equal(loadDocConfig({}).wrapWidth, 80);
});
