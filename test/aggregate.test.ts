import test from 'node:test';
import assert from 'node:assert/strict';
import {
  collectEntries,
  compareOrdinal,
  dedupeEntries,
  groupPackage,
  isEmptyPackage,
  lookupSymbol,
  type SourceReader,
} from '../src/core/aggregate';
import { scanSource } from '../src/core/scanner';

function memoryReader(files: Record<string, string>): SourceReader {
  return async (file) => files[file] ?? null;
}

test('collectEntries: concatenates files in the order given and skips unreadable ones', async () => {
  const reader = memoryReader({
    'a.odin': 'Version :: "1.0"\n',
    'b.odin': 'Version :: "2.0"\nExtra :: 1\n',
  });
  const entries = await collectEntries(['a.odin', 'missing.odin', 'b.odin'], reader);

  assert.deepEqual(
    entries.map((e) => [e.file, e.name, e.signature]),
    [
      ['a.odin', 'Version', '"1.0"'],
      ['b.odin', 'Version', '"2.0"'],
      ['b.odin', 'Extra', '1'],
    ]
  );
});

test('dedupeEntries: first occurrence in enumeration order wins', async () => {
  const reader = memoryReader({
    'a.odin': 'Version :: "1.0"\n',
    'b.odin': 'Version :: "2.0"\nExtra :: 1\n',
  });
  const deduped = dedupeEntries(await collectEntries(['a.odin', 'b.odin'], reader));

  assert.deepEqual(
    deduped.map((e) => [e.name, e.file]),
    [
      ['Version', 'a.odin'],
      ['Extra', 'b.odin'],
    ]
  );
});

test('lookupSymbol: found, private and not_found outcomes', () => {
  const entries = scanSource('Public :: 1\n@(private)\nSecret :: proc() {}\nhelper :: 2\n', 'x.odin');

  const found = lookupSymbol(entries, 'Public');
  assert.equal(found.status, 'found');
  assert.equal(found.status === 'found' ? found.entry.line : 0, 1);

  assert.equal(lookupSymbol(entries, 'Secret').status, 'private');
  assert.equal(lookupSymbol(entries, 'helper').status, 'private');
  assert.deepEqual(lookupSymbol(entries, 'Nope'), { status: 'not_found' });
});

test('lookupSymbol: duplicate names resolve to the first entry', () => {
  const entries = [...scanSource('@(private)\nDup :: 1\n', 'a.odin'), ...scanSource('Dup :: 2\n', 'b.odin')];
  assert.equal(lookupSymbol(entries, 'Dup').status, 'private');
});

test('groupPackage: buckets public entries and sorts by name', () => {
  const src = [
    'Zeta :: 1',
    'Alpha :: 2',
    'beta :: 3',
    'Point :: struct {}',
    'Color :: enum {Red}',
    'Add :: proc() {}',
    '_hidden :: proc() {}',
    'Flags :: bit_set[Color]',
    'Shape :: union {Point}',
  ].join('\n');
  const groups = groupPackage(scanSource(src, 'g.odin'));

  assert.deepEqual(groups.constants.map((e) => e.name), ['Alpha', 'Zeta']);
  assert.deepEqual(groups.types.map((e) => e.name), ['Color', 'Flags', 'Point', 'Shape']);
  assert.deepEqual(groups.procedures.map((e) => e.name), ['Add']);
});

test('compareOrdinal: code unit order, uppercase before lowercase', () => {
  assert.equal(compareOrdinal('Zeta', 'alpha'), -1);
  assert.equal(compareOrdinal('b', 'B'), 1);
  assert.equal(compareOrdinal('Same', 'Same'), 0);
});

test('isEmptyPackage: all-private package has nothing to show', () => {
  const groups = groupPackage(scanSource('internal :: 1\n_x :: proc() {}\n', 'p.odin'));
  assert.equal(isEmptyPackage(groups), true);
  assert.equal(isEmptyPackage(groupPackage(scanSource('X :: 1\n', 'p.odin'))), false);
});
