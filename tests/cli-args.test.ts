#!/usr/bin/env node
/**
 * Command-line Argument Tests
 * Flag values are required when a flag is given
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { parseAssignTagsArgs } from '../cli/commands/assign-tags';
import { parseUpdateArgs } from '../cli/commands/update';
import { parseVocabularyArgs } from '../cli/commands/vocabulary';
import { UsageError } from '../cli/lib/types';
import { readFlagValue, readPositiveInt } from '../cli/utils/cli-args';

test('readFlagValue returns the following argument', () => {
  assert.strictEqual(readFlagValue(['--album', '70s', '--dry-run'], '--album'), '70s');
  assert.strictEqual(readFlagValue(['--dry-run'], '--album'), undefined);
});

test('readFlagValue rejects a flag without a value', () => {
  assert.throws(() => readFlagValue(['--album'], '--album'), new UsageError('--album requires a value'));
  assert.throws(() => readFlagValue(['--album', '--dry-run'], '--album'), UsageError);
});

test('readPositiveInt rejects non-numeric and non-positive values', () => {
  assert.strictEqual(readPositiveInt(['--limit', '15'], '--limit'), 15);
  assert.throws(
    () => readPositiveInt(['--limit', 'abc'], '--limit'),
    new UsageError("--limit must be a positive integer, got 'abc'")
  );
  assert.throws(() => readPositiveInt(['--limit', '0'], '--limit'), UsageError);
  assert.throws(() => readPositiveInt(['--limit', '2.5'], '--limit'), UsageError);
});

test('command argument parsing', () => {
  assert.deepStrictEqual(parseUpdateArgs(['--dry-run']), { dryRun: true });
  assert.deepStrictEqual(parseAssignTagsArgs(['--dry-run', '--album', 'urban']), { album: 'urban', dryRun: true });
  assert.deepStrictEqual(parseAssignTagsArgs([]), { album: undefined, dryRun: false });
  assert.throws(() => parseAssignTagsArgs(['--album', '--dry-run']), UsageError);
  assert.deepStrictEqual(parseVocabularyArgs([]), { limit: undefined });
  assert.throws(() => parseVocabularyArgs(['--limit', 'abc']), UsageError);
});
