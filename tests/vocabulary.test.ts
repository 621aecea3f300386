#!/usr/bin/env node
/**
 * Vocabulary Tests
 * Word frequency over asset filenames
 */

import { afterEach, beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs-extra';
import { runVocabulary } from '../cli/commands/vocabulary';
import { EmptyPortfolioError } from '../cli/lib/types';
import { extractVocabulary, formatBar } from '../cli/services/tags';
import { createTempRoot, testConfig, writeMedia } from './helpers/portfolio-fixture';

let root: string;

beforeEach(async () => {
  root = await createTempRoot('portfolio-vocabulary-test-');
});

afterEach(async () => {
  await fs.remove(root);
});

test('extractVocabulary drops short, numeric, stop and hex words', () => {
  const words = extractVocabulary(['red-car-chrome', 'red_car_2024', 'car-ab12cd34', 'The-Sunset-by'], ['the']);

  assert.deepStrictEqual(words, [
    { word: 'car', count: 3 },
    { word: 'red', count: 2 },
    { word: 'chrome', count: 1 },
    { word: 'sunset', count: 1 },
  ]);
});

test('formatBar scales and caps the bar', () => {
  assert.strictEqual(formatBar(7, 2, 30), '███');
  assert.strictEqual(formatBar(100, 2, 30).length, 30);
  assert.strictEqual(formatBar(1, 2, 30), '');
});

test('runVocabulary counts words across all albums', async () => {
  await writeMedia(root, '70s/neon-van.jpg');
  await writeMedia(root, '70s/chrome-van.mp4');
  await writeMedia(root, '70s/poster.jpg');
  await writeMedia(root, 'urban/neon-alley.png');

  const result = await runVocabulary({ config: testConfig(root), stopwords: ['the'], limit: 2 });

  assert.strictEqual(result.albums, 2);
  assert.strictEqual(result.files, 3);
  assert.deepStrictEqual(result.words, [
    { word: 'van', count: 2 },
    { word: 'neon', count: 2 },
    { word: 'chrome', count: 1 },
    { word: 'alley', count: 1 },
  ]);
});

test('runVocabulary fails on a portfolio without media', async () => {
  await writeMedia(root, '70s/notes.txt');

  await assert.rejects(runVocabulary({ config: testConfig(root), stopwords: [] }), EmptyPortfolioError);
});
