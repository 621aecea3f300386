#!/usr/bin/env node
/**
 * Asset List Renderer Tests
 * Record formatting, block rendering and splicing into the host page
 */

import { afterEach, beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import path from 'path';
import fs from 'fs-extra';
import { PortfolioConfigSchema } from '../cli/lib/config';
import type { PortfolioAsset } from '../cli/lib/portfolio-types';
import { MarkerNotFoundError } from '../cli/lib/types';
import {
  renderAssetBlock,
  renderAssetRecord,
  findMarkerLine,
  spliceAssetBlock,
  toJsString,
  writeHostDocument,
} from '../cli/services/portfolio/renderer';
import { HOST_AFTER, HOST_BEFORE, HOST_TEMPLATE, createTempRoot } from './helpers/portfolio-fixture';

const { markers } = PortfolioConfigSchema.parse({});
const RULE = '─'.repeat(45);

const photo: PortfolioAsset = {
  type: 'photo',
  src: '70s/van.jpg',
  thumb: '70s/van.jpg',
  title: 'Van',
  album: '70s',
  date: '2024-01-15',
};

const video: PortfolioAsset = {
  type: 'video',
  src: 'clips/drive.mp4',
  thumb: 'clips/drive_poster.jpg',
  title: 'Drive',
  album: 'clips',
  date: '2024-02-01',
};

let root: string;

beforeEach(async () => {
  root = await createTempRoot('portfolio-renderer-test-');
});

afterEach(async () => {
  await fs.remove(root);
});

test('toJsString escapes quotes, backslashes, line breaks and closing tags', () => {
  assert.strictEqual(toJsString("Rock 'n' roll"), "'Rock \\'n\\' roll'");
  assert.strictEqual(toJsString('a\\b'), "'a\\\\b'");
  assert.strictEqual(toJsString('one\ntwo\r'), "'one\\ntwo\\r'");
  assert.strictEqual(toJsString('x\u2028y'), "'x\\u2028y'");
  assert.strictEqual(toJsString('</script>'), "'<\\/script>'");
});

test('renderAssetRecord writes the core fields only', () => {
  assert.strictEqual(
    renderAssetRecord(photo),
    [
      '  {',
      "    type:  'photo',",
      "    src:   '70s/van.jpg',",
      "    thumb: '70s/van.jpg',",
      "    title: 'Van',",
      "    album: '70s',",
      "    date:  '2024-01-15'",
      '  }',
    ].join('\n')
  );
});

test('renderAssetRecord writes optional fields in fixed order', () => {
  const record = renderAssetRecord({
    ...photo,
    tags: ['retro', 'cars'],
    layout: 'wide',
    order: 0,
    featured: true,
    credit: 'J. Doe',
    caption: "Summer '76",
    albumTitle: 'The Seventies',
  });

  assert.deepStrictEqual(record.split('\n').slice(7), [
    "    albumTitle: 'The Seventies',",
    "    caption:  'Summer \\'76',",
    "    credit:   'J. Doe',",
    '    featured: true,',
    '    order:    0,',
    "    layout:   'wide',",
    "    tags:     ['retro', 'cars']",
    '  }',
  ]);
});

test('renderAssetRecord omits featured false and empty tag lists', () => {
  assert.strictEqual(renderAssetRecord({ ...photo, featured: false, tags: [] }), renderAssetRecord(photo));
});

test('renderAssetBlock groups records under album comments', () => {
  const block = renderAssetBlock([photo, video], markers);

  assert.strictEqual(
    block,
    [
      '// ASSETS:START',
      'const ASSETS = [',
      '',
      `  // ── Album: 70s ${RULE}`,
      `${renderAssetRecord(photo)},`,
      '',
      `  // ── Album: clips ${RULE}`,
      `${renderAssetRecord(video)},`,
      '];',
      '// ASSETS:END',
    ].join('\n')
  );
});

test('renderAssetBlock with no assets keeps an empty list', () => {
  assert.strictEqual(renderAssetBlock([], markers), '// ASSETS:START\nconst ASSETS = [\n];\n// ASSETS:END');
});

test('spliceAssetBlock replaces only the marker-delimited region', () => {
  assert.strictEqual(spliceAssetBlock(HOST_TEMPLATE, 'NEW', markers), `${HOST_BEFORE}NEW${HOST_AFTER}`);
});

test('spliceAssetBlock requires both markers in order', () => {
  assert.throws(() => spliceAssetBlock('<html></html>', 'NEW', markers), MarkerNotFoundError);
  assert.throws(
    () => spliceAssetBlock('// ASSETS:END\n// ASSETS:START\n', 'NEW', markers),
    (error: unknown) => error instanceof MarkerNotFoundError && error.marker === '// ASSETS:END'
  );
});

test('findMarkerLine matches indented marker lines only', () => {
  const document = "const note = 'see // ASSETS:END';\n    // ASSETS:END\n";

  assert.strictEqual(findMarkerLine(document, '// ASSETS:END'), 38);
  assert.strictEqual(findMarkerLine('x // ASSETS:START', '// ASSETS:START'), -1);
});

test('spliceAssetBlock skips marker text inside the old block', () => {
  const document = [
    '<script>',
    '// ASSETS:START',
    "const ASSETS = [{ caption: 'see // ASSETS:END' }];",
    '// ASSETS:END',
    '</script>',
  ].join('\n');

  assert.strictEqual(spliceAssetBlock(document, 'NEW', markers), '<script>\nNEW\n</script>');
});

test('writeHostDocument rewrites once, then reports no change', async () => {
  const hostPath = path.join(root, 'portfolio.html');
  await fs.writeFile(hostPath, HOST_TEMPLATE);
  const block = renderAssetBlock([photo], markers);

  assert.deepStrictEqual(await writeHostDocument(hostPath, block, markers), { changed: true });
  assert.strictEqual(await fs.readFile(hostPath, 'utf-8'), `${HOST_BEFORE}${block}${HOST_AFTER}`);
  assert.strictEqual(await fs.pathExists(`${hostPath}.tmp`), false);

  assert.deepStrictEqual(await writeHostDocument(hostPath, block, markers), { changed: false });
});

test('writeHostDocument leaves a document without markers untouched', async () => {
  const hostPath = path.join(root, 'portfolio.html');
  await fs.writeFile(hostPath, '<html></html>');

  await assert.rejects(writeHostDocument(hostPath, 'NEW', markers), MarkerNotFoundError);
  assert.strictEqual(await fs.readFile(hostPath, 'utf-8'), '<html></html>');
});
