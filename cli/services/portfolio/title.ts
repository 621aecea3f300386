/**
 * Display titles from filenames.
 *
 * A title is produced by running the stem through TITLE_RULES in order. Each rule
 * either finishes with a title or hands a (possibly rewritten) stem to the next one.
 * The last rule always finishes.
 */

import { splitFilename } from './scanner';

export interface TitleInput {
  album: string;
  filename: string;
  /** 1-based position within the album's photos or videos */
  index: number;
  total: number;
}

export interface TitleContext extends TitleInput {
  genericPrefixes: readonly string[];
}

export type TitleStep = { done: true; title: string } | { done: false; stem: string };

export interface TitleRule {
  name: string;
  apply(stem: string, ctx: TitleContext): TitleStep;
}

const UUID_PATTERN = /[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi;
const HASH_SUFFIX_PATTERN = /[-_][A-Za-z0-9]{12,}$/;

const next = (stem: string): TitleStep => ({ done: false, stem });
const finish = (title: string): TitleStep => ({ done: true, title });

export function padIndex(index: number, total: number): string {
  return String(index).padStart(String(total).length, '0');
}

export function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

const LETTER = /\p{L}/u;

/**
 * A letter following a non-letter starts a word: "70s" -> "70S", "o'brien" -> "O'Brien"
 */
export function titleCase(text: string): string {
  let result = '';
  let afterLetter = false;

  for (const char of text) {
    const isLetter = LETTER.test(char);
    if (!isLetter) {
      result += char;
    } else {
      result += afterLetter ? char.toLowerCase() : char.toUpperCase();
    }
    afterLetter = isLetter;
  }

  return result;
}

/**
 * "{Album} — {NN}", used whenever the filename carries no usable words
 */
export function numberedTitle(ctx: TitleInput): string {
  return `${capitalize(ctx.album)} — ${padIndex(ctx.index, ctx.total)}`;
}

export const TITLE_RULES: readonly TitleRule[] = [
  {
    name: 'strip-uuid',
    apply: (stem) => next(stem.replace(UUID_PATTERN, '')),
  },
  {
    // Generator tools append long random ids: -PG0ypRgDrFtnBmIDPB3G, _7brk8p7brk8p7brk
    name: 'strip-hash-suffix',
    apply: (stem) => next(stem.replace(HASH_SUFFIX_PATTERN, '')),
  },
  {
    name: 'normalize-separators',
    apply: (stem) => next(stem.replace(/[-_]+/g, ' ').replace(/\s+/g, ' ').trim()),
  },
  {
    name: 'fallback-when-short',
    apply: (stem, ctx) => ([...stem].length < 2 ? finish(numberedTitle(ctx)) : next(stem)),
  },
  {
    name: 'title-case',
    apply: (stem) => next(titleCase(stem)),
  },
  {
    name: 'fallback-when-generic',
    apply: (stem, ctx) => {
      const lower = stem.toLowerCase();
      const generic = ctx.genericPrefixes.some((prefix) => lower.startsWith(prefix.toLowerCase()));
      return generic ? finish(numberedTitle(ctx)) : next(stem);
    },
  },
  {
    name: 'number-when-grouped',
    apply: (stem, ctx) => finish(ctx.total > 1 ? `${stem} — ${padIndex(ctx.index, ctx.total)}` : stem),
  },
];

export function deriveTitle(input: TitleInput, genericPrefixes: readonly string[]): string {
  const ctx: TitleContext = { ...input, genericPrefixes };
  let stem = splitFilename(input.filename).stem;

  for (const rule of TITLE_RULES) {
    const step = rule.apply(stem, ctx);
    if (step.done) return step.title;
    stem = step.stem;
  }

  return stem || numberedTitle(ctx);
}

export function createTitleDeriver(genericPrefixes: readonly string[]): (input: TitleInput) => string {
  return (input) => deriveTitle(input, genericPrefixes);
}
