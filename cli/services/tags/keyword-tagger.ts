import type { TagAssignments, Theme } from '../../lib/portfolio-types';

export interface TaggableItem {
  album: string;
  filename: string;
  stem: string;
  /** "{album}/{filename}", the key used in tags.json */
  path: string;
}

export interface ThemeStats {
  tag: string;
  label: string;
  count: number;
  examples: string[];
}

export interface TagStats {
  themes: ThemeStats[];
  total: number;
  tagged: number;
  untagged: number;
}

const MAX_EXAMPLES = 5;

export function tokenizeStem(stem: string): Set<string> {
  return new Set(stem.toLowerCase().split(/[-_\s]+/));
}

/**
 * Tag each item with every theme sharing a keyword with its filename, in theme order.
 * Items without a match get an empty list rather than no entry.
 */
export function assignTagsByKeywords(items: readonly TaggableItem[], themes: readonly Theme[]): TagAssignments {
  const assignments: TagAssignments = {};

  for (const item of items) {
    const words = tokenizeStem(item.stem);
    assignments[item.path] = themes
      .filter((theme) => theme.keywords.some((keyword) => words.has(keyword)))
      .map((theme) => theme.tag);
  }

  return assignments;
}

/**
 * Entries in `updates` replace those in `existing`; untouched keys keep their position
 */
export function mergeTagAssignments(existing: TagAssignments, updates: TagAssignments): TagAssignments {
  return { ...existing, ...updates };
}

export function computeTagStats(assignments: TagAssignments, themes: readonly Theme[]): TagStats {
  const counts = new Map<string, number>();
  const examples = new Map<string, string[]>();
  let untagged = 0;

  for (const [assetPath, tags] of Object.entries(assignments)) {
    if (tags.length === 0) untagged++;

    const filename = assetPath.split('/').pop() ?? assetPath;
    for (const tag of tags) {
      counts.set(tag, (counts.get(tag) ?? 0) + 1);
      const list = examples.get(tag) ?? [];
      if (list.length < MAX_EXAMPLES) list.push(filename);
      examples.set(tag, list);
    }
  }

  const total = Object.keys(assignments).length;

  return {
    themes: themes.map((theme) => ({
      tag: theme.tag,
      label: theme.label,
      count: counts.get(theme.tag) ?? 0,
      examples: examples.get(theme.tag) ?? [],
    })),
    total,
    tagged: total - untagged,
    untagged,
  };
}
