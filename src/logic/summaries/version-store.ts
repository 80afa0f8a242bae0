import { countWords } from '../../utils/textNormalizer';
import { NavigationError, StateError } from './errors';
import { SummaryVersion } from './types';

export interface NavigationResult {
  cursor: number;
  version: SummaryVersion;
  /** false when the request left the cursor where it was */
  changed: boolean;
}

export interface VersionStatistics {
  count: number;
  totalRefinements: number;
  averageWordCount: number;
  shortestVersion: SummaryVersion | null;
  longestVersion: SummaryVersion | null;
}

export interface VersionComparison {
  wordCount1: number;
  wordCount2: number;
  charCount1: number;
  charCount2: number;
  wordDelta: number;
  charDelta: number;
  percentChange: number;
  direction: 'longer' | 'shorter' | 'same';
  description: string;
}

export interface VersionHistoryItem {
  index: number;
  versionNumber: number;
  createdAt: Date;
  refinementPrompt: string | null;
  wordCount: number;
  /** null for the first version */
  msSincePrevious: number | null;
  isCurrent: boolean;
}

export function versionStatistics(versions: readonly SummaryVersion[]): VersionStatistics {
  if (versions.length === 0) {
    return { count: 0, totalRefinements: 0, averageWordCount: 0, shortestVersion: null, longestVersion: null };
  }

  let shortest = versions[0];
  let longest = versions[0];
  let shortestCount = countWords(shortest.content);
  let longestCount = shortestCount;
  let total = 0;

  for (const version of versions) {
    const words = countWords(version.content);
    total += words;
    // strict comparisons keep the earliest version on ties
    if (words < shortestCount) {
      shortest = version;
      shortestCount = words;
    }
    if (words > longestCount) {
      longest = version;
      longestCount = words;
    }
  }

  return {
    count: versions.length,
    totalRefinements: versions.length - 1,
    averageWordCount: Math.round(total / versions.length),
    shortestVersion: shortest,
    longestVersion: longest,
  };
}

export function compareVersions(v1: SummaryVersion, v2: SummaryVersion): VersionComparison {
  const wordCount1 = countWords(v1.content);
  const wordCount2 = countWords(v2.content);
  const charCount1 = v1.content.length;
  const charCount2 = v2.content.length;
  const wordDelta = wordCount2 - wordCount1;
  const percentChange = wordCount1 === 0 ? 0 : (wordDelta / wordCount1) * 100;
  const direction = wordDelta > 0 ? 'longer' : wordDelta < 0 ? 'shorter' : 'same';

  const description =
    direction === 'same'
      ? 'Same length'
      : `${direction === 'longer' ? '+' : '-'}${Math.abs(wordDelta)} words (${Math.abs(percentChange).toFixed(1)}% ${direction})`;

  return {
    wordCount1,
    wordCount2,
    charCount1,
    charCount2,
    wordDelta,
    charDelta: charCount2 - charCount1,
    percentChange,
    direction,
    description,
  };
}

/**
 * Append-only, linearly ordered summary versions. The cursor lives with the
 * caller; every navigation method takes the current cursor and answers with
 * the new one without holding any state of its own.
 */
export class VersionStore {
  private readonly items: SummaryVersion[] = [];

  get length(): number {
    return this.items.length;
  }

  get versions(): readonly SummaryVersion[] {
    return this.items;
  }

  get nextVersionNumber(): number {
    return this.items.length + 1;
  }

  /** Does not move any cursor. */
  append(version: SummaryVersion): void {
    if (version.versionNumber !== this.nextVersionNumber) {
      throw new StateError(
        'VersionGap',
        `Expected version ${this.nextVersionNumber}, got ${version.versionNumber}`,
      );
    }
    this.items.push(Object.freeze({ ...version }));
  }

  get(index: number): SummaryVersion | undefined {
    return this.items[index];
  }

  getByNumber(versionNumber: number): SummaryVersion | undefined {
    return this.items.find(v => v.versionNumber === versionNumber);
  }

  latest(): SummaryVersion | undefined {
    return this.items[this.items.length - 1];
  }

  canUndo(cursor: number): boolean {
    return cursor > 0;
  }

  canRedo(cursor: number): boolean {
    return cursor < this.items.length - 1;
  }

  /** True when the cursor sits behind the latest version, i.e. redo is possible. */
  hasNavigatedBack(cursor: number): boolean {
    return this.canRedo(cursor);
  }

  undo(cursor: number): NavigationResult {
    this.assertCursor(cursor);
    if (!this.canUndo(cursor)) {
      throw new NavigationError('AtBoundary', 'Cannot undo - already at first version');
    }
    return this.moveTo(cursor - 1);
  }

  redo(cursor: number): NavigationResult {
    this.assertCursor(cursor);
    if (!this.canRedo(cursor)) {
      throw new NavigationError('AtBoundary', 'Cannot redo - already at latest version');
    }
    return this.moveTo(cursor + 1);
  }

  jumpTo(cursor: number, targetIndex: number): NavigationResult {
    if (!Number.isInteger(targetIndex) || targetIndex < 0 || targetIndex >= this.items.length) {
      throw new NavigationError('OutOfRange', `Invalid version index ${targetIndex}`);
    }
    if (targetIndex === cursor) {
      return { cursor, version: this.items[cursor], changed: false };
    }
    return this.moveTo(targetIndex);
  }

  statistics(): VersionStatistics {
    return versionStatistics(this.items);
  }

  compare(v1: SummaryVersion, v2: SummaryVersion): VersionComparison {
    return compareVersions(v1, v2);
  }

  timeBetween(v1: SummaryVersion, v2: SummaryVersion): number {
    return v2.createdAt.getTime() - v1.createdAt.getTime();
  }

  history(cursor?: number): VersionHistoryItem[] {
    return this.items.map((version, index) => ({
      index,
      versionNumber: version.versionNumber,
      createdAt: version.createdAt,
      refinementPrompt: version.refinementPrompt,
      wordCount: countWords(version.content),
      msSincePrevious: index > 0 ? this.timeBetween(this.items[index - 1], version) : null,
      isCurrent: index === cursor,
    }));
  }

  private assertCursor(cursor: number): void {
    if (!Number.isInteger(cursor) || cursor < 0 || cursor >= this.items.length) {
      throw new NavigationError('OutOfRange', `Invalid cursor ${cursor}`);
    }
  }

  private moveTo(index: number): NavigationResult {
    return { cursor: index, version: this.items[index], changed: true };
  }
}
