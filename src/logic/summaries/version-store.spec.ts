import { NavigationError, StateError } from './errors';
import { SummaryVersion } from './types';
import { VersionStore, compareVersions, versionStatistics } from './version-store';

const words = (n: number) => Array.from({ length: n }, () => 'word').join(' ');

function version(versionNumber: number, content = `summary ${versionNumber}`, createdAt = new Date(2024, 0, versionNumber)): SummaryVersion {
  return {
    content,
    createdAt,
    versionNumber,
    refinementPrompt: versionNumber === 1 ? null : `refine ${versionNumber}`,
  };
}

function storeOf(...versions: SummaryVersion[]): VersionStore {
  const store = new VersionStore();
  versions.forEach(v => store.append(v));
  return store;
}

function storeWith(count: number): VersionStore {
  return storeOf(...Array.from({ length: count }, (_, i) => version(i + 1)));
}

describe('VersionStore', () => {
  describe('append', () => {
    it('keeps versions in order with contiguous numbers', () => {
      const store = storeWith(3);
      expect(store.length).toBe(3);
      expect(store.versions.map(v => v.versionNumber)).toEqual([1, 2, 3]);
      expect(store.nextVersionNumber).toBe(4);
    });

    it('rejects a version number that skips ahead', () => {
      const store = storeWith(1);
      expect(() => store.append(version(3))).toThrow(StateError);
      expect(() => store.append(version(3))).toThrow('Expected version 2, got 3');
      expect(store.length).toBe(1);
    });

    it('stores frozen copies', () => {
      const store = storeWith(1);
      expect(Object.isFrozen(store.get(0))).toBe(true);
    });
  });

  describe('navigation', () => {
    it('undoes and redoes one step at a time', () => {
      const store = storeWith(3);
      const back = store.undo(2);
      expect(back.cursor).toBe(1);
      expect(back.version.versionNumber).toBe(2);
      expect(back.changed).toBe(true);
      expect(store.redo(back.cursor).cursor).toBe(2);
    });

    it('refuses to undo past the first version', () => {
      const store = storeWith(2);
      expect(() => store.undo(0)).toThrow(new NavigationError('AtBoundary', 'Cannot undo - already at first version'));
    });

    it('refuses to redo past the latest version', () => {
      const store = storeWith(2);
      expect(() => store.redo(1)).toThrow(
        expect.objectContaining({ code: 'AtBoundary', message: 'Cannot redo - already at latest version' }),
      );
    });

    it('rejects an undo from a cursor outside the history', () => {
      const store = storeWith(2);
      expect(() => store.undo(5)).toThrow(new NavigationError('OutOfRange', 'Invalid cursor 5'));
    });

    it('rejects a redo from a negative cursor', () => {
      const store = storeWith(2);
      expect(() => store.redo(-1)).toThrow(new NavigationError('OutOfRange', 'Invalid cursor -1'));
    });

    it('jumps to any existing index', () => {
      const store = storeWith(4);
      const result = store.jumpTo(3, 0);
      expect(result).toEqual({ cursor: 0, version: store.get(0), changed: true });
    });

    it('treats a jump to the current index as a no-op', () => {
      const store = storeWith(2);
      const result = store.jumpTo(1, 1);
      expect(result.changed).toBe(false);
      expect(result.cursor).toBe(1);
    });

    it.each([-1, 2, 1.5])('rejects out of range index %p', index => {
      const store = storeWith(2);
      expect(() => store.jumpTo(0, index)).toThrow(`Invalid version index ${index}`);
    });

    it('leaves redo available after an append while the cursor is behind', () => {
      const store = storeWith(2);
      const { cursor } = store.undo(1);
      store.append(version(3));
      expect(cursor).toBe(0);
      expect(store.canRedo(cursor)).toBe(true);
      expect(store.hasNavigatedBack(cursor)).toBe(true);
      expect(store.hasNavigatedBack(2)).toBe(false);
    });
  });

  describe('queries', () => {
    it('looks versions up by index and number', () => {
      const store = storeWith(3);
      expect(store.get(1)?.versionNumber).toBe(2);
      expect(store.get(5)).toBeUndefined();
      expect(store.getByNumber(3)?.content).toBe('summary 3');
      expect(store.getByNumber(4)).toBeUndefined();
      expect(store.latest()?.versionNumber).toBe(3);
    });

    it('reports time between versions in milliseconds', () => {
      const store = storeOf(
        version(1, 'a', new Date('2024-01-01T10:00:00Z')),
        version(2, 'b', new Date('2024-01-01T10:00:05Z')),
      );
      expect(store.timeBetween(store.versions[0], store.versions[1])).toBe(5000);
    });

    it('lists history with word counts, elapsed time and the current flag', () => {
      const store = storeOf(
        version(1, 'one two', new Date('2024-01-01T10:00:00Z')),
        version(2, 'three', new Date('2024-01-01T10:01:30Z')),
      );
      const history = store.history(1);
      expect(history.map(h => [h.index, h.versionNumber, h.wordCount, h.msSincePrevious, h.isCurrent])).toEqual([
        [0, 1, 2, null, false],
        [1, 2, 1, 90000, true],
      ]);
      expect(history[0].refinementPrompt).toBeNull();
    });
  });
});

describe('versionStatistics', () => {
  it('returns zeroes for an empty list', () => {
    expect(versionStatistics([])).toEqual({
      count: 0,
      totalRefinements: 0,
      averageWordCount: 0,
      shortestVersion: null,
      longestVersion: null,
    });
  });

  it('averages word counts and finds the extremes', () => {
    const v1 = version(1, 'one two three');
    const v2 = version(2, 'a b');
    const v3 = version(3, 'x y z w');
    const stats = versionStatistics([v1, v2, v3]);
    expect(stats.count).toBe(3);
    expect(stats.totalRefinements).toBe(2);
    expect(stats.averageWordCount).toBe(3);
    expect(stats.shortestVersion).toBe(v2);
    expect(stats.longestVersion).toBe(v3);
  });

  it('rounds the average to the nearest integer', () => {
    const stats = versionStatistics([version(1, 'a b'), version(2, 'a b c')]);
    expect(stats.averageWordCount).toBe(3);
  });

  it('keeps the earliest version on ties', () => {
    const v1 = version(1, 'a b');
    const v2 = version(2, 'c d');
    const stats = versionStatistics([v1, v2]);
    expect(stats.shortestVersion).toBe(v1);
    expect(stats.longestVersion).toBe(v1);
  });
});

describe('compareVersions', () => {
  it('describes growth', () => {
    const result = compareVersions(version(1, words(100)), version(2, words(130)));
    expect(result.wordCount1).toBe(100);
    expect(result.wordCount2).toBe(130);
    expect(result.wordDelta).toBe(30);
    expect(result.percentChange).toBeCloseTo(30);
    expect(result.direction).toBe('longer');
    expect(result.description).toBe('+30 words (30.0% longer)');
  });

  it('describes shrinkage', () => {
    const result = compareVersions(version(1, words(120)), version(2, words(108)));
    expect(result.direction).toBe('shorter');
    expect(result.description).toBe('-12 words (10.0% shorter)');
  });

  it('describes equal lengths', () => {
    const result = compareVersions(version(1, 'a b c'), version(2, 'd e f'));
    expect(result.direction).toBe('same');
    expect(result.description).toBe('Same length');
    expect(result.charDelta).toBe(0);
  });

  it('reports zero percent change from an empty version', () => {
    const result = compareVersions(version(1, '   '), version(2, 'now has words'));
    expect(result.wordCount1).toBe(0);
    expect(result.percentChange).toBe(0);
    expect(result.description).toBe('+3 words (0.0% longer)');
  });
});
