import type { Logger } from '../logger';
import type { GradeRecord, GradesSnapshot, ScheduleEntry, ScheduleSnapshot } from '../records';
import {
  ChangeDetector,
  applyChanges,
  dedupeRecords,
  diffSnapshots,
  identityOf,
  normalizeText,
} from './change_detector';
import { ChangeDetectorError } from './change_detector.errors';

function createMockLogger(): jest.Mocked<Logger> {
  const logger: jest.Mocked<Logger> = {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    child: jest.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

function grade(overrides: Partial<GradeRecord> = {}): GradeRecord {
  return {
    term: '2024-1',
    courseName: 'Calculus',
    score: '90',
    credit: '4',
    courseCategory: 'Required',
    ...overrides,
  };
}

function entry(overrides: Partial<ScheduleEntry> = {}): ScheduleEntry {
  return {
    weekday: 1,
    startPeriod: 1,
    endPeriod: 2,
    courseName: 'Calculus',
    room: 'A101',
    teacher: 'Li',
    weekList: 'all',
    ...overrides,
  };
}

function grades(records: GradeRecord[]): GradesSnapshot {
  return { kind: 'grades', accountKey: 'demo:alice', records, capturedAt: '2024-09-01T08:00:00.000Z' };
}

function schedule(records: ScheduleEntry[]): ScheduleSnapshot {
  return { kind: 'schedule', accountKey: 'demo:alice', records, capturedAt: '2024-09-01T08:00:00.000Z' };
}

describe('ChangeDetector', () => {
  // ─────────────────────────────────────────────────────────
  // Identity
  // ─────────────────────────────────────────────────────────

  describe('identityOf', () => {
    it('should key grades by term, course name and course code', () => {
      expect(identityOf(grade({ courseCode: 'MA101' }))).toBe('2024-1|Calculus|MA101');
    });

    it('should fall back to the course name when the code is absent', () => {
      expect(identityOf(grade())).toBe('2024-1|Calculus|Calculus');
    });

    it('should key schedule entries by weekday, start period and course name', () => {
      expect(identityOf(entry({ weekday: 3, startPeriod: 5 }))).toBe('3|5|Calculus');
    });

    it('should normalize whitespace inside identity fields', () => {
      expect(identityOf(grade({ courseName: '  Linear   Algebra ' }))).toBe('2024-1|Linear Algebra|Linear Algebra');
    });
  });

  describe('normalizeText', () => {
    it('should trim and collapse whitespace and map undefined to empty', () => {
      expect(normalizeText(' a \t b\n')).toBe('a b');
      expect(normalizeText(undefined)).toBe('');
    });
  });

  // ─────────────────────────────────────────────────────────
  // diff
  // ─────────────────────────────────────────────────────────

  describe('diffSnapshots', () => {
    it('should return no changes without a previous snapshot', () => {
      expect(diffSnapshots(null, grades([grade()]))).toEqual([]);
    });

    it('should return no changes for identical snapshots', () => {
      expect(diffSnapshots(grades([grade()]), grades([grade()]))).toEqual([]);
    });

    it('should report an added grade', () => {
      const added = grade({ courseName: 'Physics', score: '85' });

      const events = diffSnapshots(grades([grade()]), grades([grade(), added]));

      expect(events).toEqual([{ kind: 'added', identity: '2024-1|Physics|Physics', after: added }]);
    });

    it('should report a removed grade', () => {
      const events = diffSnapshots(grades([grade()]), grades([]));

      expect(events).toEqual([{ kind: 'removed', identity: '2024-1|Calculus|Calculus', before: grade() }]);
    });

    it('should report a modified score with its changed fields', () => {
      const events = diffSnapshots(grades([grade()]), grades([grade({ score: '95' })]));

      expect(events).toEqual([{
        kind: 'modified',
        identity: '2024-1|Calculus|Calculus',
        before: grade(),
        after: grade({ score: '95' }),
        changedFields: ['score'],
      }]);
    });

    it('should sort changed fields by name', () => {
      const events = diffSnapshots(
        grades([grade()]),
        grades([grade({ score: '60', credit: '3', courseCategory: 'Elective' })])
      );

      expect(events[0]).toMatchObject({ kind: 'modified', changedFields: ['courseCategory', 'credit', 'score'] });
    });

    it('should ignore whitespace-only differences', () => {
      const events = diffSnapshots(grades([grade()]), grades([grade({ score: ' 90 ', courseCategory: 'Required  ' })]));

      expect(events).toEqual([]);
    });

    it('should treat an absent course code as empty when both sides lack it', () => {
      const events = diffSnapshots(grades([grade({ courseCode: '' })]), grades([grade()]));

      expect(events).toEqual([]);
    });

    it('should order events added, removed, modified and by identity within each group', () => {
      const previous = grades([
        grade({ courseName: 'Biology' }),
        grade({ courseName: 'Art' }),
        grade({ courseName: 'Calculus' }),
      ]);
      const current = grades([
        grade({ courseName: 'Calculus', score: '70' }),
        grade({ courseName: 'Zoology' }),
        grade({ courseName: 'Drama' }),
      ]);

      const events = diffSnapshots(previous, current);

      expect(events.map((event) => `${event.kind}:${event.identity}`)).toEqual([
        'added:2024-1|Drama|Drama',
        'added:2024-1|Zoology|Zoology',
        'removed:2024-1|Art|Art',
        'removed:2024-1|Biology|Biology',
        'modified:2024-1|Calculus|Calculus',
      ]);
    });

    it('should compare numeric identity parts numerically', () => {
      const events = diffSnapshots(
        schedule([]),
        schedule([entry({ startPeriod: 10 }), entry({ startPeriod: 2 })])
      );

      expect(events.map((event) => event.identity)).toEqual(['1|2|Calculus', '1|10|Calculus']);
    });

    it('should keep the last duplicate and warn about it', () => {
      const logger = createMockLogger();
      const current = grades([grade({ score: '50' }), grade({ score: '99' })]);

      const events = diffSnapshots(grades([grade()]), current, logger);

      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ kind: 'modified', after: { score: '99' } });
      expect(logger.warn).toHaveBeenCalledWith(
        'Duplicate record 2024-1|Calculus|Calculus in current grades of demo:alice; keeping the last occurrence'
      );
    });

    it('should dedupe a snapshot to the last occurrence of each identity', () => {
      const logger = createMockLogger();
      const detector = new ChangeDetector({ logger });
      const physics = grade({ courseName: 'Physics' });

      const deduped = detector.dedupe(grades([grade({ score: '50' }), physics, grade({ score: '99' })]));

      expect(deduped.records).toEqual([grade({ score: '99' }), physics]);
      expect(logger.warn).toHaveBeenCalledWith(
        'Duplicate record 2024-1|Calculus|Calculus in fetched grades of demo:alice; keeping the last occurrence'
      );
    });

    it('should return unique records unchanged', () => {
      const records = [entry(), entry({ weekday: 2 })];

      expect(dedupeRecords(records)).toBe(records);
    });

    it('should reject snapshots of different kinds', () => {
      const detector = new ChangeDetector();

      expect(() => detector.diff(grades([]), schedule([]))).toThrow(ChangeDetectorError);
    });
  });

  // ─────────────────────────────────────────────────────────
  // Schedule fields
  // ─────────────────────────────────────────────────────────

  describe('schedule week lists', () => {
    it('should compare week lists as sets', () => {
      const events = diffSnapshots(
        schedule([entry({ weekList: [3, 1, 2] })]),
        schedule([entry({ weekList: [1, 2, 3, 3] })])
      );

      expect(events).toEqual([]);
    });

    it('should treat "all" as different from an explicit list', () => {
      const events = diffSnapshots(
        schedule([entry({ weekList: 'all' })]),
        schedule([entry({ weekList: [1, 2, 3] })])
      );

      expect(events).toEqual([expect.objectContaining({ kind: 'modified', changedFields: ['weekList'] })]);
    });

    it('should report a room change', () => {
      const events = diffSnapshots(schedule([entry()]), schedule([entry({ room: 'B202' })]));

      expect(events[0]).toMatchObject({ kind: 'modified', identity: '1|1|Calculus', changedFields: ['room'] });
    });
  });

  // ─────────────────────────────────────────────────────────
  // applyChanges
  // ─────────────────────────────────────────────────────────

  describe('applyChanges', () => {
    it('should reproduce the current records from the baseline and events', () => {
      const previous = grades([grade({ courseName: 'Art' }), grade()]);
      const current = grades([grade({ score: '75' }), grade({ courseName: 'Drama' })]);

      const events = diffSnapshots(previous, current);
      const applied = applyChanges(previous.records, events);

      expect(diffSnapshots(current, grades(applied))).toEqual([]);
    });
  });

  describe('countByKind', () => {
    it('should count events per kind', () => {
      const detector = new ChangeDetector();
      const events = detector.diff(
        grades([grade({ courseName: 'Art' }), grade()]),
        grades([grade({ score: '75' }), grade({ courseName: 'Drama' })])
      );

      expect(detector.countByKind(events)).toEqual({ added: 1, removed: 1, modified: 1 });
    });
  });
});
