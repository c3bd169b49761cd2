import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { FsStore, writeFileAtomic } from './fs_store';

interface CourseNote {
  courseName: string;
  score: string;
}

function isCourseNote(value: unknown): value is CourseNote {
  return typeof value === 'object' && value !== null &&
    'courseName' in value && typeof value.courseName === 'string' &&
    'score' in value && typeof value.score === 'string';
}

async function pathExists(filePath: string): Promise<boolean> {
  return fs.access(filePath).then(() => true).catch(() => false);
}

describe('FsStore', () => {
  let store: FsStore<CourseNote>;
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fs-store-test-'));
    store = new FsStore<CourseNote>({ basePath: tempDir, guard: isCourseNote });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  // ─────────────────────────────────────────────────────────
  // Core Store Operations
  // ─────────────────────────────────────────────────────────

  describe('Core Store Operations', () => {
    it('should return the stored value when the ID exists', async () => {
      const note: CourseNote = { courseName: 'Math', score: '90' };
      await store.put('math', note);

      expect(await store.get('math')).toEqual(note);
    });

    it('should return null when the ID does not exist', async () => {
      expect(await store.get('missing')).toBeNull();
    });

    it('should overwrite an existing value', async () => {
      await store.put('math', { courseName: 'Math', score: '90' });
      await store.put('math', { courseName: 'Math', score: '95' });

      expect(await store.get('math')).toEqual({ courseName: 'Math', score: '95' });
    });

    it('should delete an existing value and ignore missing ones', async () => {
      await store.put('math', { courseName: 'Math', score: '90' });

      await store.delete('math');

      expect(await store.exists('math')).toBe(false);
      await expect(store.delete('missing')).resolves.toBeUndefined();
    });

    it('should list IDs derived from json files only', async () => {
      await store.put('math', { courseName: 'Math', score: '90' });
      await store.put('physics', { courseName: 'Physics', score: '80' });
      await fs.writeFile(path.join(tempDir, 'notes.txt'), 'text', 'utf-8');

      const ids = await store.list();

      expect(ids.sort()).toEqual(['math', 'physics']);
    });

    it('should return an empty list when the directory does not exist', async () => {
      const missing = new FsStore<CourseNote>({ basePath: path.join(tempDir, 'nope'), guard: isCourseNote });

      expect(await missing.list()).toEqual([]);
    });
  });

  // ─────────────────────────────────────────────────────────
  // Atomic writes
  // ─────────────────────────────────────────────────────────

  describe('Atomic writes', () => {
    it('should leave no temporary files behind after put', async () => {
      await store.put('math', { courseName: 'Math', score: '90' });

      const files = await fs.readdir(tempDir);

      expect(files).toEqual(['math.json']);
    });

    it('should keep the previous file when the write fails', async () => {
      const target = path.join(tempDir, 'math.json');
      await fs.writeFile(target, JSON.stringify({ courseName: 'Math', score: '90' }), 'utf-8');

      // Renaming a file over a directory fails, leaving the original untouched
      const blocked = path.join(tempDir, 'blocked.json');
      await fs.mkdir(blocked);
      await expect(writeFileAtomic(blocked, '{}')).rejects.toThrow();

      expect(JSON.parse(await fs.readFile(target, 'utf-8'))).toEqual({ courseName: 'Math', score: '90' });
      expect((await fs.readdir(tempDir)).sort()).toEqual(['blocked.json', 'math.json']);
    });

    it('should create the base directory if missing', async () => {
      const nestedDir = path.join(tempDir, 'nested', 'deep');
      const nestedStore = new FsStore<CourseNote>({ basePath: nestedDir, guard: isCourseNote });

      await nestedStore.put('math', { courseName: 'Math', score: '90' });

      expect(await pathExists(path.join(nestedDir, 'math.json'))).toBe(true);
    });

    it('should not create the directory when createIfMissing is false', async () => {
      const noCreateStore = new FsStore<CourseNote>({
        basePath: path.join(tempDir, 'no-create'),
        guard: isCourseNote,
        createIfMissing: false,
      });

      await expect(noCreateStore.put('math', { courseName: 'Math', score: '90' })).rejects.toThrow();
    });
  });

  // ─────────────────────────────────────────────────────────
  // Invalid content
  // ─────────────────────────────────────────────────────────

  describe('Invalid content', () => {
    it('should throw on invalid JSON when no onInvalid handler is set', async () => {
      await fs.writeFile(path.join(tempDir, 'math.json'), 'not valid json {{{', 'utf-8');

      await expect(store.get('math')).rejects.toThrow(SyntaxError);
    });

    it('should report invalid JSON and read it as null with an onInvalid handler', async () => {
      const onInvalid = jest.fn();
      const tolerant = new FsStore<CourseNote>({ basePath: tempDir, guard: isCourseNote, onInvalid });
      await fs.writeFile(path.join(tempDir, 'math.json'), '{"courseName": "Ma', 'utf-8');

      const result = await tolerant.get('math');

      expect(result).toBeNull();
      expect(onInvalid).toHaveBeenCalledWith('math', expect.any(SyntaxError));
    });

    it('should read values failing the guard as null', async () => {
      const onInvalid = jest.fn();
      const tolerant = new FsStore<CourseNote>({ basePath: tempDir, guard: isCourseNote, onInvalid });
      await fs.writeFile(path.join(tempDir, 'math.json'), '{"courseName": 7}', 'utf-8');

      expect(await tolerant.get('math')).toBeNull();
      expect(onInvalid).toHaveBeenCalledTimes(1);
    });
  });

  // ─────────────────────────────────────────────────────────
  // Security
  // ─────────────────────────────────────────────────────────

  describe('Security', () => {
    it('should reject IDs with path traversal', async () => {
      await expect(store.get('../etc/passwd')).rejects.toThrow(/cannot contain/);
      await expect(store.put('../etc/passwd', { courseName: 'x', score: 'x' })).rejects.toThrow(/cannot contain/);
      await expect(store.delete('../etc/passwd')).rejects.toThrow(/cannot contain/);
      await expect(store.exists('../etc/passwd')).rejects.toThrow(/cannot contain/);
    });

    it('should reject IDs with slashes', async () => {
      await expect(store.get('foo/bar')).rejects.toThrow(/cannot contain/);
      await expect(store.get('foo\\bar')).rejects.toThrow(/cannot contain/);
    });

    it('should allow IDs with a single dot', async () => {
      await store.put('12345%3As1.grades', { courseName: 'Math', score: '90' });

      expect(await store.get('12345%3As1.grades')).toEqual({ courseName: 'Math', score: '90' });
    });
  });

  it('should support a custom serializer', async () => {
    const customStore = new FsStore<CourseNote>({
      basePath: tempDir,
      guard: isCourseNote,
      serializer: {
        stringify: (value) => `CUSTOM:${JSON.stringify(value)}`,
        parse: (text) => JSON.parse(text.replace('CUSTOM:', '')),
      },
    });

    await customStore.put('math', { courseName: 'Math', score: '90' });

    expect(await customStore.get('math')).toEqual({ courseName: 'Math', score: '90' });
    const content = await fs.readFile(path.join(tempDir, 'math.json'), 'utf-8');
    expect(content.startsWith('CUSTOM:')).toBe(true);
  });
});
