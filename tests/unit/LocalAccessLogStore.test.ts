import fs from 'fs';
import os from 'os';
import path from 'path';
import { CodedError, ErrorCode } from '../../src/errors';
import LocalAccessLogStore from '../../src/routes/accessLog/LocalAccessLogStore';

describe('LocalAccessLogStore', () => {
  describe('in memory', () => {
    let store: LocalAccessLogStore;

    beforeEach(() => {
      store = new LocalAccessLogStore();
    });

    it('should have no timestamp for an unknown client', async () => {
      await expect(store.getLastAccessTimestamp('10.0.0.1')).resolves.toBeUndefined();
    });

    it('should prepend every requested city', async () => {
      await expect(store.recordAccess('10.0.0.1', 100, 'London')).resolves.toEqual({
        lastAccessTimestamp: 100,
        recentCities: ['London']
      });
      await expect(store.recordAccess('10.0.0.1', 200, 'Paris')).resolves.toEqual({
        lastAccessTimestamp: 200,
        recentCities: ['Paris', 'London']
      });
      await expect(store.recordAccess('10.0.0.1', 300, 'London')).resolves.toEqual({
        lastAccessTimestamp: 300,
        recentCities: ['London', 'Paris', 'London']
      });
      await expect(store.getLastAccessTimestamp('10.0.0.1')).resolves.toBe(300);
    });

    it('should keep clients apart', async () => {
      await store.recordAccess('10.0.0.1', 100, 'London');
      await store.recordAccess('10.0.0.2', 150, 'Rome');

      await expect(store.getLastAccessTimestamp('10.0.0.1')).resolves.toBe(100);
      await expect(store.recordAccess('10.0.0.2', 200, 'Oslo')).resolves.toEqual({
        lastAccessTimestamp: 200,
        recentCities: ['Oslo', 'Rome']
      });
    });

    it('should return a copy of the stored record', async () => {
      const record = await store.recordAccess('10.0.0.1', 100, 'London');
      record.recentCities.push('Tampered');

      await expect(store.recordAccess('10.0.0.1', 200, 'Paris')).resolves.toEqual({
        lastAccessTimestamp: 200,
        recentCities: ['Paris', 'London']
      });
    });
  });

  describe('persisted to a file', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'access-log-'));
      jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
      jest.restoreAllMocks();
    });

    it('should write the log and load it on startup', async () => {
      const filePath = path.join(tempDir, 'nested', 'accessLog.json');
      await new LocalAccessLogStore(filePath).recordAccess('10.0.0.1', 100, 'London');

      expect(JSON.parse(fs.readFileSync(filePath, 'utf8'))).toEqual([
        ['10.0.0.1', { lastAccessTimestamp: 100, recentCities: ['London'] }]
      ]);

      const reloaded = new LocalAccessLogStore(filePath);
      await expect(reloaded.getLastAccessTimestamp('10.0.0.1')).resolves.toBe(100);
      await expect(reloaded.recordAccess('10.0.0.1', 200, 'Paris')).resolves.toEqual({
        lastAccessTimestamp: 200,
        recentCities: ['Paris', 'London']
      });
    });

    it('should keep concurrent accesses of different clients', async () => {
      const filePath = path.join(tempDir, 'accessLog.json');
      const store = new LocalAccessLogStore(filePath);

      await Promise.all([
        store.recordAccess('10.0.0.1', 100, 'London'),
        store.recordAccess('10.0.0.2', 100, 'Paris')
      ]);

      const reloaded = new LocalAccessLogStore(filePath);
      await expect(reloaded.getLastAccessTimestamp('10.0.0.1')).resolves.toBe(100);
      await expect(reloaded.getLastAccessTimestamp('10.0.0.2')).resolves.toBe(100);
    });

    it('should apply overlapping accesses of one client in order', async () => {
      const filePath = path.join(tempDir, 'accessLog.json');
      const store = new LocalAccessLogStore(filePath);

      const [first, second] = await Promise.all([
        store.recordAccess('10.0.0.1', 100, 'London'),
        store.recordAccess('10.0.0.1', 200, 'Paris')
      ]);

      expect(first).toEqual({ lastAccessTimestamp: 100, recentCities: ['London'] });
      expect(second).toEqual({ lastAccessTimestamp: 200, recentCities: ['Paris', 'London'] });
      expect(JSON.parse(fs.readFileSync(filePath, 'utf8'))).toEqual([
        ['10.0.0.1', { lastAccessTimestamp: 200, recentCities: ['Paris', 'London'] }]
      ]);
    });

    it('should not let a failed access leak into a later access of the same client', async () => {
      const filePath = path.join(tempDir, 'accessLog.json');
      const store = new LocalAccessLogStore(filePath);
      jest.spyOn(fs.promises, 'writeFile').mockRejectedValueOnce(new Error('disk full'));

      const first = store.recordAccess('10.0.0.1', 100, 'London');
      const second = store.recordAccess('10.0.0.1', 200, 'Paris');

      await expect(first).rejects.toMatchObject({ errCode: ErrorCode.AccessLogUnavailable });
      await expect(second).resolves.toEqual({ lastAccessTimestamp: 200, recentCities: ['Paris'] });
      await expect(store.getLastAccessTimestamp('10.0.0.1')).resolves.toBe(200);
      expect(JSON.parse(fs.readFileSync(filePath, 'utf8'))).toEqual([
        ['10.0.0.1', { lastAccessTimestamp: 200, recentCities: ['Paris'] }]
      ]);
    });

    it('should roll back every overlapping access if the file cannot be written', async () => {
      const blocker = path.join(tempDir, 'blocker');
      fs.writeFileSync(blocker, '', 'utf8');
      const store = new LocalAccessLogStore(path.join(blocker, 'accessLog.json'));

      const results = await Promise.allSettled([
        store.recordAccess('10.0.0.1', 100, 'London'),
        store.recordAccess('10.0.0.1', 200, 'Paris')
      ]);

      expect(results.map(result => result.status)).toEqual(['rejected', 'rejected']);
      await expect(store.getLastAccessTimestamp('10.0.0.1')).resolves.toBeUndefined();
    });

    it('should start empty if a timestamp is out of range', async () => {
      const filePath = path.join(tempDir, 'accessLog.json');
      fs.writeFileSync(filePath, JSON.stringify([['10.0.0.1', { lastAccessTimestamp: 1e20, recentCities: ['London'] }]]), 'utf8');
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

      const store = new LocalAccessLogStore(filePath);

      await expect(store.getLastAccessTimestamp('10.0.0.1')).resolves.toBeUndefined();
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });

    it('should start empty if the file is corrupt', async () => {
      const filePath = path.join(tempDir, 'accessLog.json');
      fs.writeFileSync(filePath, '{"not": "a log"}', 'utf8');
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

      const store = new LocalAccessLogStore(filePath);

      await expect(store.getLastAccessTimestamp('10.0.0.1')).resolves.toBeUndefined();
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });

    it('should fail with AccessLogUnavailable and roll back if the file cannot be written', async () => {
      const blocker = path.join(tempDir, 'blocker');
      fs.writeFileSync(blocker, '', 'utf8');
      const store = new LocalAccessLogStore(path.join(blocker, 'accessLog.json'));

      const result = store.recordAccess('10.0.0.1', 100, 'London');

      await expect(result).rejects.toBeInstanceOf(CodedError);
      await expect(result).rejects.toMatchObject({ errCode: ErrorCode.AccessLogUnavailable });
      await expect(store.getLastAccessTimestamp('10.0.0.1')).resolves.toBeUndefined();
    });
  });
});
