import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SessionLogStore } from '../../../src/sessions/sessionLogStore';
import { makeSessionRecord } from '../../helpers/factories';

describe('SessionLogStore', () => {
  let dir: string;
  let logFile: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'session-log-'));
    logFile = path.join(dir, 'nested', 'sessions.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('readRaw', () => {
    it('should treat a missing file as an empty log', async () => {
      expect(await new SessionLogStore(logFile).readRaw()).toEqual([]);
    });

    it('should treat a blank file as an empty log', async () => {
      await fs.mkdir(path.dirname(logFile), { recursive: true });
      await fs.writeFile(logFile, '  \n', 'utf8');

      expect(await new SessionLogStore(logFile).readRaw()).toEqual([]);
    });

    it('should reject a file that is not a JSON array', async () => {
      await fs.mkdir(path.dirname(logFile), { recursive: true });
      await fs.writeFile(logFile, '{"sessions": []}', 'utf8');

      await expect(new SessionLogStore(logFile).readRaw()).rejects.toThrow('does not contain a JSON array');
    });
  });

  describe('append', () => {
    it('should create the file and its directory on first append', async () => {
      const store = new SessionLogStore(logFile);
      await store.append(makeSessionRecord('s1', [[true, 2]]));

      const { sessions, skipped } = await store.readSessions();
      expect(skipped).toBe(0);
      expect(sessions.map(s => s.sessionId)).toEqual(['s1']);
    });

    it('should keep every record when appends overlap', async () => {
      const store = new SessionLogStore(logFile);

      await Promise.all(['a', 'b', 'c', 'd'].map(id => store.append(makeSessionRecord(id, [[false, 5]]))));

      const raw = await store.readRaw();
      expect(raw).toHaveLength(4);
      const { sessions } = await store.readSessions();
      expect(sessions.map(s => s.sessionId)).toEqual(['a', 'b', 'c', 'd']);
    });
  });

  describe('readSessions', () => {
    it('should skip records that fail validation', async () => {
      await fs.mkdir(path.dirname(logFile), { recursive: true });
      const good = makeSessionRecord('ok', [[true, 1]]);
      const badTime = { ...makeSessionRecord('bad', [[true, 1]]), timestamp: 'yesterday' };
      await fs.writeFile(logFile, JSON.stringify([good, badTime, 42]), 'utf8');

      const { sessions, skipped } = await new SessionLogStore(logFile).readSessions();

      expect(sessions).toEqual([good]);
      expect(skipped).toBe(2);
    });
  });
});
