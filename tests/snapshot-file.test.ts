import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { expect, test } from '@playwright/test';
import { loadSnapshotFile, saveSnapshotFile } from '../src/cache';
import { FirefighterVoteTracker } from '../src/scraper';
import { FakeTransport, standardSite, testConfig } from './helpers/legislature-site';

test.describe('Snapshot files', () => {
  let dir: string;

  test.beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'firefighter-snapshot-'));
  });

  test.afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('should round-trip a built snapshot', async () => {
    const tracker = new FirefighterVoteTracker(testConfig(), {
      transport: new FakeTransport(standardSite()),
    });
    const { snapshot } = await tracker.getSnapshot();
    const filePath = join(dir, 'out', 'snapshot.json');

    saveSnapshotFile(filePath, snapshot);

    expect(loadSnapshotFile(filePath)).toEqual(snapshot);
  });

  test('should ignore missing files', () => {
    expect(loadSnapshotFile(join(dir, 'absent.json'))).toBeNull();
  });

  test('should ignore files that are not valid snapshots', () => {
    const malformed = join(dir, 'malformed.json');
    const wrongShape = join(dir, 'wrong-shape.json');
    writeFileSync(malformed, '{ not json', 'utf-8');
    writeFileSync(wrongShape, JSON.stringify({ builtAt: 'yesterday', members: [] }), 'utf-8');

    expect(loadSnapshotFile(malformed)).toBeNull();
    expect(loadSnapshotFile(wrongShape)).toBeNull();
  });
});
