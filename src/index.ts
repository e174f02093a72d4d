#!/usr/bin/env node
import { join } from 'node:path';
import { listMemberVotes } from './aggregator';
import { loadSnapshotFile, saveSnapshotFile } from './cache';
import { loadConfig } from './config';
import { CACHE_CONFIG } from './constants';
import { summarizeSnapshot } from './report';
import { FirefighterVoteTracker, findMemberTally } from './scraper';
import type { Snapshot } from './types';

function printUsage(): void {
  console.log('\n📖 Available commands:');
  console.log('  basic          - Member tallies on firefighter-related bills (default)');
  console.log('  member <id>    - Drilldown of one member, e.g. member H-101');
  console.log('  matrix         - Roll-call matrix of firefighter-related bills');
  console.log('\n🔧 Options:');
  console.log('  --force-refresh          - Ignore cached data and fetch fresh pages');
  console.log('\n📋 Examples:');
  console.log('  npm run dev basic');
  console.log('  npm run dev member H-101 --force-refresh');
  console.log('  npm run dev matrix');
}

function printTallies(snapshot: Snapshot): void {
  const membersById = new Map(snapshot.members.map((member) => [member.id, member]));
  console.log('\nMember tallies (firefighter-related bills):');
  for (const tally of snapshot.tallies) {
    const member = membersById.get(tally.memberId);
    const label = member
      ? `${member.name} (${member.partyIcon}, District ${member.district})`
      : tally.memberId;
    const note = tally.historyAvailable ? '' : ' [vote history unavailable]';
    console.log(
      `  ${tally.memberId.padEnd(6)} ${label}: support ${tally.support}, oppose ${tally.oppose}, not counted ${tally.notCounted}${note}`
    );
  }
}

function printMatrix(snapshot: Snapshot): void {
  const { rollCall } = snapshot;
  if (rollCall.bills.length === 0) {
    console.log('No firefighter-related bills with counted votes (based on the configured keywords).');
    return;
  }
  console.log(
    `\nRoll-call matrix: ${rollCall.bills.length} bills across ${rollCall.members.length} members`
  );
  for (const bill of rollCall.bills) {
    const row = rollCall.cells[bill.id] ?? {};
    const ayes = rollCall.members.filter((member) => row[member.id] === 'Aye').length;
    const noes = rollCall.members.filter((member) => row[member.id] === 'No').length;
    console.log(`  ${bill.id} ${bill.title}: ${ayes} Aye, ${noes} No`);
  }
}

async function main() {
  const args = process.argv.slice(2);
  const [first] = args;
  const command = first && !first.startsWith('--') ? first : 'basic';
  const forceRefresh = args.includes('--force-refresh');

  if (!['basic', 'member', 'matrix'].includes(command)) {
    console.error(`❌ Unknown command: ${command}`);
    printUsage();
    process.exit(1);
  }

  const config = loadConfig();
  const tracker = new FirefighterVoteTracker(config);
  const snapshotPath = join(process.cwd(), 'out', CACHE_CONFIG.SNAPSHOT_FILENAME);

  try {
    if (!forceRefresh) {
      const cached = loadSnapshotFile(snapshotPath);
      if (cached && cached.chamber === config.chamber && cached.session === config.session) {
        tracker.primeSnapshot(cached);
        console.log(`Using cached snapshot (${tracker.getCacheInfo() ?? 'age unknown'})`);
      }
    } else {
      console.log('Force refresh requested - ignoring cache');
    }

    const wasFresh = tracker.getCacheState() === 'fresh';
    const result = await tracker.getSnapshot({ forceRefresh });
    const { snapshot } = result;

    if (!wasFresh && !result.stale) {
      saveSnapshotFile(snapshotPath, snapshot);
      console.log(`Snapshot saved to ${snapshotPath}`);
    }

    console.log(`\n${summarizeSnapshot(result)}`);
    for (const issue of snapshot.report.skipped) {
      console.log(`  skipped ${issue.itemType} ${issue.itemId}: ${issue.message}`);
    }

    if (command === 'member') {
      const memberId = args[1] ?? '';
      const member = snapshot.members.find((candidate) => candidate.id === memberId);
      if (!member) {
        console.error(`❌ Unknown member: ${memberId}`);
        process.exitCode = 1;
        return;
      }
      // Both views come from the snapshot already read above
      const tally = findMemberTally(snapshot, member.id);
      console.log(`\n${member.name} — District ${member.district} (${member.partyIcon})`);
      console.log(`  Counties: ${member.counties.join(', ')}`);
      console.log(`  Phone: ${member.phone}  Email: ${member.email}  Assistant: ${member.assistant}`);
      if (tally) {
        console.log(
          `  Support ${tally.support}, oppose ${tally.oppose}, not counted ${tally.notCounted}`
        );
      }
      const votes = listMemberVotes(snapshot, member.id, {
        countableMotions: config.countableMotions,
      });
      for (const vote of votes) {
        console.log(
          `  [${vote.countedAs}] ${vote.billId} ${vote.billTitle} — ${vote.motion} ${vote.date}: ${vote.cast} (${vote.result})`
        );
      }
    } else if (command === 'matrix') {
      printMatrix(snapshot);
    } else {
      printTallies(snapshot);
    }
  } catch (error) {
    console.error('Error:', error);
    process.exitCode = 1;
  } finally {
    await tracker.close();
  }
}

if (require.main === module) {
  main().catch(console.error);
}

export * from './aggregator';
export * from './cache';
export * from './classifier';
export * from './config';
export * from './constants';
export * from './errors';
export * from './fetcher';
export * from './ids';
export * from './parsers';
export * from './pipeline';
export * from './report';
export {
  FirefighterVoteTracker,
  findBillClassification,
  findMemberTally,
  type TrackerOptions,
} from './scraper';
export * from './types';
