import { aggregate } from './aggregator';
import { processInBatches } from './batch';
import { classifyBill, normalizeKeywords, unclassified } from './classifier';
import {
  billLookupUrl,
  contactInfoUrl,
  memberListUrl,
  type TrackerConfig,
  voteHistoryUrl,
} from './config';
import { ClassificationError, FetchError, ParseError } from './errors';
import type { PageFetcher } from './fetcher';
import { compareBillIds } from './ids';
import {
  mergeMemberContacts,
  parseBillPage,
  parseContactInfo,
  parseMemberList,
  parseVoteHistory,
} from './parsers';
import { issueFromError } from './report';
import type {
  Bill,
  BuildIssue,
  Chamber,
  ClassificationResult,
  Snapshot,
  VoteRecord,
} from './types';

interface BillReference {
  session: string;
  chamber: Chamber;
  number: number;
}

/**
 * Runs one fetch → parse → classify → aggregate pass. Member list and contact
 * page failures abort the pass; a failing vote history or bill page is
 * reported as skipped and left out of the snapshot.
 */
export class SnapshotBuilder {
  constructor(
    private readonly config: TrackerConfig,
    private readonly fetcher: PageFetcher,
    private readonly now: () => number = Date.now
  ) {}

  async build(): Promise<Snapshot> {
    const { config } = this;
    const startedAt = this.now();
    const requestsBefore = this.fetcher.requestCount;
    const skipped: BuildIssue[] = [];
    const anomalies: BuildIssue[] = [];

    console.log(`Building snapshot for chamber ${config.chamber}, session ${config.session}...`);

    const [memberListHtml, contactInfoHtml] = await Promise.all([
      this.fetcher.fetch(memberListUrl(config)),
      this.fetcher.fetch(contactInfoUrl(config)),
    ]);
    const entries = parseMemberList(memberListHtml, {
      baseUrl: config.baseUrl,
      chamber: config.chamber,
    });
    const contacts = parseContactInfo(contactInfoHtml, { chamber: config.chamber });
    const members = mergeMemberContacts(entries, contacts, (entry) =>
      voteHistoryUrl(config, entry.seat)
    );
    console.log(`Found ${members.length} members (${contacts.length} contact rows)`);

    const histories = await processInBatches(
      members,
      async (member) =>
        parseVoteHistory(await this.fetcher.fetch(member.voteHistoryUrl), {
          baseUrl: config.baseUrl,
          memberId: member.id,
        }),
      this.batchOptions()
    );

    const voteRecords: VoteRecord[] = [];
    const billReferences = new Map<string, BillReference>();
    const unavailableHistories = new Set<string>();
    let otherSessionRows = 0;

    for (const [index, result] of histories.entries()) {
      const member = members[index];
      if (!member) continue;

      if (result.status === 'rejected') {
        skipped.push(this.skippedItem(result.reason, 'vote-history', member.id));
        unavailableHistories.add(member.id);
        continue;
      }

      for (const row of result.value) {
        if (row.billSession !== config.session) {
          otherSessionRows++;
          continue;
        }
        // Each bill is fetched once no matter how many members voted on it
        billReferences.set(row.billId, {
          session: row.billSession,
          chamber: row.billChamber,
          number: row.billNumber,
        });
        voteRecords.push({
          memberId: member.id,
          billId: row.billId,
          rollCall: row.rollCall,
          date: row.date,
          motion: row.motion,
          cast: row.cast,
          castRaw: row.castRaw,
          result: row.result,
          resultRaw: row.resultRaw,
        });
      }
    }

    if (otherSessionRows > 0) {
      console.log(`Ignored ${otherSessionRows} vote rows from sessions other than ${config.session}`);
    }

    const references = [...billReferences.entries()].sort(([a], [b]) => compareBillIds(a, b));
    console.log(`Fetching ${references.length} bill pages...`);

    const billPages = await processInBatches(
      references,
      async ([billId, reference]) => {
        const url = billLookupUrl(config, reference);
        const page = parseBillPage(await this.fetcher.fetch(url), { billId });
        return { url, page };
      },
      this.batchOptions()
    );

    const bills: Bill[] = [];
    for (const [index, result] of billPages.entries()) {
      const entry = references[index];
      if (!entry) continue;
      const [billId, reference] = entry;

      if (result.status === 'rejected') {
        skipped.push(this.skippedItem(result.reason, 'bill', billId));
        continue;
      }

      const { url, page } = result.value;
      let keywords: string[] = [];
      let classification: ClassificationResult;
      try {
        keywords = normalizeKeywords(billId, page.rawKeywords);
        classification = classifyBill({ id: billId, ...page }, config);
      } catch (error) {
        if (!(error instanceof ClassificationError)) throw error;
        console.warn(error.message);
        anomalies.push(issueFromError(error, 'bill', billId));
        classification = unclassified(error);
      }

      bills.push({
        id: billId,
        session: reference.session,
        chamber: reference.chamber,
        number: reference.number,
        url,
        title: page.title,
        keywords,
        rawKeywords: page.rawKeywords,
        classification,
      });
    }

    const aggregation = aggregate(
      { members, bills, voteRecords, unavailableHistories },
      { countableMotions: config.countableMotions }
    );
    for (const anomaly of aggregation.anomalies) {
      anomalies.push(
        issueFromError(anomaly, 'vote-record', `${anomaly.memberId}:${anomaly.billId}`)
      );
    }

    const finishedAt = this.now();
    const related = bills.filter((bill) => bill.classification.related).length;
    console.log(`\n=== Summary ===`);
    console.log(`Members: ${members.length}, vote records: ${voteRecords.length}`);
    console.log(`Bills: ${bills.length} (${related} firefighter-related)`);
    console.log(`Skipped: ${skipped.length}, anomalies: ${anomalies.length}`);

    return {
      builtAt: new Date(finishedAt).toISOString(),
      chamber: config.chamber,
      session: config.session,
      members,
      bills,
      voteRecords,
      tallies: aggregation.tallies,
      rollCall: aggregation.rollCall,
      report: {
        startedAt: new Date(startedAt).toISOString(),
        finishedAt: new Date(finishedAt).toISOString(),
        requestCount: this.fetcher.requestCount - requestsBefore,
        skipped,
        anomalies,
      },
    };
  }

  private batchOptions() {
    return {
      maxConcurrent: this.config.maxConcurrentFetches,
      delay: this.config.requestDelayMs,
    };
  }

  // Only fetch and parse failures are per-item; anything else aborts the pass
  private skippedItem(
    reason: unknown,
    itemType: BuildIssue['itemType'],
    itemId: string
  ): BuildIssue {
    if (!(reason instanceof FetchError || reason instanceof ParseError)) {
      throw reason;
    }
    console.warn(`Skipping ${itemType} ${itemId}: ${reason.message}`);
    return issueFromError(reason, itemType, itemId);
  }
}
