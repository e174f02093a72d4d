import * as cheerio from 'cheerio';
import { ParseError } from '../errors';
import { formatMemberId } from '../ids';
import type { Chamber, PartyCode } from '../types';
import {
  buildAbsoluteUrl,
  cleanText,
  normalizeParty,
  parseBiographyLink,
  stripMemberTitle,
} from './helpers';

export interface MemberListEntry {
  id: string;
  chamber: Chamber;
  seat: number;
  name: string;
  party: PartyCode;
  district: string;
  counties: string[];
  phone: string;
  assistant: string;
  profileUrl: string;
}

const PARTY_PATTERN =
  /\((R|D|U|Rep(?:ublican)?|Dem(?:ocrat(?:ic)?)?|Unaffiliated|Independent|Libertarian)\)/i;
const DISTRICT_PATTERN = /District\s+(\d+)/i;
const PHONE_PATTERN = /Phone:\s*([\d()\-.\s]{7,}\d)/i;
const ASSISTANT_PATTERN =
  /Assistant:\s*(.+?)(?=\s+(?:Phone|Email|District|Count(?:y|ies))\b|$)/i;
const COUNTIES_PATTERN =
  /Count(?:y|ies):\s*(.+?)(?=\s+(?:Phone|Assistant|Email|District)\b|$)/i;
const MAX_CONTAINER_DEPTH = 6;
const ANY_BIOGRAPHY_SELECTOR = 'a[href*="/Members/Biography/"]';

/**
 * Parses the chamber member directory. Each member is located through the
 * link to their biography page; the surrounding card supplies party,
 * district, counties, office phone and assistant.
 */
export function parseMemberList(
  html: string,
  options: { baseUrl: string; chamber: Chamber }
): MemberListEntry[] {
  const $ = cheerio.load(html);
  const selector = `a[href*="/Members/Biography/${options.chamber}/"]`;
  const links = $(selector);

  if (links.length === 0) {
    throw new ParseError('member-list', `biography links (${selector})`);
  }

  const members: MemberListEntry[] = [];
  const seen = new Set<string>();

  links.each((_, element) => {
    const link = $(element);
    const href = link.attr('href')?.trim() || '';
    const parsed = parseBiographyLink(href);
    if (!parsed) return;

    // Photo links share the href but carry no text
    const name = stripMemberTitle(cleanText(link.text()));
    if (!name) return;

    const id = formatMemberId(parsed.chamber, parsed.seat);
    if (seen.has(id)) return;
    seen.add(id);

    // Climb to the card holding the District line, never into a block that
    // also holds another member's links
    let container = link.parent();
    for (
      let depth = 0;
      depth < MAX_CONTAINER_DEPTH && !DISTRICT_PATTERN.test(container.text());
      depth++
    ) {
      const parent = container.parent();
      if (parent.length === 0 || parent.is('body')) break;
      const holdsOtherMember = parent
        .find(ANY_BIOGRAPHY_SELECTOR)
        .toArray()
        .some((other) => {
          const otherLink = parseBiographyLink($(other).attr('href') || '');
          return otherLink !== null && formatMemberId(otherLink.chamber, otherLink.seat) !== id;
        });
      if (holdsOtherMember) break;
      container = parent;
    }
    const text = cleanText(container.text());

    const partyMatch = text.match(PARTY_PATTERN);
    if (!partyMatch?.[1]) {
      console.warn(`No party marker found for ${name} (${id}); recording as unaffiliated`);
    }

    let counties = container
      .find('a[href*="/Counties/"]')
      .toArray()
      .map((county) => cleanText($(county).text()))
      .filter(Boolean);
    if (counties.length === 0) {
      counties = (text.match(COUNTIES_PATTERN)?.[1] ?? '')
        .split(',')
        .map((county) => county.trim())
        .filter(Boolean);
    }

    members.push({
      id,
      chamber: parsed.chamber,
      seat: parsed.seat,
      name,
      party: normalizeParty(partyMatch?.[1] ?? ''),
      district: text.match(DISTRICT_PATTERN)?.[1] ?? '',
      counties,
      phone: cleanText(text.match(PHONE_PATTERN)?.[1]),
      assistant: cleanText(text.match(ASSISTANT_PATTERN)?.[1]),
      profileUrl: buildAbsoluteUrl(href, options.baseUrl),
    });
  });

  if (members.length === 0) {
    throw new ParseError('member-list', 'named member entries');
  }

  return members;
}
