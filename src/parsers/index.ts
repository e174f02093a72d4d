import { PARTY_ICONS } from '../constants';
import type { Member } from '../types';
import type { ContactEntry } from './contact-info';
import type { MemberListEntry } from './member-list';

export * from './bill-lookup';
export * from './contact-info';
export * from './member-list';
export * from './vote-history';

/**
 * Left-outer join of the member directory with the contact page by member id.
 * Members missing from the contact page keep blank contact fields.
 */
export function mergeMemberContacts(
  entries: MemberListEntry[],
  contacts: ContactEntry[],
  voteHistoryUrl: (entry: MemberListEntry) => string
): Member[] {
  const contactsById = new Map(contacts.map((contact) => [contact.id, contact]));

  return entries.map((entry) => {
    const contact = contactsById.get(entry.id);
    return {
      id: entry.id,
      chamber: entry.chamber,
      seat: entry.seat,
      name: entry.name,
      party: entry.party,
      partyIcon: PARTY_ICONS[entry.party],
      district: entry.district,
      counties: entry.counties,
      phone: contact?.phone || entry.phone,
      assistant: contact?.assistant || entry.assistant,
      email: contact?.email ?? '',
      profileUrl: entry.profileUrl,
      voteHistoryUrl: voteHistoryUrl(entry),
    };
  });
}
