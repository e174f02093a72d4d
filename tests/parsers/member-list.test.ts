import { expect, test } from '@playwright/test';
import { ParseError } from '../../src/errors';
import { parseMemberList } from '../../src/parsers';
import { BASE_URL, memberListPage } from '../helpers/legislature-site';

test.describe('parseMemberList', () => {
  test('should extract members from directory cards', () => {
    const html = memberListPage([
      {
        seat: 101,
        name: 'Jane Smith',
        party: 'D',
        district: '12',
        counties: ['Wake', 'Durham'],
        phone: '(919) 733-5800',
        assistant: 'Pat Jones',
      },
      { seat: 102, name: 'John Doe', party: 'R', district: '7', counties: ['Nash'] },
    ]);

    const members = parseMemberList(html, { baseUrl: BASE_URL, chamber: 'H' });

    expect(members).toEqual([
      {
        id: 'H-101',
        chamber: 'H',
        seat: 101,
        name: 'Jane Smith',
        party: 'D',
        district: '12',
        counties: ['Wake', 'Durham'],
        phone: '(919) 733-5800',
        assistant: 'Pat Jones',
        profileUrl: 'https://legislature.test/Members/Biography/H/101',
      },
      {
        id: 'H-102',
        chamber: 'H',
        seat: 102,
        name: 'John Doe',
        party: 'R',
        district: '7',
        counties: ['Nash'],
        phone: '',
        assistant: '',
        profileUrl: 'https://legislature.test/Members/Biography/H/102',
      },
    ]);
  });

  test('should map unaffiliated and independent members to U', () => {
    const html = memberListPage([
      { seat: 5, name: 'Alex Rivera', party: 'Unaffiliated', district: '30', counties: ['Orange'] },
      { seat: 6, name: 'Kim Park', party: 'Independent', district: '31', counties: ['Lee'] },
    ]);

    const members = parseMemberList(html, { baseUrl: BASE_URL, chamber: 'H' });

    expect(members.map((member) => member.party)).toEqual(['U', 'U']);
  });

  test('should read labelled counties and strip member titles', () => {
    const html = `
      <html><body>
        <ul>
          <li>
            <a href="/Members/Biography/H/44">Rep. Chris Lane</a> (Republican)
            District 44 Counties: Bladen, Pender Phone: 919-733-1111
          </li>
        </ul>
      </body></html>
    `;

    const [member] = parseMemberList(html, { baseUrl: BASE_URL, chamber: 'H' });

    expect(member?.name).toBe('Chris Lane');
    expect(member?.party).toBe('R');
    expect(member?.district).toBe('44');
    expect(member?.counties).toEqual(['Bladen', 'Pender']);
    expect(member?.phone).toBe('919-733-1111');
  });

  test('should keep each card to its own member when a district is missing', () => {
    const html = `
      <html><body>
        <div class="members">
          <div class="card">
            <a href="/Members/Biography/H/4">Ann A</a> (R) District 4
            <a href="/Members/Counties/Wake">Wake</a> Phone: (919) 733-1111
          </div>
          <div class="card">
            <a href="/Members/Biography/H/5">Bob B</a> (D)
            <a href="/Members/Counties/Nash">Nash</a>
          </div>
        </div>
      </body></html>
    `;

    const members = parseMemberList(html, { baseUrl: BASE_URL, chamber: 'H' });

    expect(members[1]).toEqual({
      id: 'H-5',
      chamber: 'H',
      seat: 5,
      name: 'Bob B',
      party: 'D',
      district: '',
      counties: ['Nash'],
      phone: '',
      assistant: '',
      profileUrl: 'https://legislature.test/Members/Biography/H/5',
    });
    expect(members[0]).toMatchObject({
      party: 'R',
      district: '4',
      counties: ['Wake'],
      phone: '(919) 733-1111',
    });
  });

  test('should ignore members of the other chamber', () => {
    const html = `
      <html><body>
        <div><a href="/Members/Biography/S/9">Sen. Other Chamber</a> (D) District 9</div>
        <div><a href="/Members/Biography/H/9">Pat House</a> (D) District 9</div>
      </body></html>
    `;

    const members = parseMemberList(html, { baseUrl: BASE_URL, chamber: 'H' });

    expect(members.map((member) => member.id)).toEqual(['H-9']);
  });

  test('should throw ParseError when no biography links exist', () => {
    const html = '<html><body><div>Directory temporarily unavailable</div></body></html>';

    expect(() => parseMemberList(html, { baseUrl: BASE_URL, chamber: 'H' })).toThrow(ParseError);

    try {
      parseMemberList(html, { baseUrl: BASE_URL, chamber: 'H' });
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      if (error instanceof ParseError) {
        expect(error.pageType).toBe('member-list');
        expect(error.element).toContain('/Members/Biography/H/');
      }
    }
  });
});
