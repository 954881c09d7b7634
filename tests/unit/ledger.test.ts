/**
 * Unit tests for the Ledger Module
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import {
  assignKeys,
  findFollowUpCandidates,
  LedgerCorruptError,
  loadKeyAssignments,
  loadKeyPool,
  markResponded,
  markSent,
  parseKeyLedger,
  parseKeyPool,
  saveKeyAssignments,
  selectAvailableKeys,
  splitDelimitedLine,
  summarizeLedger,
  type OutreachTarget,
} from '../../src/ledger/index.js';
import { silentLogger } from '../../src/logger/index.js';
import { MemoryFileStore } from '../../src/storage/index.js';
import type { KeyLedger } from '../../src/types/index.js';

const KEY_A = 'AAAAA-11111-AAAAA';
const KEY_B = 'BBBBB-22222-BBBBB';
const KEY_C = 'CCCCC-33333-CCCCC';
const KEY_D = 'DDDDD-44444-DDDDD';

const NOW = new Date('2024-06-10T12:00:00.000Z');

function target(address: string, influencer = address.split('@')[0] ?? address): OutreachTarget {
  return { address, influencer, platform: 'YouTube', followers: 1200 };
}

function entry(key: string, overrides: Partial<KeyLedger[string]> = {}): KeyLedger[string] {
  return {
    key,
    influencer: 'Someone',
    platform: 'Twitch',
    followers: 900,
    assigned_date: '2024-06-01T00:00:00.000Z',
    sent: false,
    ...overrides,
  };
}

describe('Ledger Module', () => {
  describe('parseKeyPool()', () => {
    test('should read one key per line and drop short or blank lines', () => {
      expect(parseKeyPool(`${KEY_A}\n\n  ${KEY_B}  \nshort\n`)).toEqual([KEY_A, KEY_B]);
    });

    test('should pick the first header column naming a key', () => {
      expect(parseKeyPool(`Name,SteamKey,Notes\nfirst,${KEY_A},x\nsecond,${KEY_B},y\n`)).toEqual([KEY_A, KEY_B]);
    });

    test('should fall back to column 0 and keep the first row without a key header', () => {
      expect(parseKeyPool(`${KEY_A}\tbatch1\n${KEY_B}\tbatch1\n`)).toEqual([KEY_A, KEY_B]);
    });

    test('should honour quoted fields', () => {
      expect(parseKeyPool(`"Label, long",Key\n"a, b",${KEY_C}\n`)).toEqual([KEY_C]);
    });

    test('should discard keys of ten characters or fewer', () => {
      expect(parseKeyPool('0123456789\n01234567890\n')).toEqual(['01234567890']);
    });
  });

  describe('splitDelimitedLine()', () => {
    test('should unescape doubled quotes', () => {
      expect(splitDelimitedLine('"say ""hi""",two', ',')).toEqual(['say "hi"', 'two']);
    });
  });

  describe('selectAvailableKeys()', () => {
    test('should skip as many pool keys as the ledger holds', () => {
      const ledger: KeyLedger = { 'a@x.io': entry(KEY_A) };

      expect(selectAvailableKeys([KEY_A, KEY_B, KEY_C], ledger)).toEqual([KEY_B, KEY_C]);
    });

    test('should never offer a key the ledger already references', () => {
      const ledger: KeyLedger = { 'a@x.io': entry(KEY_C) };

      expect(selectAvailableKeys([KEY_A, KEY_B, KEY_C, KEY_D], ledger)).toEqual([KEY_B, KEY_D]);
    });

    test('should drop duplicate pool entries', () => {
      expect(selectAvailableKeys([KEY_A, KEY_A, KEY_B], {})).toEqual([KEY_A, KEY_B]);
    });
  });

  describe('assignKeys()', () => {
    test('should pair targets with keys in pool order', () => {
      const plan = assignKeys([target('a@x.io'), target('b@x.io')], [KEY_A, KEY_B, KEY_C], {}, NOW);

      expect(plan.assigned.map((item) => [item.target.address, item.key])).toEqual([
        ['a@x.io', KEY_A],
        ['b@x.io', KEY_B],
      ]);
      expect(plan.ledger['a@x.io']).toEqual({
        key: KEY_A,
        influencer: 'a',
        platform: 'YouTube',
        followers: 1200,
        assigned_date: '2024-06-10T12:00:00.000Z',
        sent: false,
      });
    });

    test('should not give an address a second key', () => {
      const ledger: KeyLedger = { 'a@x.io': entry(KEY_A) };
      const plan = assignKeys([target('a@x.io'), target('b@x.io'), target('b@x.io')], [KEY_A, KEY_B, KEY_C], ledger, NOW);

      expect(plan.assigned.map((item) => item.key)).toEqual([KEY_B]);
      expect(plan.alreadyAssigned.map((item) => item.address)).toEqual(['a@x.io', 'b@x.io']);
      expect(plan.ledger['a@x.io']?.key).toBe(KEY_A);
    });

    test('should report targets left without a key', () => {
      const plan = assignKeys([target('a@x.io'), target('b@x.io')], [KEY_A], {}, NOW);

      expect(plan.unassigned.map((item) => item.address)).toEqual(['b@x.io']);
      expect(Object.keys(plan.ledger)).toEqual(['a@x.io']);
    });

    test('should leave the input ledger untouched', () => {
      const ledger: KeyLedger = {};
      assignKeys([target('a@x.io')], [KEY_A], ledger, NOW);

      expect(ledger).toEqual({});
    });
  });

  describe('markSent() / markResponded()', () => {
    test('should flag known addresses and report unknown ones', () => {
      const ledger: KeyLedger = { 'a@x.io': entry(KEY_A) };
      const update = markSent(['a@x.io', 'ghost@x.io'], ledger, NOW);

      expect(update.updated).toEqual(['a@x.io']);
      expect(update.unknown).toEqual(['ghost@x.io']);
      expect(update.ledger['a@x.io']).toEqual(entry(KEY_A, { sent: true, sent_date: '2024-06-10T12:00:00.000Z' }));
      expect(ledger['a@x.io']?.sent).toBe(false);
    });

    test('should set responded', () => {
      const update = markResponded(['a@x.io'], { 'a@x.io': entry(KEY_A, { sent: true }) });

      expect(update.ledger['a@x.io']?.responded).toBe(true);
    });
  });

  describe('findFollowUpCandidates()', () => {
    const ledger: KeyLedger = {
      'due@x.io': entry(KEY_A, { influencer: 'Due', sent: true, sent_date: '2024-06-03T12:00:00.000Z' }),
      'recent@x.io': entry(KEY_B, { sent: true, sent_date: '2024-06-04T12:00:01.000Z' }),
      'replied@x.io': entry(KEY_C, { sent: true, sent_date: '2024-05-01T00:00:00.000Z', responded: true }),
      'unsent@x.io': entry(KEY_D),
      'bad-date@x.io': entry('EEEEE-55555-EEEEE', { sent: true, sent_date: 'yesterday' }),
    };

    test('should return sent, unanswered entries at least the given whole days old', () => {
      expect(findFollowUpCandidates(ledger, 7, NOW)).toEqual([
        {
          email: 'due@x.io',
          influencer: 'Due',
          key: KEY_A,
          sent_date: '2024-06-03T12:00:00.000Z',
          days_since_sent: 7,
        },
      ]);
    });

    test('should include everything sent when the threshold is zero', () => {
      expect(findFollowUpCandidates(ledger, 0, NOW).map((candidate) => candidate.email)).toEqual([
        'due@x.io',
        'recent@x.io',
      ]);
    });
  });

  describe('summarizeLedger()', () => {
    test('should count assignment states and remaining keys', () => {
      const ledger: KeyLedger = {
        'a@x.io': entry(KEY_A, { sent: true, responded: true }),
        'b@x.io': entry(KEY_B, { sent: true }),
        'c@x.io': entry(KEY_C),
      };

      expect(summarizeLedger(ledger, 5)).toEqual({
        assigned: 3,
        sent: 2,
        responded: 1,
        awaitingSend: 1,
        keysRemaining: 2,
      });
      expect(summarizeLedger(ledger, 2).keysRemaining).toBe(0);
    });
  });

  describe('parseKeyLedger()', () => {
    test('should keep stored values and unknown fields as they are', () => {
      const ledger = parseKeyLedger(
        JSON.stringify({ 'a@x.io': { key: KEY_A, followers: '1500', assigned_date: '2024-06-01T00:00:00Z' } })
      );

      expect(ledger['a@x.io']).toEqual({ key: KEY_A, followers: '1500', assigned_date: '2024-06-01T00:00:00Z' });
    });

    test('should reject a mistyped field', () => {
      expect(() => parseKeyLedger(JSON.stringify({ 'a@x.io': { key: KEY_A, sent: 'yes' } }))).toThrow(
        'Key ledger failed validation'
      );
    });

    test('should reject malformed JSON', () => {
      expect(() => parseKeyLedger('{ not json', 'ledger.json')).toThrow(LedgerCorruptError);
    });

    test('should reject entries without a key', () => {
      expect(() => parseKeyLedger(JSON.stringify({ 'a@x.io': { assigned_date: 'x' } }))).toThrow(
        'Key ledger failed validation'
      );
    });
  });

  describe('persistence', () => {
    let store: MemoryFileStore;

    beforeEach(() => {
      store = new MemoryFileStore();
    });

    test('should treat a missing or blank ledger file as empty', async () => {
      expect(await loadKeyAssignments('ledger.json', store, silentLogger)).toEqual({});

      await store.writeText('ledger.json', '  \n');
      expect(await loadKeyAssignments('ledger.json', store, silentLogger)).toEqual({});
    });

    test('should save pretty-printed JSON and load it back', async () => {
      const ledger: KeyLedger = { 'a@x.io': entry(KEY_A) };

      await saveKeyAssignments(ledger, 'ledger.json', store, silentLogger);

      expect(store.get('ledger.json')).toBe(`${JSON.stringify(ledger, null, 2)}\n`);
      expect(await loadKeyAssignments('ledger.json', store, silentLogger)).toEqual(ledger);
    });

    test('should save exactly what was loaded, including non-canonical entries', async () => {
      const stored = {
        'legacy@x.io': {
          key: KEY_A,
          influencer: null,
          platform: null,
          followers: '5000',
          assigned_date: '2024-05-01T00:00:00Z',
          notes: 'vip',
        },
        'b@x.io': entry(KEY_B, { sent: true, sent_date: '2024-06-02T00:00:00.000Z' }),
      };
      const content = `${JSON.stringify(stored, null, 2)}\n`;
      await store.writeText('ledger.json', content);

      const loaded = await loadKeyAssignments('ledger.json', store, silentLogger);
      await saveKeyAssignments(loaded, 'ledger.json', store, silentLogger);

      expect(loaded).toEqual(stored);
      expect(store.get('ledger.json')).toBe(content);
    });

    test('should read loosely stored entries without rewriting them', async () => {
      const ledger = parseKeyLedger(
        JSON.stringify({
          'legacy@x.io': { key: KEY_A, influencer: null, sent: true, sent_date: '2024-06-01T00:00:00.000Z' },
          'bare@x.io': { key: KEY_B },
        })
      );

      expect(findFollowUpCandidates(ledger, 7, NOW)).toEqual([
        {
          email: 'legacy@x.io',
          influencer: '',
          key: KEY_A,
          sent_date: '2024-06-01T00:00:00.000Z',
          days_since_sent: 9,
        },
      ]);
      expect(summarizeLedger(ledger, 3)).toEqual({
        assigned: 2,
        sent: 1,
        responded: 0,
        awaitingSend: 1,
        keysRemaining: 1,
      });
      expect(ledger['bare@x.io']).toEqual({ key: KEY_B });
    });

    test('should refuse a corrupt ledger file', async () => {
      await store.writeText('ledger.json', '[oops');

      await expect(loadKeyAssignments('ledger.json', store, silentLogger)).rejects.toThrow(LedgerCorruptError);
    });

    test('should treat a missing key pool as empty', async () => {
      expect(await loadKeyPool('keys.txt', store, silentLogger)).toEqual([]);
    });
  });
});
