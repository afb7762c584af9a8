import Database from 'better-sqlite3';
import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/**
 * Fixture factories for E2E tests.
 *
 * The owner account is 10001; datasets loaded from these fixtures use that
 * id so owner exclusion can be observed.
 */

export const OWNER_ID = '10001';

export interface ExportMember {
  user_name?: string;
  user_group_name?: string;
}

export interface ExportGroup {
  group_name: string;
  members: Record<string, ExportMember | string>;
}

export type ExportDocument = Record<string, ExportGroup>;

/**
 * Three groups, four members plus the owner:
 *
 *   100 Hiking Club  {owner, 20 Ann, 21 Ben, 22 Cy}
 *   200 Chess        {owner, 20 Ann, 21 Ben}
 *   300 Book Club    {20 Ann (nickname Annie), 23 Dee}
 */
export function membershipExport(overrides: Partial<ExportDocument> = {}): ExportDocument {
  const base: ExportDocument = {
    '100': {
      group_name: 'Hiking Club',
      members: {
        [OWNER_ID]: { user_name: 'Owner' },
        '20': { user_name: 'Ann' },
        '21': { user_name: 'Ben' },
        '22': { user_name: 'Cy' },
      },
    },
    '200': {
      group_name: 'Chess',
      members: {
        [OWNER_ID]: { user_name: 'Owner' },
        '20': { user_name: 'Ann' },
        '21': { user_name: 'Ben' },
      },
    },
    '300': {
      group_name: 'Book Club',
      members: {
        '20': { user_name: 'Ann', user_group_name: 'Annie' },
        '23': { user_name: 'Dee' },
      },
    },
  };
  const document: ExportDocument = { ...base };
  for (const [groupId, group] of Object.entries(overrides)) {
    if (group) document[groupId] = group;
  }
  return document;
}

/** Creates an empty data directory for SQLite imports. */
export function createDataDir(): string {
  return mkdtempSync(join(tmpdir(), 'membership-e2e-'));
}

/**
 * Writes a decrypted-style group database holding the same memberships as
 * `membershipExport()`.
 */
export function writeGroupDatabase(dataDir: string, fileName = 'group_info.db'): string {
  const db = new Database(join(dataDir, fileName));
  try {
    db.exec(`
      CREATE TABLE group_list (group_id INTEGER, c1, c2, c3, c4, group_name TEXT);
      CREATE TABLE group_member3 (nickname TEXT, user_name TEXT, group_id INTEGER, c3, c4, user_id INTEGER);
    `);
    const insertGroup = db.prepare('INSERT INTO group_list VALUES (?, NULL, NULL, NULL, NULL, ?)');
    insertGroup.run(100, 'Hiking Club');
    insertGroup.run(200, 'Chess');
    insertGroup.run(300, 'Book Club');
    insertGroup.run(400, 'Quiet Room');

    const insertMember = db.prepare('INSERT INTO group_member3 VALUES (?, ?, ?, NULL, NULL, ?)');
    const rows: Array<[string | null, string, number, number]> = [
      [null, 'Owner', 100, 10001],
      [null, 'Ann', 100, 20],
      [null, 'Ben', 100, 21],
      [null, 'Cy', 100, 22],
      [null, 'Owner', 200, 10001],
      [null, 'Ann', 200, 20],
      [null, 'Ben', 200, 21],
      ['Annie', 'Ann', 300, 20],
      [null, 'Dee', 300, 23],
    ];
    for (const row of rows) insertMember.run(...row);
  } finally {
    db.close();
  }
  return fileName;
}
