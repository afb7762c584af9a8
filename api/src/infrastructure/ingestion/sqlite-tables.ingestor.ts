/**
 * SqliteTablesIngestor: reads a decrypted group_info database.
 *
 * Tables are read positionally, as they are dumped:
 *   group_list     [0] group id      [5] group name
 *   group_member3  [0] group nickname [1] member name [2] group id [5] member id
 *
 * INTEGER cells are read as bigint and handed on as decimal strings, so
 * account ids above 2^53 keep every digit. Every group_list row declares a
 * group; member rows shorter than six columns, or with a null group or
 * member id, are passed on as malformed records.
 */
import { Injectable } from '@nestjs/common';
import Database from 'better-sqlite3';
import { isAbsolute, relative, resolve, sep } from 'node:path';

import type {
  IMembershipIngestor,
  SqliteTablesSource,
} from '../../domain/ingestion/membership-ingestor.interface';
import type {
  GroupDeclaration,
  IngestionBatch,
  MembershipTuple,
  RawId,
} from '../../domain/models/membership.model';
import { IngestionError } from '../../domain/errors/membership-errors';
import { AnalyzerConfigService } from '../../modules/config/analyzer-config.service';

export const GROUP_TABLE = 'group_list';
export const MEMBER_TABLE = 'group_member3';

const MIN_COLUMNS = 6;

type Row = readonly unknown[];

function cellId(value: unknown): RawId {
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (typeof value === 'bigint') return value.toString();
  return null;
}

function cellText(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint') return value.toString();
  return undefined;
}

@Injectable()
export class SqliteTablesIngestor implements IMembershipIngestor<SqliteTablesSource> {
  readonly kind = 'sqlite' as const;

  constructor(private readonly config: AnalyzerConfigService) {}

  async ingest(source: SqliteTablesSource): Promise<IngestionBatch> {
    const file = this.resolvePath(source.path);

    let db: Database.Database;
    try {
      db = new Database(file, { readonly: true, fileMustExist: true });
      db.defaultSafeIntegers(true);
    } catch (error) {
      throw new IngestionError(`Database ${source.path} could not be opened.`, this.kind, { cause: error });
    }

    try {
      const groups: GroupDeclaration[] = [];
      const groupNames = new Map<string, string>();
      for (const row of this.readTable(db, GROUP_TABLE)) {
        if (row.length < MIN_COLUMNS) continue;
        const groupId = cellId(row[0]);
        const groupName = cellText(row[5]);
        groups.push({ groupId, groupName });
        if (groupId !== null && groupName !== undefined) {
          groupNames.set(String(groupId).trim(), groupName);
        }
      }

      const tuples: MembershipTuple[] = [];
      for (const row of this.readTable(db, MEMBER_TABLE)) {
        if (row.length < MIN_COLUMNS) {
          tuples.push({ groupId: undefined, memberId: undefined });
          continue;
        }
        const groupId = cellId(row[2]);
        const memberName = cellText(row[1]);
        const nickname = cellText(row[0]);
        tuples.push({
          groupId,
          groupName: groupId === null ? undefined : groupNames.get(String(groupId).trim()),
          memberId: cellId(row[5]),
          memberName,
          memberNickname: nickname ? nickname : memberName,
        });
      }
      return { groups, tuples };
    } finally {
      db.close();
    }
  }

  /**
   * Resolve a request path under DATA_DIR.
   * @throws IngestionError for absolute paths or paths leaving DATA_DIR
   */
  resolvePath(path: string): string {
    if (!path || isAbsolute(path)) {
      throw new IngestionError('Database path must be relative to the data directory.', this.kind);
    }
    const root = this.config.dataDir;
    const file = resolve(root, path);
    const rel = relative(root, file);
    if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new IngestionError('Database path escapes the data directory.', this.kind);
    }
    return file;
  }

  private readTable(db: Database.Database, table: string): Row[] {
    const exists = db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
      .get(table);
    if (exists === undefined) {
      throw new IngestionError(`Table ${table} is missing from the database.`, this.kind);
    }
    try {
      const rows = db.prepare(`SELECT * FROM ${table}`).raw(true).all();
      return rows.filter((row): row is Row => Array.isArray(row));
    } catch (error) {
      throw new IngestionError(`Table ${table} could not be read.`, this.kind, { cause: error });
    }
  }
}
