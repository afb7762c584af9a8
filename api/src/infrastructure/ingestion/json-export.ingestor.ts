/**
 * JsonExportIngestor: reads the exported membership document.
 *
 * Expected shape:
 *   {
 *     "<groupId>": {
 *       "group_name": "...",
 *       "members": {
 *         "<memberId>": { "user_name": "...", "user_group_name": "..." }
 *       }
 *     }
 *   }
 *
 * Every group entry that is an object declares its group, even with no
 * members. Entries that are not objects are passed on as malformed records
 * so the index can count them.
 */
import { Injectable } from '@nestjs/common';
import type {
  IMembershipIngestor,
  JsonExportSource,
} from '../../domain/ingestion/membership-ingestor.interface';
import type {
  GroupDeclaration,
  IngestionBatch,
  MembershipTuple,
} from '../../domain/models/membership.model';
import { IngestionError } from '../../domain/errors/membership-errors';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

@Injectable()
export class JsonExportIngestor implements IMembershipIngestor<JsonExportSource> {
  readonly kind = 'json' as const;

  async ingest(source: JsonExportSource): Promise<IngestionBatch> {
    const document = typeof source.document === 'string' ? this.parse(source.document) : source.document;
    if (!isObject(document)) {
      throw new IngestionError('JSON export must be an object keyed by group id.', this.kind);
    }

    const groups: GroupDeclaration[] = [];
    const tuples: MembershipTuple[] = [];
    for (const [groupId, groupEntry] of Object.entries(document)) {
      if (!isObject(groupEntry)) {
        tuples.push({ groupId, memberId: undefined });
        continue;
      }

      const groupName = optionalString(groupEntry.group_name) ?? '';
      groups.push({ groupId, groupName });
      const members = groupEntry.members;
      if (members === undefined) continue;
      if (!isObject(members)) {
        tuples.push({ groupId, groupName, memberId: undefined });
        continue;
      }

      for (const [memberId, memberEntry] of Object.entries(members)) {
        if (!isObject(memberEntry)) {
          tuples.push({ groupId, groupName, memberId: undefined });
          continue;
        }
        tuples.push({
          groupId,
          groupName,
          memberId,
          memberName: optionalString(memberEntry.user_name),
          memberNickname: optionalString(memberEntry.user_group_name),
        });
      }
    }
    return { groups, tuples };
  }

  private parse(text: string): unknown {
    try {
      return JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new IngestionError(`JSON export could not be parsed: ${reason}`, this.kind, {
        cause: error,
      });
    }
  }
}
