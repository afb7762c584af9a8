/**
 * Domain models for group membership analysis.
 *
 * Identifiers are opaque strings at the domain boundary. Ingestors may hand
 * over numbers (account ids read from SQLite columns); the index normalizes
 * them with String() before any comparison.
 */
export type GroupId = string;
export type MemberId = string;

/** Raw identifier as produced by an ingestor, before normalization. */
export type RawId = string | number | null | undefined;

/**
 * One membership record as produced by an ingestor.
 * Ids are required for a record to be indexed; a record missing either one
 * is counted as malformed and skipped.
 */
export interface MembershipTuple {
  groupId: RawId;
  groupName?: string | null;
  memberId: RawId;
  memberName?: string | null;
  /** Group-specific nickname of the member (falls back to memberName). */
  memberNickname?: string | null;
}

/**
 * A group listed by the source, with or without membership records.
 * Declarations with a missing id are ignored.
 */
export interface GroupDeclaration {
  groupId: RawId;
  groupName?: string | null;
}

/** Everything one ingestor run produced. */
export interface IngestionBatch {
  groups: GroupDeclaration[];
  tuples: MembershipTuple[];
}

export interface GroupRef {
  groupId: GroupId;
  groupName: string;
}

export interface MemberRef {
  memberId: MemberId;
  memberName: string;
}

export interface IndexStats {
  groupCount: number;
  memberCount: number;
  membershipCount: number;
}

export interface CoOccurringPair {
  member1: MemberRef;
  member2: MemberRef;
  sharedCount: number;
  sharedGroups: GroupRef[];
  sharedGroupNames: string[];
}

export interface MemberWithOtherGroups {
  member: MemberRef;
  otherGroups: GroupRef[];
}

export interface GroupMembersResult {
  group: GroupRef;
  members: MemberWithOtherGroups[];
}

export interface FrequentMember {
  member: MemberRef;
  groupCount: number;
}

export interface MemberGroupEntry extends GroupRef {
  nickname: string;
}

export interface MemberGroupsResult {
  member: MemberRef;
  groups: MemberGroupEntry[];
}
