import type {
  GroupDeclaration,
  GroupId,
  GroupRef,
  IndexStats,
  MemberId,
  MemberRef,
  MembershipTuple,
} from '../models/membership.model';
import { normalizeId, sortIds } from './id-order';

export interface IndexBuildResult {
  index: MembershipIndex;
  /** Records skipped because a group id or member id was missing. */
  skippedCount: number;
}

/** Plain, canonically ordered view of both inverted maps. */
export interface IndexContents {
  groupMembers: Record<GroupId, MemberId[]>;
  memberGroups: Record<MemberId, GroupId[]>;
}

const EMPTY: ReadonlySet<string> = new Set<string>();

function presentName(name: string | null | undefined): string | undefined {
  if (typeof name !== 'string') return undefined;
  const trimmed = name.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * MembershipIndex: the bipartite group/member edge set plus name tables.
 *
 * Built once from a complete batch of tuples and never mutated afterwards:
 * every accessor hands out read-only views, so one instance can serve any
 * number of concurrent queries.
 *
 * Invariant: m ∈ groupMembers[g] ⟺ g ∈ memberGroups[m].
 */
export class MembershipIndex {
  private constructor(
    private readonly groupMemberSets: Map<GroupId, Set<MemberId>>,
    private readonly memberGroupSets: Map<MemberId, Set<GroupId>>,
    private readonly groupNames: Map<GroupId, string>,
    private readonly memberNames: Map<MemberId, string>,
    private readonly nicknames: Map<GroupId, Map<MemberId, string>>,
    private readonly edgeCount: number,
  ) {}

  /**
   * Build an index from ingested tuples. Order of the input does not affect
   * the edge set; for names the first non-empty value seen for an id wins.
   *
   * Declared groups are registered even when no tuple names them, so a group
   * with zero members is still searchable. Declarations are read before the
   * tuples and never count as skipped.
   */
  static build(
    tuples: Iterable<MembershipTuple>,
    groups: Iterable<GroupDeclaration> = [],
  ): IndexBuildResult {
    const groupMembers = new Map<GroupId, Set<MemberId>>();
    const memberGroups = new Map<MemberId, Set<GroupId>>();
    const groupNames = new Map<GroupId, string>();
    const memberNames = new Map<MemberId, string>();
    const nicknames = new Map<GroupId, Map<MemberId, string>>();
    let skippedCount = 0;
    let edgeCount = 0;

    for (const declaration of groups) {
      const groupId = normalizeId(declaration.groupId);
      if (groupId === undefined) continue;
      if (!groupMembers.has(groupId)) {
        groupMembers.set(groupId, new Set<MemberId>());
      }
      const groupName = presentName(declaration.groupName);
      if (groupName !== undefined && !groupNames.has(groupId)) {
        groupNames.set(groupId, groupName);
      }
    }

    for (const tuple of tuples) {
      const groupId = normalizeId(tuple.groupId);
      const memberId = normalizeId(tuple.memberId);
      if (groupId === undefined || memberId === undefined) {
        skippedCount++;
        continue;
      }

      const groupName = presentName(tuple.groupName);
      if (groupName !== undefined && !groupNames.has(groupId)) {
        groupNames.set(groupId, groupName);
      }
      const memberName = presentName(tuple.memberName);
      if (memberName !== undefined && !memberNames.has(memberId)) {
        memberNames.set(memberId, memberName);
      }

      let members = groupMembers.get(groupId);
      if (!members) {
        members = new Set<MemberId>();
        groupMembers.set(groupId, members);
      }
      let groups = memberGroups.get(memberId);
      if (!groups) {
        groups = new Set<GroupId>();
        memberGroups.set(memberId, groups);
      }
      if (!members.has(memberId)) {
        members.add(memberId);
        groups.add(groupId);
        edgeCount++;
      }

      const nickname = presentName(tuple.memberNickname);
      if (nickname !== undefined) {
        let byMember = nicknames.get(groupId);
        if (!byMember) {
          byMember = new Map<MemberId, string>();
          nicknames.set(groupId, byMember);
        }
        if (!byMember.has(memberId)) {
          byMember.set(memberId, nickname);
        }
      }
    }

    return {
      index: new MembershipIndex(groupMembers, memberGroups, groupNames, memberNames, nicknames, edgeCount),
      skippedCount,
    };
  }

  /** An index with no groups and no members. */
  static empty(): MembershipIndex {
    return MembershipIndex.build([]).index;
  }

  get groupMembers(): ReadonlyMap<GroupId, ReadonlySet<MemberId>> {
    return this.groupMemberSets;
  }

  get memberGroups(): ReadonlyMap<MemberId, ReadonlySet<GroupId>> {
    return this.memberGroupSets;
  }

  /** Groups the member belongs to; empty when the member is unknown. */
  groupsOf(memberId: MemberId): ReadonlySet<GroupId> {
    return this.memberGroupSets.get(memberId) ?? EMPTY;
  }

  /** Members of the group; empty when the group is unknown. */
  membersOf(groupId: GroupId): ReadonlySet<MemberId> {
    return this.groupMemberSets.get(groupId) ?? EMPTY;
  }

  hasGroup(groupId: GroupId): boolean {
    return this.groupMemberSets.has(groupId);
  }

  hasMember(memberId: MemberId): boolean {
    return this.memberGroupSets.has(memberId);
  }

  groupName(groupId: GroupId): string {
    return this.groupNames.get(groupId) ?? groupId;
  }

  memberName(memberId: MemberId): string {
    return this.memberNames.get(memberId) ?? memberId;
  }

  /** The member's nickname inside one group, falling back to the member name. */
  nickname(groupId: GroupId, memberId: MemberId): string {
    return this.nicknames.get(groupId)?.get(memberId) ?? this.memberName(memberId);
  }

  groupRef(groupId: GroupId): GroupRef {
    return { groupId, groupName: this.groupName(groupId) };
  }

  memberRef(memberId: MemberId): MemberRef {
    return { memberId, memberName: this.memberName(memberId) };
  }

  groupIds(): GroupId[] {
    return sortIds(this.groupMemberSets.keys());
  }

  memberIds(): MemberId[] {
    return sortIds(this.memberGroupSets.keys());
  }

  stats(): IndexStats {
    return {
      groupCount: this.groupMemberSets.size,
      memberCount: this.memberGroupSets.size,
      membershipCount: this.edgeCount,
    };
  }

  contents(): IndexContents {
    const groupMembers: Record<GroupId, MemberId[]> = {};
    for (const groupId of this.groupIds()) {
      groupMembers[groupId] = sortIds(this.membersOf(groupId));
    }
    const memberGroups: Record<MemberId, GroupId[]> = {};
    for (const memberId of this.memberIds()) {
      memberGroups[memberId] = sortIds(this.groupsOf(memberId));
    }
    return { groupMembers, memberGroups };
  }
}
