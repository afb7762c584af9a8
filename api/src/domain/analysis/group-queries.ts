import type { MembershipIndex } from '../index/membership-index';
import { compareIds, sortIds } from '../index/id-order';
import { GroupNotFoundError, MemberNotFoundError } from '../errors/membership-errors';
import type {
  FrequentMember,
  GroupId,
  GroupMembersResult,
  GroupRef,
  MemberId,
  MemberGroupsResult,
  MemberRef,
  MemberWithOtherGroups,
} from '../models/membership.model';

export const DEFAULT_SEARCH_LIMIT = 20;
export const DEFAULT_MIN_GROUPS = 2;

/**
 * Members of one group, each with the other groups they belong to.
 * Members that are only in this group are reported with an empty list.
 *
 * @throws GroupNotFoundError when the group is not in the index
 */
export function membersOfGroupWithOtherGroups(
  index: MembershipIndex,
  groupId: GroupId,
): GroupMembersResult {
  if (!index.hasGroup(groupId)) {
    throw new GroupNotFoundError([groupId]);
  }

  const members: MemberWithOtherGroups[] = [];
  for (const memberId of index.membersOf(groupId)) {
    const otherGroups: GroupRef[] = sortIds(index.groupsOf(memberId))
      .filter((id) => id !== groupId)
      .map((id) => index.groupRef(id));
    members.push({ member: index.memberRef(memberId), otherGroups });
  }

  members.sort(
    (a, b) =>
      b.otherGroups.length - a.otherGroups.length ||
      compareIds(a.member.memberId, b.member.memberId),
  );

  return { group: index.groupRef(groupId), members };
}

/**
 * Members present in every one of the given groups.
 *
 * Intersection starts from the smallest member set and stops as soon as the
 * running result is empty. Every unknown id is reported in a single error.
 */
export function commonMembersAcrossGroups(
  index: MembershipIndex,
  groupIds: Iterable<GroupId>,
): MemberRef[] {
  const unique = Array.from(new Set(groupIds));
  const missing = unique.filter((id) => !index.hasGroup(id));
  if (missing.length > 0) {
    throw new GroupNotFoundError(sortIds(missing));
  }
  if (unique.length === 0) return [];

  const sets = unique
    .map((id) => index.membersOf(id))
    .sort((a, b) => a.size - b.size);

  let common = new Set<MemberId>(sets[0]);
  for (let i = 1; i < sets.length && common.size > 0; i++) {
    const next = new Set<MemberId>();
    for (const memberId of common) {
      if (sets[i].has(memberId)) next.add(memberId);
    }
    common = next;
  }

  return sortIds(common).map((memberId) => index.memberRef(memberId));
}

/**
 * Case-insensitive substring search over group names; an exact id match also
 * qualifies. An empty query lists groups in id order.
 */
export function searchGroups(
  index: MembershipIndex,
  query = '',
  limit = DEFAULT_SEARCH_LIMIT,
): GroupRef[] {
  const needle = query.trim().toLowerCase();
  const results: GroupRef[] = [];
  for (const groupId of index.groupIds()) {
    if (results.length >= limit) break;
    const ref = index.groupRef(groupId);
    if (!needle || groupId === query.trim() || ref.groupName.toLowerCase().includes(needle)) {
      results.push(ref);
    }
  }
  return results;
}

export function normalizeMinGroups(minGroups: number | undefined): number {
  if (minGroups === undefined || Number.isNaN(minGroups)) return DEFAULT_MIN_GROUPS;
  return Math.max(1, Math.ceil(minGroups));
}

/** Members belonging to at least `minGroups` groups, most connected first. */
export function findFrequentMembers(
  index: MembershipIndex,
  minGroups = DEFAULT_MIN_GROUPS,
): FrequentMember[] {
  const floor = normalizeMinGroups(minGroups);
  const results: FrequentMember[] = [];
  for (const [memberId, groups] of index.memberGroups) {
    if (groups.size >= floor) {
      results.push({ member: index.memberRef(memberId), groupCount: groups.size });
    }
  }
  return results.sort(
    (a, b) => b.groupCount - a.groupCount || compareIds(a.member.memberId, b.member.memberId),
  );
}

/**
 * Every group of one member with the nickname used there.
 *
 * @throws MemberNotFoundError when the member is not in the index
 */
export function groupsOfMember(index: MembershipIndex, memberId: MemberId): MemberGroupsResult {
  if (!index.hasMember(memberId)) {
    throw new MemberNotFoundError(memberId);
  }
  return {
    member: index.memberRef(memberId),
    groups: sortIds(index.groupsOf(memberId)).map((groupId) => ({
      ...index.groupRef(groupId),
      nickname: index.nickname(groupId, memberId),
    })),
  };
}
