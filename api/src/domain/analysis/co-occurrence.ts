import type { MembershipIndex } from '../index/membership-index';
import { compareIds, sortIds } from '../index/id-order';
import type { CoOccurringPair, GroupId, MemberId } from '../models/membership.model';

export const DEFAULT_PAIR_THRESHOLD = 2;

export interface CoOccurrenceOptions {
  /** Minimum number of shared groups (default 2; values ≤ 0 mean 1). */
  threshold?: number;
  /** Keep only the first N pairs of the ordered result. */
  limit?: number;
}

export function normalizeThreshold(threshold: number | undefined): number {
  if (threshold === undefined || Number.isNaN(threshold)) return DEFAULT_PAIR_THRESHOLD;
  return Math.max(1, Math.ceil(threshold));
}

/**
 * Count, for every member pair, the groups both belong to.
 *
 * Pairs are enumerated inside each group, so the cost is Σ|S_g|² over groups
 * rather than |members|². Each group's members are sorted once, which makes
 * (members[i], members[j]) for i < j the canonical orientation of the pair:
 * the outer map key is always the lower id.
 */
export function countPairs(index: MembershipIndex): Map<MemberId, Map<MemberId, number>> {
  const counts = new Map<MemberId, Map<MemberId, number>>();
  for (const memberSet of index.groupMembers.values()) {
    if (memberSet.size < 2) continue;
    const members = sortIds(memberSet);
    for (let i = 0; i < members.length - 1; i++) {
      let partners = counts.get(members[i]);
      if (!partners) {
        partners = new Map<MemberId, number>();
        counts.set(members[i], partners);
      }
      for (let j = i + 1; j < members.length; j++) {
        partners.set(members[j], (partners.get(members[j]) ?? 0) + 1);
      }
    }
  }
  return counts;
}

function sharedGroupIds(index: MembershipIndex, a: MemberId, b: MemberId): GroupId[] {
  let small = index.groupsOf(a);
  let large = index.groupsOf(b);
  if (small.size > large.size) {
    [small, large] = [large, small];
  }
  const shared: GroupId[] = [];
  for (const groupId of small) {
    if (large.has(groupId)) shared.push(groupId);
  }
  return shared.sort(compareIds);
}

/**
 * All unordered member pairs sharing at least `threshold` groups, ordered by
 * shared count (descending) then by the canonical pair id (ascending).
 */
export function findCoOccurringPairs(
  index: MembershipIndex,
  options: CoOccurrenceOptions = {},
): CoOccurringPair[] {
  const threshold = normalizeThreshold(options.threshold);
  const qualifying: Array<{ member1: MemberId; member2: MemberId; count: number }> = [];

  for (const [member1, partners] of countPairs(index)) {
    for (const [member2, count] of partners) {
      if (count >= threshold) qualifying.push({ member1, member2, count });
    }
  }

  qualifying.sort(
    (x, y) =>
      y.count - x.count ||
      compareIds(x.member1, y.member1) ||
      compareIds(x.member2, y.member2),
  );

  const selected =
    options.limit !== undefined && options.limit >= 0 ? qualifying.slice(0, options.limit) : qualifying;

  return selected.map(({ member1, member2, count }) => {
    const sharedGroups = sharedGroupIds(index, member1, member2).map((groupId) => index.groupRef(groupId));
    return {
      member1: index.memberRef(member1),
      member2: index.memberRef(member2),
      sharedCount: count,
      sharedGroups,
      sharedGroupNames: sharedGroups.map((g) => g.groupName),
    };
  });
}
