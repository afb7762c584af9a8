import { Injectable } from '@nestjs/common';

import {
  findCoOccurringPairs,
  normalizeThreshold,
} from '../../domain/analysis/co-occurrence';
import {
  commonMembersAcrossGroups,
  findFrequentMembers,
  groupsOfMember,
  membersOfGroupWithOtherGroups,
  normalizeMinGroups,
  searchGroups,
} from '../../domain/analysis/group-queries';
import type {
  CoOccurringPair,
  FrequentMember,
  GroupMembersResult,
  GroupRef,
  MemberGroupsResult,
  MemberRef,
} from '../../domain/models/membership.model';
import { AnalyzerConfigService } from '../config/analyzer-config.service';
import { DatasetRegistryService } from '../dataset/dataset-registry.service';
import { AnalyzerLogger } from '../logging/analyzer-logger.service';
import { LogCategory } from '../logging/log-levels';

export interface PairsResult {
  threshold: number;
  totalResults: number;
  pairs: CoOccurringPair[];
}

export interface IntersectionResult {
  groupIds: string[];
  totalResults: number;
  members: MemberRef[];
}

export interface FrequentMembersResult {
  minGroups: number;
  totalResults: number;
  members: FrequentMember[];
}

/**
 * Runs the index queries against the current snapshot of a dataset.
 * Each call resolves the snapshot once, so a reload landing mid-query does
 * not change the data the query sees.
 */
@Injectable()
export class AnalysisService {
  constructor(
    private readonly registry: DatasetRegistryService,
    private readonly config: AnalyzerConfigService,
    private readonly logger: AnalyzerLogger,
  ) {}

  searchGroups(datasetId: string, query?: string, limit?: number): GroupRef[] {
    const { index } = this.registry.get(datasetId);
    const effectiveLimit = limit ?? this.config.groupSearchLimit;
    const groups = searchGroups(index, query ?? '', effectiveLimit);
    this.logger.debug(LogCategory.ANALYSIS, 'Group search', {
      query,
      limit: effectiveLimit,
      resultCount: groups.length,
    });
    return groups;
  }

  findPairs(datasetId: string, threshold?: number, limit?: number): PairsResult {
    const { index } = this.registry.get(datasetId);
    const effectiveThreshold = normalizeThreshold(threshold ?? this.config.defaultPairThreshold);
    const startedAt = Date.now();
    const pairs = findCoOccurringPairs(index, { threshold: effectiveThreshold, limit });
    this.logger.debug(LogCategory.ANALYSIS, 'Co-occurrence query', {
      threshold: effectiveThreshold,
      limit,
      resultCount: pairs.length,
      elapsedMs: Date.now() - startedAt,
    });
    return { threshold: effectiveThreshold, totalResults: pairs.length, pairs };
  }

  membersOfGroup(datasetId: string, groupId: string): GroupMembersResult {
    const { index } = this.registry.get(datasetId);
    const result = membersOfGroupWithOtherGroups(index, groupId);
    this.logger.debug(LogCategory.ANALYSIS, 'Group members query', {
      groupId,
      memberCount: result.members.length,
    });
    return result;
  }

  commonMembers(datasetId: string, groupIds: string[]): IntersectionResult {
    const { index } = this.registry.get(datasetId);
    const members = commonMembersAcrossGroups(index, groupIds);
    this.logger.debug(LogCategory.ANALYSIS, 'Intersection query', {
      groupCount: groupIds.length,
      resultCount: members.length,
    });
    return { groupIds, totalResults: members.length, members };
  }

  frequentMembers(datasetId: string, minGroups?: number): FrequentMembersResult {
    const { index } = this.registry.get(datasetId);
    const effective = normalizeMinGroups(minGroups);
    const members = findFrequentMembers(index, effective);
    return { minGroups: effective, totalResults: members.length, members };
  }

  groupsOfMember(datasetId: string, memberId: string): MemberGroupsResult {
    const { index } = this.registry.get(datasetId);
    return groupsOfMember(index, memberId);
  }
}
