import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  Post,
  Query,
} from '@nestjs/common';

import type {
  GroupMembersResult,
  GroupRef,
  MemberGroupsResult,
} from '../../domain/models/membership.model';
import {
  AnalysisService,
  type FrequentMembersResult,
  type IntersectionResult,
  type PairsResult,
} from './analysis.service';
import { parseIntegerParam, parseNumberParam } from './common/query-params';
import { IntersectionRequestDto } from './dto/intersection-request.dto';

/**
 * Analysis API Controller
 * Read-only queries against one loaded dataset: /{prefix}/datasets/{datasetId}/...
 */
@Controller('datasets/:datasetId')
export class AnalysisController {
  constructor(private readonly analysis: AnalysisService) {}

  /**
   * Search groups by name or id
   * GET /datasets/{datasetId}/groups?q=&limit=
   */
  @Get('groups')
  searchGroups(
    @Param('datasetId') datasetId: string,
    @Query('q') q?: string,
    @Query('limit') limit?: string,
  ): GroupRef[] {
    return this.analysis.searchGroups(datasetId, q, parseIntegerParam('limit', limit, 1));
  }

  /**
   * Member pairs sharing at least `threshold` groups
   * GET /datasets/{datasetId}/pairs?threshold=&limit=
   */
  @Get('pairs')
  findPairs(
    @Param('datasetId') datasetId: string,
    @Query('threshold') threshold?: string,
    @Query('limit') limit?: string,
  ): PairsResult {
    return this.analysis.findPairs(
      datasetId,
      parseNumberParam('threshold', threshold),
      parseIntegerParam('limit', limit, 0),
    );
  }

  /**
   * Members of one group, each with the other groups they belong to
   * GET /datasets/{datasetId}/groups/{groupId}/members
   */
  @Get('groups/:groupId/members')
  membersOfGroup(
    @Param('datasetId') datasetId: string,
    @Param('groupId') groupId: string,
  ): GroupMembersResult {
    return this.analysis.membersOfGroup(datasetId, groupId);
  }

  /**
   * Members common to every listed group
   * POST /datasets/{datasetId}/intersection
   * Body: { groupIds: string[] }
   */
  @Post('intersection')
  @HttpCode(200)
  commonMembers(
    @Param('datasetId') datasetId: string,
    @Body() dto: IntersectionRequestDto,
  ): IntersectionResult {
    return this.analysis.commonMembers(datasetId, dto.groupIds);
  }

  /**
   * GET /datasets/{datasetId}/frequent-members?minGroups=
   */
  @Get('frequent-members')
  frequentMembers(
    @Param('datasetId') datasetId: string,
    @Query('minGroups') minGroups?: string,
  ): FrequentMembersResult {
    return this.analysis.frequentMembers(datasetId, parseNumberParam('minGroups', minGroups));
  }

  /**
   * GET /datasets/{datasetId}/members/{memberId}/groups
   */
  @Get('members/:memberId/groups')
  groupsOfMember(
    @Param('datasetId') datasetId: string,
    @Param('memberId') memberId: string,
  ): MemberGroupsResult {
    return this.analysis.groupsOfMember(datasetId, memberId);
  }
}
