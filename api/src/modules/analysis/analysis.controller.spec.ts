import { Test, TestingModule } from '@nestjs/testing';
import { HttpException } from '@nestjs/common';

import { AnalysisController } from './analysis.controller';
import { AnalysisService } from './analysis.service';
import { GroupNotFoundError } from '../../domain/errors/membership-errors';

describe('AnalysisController', () => {
  let controller: AnalysisController;

  const mockAnalysisService = {
    searchGroups: jest.fn(),
    findPairs: jest.fn(),
    membersOfGroup: jest.fn(),
    commonMembers: jest.fn(),
    frequentMembers: jest.fn(),
    groupsOfMember: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [AnalysisController],
      providers: [
        {
          provide: AnalysisService,
          useValue: mockAnalysisService,
        },
      ],
    }).compile();

    controller = module.get<AnalysisController>(AnalysisController);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('searchGroups', () => {
    it('should pass the query and parsed limit through', () => {
      mockAnalysisService.searchGroups.mockReturnValue([{ groupId: '1', groupName: 'Hiking' }]);

      const result = controller.searchGroups('ds', 'hik', '5');

      expect(result).toEqual([{ groupId: '1', groupName: 'Hiking' }]);
      expect(mockAnalysisService.searchGroups).toHaveBeenCalledWith('ds', 'hik', 5);
    });

    it('should reject a zero limit', () => {
      expect(() => controller.searchGroups('ds', undefined, '0')).toThrow(
        "Query parameter 'limit' must be an integer >= 1.",
      );
      expect(mockAnalysisService.searchGroups).not.toHaveBeenCalled();
    });
  });

  describe('findPairs', () => {
    it('should leave absent parameters undefined', () => {
      mockAnalysisService.findPairs.mockReturnValue({ threshold: 2, totalResults: 0, pairs: [] });

      controller.findPairs('ds');

      expect(mockAnalysisService.findPairs).toHaveBeenCalledWith('ds', undefined, undefined);
    });

    it('should parse threshold and limit', () => {
      mockAnalysisService.findPairs.mockReturnValue({ threshold: 3, totalResults: 0, pairs: [] });

      controller.findPairs('ds', '3', '10');

      expect(mockAnalysisService.findPairs).toHaveBeenCalledWith('ds', 3, 10);
    });

    it('should reject a non-numeric threshold with 400', () => {
      let caught: unknown;
      try {
        controller.findPairs('ds', 'many');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(HttpException);
      expect(caught).toMatchObject({ status: 400 });
    });
  });

  describe('membersOfGroup', () => {
    it('should propagate GroupNotFoundError', () => {
      mockAnalysisService.membersOfGroup.mockImplementation(() => {
        throw new GroupNotFoundError(['9']);
      });

      expect(() => controller.membersOfGroup('ds', '9')).toThrow(GroupNotFoundError);
    });
  });

  describe('commonMembers', () => {
    it('should forward the group ids from the body', () => {
      const response = { groupIds: ['1', '2'], totalResults: 0, members: [] };
      mockAnalysisService.commonMembers.mockReturnValue(response);

      expect(controller.commonMembers('ds', { groupIds: ['1', '2'] })).toBe(response);
      expect(mockAnalysisService.commonMembers).toHaveBeenCalledWith('ds', ['1', '2']);
    });
  });

  describe('frequentMembers', () => {
    it('should parse minGroups', () => {
      mockAnalysisService.frequentMembers.mockReturnValue({ minGroups: 3, totalResults: 0, members: [] });

      controller.frequentMembers('ds', '3');

      expect(mockAnalysisService.frequentMembers).toHaveBeenCalledWith('ds', 3);
    });
  });

  describe('groupsOfMember', () => {
    it('should return the service result', () => {
      const response = { member: { memberId: '10', memberName: 'Ann' }, groups: [] };
      mockAnalysisService.groupsOfMember.mockReturnValue(response);

      expect(controller.groupsOfMember('ds', '10')).toBe(response);
    });
  });
});
