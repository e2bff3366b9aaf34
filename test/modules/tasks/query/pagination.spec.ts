import { Logger } from '@nestjs/common';
import {
  buildPaginationInfo,
  clampPagination,
  resolvePageRequest,
} from '../../../../src/modules/tasks/query/pagination';

describe('pagination', () => {
  describe('buildPaginationInfo', () => {
    it('should report a single empty page when there are no items', () => {
      expect(buildPaginationInfo(1, 10, 0)).toEqual({
        page: 1,
        pageSize: 10,
        totalItems: 0,
        totalPages: 1,
        hasNext: false,
        hasPrevious: false,
      });
    });

    it('should round the page count up', () => {
      expect(buildPaginationInfo(2, 10, 25)).toEqual({
        page: 2,
        pageSize: 10,
        totalItems: 25,
        totalPages: 3,
        hasNext: true,
        hasPrevious: true,
      });
    });

    it('should have no next page on the last page', () => {
      expect(buildPaginationInfo(3, 10, 30).hasNext).toBe(false);
    });
  });

  describe('clampPagination', () => {
    it('should fall back to page 1 of 10', () => {
      expect(clampPagination()).toEqual({ page: 1, pageSize: 10, skip: 0 });
    });

    it('should clamp out-of-range values', () => {
      expect(clampPagination(0, 500)).toEqual({ page: 1, pageSize: 100, skip: 0 });
      expect(clampPagination(-4, 0)).toEqual({ page: 1, pageSize: 1, skip: 0 });
    });

    it('should truncate fractional values', () => {
      expect(clampPagination(3.7, 5.2)).toEqual({ page: 3, pageSize: 5, skip: 10 });
    });
  });

  describe('resolvePageRequest', () => {
    let logger: Logger;
    let debug: jest.SpyInstance;

    beforeEach(() => {
      logger = new Logger('PaginationTest');
      debug = jest.spyOn(logger, 'debug').mockImplementation(() => undefined);
    });

    it('should log when a value is clamped', () => {
      expect(resolvePageRequest({ page: 2, pageSize: 500 }, logger)).toEqual({
        page: 2,
        pageSize: 100,
        skip: 100,
      });
      expect(debug).toHaveBeenCalledWith(
        'Clamped pagination to page=2 pageSize=100: pageSize must be between 1 and 100',
      );
    });

    it('should stay quiet for valid input', () => {
      expect(resolvePageRequest({ page: 2, pageSize: 20 }, logger)).toEqual({
        page: 2,
        pageSize: 20,
        skip: 20,
      });
      expect(debug).not.toHaveBeenCalled();
    });
  });
});
