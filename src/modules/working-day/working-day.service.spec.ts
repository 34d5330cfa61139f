import { Test, TestingModule } from '@nestjs/testing';
import { WorkingDayService } from './working-day.service';
import { WorkingDayRepository } from './working-day.repository';
import { WeekDay } from './weekday';
import { IdentityService } from '../identity/identity.service';
import { IDENTITY_DIRECTORY } from '../identity/identity.repository';
import type { AccountPrincipal } from '../identity/account-principal';
import { ValidationFailedError } from '../../common/errors/scheduling.errors';
import { InMemoryIdentityDirectory } from '../../../test/support/in-memory-identity';

describe('WorkingDayService', () => {
  let service: WorkingDayService;
  let repository: {
    upsert: jest.Mock;
    listByCompany: jest.Mock;
    getWorkingDay: jest.Mock;
  };

  const company: AccountPrincipal = {
    accountId: 'company-account',
    role: 'company',
  };

  beforeEach(async () => {
    repository = {
      upsert: jest.fn(),
      listByCompany: jest.fn(),
      getWorkingDay: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        WorkingDayService,
        IdentityService,
        { provide: WorkingDayRepository, useValue: repository },
        {
          provide: IDENTITY_DIRECTORY,
          useValue: new InMemoryIdentityDirectory().addCompany(
            'company-account',
            10,
          ),
        },
      ],
    }).compile();

    service = module.get<WorkingDayService>(WorkingDayService);
  });

  describe('upsertWorkingDay', () => {
    it('should save opening hours for the caller company', async () => {
      const saved = {
        id: 3,
        companyId: 10,
        day: WeekDay.Monday,
        openingTime: '08:00',
        closingTime: '16:30',
      };
      repository.upsert.mockResolvedValueOnce(saved);

      const result = await service.upsertWorkingDay(company, {
        day: WeekDay.Monday,
        opening_time: '08:00',
        closing_time: '16:30',
      });

      expect(result).toEqual(saved);
      expect(repository.upsert).toHaveBeenCalledWith(10, {
        day: WeekDay.Monday,
        openingTime: '08:00',
        closingTime: '16:30',
      });
    });

    it('should accept a closed day', async () => {
      repository.upsert.mockResolvedValueOnce({
        id: 4,
        companyId: 10,
        day: WeekDay.Sunday,
        openingTime: null,
        closingTime: null,
      });

      await service.upsertWorkingDay(company, {
        day: WeekDay.Sunday,
        opening_time: null,
        closing_time: null,
      });

      expect(repository.upsert).toHaveBeenCalledWith(10, {
        day: WeekDay.Sunday,
        openingTime: null,
        closingTime: null,
      });
    });

    it('should reject a day with only one of the two times', async () => {
      await expect(
        service.upsertWorkingDay(company, {
          day: WeekDay.Friday,
          opening_time: '08:00',
          closing_time: null,
        }),
      ).rejects.toThrow(ValidationFailedError);
      expect(repository.upsert).not.toHaveBeenCalled();
    });

    it('should reject equal opening and closing times', async () => {
      await expect(
        service.upsertWorkingDay(company, {
          day: WeekDay.Friday,
          opening_time: '09:00',
          closing_time: '09:00:00',
        }),
      ).rejects.toThrow('Opening and closing time cannot be the same');
    });

    it('should not let a client account edit opening hours', async () => {
      await expect(
        service.upsertWorkingDay(
          { accountId: 'client-account', role: 'user' },
          {
            day: WeekDay.Monday,
            opening_time: '08:00',
            closing_time: '16:00',
          },
        ),
      ).rejects.toMatchObject({ kind: 'unauthorized' });
    });
  });

  describe('listWorkingDays', () => {
    it('should fill weekdays without a row as closed, Monday first', async () => {
      repository.listByCompany.mockResolvedValueOnce([
        {
          id: 9,
          companyId: 10,
          day: WeekDay.Wednesday,
          openingTime: '10:00',
          closingTime: '18:00',
        },
      ]);

      const result = await service.listWorkingDays(10);

      expect(result.map((entry) => entry.day)).toEqual([
        WeekDay.Monday,
        WeekDay.Tuesday,
        WeekDay.Wednesday,
        WeekDay.Thursday,
        WeekDay.Friday,
        WeekDay.Saturday,
        WeekDay.Sunday,
      ]);
      expect(result[0]).toEqual({
        id: null,
        companyId: 10,
        day: WeekDay.Monday,
        openingTime: null,
        closingTime: null,
      });
      expect(result[2]).toEqual({
        id: 9,
        companyId: 10,
        day: WeekDay.Wednesday,
        openingTime: '10:00',
        closingTime: '18:00',
      });
    });
  });
});
