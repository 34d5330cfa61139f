import { Injectable, Logger } from '@nestjs/common';
import { ValidationFailedError } from '../../common/errors/scheduling.errors.js';
import { IdentityService } from '../identity/identity.service.js';
import type { AccountPrincipal } from '../identity/account-principal.js';
import { WEEK_DAY_VALUES, type WeekDay } from './weekday.js';
import { WorkingDayRepository } from './working-day.repository.js';
import type { UpsertWorkingDayDto } from './dto/upsert-working-day.dto.js';
import type { WorkingDay, WorkingDayEntry } from './working-day.types.js';

// `HH:mm` and `HH:mm:ss` name the same instant when seconds are zero.
const withSeconds = (time: string): string =>
  time.length === 5 ? `${time}:00` : time;

@Injectable()
export class WorkingDayService {
  private readonly logger = new Logger(WorkingDayService.name);

  constructor(
    private readonly workingDays: WorkingDayRepository,
    private readonly identity: IdentityService,
  ) {}

  async upsertWorkingDay(
    principal: AccountPrincipal,
    dto: UpsertWorkingDayDto,
  ): Promise<WorkingDay> {
    const companyId = await this.identity.resolveCompany(principal);
    const { opening_time: openingTime, closing_time: closingTime } = dto;

    if (openingTime === null || closingTime === null) {
      if (openingTime !== closingTime) {
        throw new ValidationFailedError(
          'Opening and closing time must both be set or both be empty',
        );
      }
    } else if (withSeconds(openingTime) === withSeconds(closingTime)) {
      throw new ValidationFailedError(
        'Opening and closing time cannot be the same',
      );
    }

    const saved = await this.workingDays.upsert(companyId, {
      day: dto.day,
      openingTime,
      closingTime,
    });
    this.logger.log(
      `Company ${companyId} set ${saved.day} to ${saved.openingTime ?? 'closed'}-${saved.closingTime ?? 'closed'}`,
    );
    return saved;
  }

  /** Always seven entries, Monday first. */
  async listWorkingDays(companyId: number): Promise<WorkingDayEntry[]> {
    const stored = await this.workingDays.listByCompany(companyId);
    const byDay = new Map<WeekDay, WorkingDay>(
      stored.map((workingDay) => [workingDay.day, workingDay]),
    );

    return WEEK_DAY_VALUES.map(
      (day) =>
        byDay.get(day) ?? {
          id: null,
          companyId,
          day,
          openingTime: null,
          closingTime: null,
        },
    );
  }
}
