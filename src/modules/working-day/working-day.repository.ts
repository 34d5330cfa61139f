import { Inject, Injectable } from '@nestjs/common';
import { and, eq } from 'drizzle-orm';
import {
  DATABASE_CONNECTION,
  type DatabaseConnection,
} from '../../database/database.module.js';
import { workingDays } from '../../database/schema/index.js';
import { guardPersistence } from '../../database/persistence.js';
import { toHourMinute } from '../../common/time/naive-datetime.js';
import { none, some, type Option } from '../../common/types/option.js';
import type { WeekDay } from './weekday.js';
import type {
  OpeningHoursProvider,
  WorkingDay,
  WorkingDayHours,
} from './working-day.types.js';

type WorkingDayRow = typeof workingDays.$inferSelect;

const toWorkingDay = (row: WorkingDayRow): WorkingDay => ({
  id: row.id,
  companyId: row.companyId,
  day: row.day,
  openingTime: row.openingTime === null ? null : toHourMinute(row.openingTime),
  closingTime: row.closingTime === null ? null : toHourMinute(row.closingTime),
});

@Injectable()
export class WorkingDayRepository implements OpeningHoursProvider {
  constructor(
    @Inject(DATABASE_CONNECTION) private readonly db: DatabaseConnection,
  ) {}

  async getWorkingDay(
    companyId: number,
    day: WeekDay,
  ): Promise<Option<WorkingDay>> {
    const [row] = await guardPersistence('load working day', async () =>
      this.db
        .select()
        .from(workingDays)
        .where(
          and(eq(workingDays.companyId, companyId), eq(workingDays.day, day)),
        )
        .limit(1),
    );
    return row ? some(toWorkingDay(row)) : none();
  }

  async listByCompany(companyId: number): Promise<WorkingDay[]> {
    const rows = await guardPersistence('list working days', async () =>
      this.db
        .select()
        .from(workingDays)
        .where(eq(workingDays.companyId, companyId)),
    );
    return rows.map(toWorkingDay);
  }

  /** Inserts the weekday or replaces its hours when the company already has it. */
  async upsert(companyId: number, hours: WorkingDayHours): Promise<WorkingDay> {
    const [row] = await guardPersistence('save working day', async () =>
      this.db
        .insert(workingDays)
        .values({ companyId, ...hours })
        .onConflictDoUpdate({
          target: [workingDays.companyId, workingDays.day],
          set: {
            openingTime: hours.openingTime,
            closingTime: hours.closingTime,
          },
        })
        .returning(),
    );
    return toWorkingDay(row);
  }
}
