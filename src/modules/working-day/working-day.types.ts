import type { Option } from '../../common/types/option.js';
import type { WeekDay } from './weekday.js';

export const OPENING_HOURS = 'OPENING_HOURS';

/** Times are `HH:mm`; both null means the company is closed that day. */
export interface WorkingDay {
  id: number;
  companyId: number;
  day: WeekDay;
  openingTime: string | null;
  closingTime: string | null;
}

/** A listing row; weekdays never configured come back closed with no id. */
export type WorkingDayEntry = Omit<WorkingDay, 'id'> & { id: number | null };

export interface OpeningHoursProvider {
  getWorkingDay(companyId: number, day: WeekDay): Promise<Option<WorkingDay>>;
}

export interface WorkingDayHours {
  day: WeekDay;
  openingTime: string | null;
  closingTime: string | null;
}
