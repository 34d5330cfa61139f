import { addMinutes, differenceInMinutes, format } from 'date-fns';
import { generateSlots, SLOT_STEP_MINUTES } from './slot-grid';

describe('generateSlots', () => {
  // 2030-01-07 is a Monday
  const at = (hours: number, minutes = 0) =>
    new Date(2030, 0, 7, hours, minutes, 0);
  const dayBefore = new Date(2030, 0, 6, 12, 0, 0);
  const hhmm = (slots: Date[]) => slots.map((slot) => format(slot, 'HH:mm'));

  const mondayWithOneBooking = {
    windowStart: at(8),
    windowEnd: at(16, 30),
    booked: [{ start: at(10), end: at(10, 30) }],
    now: dayBefore,
  };

  it('should drop every start whose 30-minute span touches the 10:00-10:30 booking', () => {
    const slots = hhmm(
      generateSlots({ ...mondayWithOneBooking, durationMinutes: 30 }),
    );

    expect(slots).toContain('09:30');
    expect(slots).toContain('10:30');
    expect(slots).not.toContain('09:45');
    expect(slots).not.toContain('10:00');
    expect(slots).not.toContain('10:15');
    expect(slots).toHaveLength(30);
    expect(slots[0]).toBe('08:00');
    expect(slots[slots.length - 1]).toBe('16:00');
  });

  it('should offer the quarter right before and right after a booking for a 15-minute service', () => {
    const slots = hhmm(
      generateSlots({ ...mondayWithOneBooking, durationMinutes: 15 }),
    );

    expect(slots).toContain('09:45');
    expect(slots).toContain('10:30');
    expect(slots).not.toContain('10:00');
    expect(slots).not.toContain('10:15');
  });

  it('should return ascending, grid-aligned slots that end by closing time', () => {
    const durationMinutes = 45;
    const slots = generateSlots({
      windowStart: at(9),
      windowEnd: at(17, 15),
      durationMinutes,
      booked: [
        { start: at(11, 15), end: at(12, 30) },
        { start: at(14), end: at(14, 45) },
      ],
      now: dayBefore,
    });

    expect(slots.length).toBeGreaterThan(0);
    slots.forEach((slot, index) => {
      expect(differenceInMinutes(slot, at(9)) % SLOT_STEP_MINUTES).toBe(0);
      expect(addMinutes(slot, durationMinutes) <= at(17, 15)).toBe(true);
      if (index > 0) {
        expect(slot.getTime()).toBeGreaterThan(slots[index - 1].getTime());
      }
    });
  });

  it('should skip starts earlier than now on the current day', () => {
    const slots = hhmm(
      generateSlots({
        windowStart: at(8),
        windowEnd: at(12),
        durationMinutes: 60,
        booked: [],
        now: at(9, 20),
      }),
    );

    expect(slots).toEqual([
      '09:30',
      '09:45',
      '10:00',
      '10:15',
      '10:30',
      '10:45',
      '11:00',
    ]);
  });

  it('should keep a start that equals now', () => {
    const slots = hhmm(
      generateSlots({
        windowStart: at(8),
        windowEnd: at(9),
        durationMinutes: 30,
        booked: [],
        now: at(8, 15),
      }),
    );

    expect(slots).toEqual(['08:15', '08:30']);
  });

  it('should return nothing when the service is longer than the window', () => {
    expect(
      generateSlots({
        windowStart: at(8),
        windowEnd: at(8, 45),
        durationMinutes: 60,
        booked: [],
        now: dayBefore,
      }),
    ).toEqual([]);
  });

  it('should allow a booking to start exactly when another ends', () => {
    const slots = hhmm(
      generateSlots({
        windowStart: at(10),
        windowEnd: at(11),
        durationMinutes: 30,
        booked: [{ start: at(10), end: at(10, 30) }],
        now: dayBefore,
      }),
    );

    expect(slots).toEqual(['10:30']);
  });
});
