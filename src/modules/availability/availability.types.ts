export type NotApplicableReason = 'service-not-found' | 'employee-not-assigned';

export type AvailabilityResult =
  | { kind: 'slots'; slots: Date[] }
  | { kind: 'not-applicable'; reason: NotApplicableReason };
