export const HOURS_PER_DAY = 24;

/** One value per hour of day, index 0..23. */
export type HourlyProfile = readonly number[];

/** Charge permission per hour of day; `true` means charging is allowed. */
export type Schedule = readonly boolean[];

export type RunMode = 'ByLoad' | 'ByPrice';

export type BaseProfiles = {
  readonly baseLoad: HourlyProfile;
  readonly price: HourlyProfile;
};

export type FeasibilityPredicate = (hour: number) => boolean;
