import { Schema } from "effect";
import { HOURS_PER_DAY } from "../schedule-optimizer/types.js";

const NonNegativeNumber = Schema.Number.pipe(Schema.finite(), Schema.nonNegative());

export const HourlyProfileSchema = Schema.Array(NonNegativeNumber).pipe(
  Schema.itemsCount(HOURS_PER_DAY)
);

export const ChargingInfoSchema = Schema.Struct({
  sim_time_hour: Schema.Int.pipe(Schema.between(0, 24)),
  sim_time_min: Schema.Int.pipe(Schema.greaterThanOrEqualTo(0), Schema.lessThan(60)),
  base_current_load: NonNegativeNumber,
  battery_capacity_kWh: NonNegativeNumber,
});

export type ChargingInfo = typeof ChargingInfoSchema.Type;

export const ChargingStateSchema = Schema.Struct({
  charging: Schema.Literal('on', 'off'),
});

export const DischargingStateSchema = Schema.Struct({
  discharging: Schema.Literal('on', 'off'),
});

export const ApiErrorSchema = Schema.Struct({
  error: Schema.String,
});
