import { z } from "zod";

/**
 * Time-ordered dataset reference. Only the timestamp column is needed for
 * windowing; rows are addressed by ordinal position.
 */
export const TimeSeriesDatasetSchema = z.object({
  id: z.string().min(1),
  timestamps: z.array(z.number().finite()),
});

export type TimeSeriesDataset = {
  readonly id: string;
  readonly timestamps: readonly number[];
};

/** Inclusive timestamp bounds of a row range, as handed to the backtest tool. */
export interface TimeRange {
  from: number;
  to: number;
}
