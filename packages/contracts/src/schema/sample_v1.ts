import { z } from "zod";

/**
 * SampleV1Schema
 *
 * One observation for one owner (e.g. a subject) at integer second `t`.
 * A channel value of null means the value was rejected at read time and is
 * treated as missing by every window.
 */
export const SampleV1Schema = z.object({
  owner_id: z.string().min(1),
  t: z.number().int().finite(),
  channels: z.record(z.number().finite().nullable()),
  label: z.string().min(1).nullable().default(null),
});

export type SampleV1 = z.infer<typeof SampleV1Schema>;

/**
 * SeriesV1: samples of a single owner, strictly increasing in `t`.
 * Produced once by the reader and never mutated afterwards.
 */
export type SeriesV1 = {
  readonly owner_id: string;
  readonly samples: ReadonlyArray<SampleV1>;
};

export function assertStrictlyIncreasing(series: SeriesV1): void {
  for (let i = 1; i < series.samples.length; i++) {
    const prev = series.samples[i - 1];
    const cur = series.samples[i];
    if (cur.t <= prev.t) {
      throw new Error(`SERIES_NOT_STRICTLY_INCREASING: owner=${series.owner_id} t=${cur.t} after t=${prev.t}`);
    }
  }
}
