/**
 * Business logic: turn a batch description (records plus chart pattern and
 * event label per entry) into ready-to-render signal records.
 */
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { SignalInputError } from "../errors";
import type { SignalRecord } from "../types/domain";
import {
  SignalRecordInputSchema,
  createSignalRecord,
} from "./create_signal_record";
import {
  SynthesizeTrajectoryOptions,
  synthesizeTrajectory,
} from "./synthesize_trajectory";

export const SuiteEntrySchema = SignalRecordInputSchema.omit({
  chartSeries: true,
}).extend({
  pattern: z.string().default("momentum"),
  eventLabel: z.string().optional(),
});

export const SignalSuiteSchema = z.object({
  signals: z.array(SuiteEntrySchema),
});

export type SignalSuite = z.input<typeof SignalSuiteSchema>;

export function buildSuiteRecords(
  suite: unknown,
  options: Pick<SynthesizeTrajectoryOptions, "random"> = {}
): SignalRecord[] {
  const parsed = SignalSuiteSchema.safeParse(suite);
  if (!parsed.success) {
    throw SignalInputError.fromZod("Invalid signal suite", parsed.error);
  }

  return parsed.data.signals.map(entry => {
    const { pattern, eventLabel, ...fields } = entry;
    const chartSeries = synthesizeTrajectory(
      fields.ticker,
      fields.currentPrice,
      pattern,
      { eventLabel, random: options.random }
    );
    return createSignalRecord({ ...fields, chartSeries });
  });
}

export async function loadSignalSuite(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, "utf8");
  try {
    return JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SignalInputError(`Signal suite ${filePath} is not valid JSON`, [
      reason,
    ]);
  }
}
