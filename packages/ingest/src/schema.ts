/**
 * Bar record schema using Zod
 */

import { z } from 'zod';

/**
 * Finite number, also accepted as a numeric string (CSV cells).
 */
const finiteNumber = z
  .union([z.number(), z.string().trim().min(1)])
  .pipe(z.coerce.number().finite());

/**
 * Raw record for one bar of one symbol
 */
export const barRecordSchema = z.object({
  symbol: z.string().trim().min(1),
  dateTime: z.union([z.string().min(1), z.number(), z.date()]).pipe(z.coerce.date()),
  open: finiteNumber,
  high: finiteNumber,
  low: finiteNumber,
  close: finiteNumber,
  volume: finiteNumber,
  // Defaults to close when the source has no adjusted series
  adjClose: finiteNumber.optional()
});

/**
 * Record as accepted from a data source
 */
export type BarRecordInput = z.input<typeof barRecordSchema>;

/**
 * Record after coercion
 */
export type BarRecord = z.output<typeof barRecordSchema>;
