import { z } from 'zod';

export const DataRecordSchema = z.record(z.string(), z.unknown());

// A bare list, or a document with a top-level `records` list
export const RecordsFileSchema = z.union([
  z.array(DataRecordSchema),
  z.object({ records: z.array(DataRecordSchema) }),
]);

export type DataRecord = z.infer<typeof DataRecordSchema>;

export function parseRecords(data: unknown): DataRecord[] {
  const parsed = RecordsFileSchema.parse(data);
  return Array.isArray(parsed) ? parsed : parsed.records;
}
