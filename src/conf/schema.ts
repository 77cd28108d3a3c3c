import { z } from 'zod';

const total = z.number().int().min(0);

export const cellSchema = z.object({
  row: z.number().int().min(0),
  column: z.number().int().min(0),
  border: z.boolean().optional(),
  value: z.number().int().min(0).optional(),
  rowTotal: total.optional(),
  columnTotal: total.optional(),
}).strict();

export const boardSchema = z.array(z.array(cellSchema).min(1)).min(1);

export const rulesSchema = z.array(z.string().min(1)).min(1);

export type CellConfig = z.infer<typeof cellSchema>;
