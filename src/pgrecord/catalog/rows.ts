// catalog/rows.ts

import { z } from "zod";

export const columnRowSchema = z.object({
  table_name: z.string(),
  table_description: z.string().nullable(),
  table_type: z.string(),
  column_name: z.string(),
  ordinal_position: z.coerce.number().int(),
  column_description: z.string().nullable(),
  column_default: z.string().nullable(),
  data_type: z.string(),
  is_nullable: z.boolean(),
  is_identity: z.boolean(),
  is_generated: z.boolean(),
});

export const constraintRowSchema = z.object({
  table_name: z.string(),
  column_name: z.string(),
  constraint_name: z.string(),
  constraint_type: z.string(),
  constraint_definition: z.string(),
  index_type: z.string(),
});

export const uniqueIndexRowSchema = z.object({
  table_name: z.string(),
  index_name: z.string(),
  index_columns: z.array(z.string()),
});

export const triggerRowSchema = z.object({
  event_object_catalog: z.string(),
  event_object_schema: z.string(),
  trigger_name: z.string(),
  event_manipulation: z.string(),
  event_object_table: z.string(),
  action_statement: z.string(),
  action_orientation: z.string(),
  action_timing: z.string(),
});

export type ColumnRow = z.infer<typeof columnRowSchema>;
export type ConstraintRow = z.infer<typeof constraintRowSchema>;
export type UniqueIndexRow = z.infer<typeof uniqueIndexRowSchema>;
export type TriggerRow = z.infer<typeof triggerRowSchema>;
