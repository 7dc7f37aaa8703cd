import { z } from 'zod';

export const TaskStatusSchema = z.enum(['pending', 'in_progress', 'done']);

const TitleSchema = z
  .string()
  .trim()
  .min(1, 'Title is required')
  .max(200, 'Title must be at most 200 characters');

const DescriptionSchema = z.string().max(2000, 'Description must be at most 2000 characters');

// Bounds of the INTEGER columns that store ids and priorities.
const INT4_MIN = -2_147_483_648;
const INT4_MAX = 2_147_483_647;

const PrioritySchema = z
  .number()
  .int('Priority must be an integer')
  .min(INT4_MIN, `Priority must be at least ${INT4_MIN}`)
  .max(INT4_MAX, `Priority must be at most ${INT4_MAX}`);

export const CreateTaskRequestSchema = z.object({
  title: TitleSchema,
  description: DescriptionSchema.nullish(),
  status: TaskStatusSchema.optional(),
  priority: PrioritySchema.nullish(),
});

// `description: null` clears it; an omitted field is left unchanged.
export const UpdateTaskRequestSchema = z.object({
  title: TitleSchema.optional(),
  description: DescriptionSchema.nullable().optional(),
  status: TaskStatusSchema.optional(),
  priority: PrioritySchema.optional(),
});

export const ListTasksQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(0).default(100),
  sort_by: z.string().optional(),
  sort_order: z.string().optional(),
  search: z.string().optional(),
  status: TaskStatusSchema.optional(),
});

export const TopPriorityQuerySchema = z.object({
  n: z.coerce.number().int().min(0).default(5),
});

export const TaskIdParamsSchema = z.object({
  id: z.coerce
    .number()
    .int()
    .positive('Task id must be a positive integer')
    .max(INT4_MAX, `Task id must be at most ${INT4_MAX}`),
});

export const TaskResponseSchema = z.object({
  id: z.number().int(),
  owner_id: z.number().int(),
  title: z.string(),
  description: z.string().nullable(),
  status: TaskStatusSchema,
  priority: z.number().int(),
  created_at: z.string().datetime(),
  updated_at: z.string().datetime(),
});

export const TaskListResponseSchema = z.array(TaskResponseSchema);

export type TaskStatusValue = z.infer<typeof TaskStatusSchema>;
export type CreateTaskRequest = z.infer<typeof CreateTaskRequestSchema>;
export type UpdateTaskRequest = z.infer<typeof UpdateTaskRequestSchema>;
export type ListTasksQuery = z.infer<typeof ListTasksQuerySchema>;
export type TopPriorityQuery = z.infer<typeof TopPriorityQuerySchema>;
export type TaskResponse = z.infer<typeof TaskResponseSchema>;
