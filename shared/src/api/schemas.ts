/**
 * Response schemas for the task API.
 *
 * Domain record types are inferred from these schemas so decoding and typing
 * cannot drift apart.
 */
import { z } from 'zod';

export const taskSchema = z.object({
  id: z.string(),
  title: z.string(),
  status: z.string(),
  priority: z.string().nullish(),
  context: z.array(z.string()).nullish(),
  dueDate: z.string().nullish(),
});

export const matterCountsSchema = z.object({
  documents: z.number().int(),
  events: z.number().int(),
  notes: z.number().int(),
  tasks: z.number().int(),
});

export const matterSchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string().nullish(),
  client: z.string(),
  matterNumber: z.string().nullish(),
  type: z.string(),
  status: z.string(),
  priority: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  dueDate: z.string().nullish(),
  completedAt: z.string().nullish(),
  lastActivityAt: z.string(),
  practiceArea: z.string().nullish(),
  jurisdiction: z.string().nullish(),
  tags: z.array(z.string()).default([]),
  counts: matterCountsSchema.nullish(),
});

export const notePrioritySchema = z.enum(['low', 'medium', 'high', 'urgent']);
export const noteStatusSchema = z.enum(['draft', 'active', 'archived']);

export const noteSchema = z.object({
  id: z.string(),
  title: z.string(),
  content: z.string(),
  excerpt: z.string().nullish(),
  tags: z.array(z.string()).default([]),
  isPinned: z.boolean(),
  priority: notePrioritySchema,
  status: noteStatusSchema,
  reviewDate: z.string().nullish(),
  confidential: z.boolean(),
  taskId: z.string().nullish(),
  matterId: z.string().nullish(),
  projectId: z.string().nullish(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const gymExerciseSchema = z.object({
  name: z.string(),
  sets: z.number().int(),
  reps: z.number().int().nullish(),
  weight: z.number().nullish(),
  rpe: z.number().nullish(),
});

export const gymSessionSchema = z.object({
  id: z.string(),
  sessionType: z.string(),
  date: z.string(),
  weekType: z.string().nullish(),
  notes: z.string().nullish(),
  overallRPE: z.number().nullish(),
  exercises: z.array(gymExerciseSchema).default([]),
});

export const sessionSuggestionSchema = z.object({
  sessionType: z.string(),
  weekType: z.string().nullish(),
  reason: z.string(),
  exercises: z.array(gymExerciseSchema).default([]),
});

export const runningStatsSchema = z.object({
  last7Days: z.object({ distanceKm: z.number(), runs: z.number().int() }),
  last30Days: z.object({ distanceKm: z.number(), runs: z.number().int() }),
  loadTrend: z.enum(['increasing', 'stable', 'decreasing']),
});

// ---------------------------------------------------------------------------
// Envelopes
// ---------------------------------------------------------------------------

export const tasksResponseSchema = z.object({
  success: z.boolean(),
  count: z.number().int(),
  tasks: z.array(taskSchema),
  pagination: z
    .object({
      offset: z.number().int(),
      limit: z.number().int(),
      total: z.number().int(),
      hasMore: z.boolean(),
    })
    .nullish(),
});

export const dataEnvelope = <T extends z.ZodTypeAny>(schema: T) => z.object({ data: schema });

export type Task = z.infer<typeof taskSchema>;
export type Matter = z.infer<typeof matterSchema>;
export type Note = z.infer<typeof noteSchema>;
export type GymExercise = z.infer<typeof gymExerciseSchema>;
export type GymSession = z.infer<typeof gymSessionSchema>;
export type SessionSuggestion = z.infer<typeof sessionSuggestionSchema>;
export type RunningStats = z.infer<typeof runningStatsSchema>;
