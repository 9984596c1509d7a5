import { z } from 'zod';

// ── Params ───────────────────────────────────────────────────

export const paramsSchema = z.record(z.unknown());

export type Params = z.infer<typeof paramsSchema>;

// ── Action vocabulary ────────────────────────────────────────

export const ACTIONS = ['move_left', 'move_right'] as const;

export const actionSchema = z.enum(ACTIONS);

export type Action = z.infer<typeof actionSchema>;

// ── Subtask ──────────────────────────────────────────────────

export const subtaskSchema = z.object({
  name: z.string().min(1),
  instruction: z.string().min(1),
  successCriteria: z.string().min(1),
  initialParams: paramsSchema,
  maxAttempts: z.number().int().min(1),
  maxAttemptSeconds: z.number().positive(),
});

export type Subtask = z.infer<typeof subtaskSchema>;

// ── Task ─────────────────────────────────────────────────────
// Subtask order is execution order. Names double as subtask ids.

export const taskSchema = z
  .object({
    name: z.string().min(1),
    subtasks: z.array(subtaskSchema).min(1),
  })
  .superRefine((task, ctx) => {
    const seen = new Set<string>();
    task.subtasks.forEach((subtask, index) => {
      if (seen.has(subtask.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['subtasks', index, 'name'],
          message: `Duplicate subtask name "${subtask.name}"`,
        });
      }
      seen.add(subtask.name);
    });
  });

export type Task = z.infer<typeof taskSchema>;

export function parseTask(data: unknown): Task {
  return taskSchema.parse(data);
}
