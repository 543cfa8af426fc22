import { z } from 'zod';

const question = z
  .string({ required_error: 'question is required' })
  .trim()
  .min(1, 'question is required')
  .max(1000, 'question must be at most 1000 characters');

export const MultipleChoiceTaskSchema = z
  .object({
    type: z.literal('multiple_choice'),
    question,
    options: z.array(z.string().trim().min(1)).min(2).max(6),
    correct: z.number().int().nonnegative(),
  })
  .refine((task) => task.correct < task.options.length, {
    message: 'correct must reference one of the options',
    path: ['correct'],
  });

export const TrueFalseTaskSchema = z.object({
  type: z.literal('true_false'),
  question,
  correct: z.boolean(),
});

export const FillBlankTaskSchema = z.object({
  type: z.literal('fill_blank'),
  question,
  correct: z.string().trim().min(1),
});

export const ShortAnswerTaskSchema = z.object({
  type: z.literal('short_answer'),
  question,
  hint: z.string().trim().max(500).optional(),
});

// discriminatedUnion does not accept refined members
export const ComprehensionTaskSchema = z.union([
  MultipleChoiceTaskSchema,
  TrueFalseTaskSchema,
  FillBlankTaskSchema,
  ShortAnswerTaskSchema,
]);
export type ComprehensionTask = z.infer<typeof ComprehensionTaskSchema>;

export const ComprehensionTaskListSchema = z.array(ComprehensionTaskSchema).max(20);
export type ComprehensionTaskList = z.infer<typeof ComprehensionTaskListSchema>;
