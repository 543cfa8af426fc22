import { describe, expect, it } from 'vitest';
import { ComprehensionTaskListSchema, ComprehensionTaskSchema } from '../../src/tasks/schemas.js';

describe('ComprehensionTaskSchema', () => {
  it('accepts each task type', () => {
    const tasks = [
      { type: 'multiple_choice', question: 'Wer kommt?', options: ['Anna', 'Ben'], correct: 1 },
      { type: 'true_false', question: 'Es regnet.', correct: false },
      { type: 'fill_blank', question: 'Der ___ bellt.', correct: 'Hund' },
      { type: 'short_answer', question: 'Warum?', hint: 'Denk an das Wetter' },
    ];

    expect(ComprehensionTaskListSchema.parse(tasks)).toHaveLength(4);
  });

  it('rejects a multiple choice answer outside the options', () => {
    const result = ComprehensionTaskSchema.safeParse({
      type: 'multiple_choice',
      question: 'Wer kommt?',
      options: ['Anna', 'Ben'],
      correct: 2,
    });

    expect(result.success).toBe(false);
  });

  it('caps a released list at twenty tasks', () => {
    const task = { type: 'true_false', question: 'Es regnet.', correct: true };
    expect(ComprehensionTaskListSchema.safeParse(Array.from({ length: 21 }, () => task)).success).toBe(false);
  });
});
