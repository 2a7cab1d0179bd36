import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { AnswerKind, Question, QuestionPrompt } from './types';

const AUDIO_PREFIX = 'audio:';

const QuestionInputSchema = z
  .object({
    text: z.string().trim().min(1).optional(),
    audioUri: z.string().trim().min(1).optional(),
    expectedAnswerKind: z.enum(['free-speech', 'bounded']).default('free-speech'),
  })
  .refine((value) => (value.text === undefined) !== (value.audioUri === undefined), {
    message: 'exactly one of text or audioUri is required',
  });

export const QuestionListSchema = z.array(QuestionInputSchema);
export type QuestionInput = z.input<typeof QuestionInputSchema>;

function toPrompt(input: { text?: string; audioUri?: string }): QuestionPrompt {
  if (input.audioUri !== undefined) {
    return { kind: 'audio', uri: input.audioUri };
  }
  return { kind: 'text', text: input.text ?? '' };
}

/** Validates operator-supplied questions and numbers them in order. */
export function buildQuestions(inputs: unknown): Question[] {
  const parsed = QuestionListSchema.safeParse(inputs);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    throw new Error(`Invalid questions: ${issues}`);
  }
  return parsed.data.map((input, index) => ({
    index,
    prompt: toPrompt(input),
    expectedAnswerKind: input.expectedAnswerKind,
  }));
}

/**
 * One question per non-empty line; `#` starts a comment line and an
 * `audio:` prefix makes the rest of the line an audio prompt URI.
 */
export function parseQuestionLines(content: string, answerKind: AnswerKind = 'free-speech'): Question[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'))
    .map((line, index) => {
      const prompt: QuestionPrompt = line.startsWith(AUDIO_PREFIX)
        ? { kind: 'audio', uri: line.slice(AUDIO_PREFIX.length).trim() }
        : { kind: 'text', text: line };
      return { index, prompt, expectedAnswerKind: answerKind };
    });
}

/** Reads a .json question list or a plain text file. */
export async function loadQuestionsFile(filePath: string): Promise<Question[]> {
  const content = await fs.readFile(filePath, 'utf8');
  if (path.extname(filePath).toLowerCase() === '.json') {
    return buildQuestions(JSON.parse(content));
  }
  return parseQuestionLines(content);
}
