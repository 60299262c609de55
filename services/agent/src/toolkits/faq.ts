/**
 * FAQ lookup over a small question/answer table (data/faq.json).
 *
 * Matching is keyword based: a query contained in a question (or the other
 * way round) scores 0.8, otherwise the score is the share of query words that
 * appear in the question. Matches below 0.3 are reported as not found.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ToolExecutionError, type LocalToolkit } from '@toolweave/shared';
import { overlapScore } from './text-match.js';

export const DEFAULT_FAQ_PATH = fileURLToPath(new URL('../../data/faq.json', import.meta.url));

const CONTAINMENT_SCORE = 0.8;
const MIN_SCORE = 0.3;

const FaqEntrySchema = z.object({
  question: z.string().min(1),
  answer: z.string().min(1),
});

export type FaqEntry = z.infer<typeof FaqEntrySchema>;

export interface FaqMatch {
  answer: string;
  matchedQuestion: string;
  score: number;
}

export async function loadFaqEntries(path: string = DEFAULT_FAQ_PATH): Promise<FaqEntry[]> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
  return z.array(FaqEntrySchema).parse(raw);
}

export function searchFaq(entries: FaqEntry[], query: string): FaqMatch | null {
  const q = query.trim().toLowerCase();
  if (q === '') return null;

  let best: FaqEntry | null = null;
  let bestScore = 0;
  for (const entry of entries) {
    const question = entry.question.toLowerCase();
    const score =
      question.includes(q) || q.includes(question) ? CONTAINMENT_SCORE : overlapScore(q, question);
    if (score > bestScore) {
      best = entry;
      bestScore = score;
    }
  }

  if (!best || bestScore < MIN_SCORE) return null;
  return { answer: best.answer, matchedQuestion: best.question, score: bestScore };
}

export function createFaqToolkit(entries: FaqEntry[]): LocalToolkit {
  return {
    name: 'faq',
    tools: [
      {
        name: 'faq',
        description: 'Search the frequently asked questions for a ready-made answer to a common question.',
        inputSchema: {
          type: 'object',
          properties: {
            query: {
              type: 'string',
              description:
                'The question to look up. If no answer is found, try the retriever tool for longer documents.',
            },
          },
          required: ['query'],
        },
        handler: (args) => {
          const query = typeof args.query === 'string' ? args.query.trim() : '';
          if (!query) {
            throw new ToolExecutionError('faq', 'query is required');
          }
          const match = searchFaq(entries, query);
          if (!match) {
            return { answer: null, found: false, message: 'No matching answer was found in the FAQ.' };
          }
          return match;
        },
      },
    ],
  };
}
