/**
 * Keyword retrieval over the knowledge base (data/knowledge-base.json).
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ToolExecutionError, type LocalToolkit } from '@toolweave/shared';
import { overlapScore } from './text-match.js';

export const DEFAULT_KNOWLEDGE_BASE_PATH = fileURLToPath(new URL('../../data/knowledge-base.json', import.meta.url));
export const DEFAULT_TOP_K = 3;

const DocumentSchema = z.object({
  id: z.string(),
  title: z.string(),
  content: z.string(),
  category: z.string(),
});

export type KnowledgeDocument = z.infer<typeof DocumentSchema>;

export interface RetrievedDocument extends KnowledgeDocument {
  score: number;
}

export interface RetrievalResult {
  query: string;
  results: RetrievedDocument[];
  totalFound: number;
  message?: string;
}

const ArgsSchema = z.object({
  query: z.string().trim().min(1, 'query is required'),
  top_k: z.number().int().positive().default(DEFAULT_TOP_K),
});

export async function loadKnowledgeBase(path: string = DEFAULT_KNOWLEDGE_BASE_PATH): Promise<KnowledgeDocument[]> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
  return z.array(DocumentSchema).parse(raw);
}

function scoreDocument(doc: KnowledgeDocument, query: string): number {
  if (doc.content.toLowerCase().includes(query)) return 0.8;
  if (doc.title.toLowerCase().includes(query)) return 0.6;
  return overlapScore(query, `${doc.title} ${doc.content}`) * 0.5;
}

export function searchDocuments(docs: KnowledgeDocument[], query: string, topK = DEFAULT_TOP_K): RetrievalResult {
  const q = query.trim().toLowerCase();
  const results = docs
    .map((doc) => ({ ...doc, score: scoreDocument(doc, q) }))
    .filter((doc) => doc.score > 0.2)
    .sort((a, b) => b.score - a.score)
    .slice(0, topK);

  if (results.length === 0) {
    return { query, results: [], totalFound: 0, message: 'No relevant documents were found.' };
  }
  return { query, results, totalFound: results.length };
}

export function createRetrieverToolkit(docs: KnowledgeDocument[]): LocalToolkit {
  return {
    name: 'retriever',
    tools: [
      {
        name: 'retriever',
        description: 'Search the knowledge base for guides and articles. Use it for details the FAQ does not cover.',
        inputSchema: {
          type: 'object',
          properties: {
            query: { type: 'string', description: 'What to search for' },
            top_k: { type: 'integer', description: 'Number of documents to return (default 3)', default: DEFAULT_TOP_K },
          },
          required: ['query'],
        },
        handler: (args) => {
          const parsed = ArgsSchema.safeParse(args);
          if (!parsed.success) {
            throw new ToolExecutionError('retriever', parsed.error.issues.map((i) => i.message).join('; '));
          }
          return searchDocuments(docs, parsed.data.query, parsed.data.top_k);
        },
      },
    ],
  };
}
