import { readFile } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

export const LexiconSchema = z.object({
  terms: z.array(z.string().min(1)),
  synonyms: z.array(
    z.object({
      colloquial: z.string().min(1),
      canonical: z.string().min(1),
    }),
  ),
});

export type Lexicon = z.infer<typeof LexiconSchema>;

export const PassageSchema = z.object({
  id: z.string(),
  title: z.string(),
  content: z.string(),
  source: z.string(),
  source_type: z.enum(["pubmed", "guideline", "drugbank", "knowledge_graph", "clinical_trial", "who", "other"]),
  pmid: z.string().optional(),
  doi: z.string().optional(),
  url: z.string().optional(),
  year: z.string().optional(),
  keywords: z.array(z.string()).default([]),
  confidence: z.number().min(0).max(1).optional(),
});

export type Passage = z.infer<typeof PassageSchema>;

export const CannedTopicSchema = z.object({
  topic: z.string(),
  keywords: z.array(z.string().min(1)).min(1),
  answer: z.string().min(1),
});

export type CannedTopic = z.infer<typeof CannedTopicSchema>;

export const QueryExampleSchema = z.object({
  id: z.number().int(),
  query: z.string(),
  category: z.string(),
});

export type QueryExample = z.infer<typeof QueryExampleSchema>;

export async function loadDataFile<T>(dataDir: string, fileName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const resolved = path.resolve(process.cwd(), dataDir, fileName);
  const raw = await readFile(resolved, "utf8");
  const parsed = schema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`invalid data file ${resolved}: ${parsed.error.message}`);
  }
  return parsed.data;
}

export type DataFiles = {
  lexicon: Lexicon;
  passages: Passage[];
  cannedTopics: CannedTopic[];
  queryExamples: QueryExample[];
};

export async function loadDataFiles(dataDir: string): Promise<DataFiles> {
  const [lexicon, passages, cannedTopics, queryExamples] = await Promise.all([
    loadDataFile(dataDir, "lexicon.json", LexiconSchema),
    loadDataFile(dataDir, "passages.json", z.array(PassageSchema)),
    loadDataFile(dataDir, "canned-answers.json", z.array(CannedTopicSchema)),
    loadDataFile(dataDir, "query-examples.json", z.array(QueryExampleSchema)),
  ]);
  return { lexicon, passages, cannedTopics, queryExamples };
}
