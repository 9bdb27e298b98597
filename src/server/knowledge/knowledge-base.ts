import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { errorMessage } from "@/lib/errors";
import { logger, logOperation } from "@/lib/logger";
import {
  keywordMatch,
  similarityRatio,
  symptomMatch,
  tokenCoverage,
  tokenize,
} from "./similarity";

const MetadataSchema = z
  .object({
    device_model: z.string().optional(),
    keywords: z.array(z.string()).optional(),
    symptoms: z.array(z.string()).optional(),
    title: z.string().optional(),
  })
  .passthrough();

const DocumentEntrySchema = z.object({
  content: z.string(),
  metadata: MetadataSchema.optional(),
});

// Some exports wrap a document in a list; the first element is the document.
const DocumentItemSchema = z.union([DocumentEntrySchema, z.array(DocumentEntrySchema)]);

const TroubleshootingEntrySchema = z.object({
  problem: z.string(),
  solution: z.string(),
  metadata: MetadataSchema.optional(),
});

const UsageGuideEntrySchema = z.object({
  title: z.string(),
  content: z.string(),
  metadata: MetadataSchema.optional(),
});

export type DocumentEntry = z.infer<typeof DocumentEntrySchema>;
export type TroubleshootingEntry = z.infer<typeof TroubleshootingEntrySchema>;
export type UsageGuideEntry = z.infer<typeof UsageGuideEntrySchema>;

export type KnowledgeBase = {
  documents: DocumentEntry[];
  troubleshooting: TroubleshootingEntry[];
  usageGuides: UsageGuideEntry[];
};

export type SolutionType = "troubleshooting" | "document" | "usage_guide";

export type Solution = {
  type: SolutionType;
  content: string;
  relevance: number;
};

const TROUBLESHOOTING_THRESHOLD = 0.2;
const DOCUMENT_THRESHOLD = 0.1;
const USAGE_THRESHOLD = 0.15;
const MIN_RESULTS_BEFORE_FALLBACK = 3;
const MAX_RESULTS = 5;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function loadEntries<T>(filePath: string, schema: z.ZodType<T>): Promise<T[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isMissingFile(err)) logger.warn(`File not found: ${filePath}`);
    else logger.error(`Error reading ${filePath}: ${errorMessage(err)}`);
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    logger.error(`Error parsing ${filePath}: ${errorMessage(err)}`);
    return [];
  }

  if (!Array.isArray(parsed)) {
    logger.error(`Error loading ${filePath}: expected a JSON array`);
    return [];
  }

  const entries: T[] = [];
  parsed.forEach((item: unknown, index) => {
    const result = schema.safeParse(item);
    if (result.success) {
      entries.push(result.data);
    } else {
      logger.warn(`Skipping invalid entry ${index} in ${filePath}`);
    }
  });
  return entries;
}

export async function loadKnowledgeBase(params: { dataDir: string }): Promise<KnowledgeBase> {
  const dataDir = path.resolve(params.dataDir);
  logOperation.start("knowledge", `Initializing knowledge base from ${dataDir}`);

  const [documentItems, troubleshooting, usageGuides] = await Promise.all([
    loadEntries(path.join(dataDir, "documents.json"), DocumentItemSchema),
    loadEntries(path.join(dataDir, "troubleshooting.json"), TroubleshootingEntrySchema),
    loadEntries(path.join(dataDir, "usage.json"), UsageGuideEntrySchema),
  ]);

  const documents: DocumentEntry[] = [];
  for (const item of documentItems) {
    if (!Array.isArray(item)) {
      documents.push(item);
    } else if (item.length > 0) {
      documents.push(item[0]);
    }
  }

  logOperation.complete(
    "knowledge",
    `Knowledge base initialized with ${documents.length} documents, ${troubleshooting.length} troubleshooting entries, ${usageGuides.length} usage guides`
  );

  return { documents, troubleshooting, usageGuides };
}

function searchTroubleshooting(
  kb: KnowledgeBase,
  model: string,
  problem: string,
  problemTokens: string[]
): Solution[] {
  const matches: Solution[] = [];

  for (const item of kb.troubleshooting) {
    const itemModel = item.metadata?.device_model ?? "";
    if (itemModel && itemModel !== model) continue;

    const keywords = (item.metadata?.keywords ?? []).map((k) => k.toLowerCase());
    const symptoms = (item.metadata?.symptoms ?? []).map((s) => s.toLowerCase());
    const content = `${item.problem} ${item.solution}`;

    const relevance =
      keywordMatch(problemTokens, keywords) * 0.4 +
      symptomMatch(problem, symptoms) * 0.3 +
      similarityRatio(problem, content) * 0.3;

    if (relevance > TROUBLESHOOTING_THRESHOLD) {
      matches.push({
        type: "troubleshooting",
        content: `Problem: ${item.problem}\n\nSolution: ${item.solution}`,
        relevance,
      });
    }
  }

  return matches;
}

function searchDocuments(kb: KnowledgeBase, model: string, problemTokens: string[]): Solution[] {
  const results: Solution[] = [];

  for (const doc of kb.documents) {
    const docModel = doc.metadata?.device_model ?? "";
    if (model && model !== "unknown" && docModel && docModel !== model) continue;

    const relevance = tokenCoverage(doc.content, problemTokens);
    if (relevance > DOCUMENT_THRESHOLD) {
      results.push({ type: "document", content: doc.content, relevance });
    }
  }

  return results.sort((a, b) => b.relevance - a.relevance).slice(0, MAX_RESULTS);
}

function searchUsageGuides(kb: KnowledgeBase, model: string, problem: string): Solution[] {
  const matches: Solution[] = [];

  for (const guide of kb.usageGuides) {
    const guideModel = guide.metadata?.device_model ?? "";
    if (guideModel && guideModel !== model) continue;

    const similarity = similarityRatio(problem, guide.content);
    if (similarity > USAGE_THRESHOLD) {
      matches.push({
        type: "usage_guide",
        content: `Guide: ${guide.title}\n\n${guide.content}`,
        relevance: similarity,
      });
    }
  }

  return matches;
}

export function describeSolutions(solutions: Solution[]): string {
  if (solutions.length === 0) return "No matches found in the knowledge base for this problem.";

  const count = solutions.length;
  if (solutions.some((s) => s.type === "troubleshooting")) {
    return `Found ${count} potential solutions to this problem in the knowledge base.`;
  }
  if (solutions.some((s) => s.type === "document")) {
    return `Found ${count} related entries in the technical documentation.`;
  }
  return `Found ${count} related entries in the knowledge base.`;
}

/**
 * Troubleshooting entries first; documents and then usage guides only while
 * fewer than three matches were found. Returns at most five, best first.
 */
export function findSolution(
  kb: KnowledgeBase,
  model: string,
  problemDescription: string
): { solutions: Solution[]; message: string } {
  logger.info(`Searching solution for model ${model} and problem: ${problemDescription.slice(0, 50)}...`);

  const problemTokens = tokenize(problemDescription);
  const solutions: Solution[] = [];

  solutions.push(...searchTroubleshooting(kb, model, problemDescription, problemTokens));

  if (solutions.length < MIN_RESULTS_BEFORE_FALLBACK) {
    solutions.push(...searchDocuments(kb, model, problemTokens));
  }

  if (solutions.length < MIN_RESULTS_BEFORE_FALLBACK) {
    solutions.push(...searchUsageGuides(kb, model, problemDescription));
  }

  solutions.sort((a, b) => b.relevance - a.relevance);
  const top = solutions.slice(0, MAX_RESULTS);

  return { solutions: top, message: describeSolutions(top) };
}

/** Numbered context block for the diagnosis prompt. */
export function formatSolutionsForPrompt(solutions: Solution[]): string {
  if (solutions.length === 0) {
    return "No exact matches in the knowledge base for this problem.";
  }

  return solutions
    .map(
      (s, i) =>
        `Solution ${i + 1} (Relevance: ${Math.round(s.relevance * 100)}%, Type: ${s.type}):\n${s.content}\n`
    )
    .join("\n");
}
