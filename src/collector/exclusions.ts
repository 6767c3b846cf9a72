import fs from "fs";
import { z } from "zod";
import type { Source } from "../shared/record.js";

const exclusionsSchema = z.object({
  photoCreditPatterns: z.array(z.string().min(1)),
  sources: z.record(z.array(z.string().min(1)))
});

export type Exclusions = {
  photoCreditPatterns: string[];
  keywords: Record<Source, string[]>;
};

export const parseExclusions = (raw: unknown): Exclusions => {
  const parsed = exclusionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid exclusions config: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`);
  }
  const keywords: Record<Source, string[]> = {
    FoxNews: parsed.data.sources.FoxNews ?? [],
    NBC: parsed.data.sources.NBC ?? []
  };
  return { photoCreditPatterns: parsed.data.photoCreditPatterns, keywords };
};

export const loadExclusions = (filePath: string): Exclusions => {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Exclusions config not found: ${filePath}`);
  }
  const content = fs.readFileSync(filePath, "utf-8");
  return parseExclusions(JSON.parse(content));
};
