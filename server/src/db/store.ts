import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { MAX_ITEMS, REVIEW_COUNT, isDateKey, type LearningEntry } from '@recall-curve/shared';

export interface EntryStore {
  load(): Promise<LearningEntry[]>;
  save(entries: LearningEntry[]): Promise<void>;
}

export class StoreCorruptError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreCorruptError';
  }
}

const dateKeySchema = z.string().refine(isDateKey, { message: 'Expected a YYYY-MM-DD date' });

const entrySchema = z.object({
  date: dateKeySchema,
  items: z
    .array(z.string())
    .min(1, { message: 'Expected at least one study item' })
    .max(MAX_ITEMS, { message: `Expected at most ${MAX_ITEMS} study items` }),
  reviews: z
    .array(
      z.object({
        dueDate: dateKeySchema,
        completed: z.boolean(),
      })
    )
    .length(REVIEW_COUNT, { message: `Expected exactly ${REVIEW_COUNT} reviews` }),
});

export const entriesSchema = z.array(entrySchema).superRefine((entries, ctx) => {
  const seen = new Set<string>();
  entries.forEach((entry, index) => {
    if (seen.has(entry.date)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'date'],
        message: `Duplicate entry for ${entry.date}`,
      });
    }
    seen.add(entry.date);
  });
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Entries persisted as one pretty-printed JSON array. Every load re-reads
 * the file and every save rewrites it whole.
 */
export class JsonFileEntryStore implements EntryStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<LearningEntry[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StoreCorruptError(`Data file ${this.filePath} is not valid JSON`, { cause: error });
    }

    const result = entriesSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? ` at ${issue.path.join('.') || '(root)'}: ${issue.message}` : '';
      throw new StoreCorruptError(`Data file ${this.filePath} has an unexpected shape${where}`);
    }
    return result.data;
  }

  async save(entries: LearningEntry[]): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(entries, null, 2), 'utf8');
    console.log(`[Store] Saved ${entries.length} entries to ${this.filePath}`);
  }
}

/**
 * In-process store. Hands out copies so callers cannot mutate stored state.
 */
export class MemoryEntryStore implements EntryStore {
  private entries: LearningEntry[];
  saveCount = 0;

  constructor(initial: LearningEntry[] = []) {
    this.entries = structuredClone(initial);
  }

  async load(): Promise<LearningEntry[]> {
    return structuredClone(this.entries);
  }

  async save(entries: LearningEntry[]): Promise<void> {
    this.entries = structuredClone(entries);
    this.saveCount++;
  }
}
