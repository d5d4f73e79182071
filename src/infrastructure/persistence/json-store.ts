import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { z } from 'zod/v4';

export class JsonStoreError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly issues: unknown[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'JsonStoreError';
  }
}

/**
 * Typed JSON file access validated against Zod schemas.
 */
export const JsonStore = {
  /**
   * Read a JSON file and validate against schema.
   * @throws JsonStoreError if the file is missing, unreadable, not JSON, or fails validation
   */
  read<T>(path: string, schema: z.ZodType<T>): T {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
      const reason = err instanceof SyntaxError ? 'Invalid JSON' : 'Failed to read file';
      throw new JsonStoreError(`${reason}: ${path}`, path, [], { cause: err });
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      const summary = result.error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
      throw new JsonStoreError(summary, path, result.error.issues);
    }
    return result.data;
  },

  /**
   * Validate data and write it as pretty-printed JSON.
   * Creates parent directories if they don't exist.
   */
  write<T>(path: string, data: T, schema: z.ZodType<T>): void {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new JsonStoreError(`Validation failed before write: ${path}`, path, result.error.issues);
    }

    mkdirSync(dirname(path), { recursive: true });
    try {
      writeFileSync(path, JSON.stringify(result.data, null, 2) + '\n', 'utf-8');
    } catch (err) {
      throw new JsonStoreError(`Failed to write file: ${path}`, path, [], { cause: err });
    }
  },

  exists(path: string): boolean {
    return existsSync(path);
  },
};
