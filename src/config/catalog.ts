import fs from 'node:fs';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('catalog');

const catalogEntrySchema = z.object({
  name: z.string().min(1),
  provider: z.enum(['anthropic', 'minimax']),
  modelId: z.string().min(1),
  supportedLanguages: z.array(z.string().min(1)),
  supportedTasks: z.array(z.string().min(1)),
  maxComplexity: z.number().int().min(1).max(5),
  maxTokens: z.number().int().positive(),
  costPerToken: z.number().nonnegative(),
});

const catalogFileSchema = z.object({
  providers: z.array(catalogEntrySchema).min(1),
});

export type CatalogEntry = z.infer<typeof catalogEntrySchema>;

/**
 * Reads the provider catalog handed to the registry at construction time.
 * Order in the file is registration order, which decides selection ties.
 */
export function loadCapabilityCatalog(catalogPath: string): CatalogEntry[] {
  const raw = fs.readFileSync(catalogPath, 'utf-8');
  const parsed = catalogFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid capability catalog ${catalogPath}: ${issues}`);
  }

  const seen = new Set<string>();
  for (const entry of parsed.data.providers) {
    if (seen.has(entry.name)) {
      throw new Error(`Duplicate provider "${entry.name}" in ${catalogPath}`);
    }
    seen.add(entry.name);
  }

  log.info(`Loaded ${parsed.data.providers.length} providers from catalog`);
  return parsed.data.providers;
}
