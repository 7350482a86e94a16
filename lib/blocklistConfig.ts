import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigError } from './errors';
import { createWhitelist } from './whitelist';
import { DEFAULT_FILE_NAMES } from './output';
import { LineRule, OutputFileNames, SourceDescriptor, WhitelistRule } from './types';

const LineRuleSchema: z.ZodType<LineRule> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('hostLine'), address: z.string().min(1) }),
  z.object({ kind: z.literal('domainList') }),
]);

const SourceSchema: z.ZodType<SourceDescriptor> = z.object({
  url: z
    .string()
    .url()
    .refine((u) => /^https?:\/\//i.test(u), 'source url must be http(s)'),
  rule: LineRuleSchema,
});

const WhitelistRuleSchema: z.ZodType<WhitelistRule> = z.object({
  kind: z.enum(['contains', 'prefix', 'suffix', 'equal', 'regex']),
  pattern: z.string().min(1),
});

const OutputSchema: z.ZodType<OutputFileNames> = z.object({
  plain: z.string().min(1),
  plainWithoutShortlinks: z.string().min(1),
  optimized: z.string().min(1),
  optimizedWithoutShortlinks: z.string().min(1),
});

export const BlocklistConfigSchema = z.object({
  sources: z.array(SourceSchema),
  shortlinks: z.array(z.string().min(1).transform((s) => s.toLowerCase())).default([]),
  whitelist: z.array(WhitelistRuleSchema).default([]),
  output: OutputSchema.default(DEFAULT_FILE_NAMES),
});

export type BlocklistConfig = z.infer<typeof BlocklistConfigSchema>;

/**
 * Validate an already-parsed config object. Whitelist regexes are compiled
 * here so a bad pattern fails before any download starts.
 */
export function parseBlocklistConfig(data: unknown): BlocklistConfig {
  const parsed = BlocklistConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`invalid blocklist config: ${issues.join('; ')}`);
  }
  createWhitelist(parsed.data.whitelist);
  return parsed.data;
}

export async function loadBlocklistConfig(file: string): Promise<BlocklistConfig> {
  let raw: string;
  try {
    raw = await readFile(file, 'utf8');
  } catch (err) {
    throw new ConfigError(`cannot read blocklist config ${file}`, { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`blocklist config ${file} is not valid JSON`, { cause: err });
  }
  return parseBlocklistConfig(data);
}
