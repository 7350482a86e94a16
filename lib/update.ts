import { writeFile } from 'fs/promises';
import path from 'path';
import { loadBlocklistConfig } from './blocklistConfig';
import { CONFIG } from './config';
import { FetchRetryOptions } from './net/fetchWithRetry';
import { buildVariants, BlocklistVariants, writeBlocklists, WriteResult } from './output';
import { runPipeline, PipelineResult } from './pipeline';
import { createExistenceVerifier, ExistenceVerifier } from './resolver';
import { createWhitelist } from './whitelist';
import { register, setDomainCount } from './metrics';
import logger from './logger';

export interface UpdateOptions {
  configFile?: string;
  outDir?: string;
  metricsFile?: string | null;
  fetch?: FetchRetryOptions;
  verifier?: ExistenceVerifier;
  concurrency?: number;
  bufferSize?: number;
}

export interface UpdateResult {
  pipeline: PipelineResult;
  variants: BlocklistVariants;
  written: WriteResult[];
}

/**
 * One full run: load config, run the pipeline, write the four lists and,
 * when asked, the metrics textfile. Only a broken config file throws.
 */
export async function runUpdate(opts?: UpdateOptions): Promise<UpdateResult> {
  const configFile = path.resolve(opts?.configFile ?? CONFIG.BLOCKLIST_CONFIG);
  const config = await loadBlocklistConfig(configFile);
  logger.info(
    { configFile, sources: config.sources.length, whitelist: config.whitelist.length },
    'blocklist config loaded',
  );

  const pipeline = await runPipeline({
    sources: config.sources,
    whitelist: createWhitelist(config.whitelist),
    fetch: opts?.fetch,
    verifier: opts?.verifier ?? createExistenceVerifier(),
    concurrency: opts?.concurrency,
    bufferSize: opts?.bufferSize,
  });

  const variants = buildVariants(pipeline.finalDomains, config.shortlinks);
  setDomainCount('final', variants.plainWithoutShortlinks.length);
  setDomainCount('optimized', variants.optimizedWithoutShortlinks.length);

  const written = await writeBlocklists(variants, opts?.outDir ?? CONFIG.OUTPUT_DIR, config.output);

  const metricsFile = opts?.metricsFile !== undefined ? opts.metricsFile : CONFIG.METRICS_FILE;
  if (metricsFile) {
    try {
      await writeFile(metricsFile, await register.metrics(), 'utf8');
    } catch (err) {
      logger.error({ err, metricsFile }, 'failed to write metrics file');
    }
  }

  return { pipeline, variants, written };
}

export default runUpdate;
