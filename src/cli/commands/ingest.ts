/**
 * Ingest Command
 *
 * Loads a folder of course documents into the index:
 *   cqa ingest               - Load documents.path from config.toml
 *   cqa ingest ./transcripts - Load a specific folder
 *   cqa ingest --clear       - Drop every indexed course first
 *
 * Courses whose title is already indexed are skipped. Malformed documents are
 * reported and skipped; the rest of the folder still loads.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { loadConfig, expandHome } from '../../config/index.js';
import { scanCourseDocuments, runIngestPipeline } from '../../indexer/index.js';
import { openCourseIndex } from '../../search/open.js';
import { CLIError } from '../../errors/index.js';

interface IngestCommandOptions {
  clear?: boolean;
}

interface IngestOutputJSON {
  path: string;
  documents: number;
  cleared: number;
  courses_added: number;
  chunks_added: number;
  skipped: string[];
  failed: Array<{ path: string; error: string }>;
  total_courses: number;
  embedding_model: string;
}

type Spinner = ReturnType<typeof import('ora').default>;

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

function displaySummary(ctx: CommandContext, output: IngestOutputJSON): void {
  ctx.log(
    `${chalk.green('✓')} Added ${plural(output.courses_added, 'course')} ` +
      `(${plural(output.chunks_added, 'chunk')}) from ${plural(output.documents, 'document')}`
  );

  if (output.skipped.length > 0) {
    ctx.log(chalk.dim(`Skipped ${output.skipped.length} already indexed:`));
    for (const path of output.skipped) {
      ctx.log(chalk.dim(`  ${path}`));
    }
  }

  if (output.failed.length > 0) {
    ctx.log(chalk.yellow(`${plural(output.failed.length, 'document')} could not be loaded`));
  }

  ctx.log('');
  ctx.log(chalk.dim(`${plural(output.total_courses, 'course')} indexed`));
}

/**
 * Create the ingest command
 */
export function createIngestCommand(getContext: () => CommandContext): Command {
  return new Command('ingest')
    .argument('[path]', 'Folder of course documents (default: documents.path)')
    .description('Load course documents into the index')
    .option('--clear', 'Delete every indexed course before loading')
    .action(async (pathArg: string | undefined, cmdOptions: IngestCommandOptions) => {
      const ctx = getContext();
      const config = loadConfig();

      const root = expandHome(pathArg ?? config.documents.path);
      ctx.debug(`Documents folder: ${root}`);

      const paths = await scanCourseDocuments(root);
      ctx.debug(`Found ${paths.length} document(s)`);

      if (paths.length === 0 && !cmdOptions.clear) {
        throw new CLIError(`No course documents found in ${root}`, 'Documents must be .txt or .md files');
      }

      let spinner: Spinner | null = null;
      if (!ctx.options.json && process.stdout.isTTY) {
        const ora = (await import('ora')).default;
        spinner = ora('Loading embedding model...').start();
      }

      let opened: Awaited<ReturnType<typeof openCourseIndex>>;
      try {
        opened = await openCourseIndex(config, {
          logger: ctx,
          onModelLoad: (progress) => {
            if (spinner) {
              const pct = progress.progress !== undefined ? ` (${progress.progress}%)` : '';
              spinner.text = `${progress.status}${pct}`;
            }
          },
        });
        spinner?.succeed(`Embedding model ready (${opened.embeddingModel})`);
      } catch (error) {
        spinner?.fail('Failed to load embedding model');
        throw error;
      }

      // First Ctrl+C stops after the current document
      const controller = new AbortController();
      const onInterrupt = (): void => controller.abort();
      process.once('SIGINT', onInterrupt);

      let cleared = 0;
      try {
        spinner?.start('Loading documents...');
        const result = await runIngestPipeline({
          index: opened.index,
          paths,
          chunking: { chunkSize: config.chunking.chunk_size, chunkOverlap: config.chunking.chunk_overlap },
          clearExisting: cmdOptions.clear,
          onCleared: (removed) => {
            cleared = removed;
            ctx.debug(`Cleared ${removed} course(s)`);
          },
          signal: controller.signal,
          onDocumentStart: (path, position, total) => {
            ctx.debug(`[${position}/${total}] ${path}`);
            if (spinner) {
              spinner.text = `Loading documents (${position}/${total})`;
            }
          },
          onEmbedProgress: (_path, embedded, total) => {
            if (spinner) {
              spinner.text = `Embedding chunks (${embedded}/${total})`;
            }
          },
          onWarning: (message) => {
            spinner?.clear();
            ctx.warn(message);
            spinner?.render();
          },
        });
        spinner?.stop();

        const output: IngestOutputJSON = {
          path: root,
          documents: paths.length,
          cleared,
          courses_added: result.coursesAdded,
          chunks_added: result.chunksAdded,
          skipped: result.skipped,
          failed: result.failed,
          total_courses: opened.index.getCourseCount(),
          embedding_model: opened.embeddingModel,
        };

        if (ctx.options.json) {
          console.log(JSON.stringify(output, null, 2));
        } else {
          displaySummary(ctx, output);
        }
      } catch (error) {
        spinner?.fail('Ingestion stopped');
        throw error;
      } finally {
        process.off('SIGINT', onInterrupt);
        opened.close();
      }
    });
}
