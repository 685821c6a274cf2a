/* eslint-disable no-console */
import { bootstrapResearch } from '../app/bootstrap';
import { saveResult } from '../core/output/saveResult';
import { ProgressUpdate } from '../core/research/research-types';
import { config } from '../shared/config/env';
import { errorMessage } from '../shared/errors/app-error';

const PREVIEW_CHARS = 500;

function printProgress(update: ProgressUpdate): void {
  console.log(`[${String(update.percent).padStart(3)}%] ${update.message}`);
}

async function main(): Promise<void> {
  const query = process.argv.slice(2).join(' ').trim();
  if (!query) {
    console.error('Error: please provide a research query');
    console.error('\nUsage: npm run research -- "Your research query"');
    process.exitCode = 1;
    return;
  }

  console.log(`Query: ${query}\n`);
  const pipeline = bootstrapResearch({ onProgress: printProgress });
  const result = await pipeline.research(query);

  console.log('\nResearch summary');
  console.log(`  Subagents used:    ${result.metadata.subagentsCount} (${result.metadata.failedSubagents} failed)`);
  console.log(`  Sources consulted: ${result.metadata.sourcesCount}`);
  console.log(`  Citations:         ${result.metadata.citationCount} (${result.metadata.bibliographySource})`);
  console.log(`  Duration:          ${result.metadata.durationSeconds.toFixed(2)}s`);
  console.log(`  Report length:     ${result.citedReport.length} characters`);

  const paths = await saveResult(result, config.OUTPUT_DIR);
  console.log('\nOutput files');
  console.log(`  Markdown: ${paths.markdown}`);
  console.log(`  JSON:     ${paths.json}`);
  console.log(`  HTML:     ${paths.html}`);

  const preview =
    result.citedReport.length > PREVIEW_CHARS ? `${result.citedReport.slice(0, PREVIEW_CHARS)}...` : result.citedReport;
  console.log(`\nReport preview\n${preview}`);
}

main().catch((error: unknown) => {
  console.error('[run-research] failed', errorMessage(error));
  process.exitCode = 1;
});
