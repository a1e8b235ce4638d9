/**
 * Download the curriculum PDF from the programme page
 *
 * Usage: npm run fetch -- [--url <page url>] [--out <file.pdf>]
 */

import { getEnv } from '../config/env.js';
import { createPipelineServices } from '../config/serviceInitialization.js';
import { parseFetchArgs, UsageError } from './cliArgs.js';

async function fetchCurriculum(): Promise<void> {
  const args = parseFetchArgs(process.argv.slice(2));
  const { fetcher } = createPipelineServices(getEnv());

  const result = await fetcher.fetch({ url: args.url, saveAs: args.out });
  console.log(result.pdfPath);
}

fetchCurriculum()
  .then(() => {
    process.exit(0);
  })
  .catch((error: unknown) => {
    if (error instanceof UsageError) {
      console.error(`${error.message}\nUsage: fetch-curriculum [--url <page url>] [--out <file.pdf>]`);
      process.exit(2);
    }
    console.error('❌ Fetch failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
