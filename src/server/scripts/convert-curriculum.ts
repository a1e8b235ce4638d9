/**
 * Convert a curriculum PDF into its text and XML renderings
 *
 * Usage: npm run convert -- [<file.pdf>] [--structured]
 *
 * Without a path the document the Latest Pointer references is converted.
 */

import { getEnv } from '../config/env.js';
import { createPipelineServices } from '../config/serviceInitialization.js';
import { parseConvertArgs, UsageError } from './cliArgs.js';

async function convertCurriculum(): Promise<number> {
  const args = parseConvertArgs(process.argv.slice(2));
  const { store, converter } = createPipelineServices(getEnv());

  const pdfPath = args.pdfPath ?? (await store.readLatestPointer());
  if (!pdfPath) {
    console.error(`No PDF path given and no latest pointer at ${store.latestPointerPath}`);
    return 1;
  }
  if (!(await store.exists(pdfPath))) {
    console.error(`File not found: ${pdfPath}`);
    return 1;
  }

  if (args.structuredOnly) {
    const result = await converter.convert(pdfPath, { only: ['structured'] });
    console.log(result.structuredPath);
  } else {
    const result = await converter.convert(pdfPath);
    console.log(result.txtPath);
    console.log(result.xmlPath);
    console.log(result.structuredPath);
  }
  return 0;
}

convertCurriculum()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    if (error instanceof UsageError) {
      console.error(`${error.message}\nUsage: convert-curriculum [<file.pdf>] [--structured]`);
      process.exit(2);
    }
    console.error('❌ Conversion failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
