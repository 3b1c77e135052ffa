/**
 * File Upload Example
 *
 * This example demonstrates:
 * - Uploading a local file through the session's file cache
 * - Reusing uploads already stored under the API key
 * - Asking a question about the uploaded file
 *
 * Usage:
 * ```bash
 * export GEMINI_API_KEY="your-api-key"
 * npx tsc
 * node dist/examples/files.js ./report.pdf
 * ```
 */

import { GemSession, GeminiError, getText } from '../src/index.js';

async function main(): Promise<void> {
  const path = process.argv[2];
  if (!path) {
    console.error('Usage: node dist/examples/files.js <path>');
    process.exitCode = 1;
    return;
  }

  const session = GemSession.builder().logLevel('info').build();

  // Pick up files uploaded by earlier runs so identical content is not sent again.
  await session.files.fetchList();
  console.log(`Known uploads: ${session.files.size}`);

  const fileData = await session.files.addFile(path);
  console.log(`Using ${fileData.fileUri}\n`);

  const response = await session.sendMessageWithFile('Summarize this file in five bullet points.', fileData);
  console.log(getText(response) ?? '(no text)');
}

main().catch((error: unknown) => {
  if (error instanceof GeminiError) {
    console.error(`${error.name} (${error.type}): ${error.message}`);
  } else {
    console.error('Unexpected error:', error);
  }
  process.exitCode = 1;
});
