/**
 * Streaming Example
 *
 * Prints a reply as it arrives, then continues the conversation with the
 * recorded answer in the history.
 *
 * Usage:
 * ```bash
 * export GEMINI_API_KEY="your-api-key"
 * npx tsc
 * node dist/examples/streaming.js
 * ```
 */

import { GemSession, Models, StreamAccumulator, getText } from '../src/index.js';

async function main(): Promise<void> {
  const session = GemSession.builder().model(Models.Gemini15Flash).logLevel('warn').build();
  const accumulator = new StreamAccumulator();

  const stream = await session.sendMessageStream(
    'Write a short story about a robot learning to paint. Keep it to 3 paragraphs.'
  );

  for await (const chunk of stream) {
    accumulator.add(chunk);
    process.stdout.write(getText(chunk) ?? '');
  }

  const combined = accumulator.build();
  console.log('\n\n--- Streaming Summary ---');
  console.log(`Chunks: ${accumulator.chunkCount}`);
  console.log(`Finish reason: ${combined.candidates?.[0]?.finishReason ?? 'unknown'}`);
  console.log(`Total tokens: ${combined.usageMetadata?.totalTokenCount ?? 0}`);

  // The streamed answer is part of the history now.
  const followUp = await session.sendMessage('Give the story a title.');
  console.log(`\nTitle: ${getText(followUp) ?? '(no text)'}`);
}

main().catch((error: unknown) => {
  console.error('Streaming failed:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
