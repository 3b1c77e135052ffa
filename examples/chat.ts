/**
 * Multi-turn Chat Example
 *
 * This example demonstrates:
 * - Building a session from environment variables (and `.env`)
 * - Sending several messages that share one conversation history
 * - Applying per-call settings
 *
 * Prerequisites:
 * - Set the GEMINI_API_KEY environment variable
 *
 * Usage:
 * ```bash
 * export GEMINI_API_KEY="your-api-key"
 * npx tsc
 * node dist/examples/chat.js
 * ```
 */

import { GemSession, Settings, getText, getUsageMetadata } from '../src/index.js';

async function main(): Promise<void> {
  console.log('=== Multi-turn Chat Example ===\n');

  const session = GemSession.builder().logLevel('warn').build();

  const settings = new Settings();
  settings.setSystemInstruction('You are a patient tutor. Answer in at most three sentences.');
  settings.setAllSafetySettings('BLOCK_ONLY_HIGH');
  settings.setTemperature(0.4);

  const questions = [
    'What is a prime number?',
    'Give me the first five of them.',
    'Why is 1 not in that list?',
  ];

  for (const question of questions) {
    console.log(`> ${question}`);
    const response = await session.sendMessage(question, { settings });
    console.log(`${getText(response) ?? '(no text)'}\n`);

    const usage = getUsageMetadata(response);
    if (usage) {
      console.log(`[tokens: ${usage.totalTokenCount ?? 0}]\n`);
    }
  }

  console.log(`History now holds ${session.context.length} turns.`);
}

main().catch((error: unknown) => {
  console.error('Chat failed:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
