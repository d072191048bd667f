/**
 * Murabaha Financing Advisor - Entry Point
 *
 * Runs the advisor agent on a customer request and prints its advice.
 *
 * Usage:
 *   npm run advisor -- "<request>"   # Run with OpenRouter (requires API key)
 *   npm run advisor:mock             # Run with mock LLM (deterministic)
 *
 * @see ./agent.ts - The loop
 */

import 'dotenv/config';
import { config } from 'dotenv';

// Load .env.local if it exists
config({ path: '.env.local' });

import { agent, FINANCING_ADVISOR_PROMPT } from './agent.js';
import { errorMessage } from './financing/index.js';
import { createClient } from './llm/index.js';
import { allTools, parseAdvice } from './tools/index.js';
import { EventStore } from './state/index.js';

function heading(title: string): void {
  console.log('\n' + '='.repeat(60));
  console.log(title);
  console.log('='.repeat(60));
}

async function main(): Promise<void> {
  const task =
    process.argv[2] ||
    'I want to buy a Land Cruiser worth 350,000 AED with 100,000 AED down over 4 years. What will I pay each month?';

  // Set EVENT_LOG to persist the audit trail as JSON Lines
  const eventStore = new EventStore(process.env.EVENT_LOG);

  try {
    const llm = createClient();

    const result = await agent(task, allTools, llm, {
      systemPrompt: FINANCING_ADVISOR_PROMPT,
      eventStore,
      maxIterations: 15,
      verbose: true,
    });

    heading('ADVICE');

    const advice = parseAdvice(result);
    if (advice) {
      console.log(`\n${advice.summary}`);
      if (advice.vehicleType) {
        console.log(`Vehicle type: ${advice.vehicleType}`);
      }
      if (advice.monthlyInstalmentAed !== undefined) {
        console.log(`Monthly instalment: ${advice.monthlyInstalmentAed.toFixed(2)} AED`);
      }
      console.log(`Confidence: ${(advice.confidence * 100).toFixed(0)}%`);
    } else {
      console.log('\nRaw result:');
      console.log(result);
    }

    heading('EVENT LOG SUMMARY');
    console.log(eventStore.getSummary());
    console.log('\n' + '='.repeat(60));
  } catch (error) {
    await eventStore.append({
      type: 'error_occurred',
      error: errorMessage(error),
      recoverable: false,
    });

    console.error('Error:', error);
    console.log('\nEvent Log:');
    console.log(eventStore.getSummary());
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error('Fatal:', error);
  process.exitCode = 1;
});
