import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import * as readline from 'readline';
import { createSession } from './mastra/session/create-session';
import type { AgentResult } from './mastra/schemas';

function printTrace(result: AgentResult) {
  result.steps.forEach((step, i) => {
    console.log(`  [${i + 1}] ${step.tool ?? '(no tool)'} ← ${step.input}`);
    if (step.thought) console.log(`      thought: ${step.thought}`);
    console.log(`      ${step.ok ? 'observation' : 'error'}: ${step.observation.slice(0, 300)}`);
  });
}

async function main() {
  const args = process.argv.slice(2);
  const trace = args.includes('--trace');
  const files = args.filter((arg) => !arg.startsWith('--'));

  if (files.length === 0) {
    console.error('Usage: npm run ask -- [--trace] <file> [file...]');
    process.exit(1);
  }

  const session = createSession();

  console.log(`\nIngesting ${files.length} file(s)...\n`);
  const report = await session.ingest(
    files.map((file) => ({ name: path.basename(file), bytes: fs.readFileSync(file) })),
  );

  for (const entry of report.registered) {
    console.log(`  ✓ ${entry.name} → ${entry.toolName} (${entry.kind})`);
  }
  for (const entry of report.skipped) {
    console.log(`  ✗ ${entry.name}: ${entry.reason}`);
  }

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: '\nQuestion> ',
  });

  console.log('\nAsk a question about your files. Type "exit" to quit.');
  rl.prompt();

  for await (const line of rl) {
    const question = line.trim();
    if (['exit', 'quit'].includes(question.toLowerCase())) break;
    if (!question) {
      rl.prompt();
      continue;
    }

    const result = await session.ask(question);
    console.log(`\nAnswer: ${result.answer}`);
    if (trace) printTrace(result);
    rl.prompt();
  }

  rl.close();
}

main().catch((error) => {
  console.error('\nError:', error instanceof Error ? error.message : error);
  process.exit(1);
});
