#!/usr/bin/env node
import 'dotenv/config';
import { existsSync } from 'node:fs';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { R2Channel } from './channel/r2-channel';
import { config } from './config';
import { errorMessage, isAgentError } from './core/errors';
import { Session } from './core/session';
import { LLMClient } from './llm/llm-base';
import { StreamProcessor } from './llm/stream-processor';
import { logger } from './observability/logger';
import { ScriptExecutor } from './sandbox/script-executor';
import { ActionDispatcher } from './tools/executor';
import { TerminalInput } from './ui/prompt';
import { TerminalRenderer } from './ui/terminal';

const DEFAULT_PROMPT = 'Analyze the main function logic.';

type CliOptions = {
  model: string;
  maxAttempts: number;
  timeout: number;
  thinking: boolean;
};

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('must be a positive integer');
  return n;
}

function fatal(message: string): never {
  console.error(chalk.bold.red(`Error: ${message}`));
  process.exit(1);
}

async function main(file: string, prompt: string, opts: CliOptions) {
  if (!existsSync(file)) fatal(`File not found: ${file}`);
  if (!config.openaiBaseUrl || !config.openaiApiKey) {
    fatal('.env file missing OPENAI_BASE_URL or OPENAI_API_KEY');
  }

  const renderer = new TerminalRenderer({ scriptPreviewChars: config.scriptOutputPreviewChars });
  renderer.notice('info', `Loading ${file} into radare2...`);

  let channel: R2Channel;
  try {
    channel = await R2Channel.open(file, { r2Path: config.r2Path });
  } catch (err) {
    fatal(`Failed to open file with r2: ${errorMessage(err)}`);
  }

  const processor = new StreamProcessor(
    new LLMClient({ apiKey: config.openaiApiKey, baseUrl: config.openaiBaseUrl }),
    renderer,
    {
      model: opts.model,
      reasoningBudget: opts.thinking ? config.thinkingBudgetTokens : undefined,
      maxAttempts: opts.maxAttempts,
      timeoutMs: opts.timeout
    }
  );
  const dispatcher = new ActionDispatcher({
    channel,
    scripts: new ScriptExecutor({ timeoutMs: config.scriptTimeoutMs }),
    renderer,
    maxResultChars: config.maxResultChars
  });
  const input = new TerminalInput();
  const session = new Session({ processor, dispatcher, input, renderer });

  try {
    await session.run(file, prompt);
  } catch (err) {
    logger.error('session failed', err);
    if (isAgentError(err, 'exhausted')) {
      renderer.notice('danger', err.message);
    } else {
      renderer.notice('danger', `Unexpected error: ${errorMessage(err)}`);
    }
    process.exitCode = 1;
  } finally {
    input.close();
    await channel.close();
  }
}

const program = new Command()
  .name('r2-pilot')
  .description('AI-driven reverse engineering with radare2 and JavaScript')
  .argument('<file>', 'path to the binary file to analyze')
  .argument('[prompt]', 'initial analysis instruction', DEFAULT_PROMPT)
  .option('-m, --model <name>', 'model name', config.openaiModel)
  .option('--max-attempts <n>', 'attempts per model call', positiveInt, config.llmMaxAttempts)
  .option('--timeout <ms>', 'per-attempt timeout in milliseconds', positiveInt, config.llmTimeoutMs)
  .option('--no-thinking', 'never send the reasoning-budget hint')
  .action(async (file: string, prompt: string, opts: CliOptions) => {
    await main(file, prompt, opts);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.bold.red(errorMessage(err)));
  process.exit(1);
});
