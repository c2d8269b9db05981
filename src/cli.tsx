#!/usr/bin/env node
import { randomUUID } from 'node:crypto';

import { Command, InvalidArgumentError, Option } from 'commander';
import { render } from 'ink';

import { ShellAgent } from './agent/shell-agent.js';
import { EXECUTION_MODES, type ExecutionMode } from './admission/types.js';
import { loadConfig, type ShellgateConfig } from './config/index.js';
import { IpcClient } from './ipc/client.js';
import { createLogger } from './logging/logger.js';
import { App, ConfirmationBroker } from './ui/index.js';

const VERSION = '0.1.0';

interface AgentCommandOptions {
  socket?: string;
  shell?: string;
  headless?: boolean;
}

interface ExecCommandOptions {
  mode: ExecutionMode;
  timeout?: number;
  socket?: string;
  retries: number;
}

interface ResizeCommandOptions {
  socket?: string;
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('shellgate')
    .description('Gated execution of controller-issued commands in a shared terminal.')
    .version(VERSION);

  program
    .command('agent')
    .description('Start the shell agent and its confirmation surface')
    .option('--socket <path>', 'Unix socket to listen on')
    .option('--shell <path>', 'Shell executable to spawn')
    .option('--headless', 'Run without the terminal UI; gated commands are denied')
    .action(async (options: AgentCommandOptions) => {
      await runAgent(options);
    });

  program
    .command('exec')
    .description('Submit one command to a running agent')
    .argument('<command>', 'Shell command line to run')
    .addOption(
      new Option('--mode <mode>', 'Execution mode')
        .choices([...EXECUTION_MODES])
        .default('autonomous'),
    )
    .option('--timeout <seconds>', 'Seconds to wait for the command', parsePositiveNumber)
    .option('--socket <path>', 'Unix socket of the agent')
    .option('--retries <count>', 'Connection attempts before giving up', parsePositiveInteger, 5)
    .action(async (command: string, options: ExecCommandOptions) => {
      await runExec(command, options);
    });

  program
    .command('resize')
    .description('Resize the agent terminal')
    .argument('<cols>', 'Columns', parsePositiveInteger)
    .argument('<rows>', 'Rows', parsePositiveInteger)
    .option('--socket <path>', 'Unix socket of the agent')
    .action(async (cols: number, rows: number, options: ResizeCommandOptions) => {
      await runResize(cols, rows, options);
    });

  await program.parseAsync(process.argv);
}

async function runAgent(options: AgentCommandOptions): Promise<void> {
  const baseConfig = loadConfig();
  const config: ShellgateConfig = {
    ...baseConfig,
    socketPath: options.socket ?? baseConfig.socketPath,
    shellPath: options.shell ?? baseConfig.shellPath,
  };

  const logger = createLogger({
    level: config.logLevel,
    destination: options.headless ? 'stderr' : config.logFile,
  });

  const broker = options.headless ? undefined : new ConfirmationBroker();
  const agent = new ShellAgent({ config, logger, confirmations: broker });
  await agent.start();
  logger.info('Agent listening', { socketPath: config.socketPath, headless: Boolean(options.headless) });

  if (!broker) {
    await waitForSignal();
    await agent.stop();
    return;
  }

  const instance = render(<App agent={agent} broker={broker} />, { exitOnCtrlC: false });
  await instance.waitUntilExit();
  await agent.stop();
}

async function runExec(command: string, options: ExecCommandOptions): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, destination: 'stderr' });
  const socketPath = options.socket ?? config.socketPath;

  const client = await IpcClient.connectWithRetry(
    socketPath,
    { attempts: options.retries },
    { logger },
  );

  try {
    const result = await client.submitExecution({
      id: randomUUID(),
      command,
      mode: options.mode,
      timeoutMs:
        options.timeout === undefined ? config.defaultTimeoutMs : Math.round(options.timeout * 1000),
    });

    if (result.stdout.length > 0) {
      process.stdout.write(result.stdout.endsWith('\n') ? result.stdout : `${result.stdout}\n`);
    }

    if (result.status !== 'completed') {
      console.error(`${result.status}: ${result.reason ?? result.stderr}`);
      process.exitCode = 1;
      return;
    }

    process.exitCode = result.exitCode ?? 0;
  } finally {
    client.close();
  }
}

async function runResize(cols: number, rows: number, options: ResizeCommandOptions): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, destination: 'stderr' });
  const client = await IpcClient.connect(options.socket ?? config.socketPath, { logger });

  try {
    await client.resize(cols, rows);
  } finally {
    client.close();
  }
}

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      process.off('SIGINT', done);
      process.off('SIGTERM', done);
      resolve();
    };
    process.once('SIGINT', done);
    process.once('SIGTERM', done);
  });
}

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
}

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
