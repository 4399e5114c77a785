#!/usr/bin/env node
/**
 * @fileoverview Workbench CLI
 *
 * Commands:
 *   workbench run <model-file>                 - Load a model and run the analysis workflow
 *   workbench reason <goal> --model <file>     - Reason about the reachability of a goal
 *   workbench help [command]                   - Show help information
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { showHelp } from './help.js';
import { runCommand } from './commands/run.js';
import { reasonCommand } from './commands/reason.js';
import {
  classifyError,
  createErrorEnvelope,
  formatErrorJson,
  formatErrorWithHints,
  getExitCode,
  type ErrorEnvelope,
} from './errors.js';

type Command = 'run' | 'reason' | 'help';

const COMMANDS: Record<Command, { description: string; usage: string }> = {
  'run': {
    description: 'Load a model and run the analysis workflow',
    usage: 'workbench run <model-file> [--goal <name>] [--optimize] [--save <name>] [--export <path>]',
  },
  'reason': {
    description: 'Reason about the reachability of a goal',
    usage: 'workbench reason <goal> (--model <file> | --snapshot <name>) [--mode independent|joint]',
  },
  'help': {
    description: 'Show help information',
    usage: 'workbench help [command]',
  },
};

function isCommand(value: string): value is Command {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

/**
 * Output a structured error for agent consumption
 */
function outputStructuredError(envelope: ErrorEnvelope, useJson: boolean): void {
  if (useJson) {
    console.error(formatErrorJson(envelope));
  } else {
    console.error(formatErrorWithHints(envelope));
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Global options only; each command parses its own arguments strictly.
  const { values, positionals, tokens } = parseArgs({
    args,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
      config: { type: 'string', short: 'c' },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: false,
    tokens: true,
  });

  if (values.version === true) {
    const { WORKBENCH_VERSION } = await import('../index.js');
    console.log(`workbench ${WORKBENCH_VERSION.string}`);
    return;
  }

  const command = positionals[0];
  const jsonMode = values.json === true;
  const configPath = typeof values.config === 'string' ? values.config : undefined;

  if (values.help === true || command === undefined || command === 'help') {
    showHelp(command === 'help' ? positionals[1] : undefined);
    return;
  }

  if (!isCommand(command)) {
    const envelope = createErrorEnvelope('EINVALID_ARGUMENT', `Unknown command: ${command}`, {
      recoveryHints: [
        `Run 'workbench help' for usage information`,
        `Available commands: ${Object.keys(COMMANDS).join(', ')}`,
      ],
      context: { command },
    });
    outputStructuredError(envelope, jsonMode);
    process.exitCode = getExitCode(envelope);
    return;
  }

  // Everything except the command word goes to the command's own parser.
  const commandToken = tokens.find((token) => token.kind === 'positional');
  const commandArgs = args.filter((_, index) => index !== commandToken?.index);

  try {
    switch (command) {
      case 'run':
        await runCommand({ args: commandArgs, configPath, json: jsonMode });
        break;
      case 'reason':
        await reasonCommand({ args: commandArgs, configPath, json: jsonMode });
        break;
      case 'help':
        showHelp();
        break;
    }
  } catch (error) {
    const envelope = classifyError(error);
    if (envelope.context) {
      envelope.context.command = command;
    }
    outputStructuredError(envelope, jsonMode);
    process.exitCode = getExitCode(envelope);
  }
}

main().catch((error) => {
  const jsonMode = process.argv.includes('--json');
  const envelope = classifyError(error);
  outputStructuredError(envelope, jsonMode);
  process.exitCode = getExitCode(envelope);
});
