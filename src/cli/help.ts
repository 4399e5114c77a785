/**
 * @fileoverview Detailed help text for workbench CLI commands
 */

const HELP_TEXT = {
  main: `
Workbench CLI - Reachability analysis of hybrid-system biology models

USAGE:
    workbench <command> [options]

COMMANDS:
    run <model>              Load a model and run the analysis workflow
    reason <goal>            Reason about the reachability of a goal
    help [command]           Show help for a command

GLOBAL OPTIONS:
    -h, --help               Show help information
    -v, --version            Show version information
    -c, --config <path>      Configuration file (YAML or JSON)
    --json                   Print results and errors as JSON

ERROR HANDLING:
    With --json, errors are printed as a structured envelope:
    {
      "error": {
        "code": "ETOOL",            // Machine-readable error code
        "message": "...",           // Human-readable description
        "retryable": true,          // Worth retrying unchanged?
        "recoveryHints": [...],     // Suggested recovery actions
        "context": { ... }          // Additional error context
      }
    }

    Exit codes:
    - 0: success
    - 1: workflow finished with failed tasks, or an unexpected error
    - 2: invalid arguments
    - 3: invalid configuration
    - 4: invalid input (descriptor, snapshot, names)
    - 5: external tool failure
    - 6: timeout

EXAMPLES:
    workbench run examples/psoriasis_model.yaml
    workbench run examples/psoriasis_model.yaml --optimize --save baseline
    workbench reason remission_365 --model examples/psoriasis_model.yaml

For more information on a specific command, run:
    workbench help <command>
`,

  run: `
workbench run - Load a model and run the analysis workflow

USAGE:
    workbench run <model-file> [options]

OPTIONS:
    --goal <name>            Goal to analyse (default: the model's first goal)
    --workflow <name>        Workflow name prefix (default: comprehensive)
    --optimize               Append an optimization task
    --paths <n>              Simulated trajectories
    --depth <n>              Simulation depth
    --precision <p>          Verifier precision
    --focus <names>          Comma-separated atoms to stimulate after the run
    --top <n>                Important atoms to report (default: 10)
    --save <name>            Save the resulting state as a named snapshot
    --export <path>          Write the resulting state to a JSON file
    --json                   Print the report as JSON

DESCRIPTION:
    Builds the simulate -> verify -> analyze (-> optimize) workflow for the
    model, executes it with the configured tools and reports task outcomes,
    the goal's truth value and the most important atoms.

EXAMPLES:
    workbench run examples/psoriasis_model.yaml
    workbench run model.json --goal reach_steady --paths 500 --json
`,

  reason: `
workbench reason - Reason about the reachability of a goal

USAGE:
    workbench reason <goal> (--model <file> | --snapshot <name>) [options]

OPTIONS:
    -m, --model <file>       Load a model descriptor (YAML or JSON)
    --snapshot <name>        Restore a named snapshot, e.g. one saved by run --save
    --mode <mode>            Evidence combination: independent (default) | joint
    --json                   Print the assessment as JSON

DESCRIPTION:
    Combines the propagated confidence of the model's parameters with the
    goal's current truth value. No external tool is run.

EXAMPLES:
    workbench reason remission_365 --model examples/psoriasis_model.yaml
    workbench reason remission_365 --snapshot baseline --mode joint --json
`,

  help: `
workbench help - Show help information

USAGE:
    workbench help [command]
`,
};

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(value: string): value is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, value);
}

export function showHelp(command?: string): void {
  if (command && !isHelpTopic(command)) {
    console.log(`Unknown command: ${command}`);
  }
  console.log(getCommandHelp(command ?? 'main'));
}

export function getCommandHelp(command: string): string {
  return isHelpTopic(command) ? HELP_TEXT[command] : HELP_TEXT.main;
}
