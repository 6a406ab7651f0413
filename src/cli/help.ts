/**
 * @fileoverview Detailed help text for docfacts CLI commands
 */

const HELP_TEXT = {
  main: `
docfacts - deterministic function facts and safe documentation injection

USAGE:
    docfacts <command> [options]

COMMANDS:
    discover <path>     List supported source files after ignore rules
    collect <path>      Collect per-function metadata
    apply <file>        Insert documentation for one function, atomically
    document <path>     Document many functions with a narrative template
    extract <path>      Export fenced documentation blocks
    lint <path>         Check documentation blocks for structural problems
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    -w, --workspace     Directory holding docfacts.config.yaml (default: cwd)
    --json              Machine-readable output on stdout
    --verbose           Debug logging on stderr

EXIT CODES:
    0  success
    1  rejected edits, lint findings or runtime errors
    2  invalid usage

Run 'docfacts help <command>' for details on a specific command.
`,

  discover: `
docfacts discover - List supported source files

USAGE:
    docfacts discover [path] [--json]

Walks <path> (default: workspace) and prints files with a registered
language adapter. Skips build and dependency directories, files git
ignores, and patterns from .docfactsignore at the repository root.
`,

  collect: `
docfacts collect - Collect per-function metadata

USAGE:
    docfacts collect <path> [--function <name>] [--json]

OPTIONS:
    --function <name>   Only functions with this name
    --json              Full metadata keyed by file, then name@line

Runs every registered collector (signature, dependencies, decorators,
type coverage, exceptions, complexity and, inside a git repository,
commit history and blame). A failing collector is recorded under
raw.<collector>_error and does not stop the others.
`,

  apply: `
docfacts apply - Insert documentation for one function

USAGE:
    docfacts apply <file> --line <n> --narrative <file> [--style flat|fenced] [--dry-run]

OPTIONS:
    --line <n>          1-based line where the declaration starts
    --narrative <file>  Text to use as the narrative part
    --style <style>     flat (labelled sections) or fenced (YAML block)
    --dry-run           Run both checks and report; leave the file as it is

The edit happens on a temp copy that is syntax-checked after the
narrative goes in and again after the facts go in. The original file is
replaced only when both checks pass.
`,

  document: `
docfacts document - Document many functions

USAGE:
    docfacts document <path> --narrative <file> [options]

OPTIONS:
    --narrative <file>  Narrative template; {name} and {signature} are filled in
    --style <style>     flat or fenced
    --undocumented      Skip functions that already have documentation
    --function <name>   Only this function (repeatable)
    --concurrency <n>   Files processed in parallel
    --dry-run           Run every check and report planned edits; write nothing

Functions within a file are edited bottom to top. Each file is handled
by a single worker.
`,

  extract: `
docfacts extract - Export fenced documentation blocks

USAGE:
    docfacts extract <path> [--format json|markdown] [--output <file>]

Prints every ---docfacts block found in function documentation.
Defaults to markdown, or json when --json is given.
`,

  lint: `
docfacts lint - Check documentation blocks

USAGE:
    docfacts lint <path> [--json]

Reports functions without documentation, documentation without a fenced
block, blocks whose YAML does not parse, missing what/deps/why/guardrails
keys, deps that is not a mapping and guardrails that is not a non-empty
list. Exits 1 when anything is found.
`,
} as const;

type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(value: string): value is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, value);
}

export function getHelpText(command?: string): string {
  if (command && isHelpTopic(command)) {
    return HELP_TEXT[command];
  }
  return HELP_TEXT.main;
}

export function showHelp(command?: string): void {
  console.log(getHelpText(command));
}
