import { parseGrammarSource } from '@/core/dsl';
import { defineGrammar } from '@/core/grammar';

export const PROGRAM_NAME = 'flagtree';

const CLI_GRAMMAR = `
/// Work with declarative command-line grammars.
cmd flagtree {
    /// Grammar file (.flags or .json); defaults to "grammar" in .flagtree.json.
    optional -g, --grammar file: string
    /// Directory searched for .flagtree.json.
    optional -C, --cwd dir: string
    /// Disable colored output.
    optional --no-color

    /// Validate the grammar and summarize it.
    cmd check { }

    /// Render help text for a command of the grammar.
    cmd help
        /// Subcommand path inside the grammar.
        repeated command: string
    { }

    /// Parse arguments against the grammar and print the result.
    cmd parse
        /// Arguments to parse; put them after \`--\` when they start with a dash.
        repeated args: path
    {
        /// Print the materialized flags as JSON.
        optional --json
        /// Split a whole command line with shell quoting rules instead.
        optional -c, --line line: string
    }

    /// Generate TypeScript declarations for the grammar.
    cmd codegen {
        /// File whose generated block is rewritten; defaults to "out" in .flagtree.json.
        optional -o, --out file: string
        /// Report a stale block instead of writing it.
        optional --check
    }

    /// Print the version.
    cmd version { }
}
`;

export const cliGrammar = defineGrammar(parseGrammarSource(CLI_GRAMMAR));
