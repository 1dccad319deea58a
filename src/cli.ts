#!/usr/bin/env node

/**
 * CLI entry point for cst-tree
 *
 * Usage:
 *   cst-tree <file> [options]
 *   npx cst-tree src/main.c --rename count=total
 *
 * Parses a source file into a concrete syntax tree, optionally rewrites it,
 * and prints the reconstructed source (or a report) to stdout.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import {
  parseTree, stripComments, renameWord, formatPosition,
  isGroup, isToken, tokenOfType, TokenNode, TreeError,
  type Node, type NodeTest, type SourceFileNode,
} from './index.js';

export interface CliOptions {
  help?: boolean;
  version?: boolean;
  check?: boolean;
  stats?: boolean;
  find?: string;
  stripComments?: boolean;
  rename?: { from: string; to: string };
}

/** Where the CLI writes. Defaults to the process streams. */
export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export class UsageError extends Error {}

const version = '0.1.0';

const defaultIO: CliIO = {
  out: text => process.stdout.write(text),
  err: text => process.stderr.write(text),
};

function helpText(): string {
  return `
cst-tree v${version}

USAGE:
  cst-tree <file> [options]

DESCRIPTION:
  Parse a source file into a lossless concrete syntax tree and print the
  source rebuilt from its tokens, after any requested rewrites.

OPTIONS:
  -h, --help                     Show this help message
  -v, --version                  Show version number

      --check                    Verify the file round-trips unchanged
      --stats                    Print token and group counts as JSON
      --find <kind>              List nodes of a kind ("group", "source_file")
                                 or tokens of a type ("word", "comment", ...)

      --strip-comments           Remove all comments
      --rename <from>=<to>       Rename every word token spelled <from>

EXAMPLES:
  # Confirm the tree reproduces the file exactly
  cst-tree src/main.c --check

  # List every comment with its position
  cst-tree src/main.c --find comment

  # Rename an identifier and drop comments
  cst-tree src/main.c --rename count=total --strip-comments
`;
}

export function parseArgs(args: string[]): { filePath: string | null; options: CliOptions } {
  const options: CliOptions = {};
  let filePath: string | null = null;

  function value(flag: string, index: number): string {
    const next = args[index];
    if (next === undefined || next.startsWith('-')) {
      throw new UsageError(`Missing value for ${flag}`);
    }
    return next;
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '-h' || arg === '--help') {
      options.help = true;
    } else if (arg === '-v' || arg === '--version') {
      options.version = true;
    } else if (arg === '--check') {
      options.check = true;
    } else if (arg === '--stats') {
      options.stats = true;
    } else if (arg === '--find') {
      options.find = value(arg, ++i);
    } else if (arg === '--strip-comments') {
      options.stripComments = true;
    } else if (arg === '--rename') {
      options.rename = parseRename(value(arg, ++i));
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (!filePath) {
      // First non-flag argument is the file path
      filePath = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  return { filePath, options };
}

function parseRename(spec: string): { from: string; to: string } {
  const match = spec.match(/^([A-Za-z_$][\w$]*)=([A-Za-z_$][\w$]*)$/);
  if (!match) {
    throw new UsageError(`Invalid --rename value: ${spec} (expected <from>=<to>)`);
  }
  return { from: match[1], to: match[2] };
}

/** Matches nodes by kind, and tokens by type. */
function kindTest(kind: string): NodeTest {
  return (node: Node): node is Node =>
    node.kind === kind || (node instanceof TokenNode && node.type === kind);
}

function describeMatch(node: Node): string {
  const label = node instanceof TokenNode ? node.type : node.kind;
  return `${formatPosition(node.getSourcePosition())} ${label} ${JSON.stringify(node.toString())}`;
}

/** Newline-terminated lines, plus an unterminated last line if any. */
function countLines(source: string): number {
  if (source === '') return 0;
  const breaks = source.split('\n').length - 1;
  return source.endsWith('\n') ? breaks : breaks + 1;
}

function collectStats(filePath: string, source: string, root: SourceFileNode): Record<string, unknown> {
  const tokens = root.find(isToken);
  return {
    file: filePath,
    characters: source.length,
    lines: countLines(source),
    tokens: tokens.length,
    trivia: tokens.filter(token => token.isTrivia()).length,
    comments: root.find(tokenOfType('comment')).length,
    groups: root.find(isGroup).length,
  };
}

/** Run the CLI against `args` and return the process exit code. */
export function run(args: string[], io: CliIO = defaultIO, cwd: string = process.cwd()): number {
  if (args.length === 0) {
    io.out(helpText());
    return 0;
  }

  let filePath: string | null;
  let options: CliOptions;
  try {
    ({ filePath, options } = parseArgs(args));
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.err(`Error: ${error.message}\nRun with --help to see available options\n`);
    return 1;
  }

  if (options.help) {
    io.out(helpText());
    return 0;
  }

  if (options.version) {
    io.out(`${version}\n`);
    return 0;
  }

  if (!filePath) {
    io.err('Error: No input file specified\nUsage: cst-tree <file> [options]\n');
    return 1;
  }

  const absolutePath = path.resolve(cwd, filePath);
  if (!fs.existsSync(absolutePath)) {
    io.err(`Error: File not found: ${filePath}\n`);
    return 1;
  }

  let source: string;
  let root: SourceFileNode;
  try {
    source = fs.readFileSync(absolutePath, 'utf-8');
    root = parseTree(source);
  } catch (error) {
    io.err(`Error parsing ${filePath}: ${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }

  try {
    return execute(filePath, source, root, options, io);
  } catch (error) {
    if (!(error instanceof TreeError)) throw error;
    io.err(`Error: ${error.message}\n`);
    return 1;
  }
}

function execute(filePath: string, source: string, root: SourceFileNode, options: CliOptions, io: CliIO): number {
  if (options.check) {
    if (root.toString() !== source) {
      io.err(`Error: ${filePath} does not round-trip\n`);
      return 1;
    }
    io.out(`OK ${filePath}: ${root.find(isToken).length} tokens, ${root.find(isGroup).length} groups\n`);
    return 0;
  }

  if (options.stripComments) {
    stripComments(root);
  }
  if (options.rename) {
    renameWord(root, options.rename.from, options.rename.to);
  }

  if (options.find !== undefined) {
    for (const node of root.find(kindTest(options.find))) {
      io.out(`${describeMatch(node)}\n`);
    }
    return 0;
  }

  if (options.stats) {
    io.out(`${JSON.stringify(collectStats(filePath, source, root), null, 2)}\n`);
    return 0;
  }

  io.out(root.toString());
  return 0;
}

/** True when this module is the script node was started with, through any symlink. */
function isEntryPoint(): boolean {
  const script = process.argv[1];
  return script !== undefined && fs.existsSync(script) &&
    fs.realpathSync(script) === fileURLToPath(import.meta.url);
}

if (isEntryPoint()) {
  process.exitCode = run(process.argv.slice(2));
}
