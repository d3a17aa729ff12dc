#!/usr/bin/env node
import fs from 'node:fs/promises';
import { createColors } from 'colorette';

import { describeToken, parseBasic, createBasicLexer, createBasicGrammar } from '../basic/index';
import { loadConfig, type SrkConfig } from '../config';
import { LexerProfiler } from '../lexer/index';
import type { Grammar } from '../grammar/index';
import type { EngineEvent } from '../parser/index';
import {
  formatInfoMessage,
  formatLexerError,
  formatSuccessMessage,
  formatWarningMessage,
  getLocationFromOffset,
  printTree,
} from '../utils/index';
import type { BasicToken } from '../basic/index';

export interface CLIOptions {
  filePath?: string;
  input?: string;
  tokens: boolean;
  tree: boolean;
  json: boolean;
  strict: boolean;
  trace: boolean;
  color?: boolean;
  verbose: boolean;
  help: boolean;
}

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    tokens: false,
    tree: false,
    json: false,
    strict: false,
    trace: false,
    verbose: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--input':
        if (nextArg !== undefined) {
          options.input = nextArg;
          i++;
        }
        break;
      case '--tokens':
        options.tokens = true;
        break;
      case '--tree':
        options.tree = true;
        break;
      case '--json':
        options.json = true;
        break;
      case '--strict':
        options.strict = true;
        break;
      case '--trace':
        options.trace = true;
        break;
      case '--no-color':
        options.color = false;
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        if (!arg.startsWith('-') && options.filePath === undefined) {
          options.filePath = arg;
        }
    }
  }

  return options;
}

// Command line flags win over the config file
export function resolveSettings(options: CLIOptions, config: SrkConfig, env: NodeJS.ProcessEnv = process.env): SrkConfig {
  return {
    color: options.color ?? (env.NO_COLOR !== undefined && env.NO_COLOR !== '' ? false : config.color),
    leftover: options.strict ? 'strict' : config.leftover,
    trace: options.trace || config.trace,
    appendNewline: config.appendNewline,
  };
}

function createLog(useColor: boolean) {
  const c = createColors({ useColor });
  return {
    info: (msg: string) => console.log(formatInfoMessage(msg, useColor)),
    success: (msg: string) => console.log(formatSuccessMessage(msg, useColor)),
    error: (msg: string) => console.error(`${c.red('❌')} ${msg}`),
    warn: (msg: string) => console.warn(formatWarningMessage(msg, useColor)),
    debug: (msg: string) => console.log(c.dim(`🐛 ${msg}`)),
  };
}

function printHelp(useColor: boolean) {
  const c = createColors({ useColor });
  console.log(`
${c.bold('srk')} - Tiny BASIC front end on a shift-reduce engine

${c.bold('USAGE:')}
  srk <file.bas> [options]
  srk --input <source> [options]

${c.bold('OPTIONS:')}
  ${c.green('--input <text>')}     Parse the given source instead of a file
  ${c.green('--tokens')}           Print the token stream
  ${c.green('--tree')}             Print the parse tree of every line
  ${c.green('--json')}             Print the program as JSON
  ${c.green('--strict')}           Treat blank lines and leftovers as errors
  ${c.green('--trace')}            Log every shift and reduce
  ${c.green('--no-color')}         Disable colored output
  ${c.green('--verbose, -v')}      Enable verbose output
  ${c.green('--help, -h')}         Show this help

${c.bold('EXAMPLES:')}
  srk hello.bas --tree
  srk --input "10 PRINT \\"HI\\"" --tokens
`);
}

function describeEvent(event: EngineEvent<BasicToken>, grammar: Grammar<BasicToken>): string {
  return event.type === 'shift'
    ? `shift ${describeToken(event.token)} (depth ${event.depth})`
    : `reduce ${event.rule.describe(id => grammar.symbolName(id))} (depth ${event.depth})`;
}

export async function main(args: string[] = process.argv.slice(2)): Promise<number> {
  const options = parseArgs(args);
  const { config, errors } = loadConfig();
  const settings = resolveSettings(options, config);
  const log = createLog(settings.color);

  if (options.help || (options.filePath === undefined && options.input === undefined)) {
    printHelp(settings.color);
    return options.help ? 0 : 1;
  }

  if (errors.length > 0) {
    log.error('Invalid srk.config.json:');
    errors.forEach(err => console.error(`  - ${err}`));
    return 1;
  }

  let source: string;
  if (options.input !== undefined) {
    source = options.input;
  } else {
    const filePath = options.filePath ?? '';
    try {
      source = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      log.error(`Could not read ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
      return 1;
    }
  }
  const sourceFile = options.filePath ?? '<input>';

  if (options.tokens) {
    if (options.tree || options.json) {
      log.warn('--tokens only lexes; --tree and --json are ignored');
    }
    for (const item of createBasicLexer({ sourceFile }).tokenize(source)) {
      if (!item.success) {
        console.error(formatLexerError(item.error, source, settings.color));
        return 1;
      }
      const at = getLocationFromOffset(source, item.span.start);
      console.log(`${at.line}:${at.column}\t${item.token.kind}\t${describeToken(item.token)}`);
    }
    return 0;
  }

  const basic = createBasicGrammar();
  const { grammar } = basic;
  const profiler = options.verbose ? new LexerProfiler() : undefined;
  const result = parseBasic(source, {
    sourceFile,
    profiler,
    appendNewline: settings.appendNewline,
    leftover: settings.leftover,
    grammar: basic,
    tracer: settings.trace ? { trace: event => log.debug(describeEvent(event, grammar)) } : undefined,
  });

  if (profiler) {
    const report = profiler.getReport();
    log.info(`Lexed ${report.tokenCount} tokens, skipped ${report.skippedCount} characters in ${report.duration.toFixed(2)}ms`);
  }

  if (!result.success) {
    if (result.lexerError) {
      console.error(formatLexerError(result.lexerError, source, settings.color));
    } else {
      const where = result.lineNumber !== undefined ? ` (line ${result.lineNumber})` : '';
      log.error(`${sourceFile}: ${result.error}${where}`);
    }
    return 1;
  }

  if (options.tree) {
    for (const element of result.stack) {
      console.log(printTree(element, { symbolName: id => grammar.symbolName(id), tokenLabel: describeToken }));
    }
  }
  if (options.json) {
    console.log(JSON.stringify(result.program, null, 2));
  }
  if (!options.tree && !options.json) {
    log.success(`${sourceFile}: ${result.program.size} line${result.program.size === 1 ? '' : 's'} parsed`);
  }
  return 0;
}

if (require.main === module) {
  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled rejection:', reason);
    process.exit(1);
  });

  main().then(
    code => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err instanceof Error ? err.stack ?? err.message : String(err));
      process.exitCode = 1;
    }
  );
}
