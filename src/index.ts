// src/index.ts
// ===============================================
// 🌐 shift-reduce-kit Main API Surface (Public Entry)
// ===============================================

// 🧠 Symbols, Rules and Grammars
export {
  IdGenerator,
  SymbolId,
  Rule,
  RuleBuilder,
  Grammar,
  GrammarBuilder,
  leaf,
  node,
  isLeaf,
  isNode,
  type SymbolSchema,
  type TerminalSchema,
  type NonterminalSchema,
  type TokenPredicate,
  type ParseTree,
  type ParseLeaf,
  type ParseNode,
} from './grammar/index';

// 🔤 Lexer and Tokenization
export {
  LexerPipeline,
  LexerPipelineBuilder,
  LexerError,
  LexerProfiler,
  success,
  ignored,
  failed,
  isSuccess,
  isIgnored,
  isFailure,
  type LexerOutcome,
  type LexerSuccess,
  type LexerIgnored,
  type LexerFailure,
  type TokenRecognizer,
  type LexItem,
  type CollectResult,
  type PipelineOptions,
  type SourceLocation,
  type ProfileReport,
} from './lexer/index';
export {
  patternRecognizer,
  keywordRecognizer,
  charRecognizer,
  quotedRecognizer,
  type KeywordRecognizerOptions,
  type QuotedRecognizerOptions,
} from './lexer/recognizers';

// 📥 Parsing
export {
  ShiftReduceParser,
  parseSource,
  type LeftoverPolicy,
  type EngineEvent,
  type EngineTracer,
  type EngineOptions,
  type ParseResult,
  type ParseSuccess,
  type ParseFailure,
} from './parser/index';

// 🧾 Utilities and Tree Helpers
export {
  formatLocation,
  formatLexerError,
  formatParseFailure,
  highlightSnippet,
  printTree,
  serializeTree,
  traverseTree,
  type Location,
  type Position,
  type Span,
} from './utils/index';

// ⚙️ Configuration
export { defaultConfig, validateConfig, loadConfig, type SrkConfig } from './config';
