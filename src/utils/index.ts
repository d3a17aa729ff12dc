// utils/index.ts
// ==========================
// 📦 Utility Exports
// ==========================

export {
  formatLocation,
  formatLexerError,
  formatParseFailure,
  formatSuccessMessage,
  formatWarningMessage,
  formatInfoMessage,
  formatErrorPosition,
} from './format';
export {
  traverseTree,
  findNodes,
  collectTokens,
  printTree,
  serializeTree,
  getTreeStats,
} from './tree';
export {
  highlightSnippet,
  getLocationFromOffset,
  locationFromSpan,
  getLine,
} from './highlight';
export type { TreeVisitor, TreeLabels, SerializedTree } from './tree';
export type { Location, Position, Span } from './types';
