// ---------------------------------------------------------------------------
// @rowscope/engine
//
// Static detector for ORM query API migration risks in Python code. Shared by
// the CLI and any tool that wants structured findings.
// ---------------------------------------------------------------------------

// Schemas
export {
  CategorySchema,
  FindingSchema,
  SeveritySchema,
  MEMBERSHIP_MARKER,
  type Category,
  type Finding,
  type ScanReport,
  type Severity,
} from "./schemas.js";

// Syntax
export {
  childrenOf,
  isComparisonOperator,
  type AttributeAccess,
  type CallExpr,
  type CompareExpr,
  type ComparisonOperator,
  type Literal,
  type NameRef,
  type Other,
  type SyntaxKind,
  type SyntaxNode,
} from "./syntax/nodes.js";

export { parsePython, resetPythonParser, type ParseOutcome } from "./syntax/python-parser.js";

// Analysis
export {
  renderNode,
  renderStructural,
  isRenderMode,
  RENDER_MODES,
  type RenderMode,
} from "./analysis/renderer.js";

export {
  classifyComparisonOperand,
  classifyMembershipArgument,
  hasSubqueryGuard,
  isQueryChain,
  isRowChain,
  membershipArgument,
} from "./analysis/classifiers.js";

export {
  DEFAULT_KEYWORDS,
  KEYWORD_CATEGORIES,
  MAX_CHAIN_DEPTH,
  extendKeywords,
  isKeywordCategory,
  matchesKeywords,
  type KeywordCategory,
  type KeywordRule,
  type KeywordTable,
} from "./analysis/heuristics.js";

export { visitTree, type VisitOptions } from "./analysis/visitor.js";

// Categories
export {
  getAllCategories,
  getCategoryInfo,
  severityRank,
  SEVERITY_ORDER,
  type CategoryInfo,
  type Confidence,
} from "./rules/categories.js";

// Scanning
export {
  scanSource,
  scanFile,
  scanDirectory,
  scanPath,
  describeScanError,
  loggingReporter,
  createCollectingReporter,
  DEFAULT_CONCURRENCY,
  type ScanError,
  type ScanOptions,
  type ScanReporter,
} from "./scan/scanner.js";

export {
  discoverSourceFiles,
  matchesIgnore,
  normalizeExtensions,
  DEFAULT_EXTENSIONS,
  type DiscoverOptions,
} from "./scan/discovery.js";

// Formatters
export { generateMarkdownReport, type ReportOptions } from "./formatters/markdown-report.js";
export { summarizeReport, type ReportSummary } from "./formatters/summary.js";

// Config
export {
  loadConfig,
  filterReport,
  didYouMean,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  type RowscopeConfig,
} from "./config.js";

// Logger
export { logger } from "./logger.js";
